import {
  ConflictException,
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { WorkspaceLockService } from '../../locks/workspace-lock.service';
import { PipelineRunnerService } from '../../pipeline/pipeline-runner.service';
import { CHECKS_PIPELINE } from '../../pipeline/pipeline.module';
import type { PipelineDefinition, TriggerEvent } from '../../pipeline/pipeline.types';
import { SecretStore } from '../../pipeline/secret-store';
import { LogStreamService } from '../../streaming/log-stream.service';
import { DatabaseRunReporter } from './database-run-reporter';
import { RunHistoryService } from './run-history.service';

export type TriggerOutcome =
  | { triggered: false; reason: string }
  | { triggered: true; runId: string; status: 'pending' };

/**
 * Starts pipeline runs for incoming events. A matching event gets a run row and the run
 * continues in the background; callers poll /runs/:id or follow /stream/logs/:runId.
 */
@Injectable()
export class RunsService implements OnApplicationShutdown {
  private readonly logger = new Logger(RunsService.name);
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    @Inject(CHECKS_PIPELINE) private readonly pipeline: PipelineDefinition,
    private readonly runner: PipelineRunnerService,
    private readonly history: RunHistoryService,
    private readonly logStream: LogStreamService,
    private readonly locks: WorkspaceLockService,
    private readonly secrets: SecretStore,
    private readonly configService: ConfigService,
  ) {}

  get definition(): PipelineDefinition {
    return this.pipeline;
  }

  private get workspaceDir(): string {
    return this.configService.get<string>('WORKSPACE_DIR') ?? process.cwd();
  }

  async trigger(
    event: TriggerEvent,
    triggerType: string,
    triggerMetadata: Record<string, unknown> | null = null,
  ): Promise<TriggerOutcome> {
    if (!this.runner.evaluate(this.pipeline, event)) {
      this.logger.log(`Ignoring ${event.kind} on ${event.branch}: no trigger matches`);
      return { triggered: false, reason: `no trigger matches ${event.kind} on ${event.branch}` };
    }

    const workspaceDir = this.workspaceDir;
    const lock = await this.locks.tryAcquire(workspaceDir);
    if (!lock.acquired) {
      throw new ConflictException(`A run is already using ${workspaceDir}`);
    }

    const runId = randomUUID();
    try {
      await this.history.createRun(runId, this.pipeline.name, event, triggerType, triggerMetadata);
    } catch (err) {
      await lock.release();
      throw err;
    }

    const task = this.runInBackground(runId, event, workspaceDir, lock.release);
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));

    return { triggered: true, runId, status: 'pending' };
  }

  /** Waits for runs still in progress so their final status gets written. */
  async onApplicationShutdown(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private async runInBackground(
    runId: string,
    event: TriggerEvent,
    workspaceDir: string,
    release: () => Promise<void>,
  ): Promise<void> {
    try {
      await this.runner.execute(this.pipeline, {
        runId,
        event,
        workspaceDir,
        secrets: this.secrets,
        reporter: new DatabaseRunReporter(this.history, this.logStream),
        defaultTimeoutMs: this.configService.get<number>('STAGE_TIMEOUT_MS'),
      });
    } catch (err) {
      const message = this.secrets.redact(err instanceof Error ? err.message : String(err));
      this.logger.error(`[${runId}] runner error: ${message}`);
      await this.history
        .markCrashed(runId, message)
        .catch((markErr: unknown) =>
          this.logger.error(`[${runId}] could not record failure: ${String(markErr)}`),
        );
    } finally {
      await release().catch((releaseErr: unknown) =>
        this.logger.warn(`Could not release workspace lock: ${String(releaseErr)}`),
      );
    }
  }
}
