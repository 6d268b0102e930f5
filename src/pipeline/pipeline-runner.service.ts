import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ActionRegistry } from '../actions/action-registry';
import type { ActionContext, ActionInputs, ShellResult } from '../actions/stage-action';
import { ArtifactRegistry } from './artifact-registry';
import {
  MissingSecretError,
  PipelineError,
  StageFailureError,
  StageTimeoutError,
  TriggerMismatchError,
} from './pipeline.errors';
import type {
  Artifact,
  EnvBinding,
  ExecutionResult,
  LogLevel,
  PipelineDefinition,
  RunReporter,
  StageDescriptor,
  StageResult,
  TriggerEvent,
} from './pipeline.types';
import { SecretStore } from './secret-store';
import { StageExecutorService } from './stage-executor.service';
import type { ShellOptions } from './stage-executor.service';
import { matchesAnyTrigger } from './trigger-matcher';

export interface ExecutionContext {
  event: TriggerEvent;
  secrets: SecretStore;
  workspaceDir: string;
  /** Base environment for every stage. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  reporter?: RunReporter;
  runId?: string;
  /** Applied to stages without their own timeoutMs. 0 or unset means no limit. */
  defaultTimeoutMs?: number;
}

interface StageRun {
  runId: string;
  stage: StageDescriptor;
  context: ExecutionContext;
  env: NodeJS.ProcessEnv;
  artifacts: ArtifactRegistry;
  reporter: RunReporter;
}

const silentReporter: RunReporter = {
  async runStarted() {},
  async stageStarted() {},
  stageLog() {},
  async stageFinished() {},
  async runFinished() {},
};

function resolveBinding(binding: EnvBinding, secrets: SecretStore): string {
  if (typeof binding === 'string') return binding;
  const value = secrets.get(binding.secret);
  if (value === undefined) throw new MissingSecretError(binding.secret);
  return value;
}

function resolveEnv(
  bindings: Record<string, EnvBinding> | undefined,
  secrets: SecretStore,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, binding] of Object.entries(bindings ?? {})) {
    env[name] = resolveBinding(binding, secrets);
  }
  return env;
}

/** Drops every secret from an inherited environment; stages only see secrets they bind. */
function withoutSecrets(env: NodeJS.ProcessEnv, secrets: SecretStore): NodeJS.ProcessEnv {
  const stripped = { ...env };
  for (const name of secrets.names()) delete stripped[name];
  return stripped;
}

function resolveInputs(
  inputs: Record<string, EnvBinding | boolean> | undefined,
  secrets: SecretStore,
): ActionInputs {
  const resolved: ActionInputs = {};
  for (const [name, binding] of Object.entries(inputs ?? {})) {
    resolved[name] = typeof binding === 'boolean' ? binding : resolveBinding(binding, secrets);
  }
  return resolved;
}

/**
 * Runs a pipeline definition: stages strictly in declared order, each exactly once,
 * stopping at the first stage that fails.
 *
 * Stage outcomes:
 * - succeeded: commands exited 0 (or the action resolved) and any declared artifact exists
 * - skipped: the stage failed but is not failure-fatal (failOnError: false); the run goes on
 * - failed / timed_out: the run ends; remaining stages are reported as not_run
 */
@Injectable()
export class PipelineRunnerService {
  private readonly logger = new Logger(PipelineRunnerService.name);

  constructor(
    private readonly executor: StageExecutorService,
    private readonly actions: ActionRegistry,
  ) {}

  evaluate(definition: PipelineDefinition, event: TriggerEvent): boolean {
    return matchesAnyTrigger(definition.triggers, event);
  }

  async execute(
    definition: PipelineDefinition,
    context: ExecutionContext,
  ): Promise<ExecutionResult> {
    const { event } = context;
    if (!this.evaluate(definition, event)) {
      throw new TriggerMismatchError(event.kind, event.branch);
    }

    const runId = context.runId ?? randomUUID();
    const reporter = context.reporter ?? silentReporter;
    const artifacts = new ArtifactRegistry();
    const baseEnv = context.env ?? process.env;
    const startedAt = new Date();

    const stages: StageResult[] = [];
    const completedStages: string[] = [];
    let failedStage: ExecutionResult['failedStage'];
    let status: ExecutionResult['status'] = 'succeeded';

    this.logger.log(
      `[${runId}] ${definition.name}: ${event.kind} on ${event.branch}, ${definition.stages.length} stages`,
    );
    await reporter.runStarted(runId, definition, event);

    for (const [index, stage] of definition.stages.entries()) {
      if (failedStage) {
        stages.push({ id: stage.id, name: stage.name, status: 'not_run', exitCode: null, output: [] });
        continue;
      }

      await reporter.stageStarted(runId, stage, index);
      const result = await this.runStage({
        runId,
        stage,
        context,
        env: baseEnv,
        artifacts,
        reporter,
      });
      stages.push(result);
      await reporter.stageFinished(runId, result, index);

      if (result.status === 'succeeded' || result.status === 'skipped') {
        completedStages.push(stage.id);
        continue;
      }

      failedStage = {
        id: stage.id,
        name: stage.name,
        error: result.error ?? { code: 'STAGE_FAILURE', message: `Stage "${stage.name}" failed` },
      };
      status = result.status === 'timed_out' ? 'aborted' : 'failed';
    }

    const result: ExecutionResult = {
      runId,
      pipeline: definition.name,
      event,
      status,
      completedStages,
      failedStage,
      stages,
      startedAt,
      finishedAt: new Date(),
    };

    if (failedStage) {
      this.logger.error(
        `[${runId}] ${status} at "${failedStage.name}": ${failedStage.error.message}`,
      );
    } else {
      this.logger.log(`[${runId}] succeeded`);
    }
    await reporter.runFinished(result);
    return result;
  }

  private async runStage(run: StageRun): Promise<StageResult> {
    const { stage, context, runId, reporter } = run;
    const { secrets } = context;
    const startedAt = new Date();
    const output: string[] = [];
    const log = (line: string, level: LogLevel = 'info') => {
      const clean = secrets.redact(line);
      output.push(clean);
      reporter.stageLog(runId, stage.id, clean, level);
    };

    const timeoutMs = stage.timeoutMs ?? (context.defaultTimeoutMs || undefined);
    const controller = new AbortController();
    const timer = timeoutMs ? setTimeout(() => controller.abort(), timeoutMs) : null;
    let exitCode: number | null = null;

    try {
      const env = { ...withoutSecrets(run.env, secrets), ...resolveEnv(stage.env, secrets) };
      const consumed = this.takeArtifacts(stage, run.artifacts);

      if (stage.run) {
        exitCode = await this.executor.runSequence(stage.run, {
          cwd: context.workspaceDir,
          env,
          onLine: log,
          signal: controller.signal,
        });
        if (controller.signal.aborted && timeoutMs) throw new StageTimeoutError(stage.name, timeoutMs);
        if (exitCode !== 0) throw new StageFailureError(stage.name, exitCode);
      } else if (stage.uses) {
        const action = this.actions.get(stage.uses.name);
        const actionContext: ActionContext = {
          stage,
          inputs: resolveInputs(stage.uses.with, secrets),
          event: context.event,
          workspaceDir: context.workspaceDir,
          artifacts: consumed,
          signal: controller.signal,
          log,
          sh: (command) =>
            this.shell(command, { cwd: context.workspaceDir, env, signal: controller.signal }, log, secrets),
        };
        await action.run(actionContext);
        if (controller.signal.aborted && timeoutMs) throw new StageTimeoutError(stage.name, timeoutMs);
        exitCode = 0;
      }

      const artifact = stage.produces
        ? await this.collectArtifact(stage, context.workspaceDir, run.artifacts)
        : undefined;

      return {
        id: stage.id,
        name: stage.name,
        status: 'succeeded',
        exitCode,
        output,
        artifact,
        startedAt,
        finishedAt: new Date(),
      };
    } catch (err) {
      const error =
        controller.signal.aborted && timeoutMs
          ? new StageTimeoutError(stage.name, timeoutMs)
          : this.toPipelineError(err, stage, exitCode);
      const message = secrets.redact(error.message);
      const fatal = stage.failOnError || error instanceof StageTimeoutError;

      log(message, fatal ? 'error' : 'warn');
      if (!fatal) {
        this.logger.warn(`[${runId}] "${stage.name}" skipped: ${message}`);
      }

      return {
        id: stage.id,
        name: stage.name,
        status: error instanceof StageTimeoutError ? 'timed_out' : fatal ? 'failed' : 'skipped',
        exitCode: error instanceof StageFailureError ? error.exitCode : exitCode,
        output,
        error: { code: error.code, message },
        startedAt,
        finishedAt: new Date(),
      };
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  private async shell(
    command: string,
    options: Omit<ShellOptions, 'onLine'>,
    log: (line: string, level?: LogLevel) => void,
    secrets: SecretStore,
  ): Promise<ShellResult> {
    const lines: string[] = [];
    log(`$ ${command}`);
    const exitCode = await this.executor.runCommand(command, {
      ...options,
      onLine: (line, level) => {
        log(line, level);
        lines.push(secrets.redact(line));
      },
    });
    return { exitCode, lines };
  }

  private takeArtifacts(stage: StageDescriptor, registry: ArtifactRegistry): Map<string, Artifact> {
    const taken = new Map<string, Artifact>();
    for (const name of stage.consumes ?? []) {
      const artifact = registry.take(name);
      if (!artifact) {
        throw new StageFailureError(stage.name, 1, `Artifact "${name}" is not available`);
      }
      taken.set(name, artifact);
    }
    return taken;
  }

  private async collectArtifact(
    stage: StageDescriptor,
    workspaceDir: string,
    registry: ArtifactRegistry,
  ): Promise<Artifact | undefined> {
    if (!stage.produces) return undefined;
    const path = resolve(workspaceDir, stage.produces.path);
    const found = await stat(path).then(
      (info) => info.isFile(),
      () => false,
    );
    if (!found) {
      throw new StageFailureError(
        stage.name,
        1,
        `Stage "${stage.name}" did not produce ${stage.produces.path}`,
      );
    }
    const artifact: Artifact = { name: stage.produces.name, path, producedBy: stage.id };
    registry.register(artifact);
    return artifact;
  }

  private toPipelineError(err: unknown, stage: StageDescriptor, exitCode: number | null): PipelineError {
    if (err instanceof PipelineError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new StageFailureError(stage.name, exitCode ?? 1, `Stage "${stage.name}" crashed: ${message}`);
  }
}
