import { ActionRegistry } from '../actions/action-registry';
import { CheckoutAction } from '../actions/checkout.action';
import { CodecovAction } from '../actions/codecov.action';
import { SetupPythonAction } from '../actions/setup-python.action';
import type { CoverageSink, CoverageUpload, CoverageUploadReceipt } from '../coverage/coverage-sink';
import type { ShellOptions } from '../pipeline/stage-executor.service';
import { StageExecutorService } from '../pipeline/stage-executor.service';
import type {
  ExecutionResult,
  LogLevel,
  RunReporter,
  StageResult,
} from '../pipeline/pipeline.types';

export interface ScriptedCommand {
  exitCode?: number;
  output?: string[];
  /** Side effect while "running", e.g. writing a report file. */
  effect?: (options: ShellOptions) => void;
}

/** Executor that records commands instead of spawning them. */
export class ScriptedExecutor extends StageExecutorService {
  readonly commands: string[] = [];

  constructor(private readonly script: Record<string, ScriptedCommand> = {}) {
    super();
  }

  override async runCommand(command: string, options: ShellOptions): Promise<number> {
    this.commands.push(command);
    const entry = this.script[command] ?? {};
    for (const line of entry.output ?? []) options.onLine(line, 'info');
    entry.effect?.(options);
    return entry.exitCode ?? 0;
  }
}

export class RecordingSink implements CoverageSink {
  readonly uploads: CoverageUpload[] = [];

  constructor(private readonly failure?: Error) {}

  async upload(request: CoverageUpload): Promise<CoverageUploadReceipt> {
    this.uploads.push(request);
    if (this.failure) throw this.failure;
    return { reportUrl: 'https://coverage.test/report/1' };
  }
}

export class RecordingReporter implements RunReporter {
  readonly events: string[] = [];
  readonly lines: Array<{ stageId: string; line: string; level: LogLevel }> = [];
  finished?: ExecutionResult;

  async runStarted(runId: string): Promise<void> {
    this.events.push(`run:${runId}`);
  }

  async stageStarted(_runId: string, stage: { id: string }): Promise<void> {
    this.events.push(`start:${stage.id}`);
  }

  stageLog(_runId: string, stageId: string, line: string, level: LogLevel): void {
    this.lines.push({ stageId, line, level });
  }

  async stageFinished(_runId: string, result: StageResult): Promise<void> {
    this.events.push(`finish:${result.id}:${result.status}`);
  }

  async runFinished(result: ExecutionResult): Promise<void> {
    this.finished = result;
    this.events.push(`done:${result.status}`);
  }
}

export function builtinActions(sink: CoverageSink): ActionRegistry {
  return new ActionRegistry([new CheckoutAction(), new SetupPythonAction(), new CodecovAction(sink)]);
}
