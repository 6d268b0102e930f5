import { Logger } from '@nestjs/common';
import type {
  ExecutionResult,
  LogLevel,
  RunReporter,
  StageDescriptor,
  StageResult,
} from '../../pipeline/pipeline.types';
import { LogStreamService } from '../../streaming/log-stream.service';
import { RunHistoryService } from './run-history.service';

/**
 * Records one run as it progresses. Created per run; stage row ids are kept in memory
 * so log lines can be attached to them.
 */
export class DatabaseRunReporter implements RunReporter {
  private readonly logger = new Logger(DatabaseRunReporter.name);
  private readonly stageRows = new Map<string, string>();
  private readonly lineNumbers = new Map<string, number>();

  constructor(
    private readonly history: Pick<RunHistoryService, 'markRunning' | 'startStage' | 'finishStage' | 'finishRun'>,
    private readonly logStream: Pick<LogStreamService, 'appendLog'>,
  ) {}

  async runStarted(runId: string): Promise<void> {
    await this.history.markRunning(runId);
  }

  async stageStarted(runId: string, stage: StageDescriptor, index: number): Promise<void> {
    const stageRunId = await this.history.startStage(runId, stage.id, stage.name, index);
    this.stageRows.set(stage.id, stageRunId);
  }

  stageLog(runId: string, stageId: string, line: string, level: LogLevel): void {
    const stageRunId = this.stageRows.get(stageId);
    if (!stageRunId) return;

    const lineNo = (this.lineNumbers.get(stageRunId) ?? 0) + 1;
    this.lineNumbers.set(stageRunId, lineNo);

    this.logStream
      .appendLog({
        run_id: runId,
        stage_run_id: stageRunId,
        stage: stageId,
        line_no: lineNo,
        log_line: line,
        log_level: level,
      })
      .catch((err: unknown) => {
        this.logger.warn(
          `Could not store log line ${lineNo} of ${stageId}: ${err instanceof Error ? err.message : String(err)}`,
        );
      });
  }

  async stageFinished(_runId: string, result: StageResult): Promise<void> {
    const stageRunId = this.stageRows.get(result.id);
    if (!stageRunId) return;
    await this.history.finishStage(stageRunId, result);
  }

  async runFinished(result: ExecutionResult): Promise<void> {
    await this.history.finishRun(result);
  }
}
