import { Logger } from '@nestjs/common';
import type {
  ExecutionResult,
  LogLevel,
  PipelineDefinition,
  RunReporter,
  StageDescriptor,
  StageResult,
  TriggerEvent,
} from '../pipeline/pipeline.types';

/** Prints stage progress and output through the Nest logger. */
export class ConsoleRunReporter implements RunReporter {
  private readonly logger = new Logger('checks');
  private total = 0;

  async runStarted(_runId: string, definition: PipelineDefinition, event: TriggerEvent): Promise<void> {
    this.total = definition.stages.length;
    this.logger.log(`${definition.name} (${event.kind} → ${event.branch})`);
  }

  async stageStarted(_runId: string, stage: StageDescriptor, index: number): Promise<void> {
    this.logger.log(`[${index + 1}/${this.total}] ${stage.name}`);
  }

  stageLog(_runId: string, stageId: string, line: string, level: LogLevel): void {
    const message = `  ${line}`;
    if (level === 'error') this.logger.error(message, undefined, stageId);
    else if (level === 'warn') this.logger.warn(message, stageId);
    else this.logger.log(message, stageId);
  }

  async stageFinished(_runId: string, result: StageResult): Promise<void> {
    const code = result.exitCode === null ? '' : ` (exit ${result.exitCode})`;
    this.logger.log(`${result.name}: ${result.status}${code}`);
  }

  async runFinished(result: ExecutionResult): Promise<void> {
    const summary = result.stages.map((stage) => `${stage.status.padEnd(9)} ${stage.name}`).join('\n');
    this.logger.log(`Summary:\n${summary}`);
  }
}
