import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineRun } from '../../database/entities/pipeline-run.entity';
import { StageRun } from '../../database/entities/stage-run.entity';
import { StageLog } from '../../database/entities/stage-log.entity';
import type { ExecutionResult, StageResult, TriggerEvent } from '../../pipeline/pipeline.types';

/**
 * Run history in Postgres: pipeline_runs, stage_runs, stage_logs.
 */
@Injectable()
export class RunHistoryService {
  constructor(private readonly dataSource: DataSource) {}

  private get runs() {
    return this.dataSource.getRepository(PipelineRun);
  }

  private get stages() {
    return this.dataSource.getRepository(StageRun);
  }

  async createRun(
    runId: string,
    pipelineName: string,
    event: TriggerEvent,
    triggerType: string,
    triggerMetadata: Record<string, unknown> | null,
  ): Promise<PipelineRun> {
    const run = this.runs.create({
      id: runId,
      pipeline_name: pipelineName,
      trigger_type: triggerType,
      event_kind: event.kind,
      branch: event.branch,
      revision: event.revision ?? null,
      trigger_metadata: triggerMetadata,
      status: 'pending',
    });
    return this.runs.save(run);
  }

  async markRunning(runId: string): Promise<void> {
    await this.runs.update({ id: runId }, { status: 'running', started_at: new Date() });
  }

  /** Returns the stage_runs row id. */
  async startStage(runId: string, stageKey: string, name: string, order: number): Promise<string> {
    const stage = this.stages.create({
      pipeline_run_id: runId,
      stage_key: stageKey,
      name,
      stage_order: order,
      status: 'running',
      started_at: new Date(),
    });
    const saved = await this.stages.save(stage);
    return saved.id;
  }

  async finishStage(stageRunId: string, result: StageResult): Promise<void> {
    await this.stages.update(
      { id: stageRunId },
      {
        status: result.status,
        exit_code: result.exitCode,
        artifact_path: result.artifact?.path ?? null,
        error_code: result.error?.code ?? null,
        error_message: result.error?.message ?? null,
        completed_at: result.finishedAt ?? new Date(),
      },
    );
  }

  async finishRun(result: ExecutionResult): Promise<void> {
    await this.runs.update(
      { id: result.runId },
      {
        status: result.status,
        failed_stage: result.failedStage?.id ?? null,
        error_code: result.failedStage?.error.code ?? null,
        error_message: result.failedStage?.error.message ?? null,
        completed_at: result.finishedAt,
      },
    );
  }

  /** The runner itself threw (e.g. the database went away mid-run). */
  async markCrashed(runId: string, message: string): Promise<void> {
    await this.runs.update(
      { id: runId },
      { status: 'failed', error_code: 'RUNNER_ERROR', error_message: message, completed_at: new Date() },
    );
  }

  async findAll(branch?: string): Promise<PipelineRun[]> {
    return this.runs.find({
      where: branch ? { branch } : undefined,
      order: { created_at: 'DESC' },
      take: 100,
    });
  }

  async findOneWithStages(runId: string): Promise<PipelineRun | null> {
    return this.runs.findOne({
      where: { id: runId },
      relations: ['stages'],
      order: { stages: { stage_order: 'ASC' } },
    });
  }

  async getStageLogs(runId: string, stageRunId: string): Promise<StageLog[]> {
    return this.dataSource.getRepository(StageLog).find({
      where: { stage_run_id: stageRunId, stage_run: { pipeline_run_id: runId } },
      order: { line_no: 'ASC' },
    });
  }
}
