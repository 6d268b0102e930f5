/**
 * Database entities: pipeline_runs, stage_runs, stage_logs.
 */
export { PipelineRun } from './pipeline-run.entity';
export { StageRun } from './stage-run.entity';
export { StageLog } from './stage-log.entity';
