/**
 * Pipeline definition and run result types.
 * Definitions are built once (see PipelineBuilder) and never mutated while a run is in progress.
 */

export type EventKind = 'pull_request' | 'push';

/** Incoming repository event: what happened and which branch it targets. */
export interface TriggerEvent {
  kind: EventKind;
  /** Destination branch: PR base branch, or the pushed branch. */
  branch: string;
  /** Commit to check out, when the event carries one. */
  revision?: string;
  repository?: string;
}

export interface TriggerRule {
  kind: EventKind;
  branches: readonly string[];
}

/** A literal value, or a reference resolved from the SecretStore at execution time. */
export type EnvBinding = string | { secret: string };

export interface ArtifactSpec {
  name: string;
  /** Relative to the workspace directory. */
  path: string;
}

export interface ActionInvocation {
  name: string;
  with?: Record<string, EnvBinding | boolean>;
}

export interface StageDescriptor {
  id: string;
  name: string;
  run?: readonly string[];
  uses?: ActionInvocation;
  env?: Record<string, EnvBinding>;
  produces?: ArtifactSpec;
  consumes?: readonly string[];
  /** When false, a missing secret or a sink error skips the stage instead of failing the run. */
  failOnError: boolean;
  timeoutMs?: number;
}

export interface PipelineDefinition {
  name: string;
  triggers: readonly TriggerRule[];
  stages: readonly StageDescriptor[];
}

export interface Artifact {
  name: string;
  /** Absolute path on disk. */
  path: string;
  producedBy: string;
}

export type RunStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'aborted';

export type StageStatus = 'succeeded' | 'failed' | 'skipped' | 'timed_out' | 'not_run';

export type LogLevel = 'info' | 'warn' | 'error';

export interface StageError {
  code: string;
  message: string;
}

export interface StageResult {
  id: string;
  name: string;
  status: StageStatus;
  exitCode: number | null;
  /** Captured output, secrets already redacted. */
  output: string[];
  artifact?: Artifact;
  error?: StageError;
  startedAt?: Date;
  finishedAt?: Date;
}

export interface ExecutionResult {
  runId: string;
  pipeline: string;
  event: TriggerEvent;
  status: Extract<RunStatus, 'succeeded' | 'failed' | 'aborted'>;
  completedStages: string[];
  failedStage?: { id: string; name: string; error: StageError };
  stages: StageResult[];
  startedAt: Date;
  finishedAt: Date;
}

/**
 * Observer of a run's progress. The HTTP service persists through it, the CLI logs through it.
 */
export interface RunReporter {
  runStarted(runId: string, definition: PipelineDefinition, event: TriggerEvent): Promise<void>;
  stageStarted(runId: string, stage: StageDescriptor, index: number): Promise<void>;
  stageLog(runId: string, stageId: string, line: string, level: LogLevel): void;
  stageFinished(runId: string, result: StageResult, index: number): Promise<void>;
  runFinished(result: ExecutionResult): Promise<void>;
}
