import type { Artifact, LogLevel, StageDescriptor, TriggerEvent } from '../pipeline/pipeline.types';

/** `with:` inputs after secret bindings have been resolved. */
export type ActionInputs = Record<string, string | boolean>;

export interface ActionContext {
  stage: StageDescriptor;
  inputs: ActionInputs;
  event: TriggerEvent;
  workspaceDir: string;
  /** Artifacts this stage consumes, keyed by name. */
  artifacts: ReadonlyMap<string, Artifact>;
  signal: AbortSignal;
  log(line: string, level?: LogLevel): void;
  /** Runs a shell command in the workspace with the stage environment. Output is logged and returned. */
  sh(command: string): Promise<ShellResult>;
}

export interface ShellResult {
  exitCode: number;
  /** stdout and stderr lines in arrival order, secrets redacted. */
  lines: string[];
}

/**
 * A reusable stage body invoked through `uses:`. Resolves when the stage succeeded;
 * rejects with a PipelineError otherwise.
 */
export interface StageAction {
  readonly name: string;
  run(context: ActionContext): Promise<void>;
}

export const STAGE_ACTIONS = Symbol('STAGE_ACTIONS');

export function inputString(inputs: ActionInputs, key: string): string | undefined {
  const value = inputs[key];
  if (value === undefined) return undefined;
  return String(value);
}
