export type PipelineErrorCode =
  | 'TRIGGER_MISMATCH'
  | 'STAGE_FAILURE'
  | 'MISSING_SECRET'
  | 'UPLOAD_FAILURE'
  | 'STAGE_TIMEOUT'
  | 'PIPELINE_DEFINITION'
  | 'UNKNOWN_ACTION';

/**
 * Base class for everything the runner raises. Subclasses carry a stable code and a default message.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { code: PipelineErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

/** Event matched no trigger rule. Not a failure: the pipeline simply never starts. */
export class TriggerMismatchError extends PipelineError {
  readonly code = 'TRIGGER_MISMATCH';

  constructor(kind: string, branch: string) {
    super(`No trigger rule matches ${kind} on branch "${branch}"`);
  }
}

export class StageFailureError extends PipelineError {
  readonly code = 'STAGE_FAILURE';

  constructor(
    readonly stageName: string,
    readonly exitCode: number,
    message = `Stage "${stageName}" exited with code ${exitCode}`,
  ) {
    super(message);
  }
}

export class MissingSecretError extends PipelineError {
  readonly code = 'MISSING_SECRET';

  constructor(readonly secretName: string) {
    super(`Required secret ${secretName} is not set`);
  }
}

export class UploadFailureError extends PipelineError {
  readonly code = 'UPLOAD_FAILURE';

  constructor(
    message = 'Coverage upload failed',
    readonly status?: number,
  ) {
    super(message);
  }
}

export class StageTimeoutError extends PipelineError {
  readonly code = 'STAGE_TIMEOUT';

  constructor(
    readonly stageName: string,
    readonly timeoutMs: number,
  ) {
    super(`Stage "${stageName}" exceeded ${timeoutMs}ms and was stopped`);
  }
}

export class PipelineDefinitionError extends PipelineError {
  readonly code = 'PIPELINE_DEFINITION';

  constructor(readonly issues: string[]) {
    super(`Invalid pipeline definition: ${issues.join('; ')}`);
  }
}

export class UnknownActionError extends PipelineError {
  readonly code = 'UNKNOWN_ACTION';

  constructor(readonly actionName: string) {
    super(`No action registered under "${actionName}"`);
  }
}
