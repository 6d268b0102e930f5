import { Inject, Injectable } from '@nestjs/common';
import { COVERAGE_SINK } from '../coverage/coverage-sink';
import type { CoverageSink } from '../coverage/coverage-sink';
import { MissingSecretError, UploadFailureError } from '../pipeline/pipeline.errors';
import { inputString } from './stage-action';
import type { ActionContext, StageAction } from './stage-action';

/**
 * Hands the consumed coverage artifact to the coverage sink.
 * Inputs: token, flags (comma separated), and optionally artifact to pick one of several consumed artifacts.
 */
@Injectable()
export class CodecovAction implements StageAction {
  readonly name = 'codecov';

  constructor(@Inject(COVERAGE_SINK) private readonly sink: CoverageSink) {}

  async run(context: ActionContext): Promise<void> {
    const token = inputString(context.inputs, 'token');
    if (!token) {
      throw new MissingSecretError('token');
    }

    const wanted = inputString(context.inputs, 'artifact');
    const artifact = wanted ? context.artifacts.get(wanted) : [...context.artifacts.values()][0];
    if (!artifact) {
      throw new UploadFailureError('No coverage artifact to upload');
    }

    const flags = (inputString(context.inputs, 'flags') ?? '')
      .split(',')
      .map((flag) => flag.trim())
      .filter(Boolean);

    context.log(`Uploading ${artifact.path} with flags [${flags.join(', ')}]`);
    const receipt = await this.sink.upload({
      artifact,
      token,
      flags,
      commit: context.event.revision,
      branch: context.event.branch,
      signal: context.signal,
    });
    if (receipt.reportUrl) context.log(`Report: ${receipt.reportUrl}`);
  }
}
