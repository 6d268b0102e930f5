import { Injectable } from '@nestjs/common';
import { StageFailureError } from '../pipeline/pipeline.errors';
import type { ActionContext, StageAction } from './stage-action';

const REVISION_PATTERN = /^[0-9a-zA-Z._\/-]+$/;

/**
 * Puts the workspace at the event's revision. Without a revision the working tree is used as is.
 */
@Injectable()
export class CheckoutAction implements StageAction {
  readonly name = 'checkout';

  async run(context: ActionContext): Promise<void> {
    const revision = context.event.revision;
    if (!revision) {
      context.log('No revision on the event; using the working tree as is');
      return;
    }
    if (!REVISION_PATTERN.test(revision)) {
      throw new StageFailureError(context.stage.name, 1, `Refusing to check out "${revision}"`);
    }

    const { exitCode } = await context.sh(`git checkout --force --detach ${revision}`);
    if (exitCode !== 0) {
      throw new StageFailureError(context.stage.name, exitCode);
    }
  }
}
