import { Injectable } from '@nestjs/common';
import { StageFailureError } from '../pipeline/pipeline.errors';
import { inputString } from './stage-action';
import type { ActionContext, StageAction } from './stage-action';

const VERSION_LINE = /^Python\s+(\S+)/;

/**
 * Checks that the interpreter on PATH is the pinned Python version.
 * Provisioning itself belongs to the host; this stage only refuses to go on with the wrong one.
 */
@Injectable()
export class SetupPythonAction implements StageAction {
  readonly name = 'setup-python';

  async run(context: ActionContext): Promise<void> {
    const pinned = inputString(context.inputs, 'python-version');
    const interpreter = inputString(context.inputs, 'python') ?? 'python';
    if (!pinned) {
      throw new StageFailureError(context.stage.name, 1, 'python-version input is required');
    }

    // older interpreters print the version on stderr
    const { exitCode, lines } = await context.sh(`${interpreter} --version 2>&1`);
    if (exitCode !== 0) {
      throw new StageFailureError(context.stage.name, exitCode, `${interpreter} is not available`);
    }

    const reported = lines
      .map((line) => VERSION_LINE.exec(line.trim())?.[1])
      .find((version): version is string => version !== undefined);
    if (!reported || !matchesPinnedVersion(reported, pinned)) {
      throw new StageFailureError(
        context.stage.name,
        1,
        `Expected Python ${pinned}, found ${reported ?? 'unknown version'}`,
      );
    }
    context.log(`Using Python ${reported}`);
  }
}

/** "3.9" matches "3.9.18" but not "3.90.1". */
export function matchesPinnedVersion(reported: string, pinned: string): boolean {
  return reported === pinned || reported.startsWith(`${pinned}.`);
}
