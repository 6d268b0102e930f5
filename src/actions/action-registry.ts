import { Inject, Injectable } from '@nestjs/common';
import { UnknownActionError } from '../pipeline/pipeline.errors';
import { STAGE_ACTIONS } from './stage-action';
import type { StageAction } from './stage-action';

export const BUILTIN_ACTION_NAMES = ['checkout', 'setup-python', 'codecov'] as const;

@Injectable()
export class ActionRegistry {
  private readonly actions = new Map<string, StageAction>();

  constructor(@Inject(STAGE_ACTIONS) actions: StageAction[]) {
    for (const action of actions) {
      this.actions.set(action.name, action);
    }
  }

  get(name: string): StageAction {
    const action = this.actions.get(name);
    if (!action) throw new UnknownActionError(name);
    return action;
  }
}
