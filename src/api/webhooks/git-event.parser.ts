import { z } from 'zod';
import type { TriggerEvent } from '../../pipeline/pipeline.types';

const repositorySchema = z
  .object({ full_name: z.string().optional(), clone_url: z.string().optional() })
  .passthrough()
  .optional();

const pullRequestPayload = z
  .object({
    action: z.string().optional(),
    pull_request: z
      .object({
        base: z.object({ ref: z.string().min(1) }).passthrough(),
        head: z.object({ sha: z.string().min(1).optional() }).passthrough().optional(),
      })
      .passthrough(),
    repository: repositorySchema,
  })
  .passthrough();

const pushPayload = z
  .object({
    ref: z.string().min(1),
    after: z.string().min(1).optional(),
    deleted: z.boolean().optional(),
    repository: repositorySchema,
  })
  .passthrough();

const BRANCH_REF = 'refs/heads/';

/** Pull request actions that change the code under review. */
const RUN_ON_PR_ACTIONS: readonly string[] = ['opened', 'synchronize', 'reopened'];

export type ParsedGitEvent =
  | { ok: true; event: TriggerEvent }
  | { ok: false; reason: string; invalid?: boolean };

function repositoryName(repo: z.infer<typeof repositorySchema>): string | undefined {
  return repo?.full_name ?? repo?.clone_url;
}

/**
 * Turns a GitHub-style webhook into a TriggerEvent.
 * `eventName` is the X-GitHub-Event header (or `event` in the body).
 * Unsupported event kinds, pull request actions other than opened/synchronize/reopened,
 * tag pushes and branch deletions are not errors; malformed payloads are.
 */
export function parseGitEvent(eventName: string | undefined, body: unknown): ParsedGitEvent {
  if (eventName === 'pull_request') {
    const parsed = pullRequestPayload.safeParse(body);
    if (!parsed.success) {
      return { ok: false, invalid: true, reason: 'pull_request payload needs pull_request.base.ref' };
    }
    const { action, pull_request, repository } = parsed.data;
    if (action === undefined || !RUN_ON_PR_ACTIONS.includes(action)) {
      return { ok: false, reason: `pull_request action ${action ?? '(none)'} does not run checks` };
    }
    return {
      ok: true,
      event: {
        kind: 'pull_request',
        branch: pull_request.base.ref,
        revision: pull_request.head?.sha,
        repository: repositoryName(repository),
      },
    };
  }

  if (eventName === 'push') {
    const parsed = pushPayload.safeParse(body);
    if (!parsed.success) {
      return { ok: false, invalid: true, reason: 'push payload needs ref' };
    }
    const { ref, after, deleted, repository } = parsed.data;
    if (!ref.startsWith(BRANCH_REF)) {
      return { ok: false, reason: `${ref} is not a branch` };
    }
    if (deleted === true) {
      return { ok: false, reason: `${ref} was deleted` };
    }
    return {
      ok: true,
      event: {
        kind: 'push',
        branch: ref.slice(BRANCH_REF.length),
        revision: after,
        repository: repositoryName(repository),
      },
    };
  }

  return { ok: false, reason: `unsupported event ${eventName ?? '(none)'}` };
}
