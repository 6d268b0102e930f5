import { parseGitEvent } from './git-event.parser';

describe('parseGitEvent', () => {
  it('takes the base branch and head commit of a pull request', () => {
    expect(
      parseGitEvent('pull_request', {
        action: 'opened',
        pull_request: { base: { ref: 'develop' }, head: { ref: 'feature-x', sha: 'abc123' } },
        repository: { full_name: 'example/space-battle' },
      }),
    ).toEqual({
      ok: true,
      event: { kind: 'pull_request', branch: 'develop', revision: 'abc123', repository: 'example/space-battle' },
    });
  });

  it('takes the pushed branch and the new head of a push', () => {
    expect(
      parseGitEvent('push', {
        ref: 'refs/heads/develop',
        after: 'def456',
        repository: { clone_url: 'https://git.example.test/space-battle.git' },
      }),
    ).toEqual({
      ok: true,
      event: {
        kind: 'push',
        branch: 'develop',
        revision: 'def456',
        repository: 'https://git.example.test/space-battle.git',
      },
    });
  });

  it('keeps slashes in branch names', () => {
    const parsed = parseGitEvent('push', { ref: 'refs/heads/release/1.0' });

    expect(parsed.ok && parsed.event.branch).toBe('release/1.0');
  });

  it.each(['synchronize', 'reopened'])('runs for the %s pull request action', (action) => {
    const parsed = parseGitEvent('pull_request', { action, pull_request: { base: { ref: 'main' } } });

    expect(parsed.ok).toBe(true);
  });

  it.each(['closed', 'labeled', 'edited'])('ignores the %s pull request action', (action) => {
    expect(parseGitEvent('pull_request', { action, pull_request: { base: { ref: 'main' } } })).toEqual({
      ok: false,
      reason: `pull_request action ${action} does not run checks`,
    });
  });

  it('ignores a pull request without an action', () => {
    expect(parseGitEvent('pull_request', { pull_request: { base: { ref: 'main' } } })).toEqual({
      ok: false,
      reason: 'pull_request action (none) does not run checks',
    });
  });

  it('ignores branch deletions', () => {
    expect(
      parseGitEvent('push', {
        ref: 'refs/heads/develop',
        after: '0000000000000000000000000000000000000000',
        deleted: true,
      }),
    ).toEqual({ ok: false, reason: 'refs/heads/develop was deleted' });
  });

  it('ignores tag pushes', () => {
    expect(parseGitEvent('push', { ref: 'refs/tags/v1.0' })).toEqual({
      ok: false,
      reason: 'refs/tags/v1.0 is not a branch',
    });
  });

  it('ignores unsupported events', () => {
    expect(parseGitEvent('issues', {})).toEqual({ ok: false, reason: 'unsupported event issues' });
    expect(parseGitEvent(undefined, {})).toEqual({ ok: false, reason: 'unsupported event (none)' });
  });

  it('flags malformed payloads as invalid', () => {
    expect(parseGitEvent('pull_request', { pull_request: { head: { sha: 'abc' } } })).toEqual({
      ok: false,
      invalid: true,
      reason: 'pull_request payload needs pull_request.base.ref',
    });
    expect(parseGitEvent('push', { after: 'abc' })).toEqual({
      ok: false,
      invalid: true,
      reason: 'push payload needs ref',
    });
  });
});
