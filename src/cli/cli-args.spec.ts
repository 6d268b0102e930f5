import type { ExecutionResult } from '../pipeline/pipeline.types';
import { EXIT_FAILED, EXIT_OK, exitCodeFor, parseCliArgs } from './cli-args';

function failureMessage(argv: string[]): string {
  const parsed = parseCliArgs(argv);
  if (parsed.ok !== false) throw new Error(`expected a usage error for ${argv.join(' ')}`);
  return parsed.message;
}

describe('parseCliArgs', () => {
  it('builds the trigger event from long options', () => {
    expect(parseCliArgs(['--event', 'pull_request', '--branch', 'main', '--revision', 'abc123'])).toEqual({
      ok: true,
      options: { event: { kind: 'pull_request', branch: 'main', revision: 'abc123' }, workdir: undefined },
    });
  });

  it('accepts short options and a workdir', () => {
    expect(parseCliArgs(['-e', 'push', '-b', 'develop', '-C', '/srv/checkout'])).toEqual({
      ok: true,
      options: { event: { kind: 'push', branch: 'develop' }, workdir: '/srv/checkout' },
    });
  });

  it('asks for help', () => {
    expect(parseCliArgs(['--help'])).toEqual({ ok: 'help' });
  });

  it('names the missing options', () => {
    expect(failureMessage([])).toBe('--event: Required; --branch: Required');
  });

  it('rejects an unknown event kind', () => {
    expect(failureMessage(['--event', 'tag', '--branch', 'main'])).toBe(
      "--event: Invalid enum value. Expected 'pull_request' | 'push', received 'tag'",
    );
  });

  it('rejects unknown flags', () => {
    expect(failureMessage(['--event', 'push', '--branch', 'develop', '--force'])).toMatch(
      /^Unknown option '--force'/,
    );
  });
});

describe('exitCodeFor', () => {
  const base: ExecutionResult = {
    runId: 'run-1',
    pipeline: 'Checks Workflow',
    event: { kind: 'push', branch: 'develop' },
    status: 'succeeded',
    completedStages: [],
    stages: [],
    startedAt: new Date(0),
    finishedAt: new Date(0),
  };

  it('maps the run status to the process exit status', () => {
    expect(exitCodeFor(base)).toBe(EXIT_OK);
    expect(exitCodeFor({ ...base, status: 'failed' })).toBe(EXIT_FAILED);
    expect(exitCodeFor({ ...base, status: 'aborted' })).toBe(EXIT_FAILED);
  });
});
