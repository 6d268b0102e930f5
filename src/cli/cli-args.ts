import { parseArgs } from 'node:util';
import { triggerEventSchema } from '../dto/trigger-run.dto';
import type { ExecutionResult, TriggerEvent } from '../pipeline/pipeline.types';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

const OPTION_FOR_FIELD: Record<string, string> = { kind: 'event' };

export interface CliOptions {
  event: TriggerEvent;
  workdir?: string;
}

export type ParsedCli = { ok: true; options: CliOptions } | { ok: false; message: string };

export function usage(): string {
  return [
    'checks-runner --event <pull_request|push> --branch <name> [options]',
    '',
    'Options:',
    '  -e, --event <kind>      Event kind: pull_request or push',
    '  -b, --branch <name>     Destination branch (PR base, or pushed branch)',
    '  -r, --revision <sha>    Commit to check out before running',
    '  -C, --workdir <dir>     Workspace to run in (default: WORKSPACE_DIR or cwd)',
    '  -h, --help              Show help',
    '',
    'Exit status: 0 when the run succeeded or the event matched no trigger, 1 when it failed.',
    '',
  ].join('\n');
}

export function parseCliArgs(argv: string[]): ParsedCli | { ok: 'help' } {
  let values: { [option: string]: string | boolean | (string | boolean)[] | undefined };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        event: { type: 'string', short: 'e' },
        branch: { type: 'string', short: 'b' },
        revision: { type: 'string', short: 'r' },
        workdir: { type: 'string', short: 'C' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
    }));
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }

  if (values.help === true) return { ok: 'help' };

  const parsed = triggerEventSchema.safeParse({
    kind: values.event,
    branch: values.branch,
    revision: values.revision,
  });
  if (!parsed.success) {
    return {
      ok: false,
      message: parsed.error.issues
        .map((issue) => `--${OPTION_FOR_FIELD[String(issue.path[0])] ?? issue.path.join('.')}: ${issue.message}`)
        .join('; '),
    };
  }

  const workdir = typeof values.workdir === 'string' ? values.workdir : undefined;
  return { ok: true, options: { event: parsed.data, workdir } };
}

export function exitCodeFor(result: ExecutionResult): number {
  return result.status === 'succeeded' ? EXIT_OK : EXIT_FAILED;
}
