import { Injectable } from '@nestjs/common';
import { spawn } from 'node:child_process';
import type { LogLevel } from './pipeline.types';

export interface ShellOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  onLine: (line: string, level: LogLevel) => void;
  signal?: AbortSignal;
}

export function createLineBuffer(onLine: (line: string) => void) {
  let buffer = '';

  return {
    write(chunk: string) {
      buffer += chunk;

      // Split into complete lines; keep the last partial line in buffer.
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? '';

      for (const part of parts) {
        onLine(part);
      }
    },
    flush() {
      const remaining = buffer;
      buffer = '';
      if (remaining.length > 0) onLine(remaining);
    },
  };
}

/**
 * Runs shell commands for a stage and streams their output line by line.
 * Exit codes are returned, never thrown; the runner decides what a non-zero code means.
 */
@Injectable()
export class StageExecutorService {
  /**
   * Run one shell command. Resolves with the exit code (1 when the process could not start
   * or was killed by a signal). Aborting signals the command's whole process group.
   */
  runCommand(command: string, options: ShellOptions): Promise<number> {
    if (options.signal?.aborted) return Promise.resolve(1);

    return new Promise<number>((resolve) => {
      // own process group, so an abort reaches everything the shell started
      const child = spawn(command, {
        shell: true,
        cwd: options.cwd,
        env: options.env,
        detached: true,
      });

      const stdoutBuffer = createLineBuffer((line) => options.onLine(line, 'info'));
      const stderrBuffer = createLineBuffer((line) => options.onLine(line, 'error'));

      const onAbort = () => {
        if (child.pid === undefined) return;
        try {
          process.kill(-child.pid, 'SIGTERM');
        } catch {
          // group already gone; the shell itself may still be exiting
          child.kill('SIGTERM');
        }
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', (buf: Buffer) => stdoutBuffer.write(buf.toString('utf8')));
      child.stderr.on('data', (buf: Buffer) => stderrBuffer.write(buf.toString('utf8')));

      child.on('close', (code) => {
        // Flush any partial line that didn't end in \n
        stdoutBuffer.flush();
        stderrBuffer.flush();
        options.signal?.removeEventListener('abort', onAbort);
        resolve(code ?? 1);
      });
      child.on('error', (err) => {
        stdoutBuffer.flush();
        stderrBuffer.flush();
        options.signal?.removeEventListener('abort', onAbort);
        options.onLine(`Execution error: ${err.message}`, 'error');
        resolve(1);
      });
    });
  }

  /**
   * Run a command sequence as one unit: stops at the first non-zero exit and returns it.
   */
  async runSequence(commands: readonly string[], options: ShellOptions): Promise<number> {
    for (const command of commands) {
      options.onLine(`$ ${command}`, 'info');
      const exitCode = await this.runCommand(command, options);
      if (exitCode !== 0) return exitCode;
    }
    return 0;
  }
}
