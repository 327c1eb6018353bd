import { execFile } from 'node:child_process';
import { MAX_PHASE_OUTPUT_BYTES } from '@ruff-claude-hook/shared';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs?: number;
  cwd?: string;
}

/**
 * Runs an external program to completion. A non-zero exit is a normal
 * result; only failing to run the program at all (or a timeout) rejects.
 */
export interface CommandExecutor {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

export type CommandFaultKind = 'spawn' | 'timeout';

export class CommandExecutionError extends Error {
  constructor(
    readonly kind: CommandFaultKind,
    readonly command: string,
    message: string,
    readonly timeoutMs?: number,
  ) {
    super(message);
    this.name = 'CommandExecutionError';
  }
}

/** Executor backed by child_process.execFile; the program is looked up on PATH. */
export function createCommandExecutor(defaultTimeoutMs: number): CommandExecutor {
  return {
    run(command, args, options = {}) {
      const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;

      return new Promise<CommandResult>((resolve, reject) => {
        execFile(
          command,
          [...args],
          {
            cwd: options.cwd,
            encoding: 'utf-8',
            timeout: timeoutMs,
            maxBuffer: MAX_PHASE_OUTPUT_BYTES,
            windowsHide: true,
          },
          (err, stdout, stderr) => {
            if (!err) {
              resolve({ exitCode: 0, stdout, stderr });
              return;
            }

            // ENOENT / EACCES / maxBuffer overflow carry a string code, exit statuses a number
            const code: unknown = err.code;
            if (typeof code === 'string') {
              reject(new CommandExecutionError('spawn', command, err.message));
              return;
            }
            if (err.killed) {
              reject(new CommandExecutionError('timeout', command, `${command} timed out after ${timeoutMs}ms`, timeoutMs));
              return;
            }
            if (typeof code === 'number') {
              resolve({ exitCode: code, stdout, stderr });
              return;
            }

            reject(new CommandExecutionError('spawn', command, `${command} terminated by ${err.signal ?? 'unknown signal'}`));
          },
        );
      });
    },
  };
}
