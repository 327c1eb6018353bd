import { describe, it, expect } from 'vitest';
import { CommandExecutionError, createCommandExecutor } from '../lib/executor.js';

// Uses the running node binary as a stand-in for ruff
const NODE = process.execPath;

describe('executor', () => {
  const executor = createCommandExecutor(10_000);

  it('captures stdout, stderr and a zero exit code', async () => {
    const result = await executor.run(NODE, ['-e', 'process.stdout.write("out"); process.stderr.write("err")']);

    expect(result).toEqual({ exitCode: 0, stdout: 'out', stderr: 'err' });
  });

  it('resolves with the exit code when the program fails', async () => {
    const result = await executor.run(NODE, ['-e', 'process.stdout.write("x.py:1:1: F401"); process.exit(3)']);

    expect(result).toEqual({ exitCode: 3, stdout: 'x.py:1:1: F401', stderr: '' });
  });

  it('rejects with a spawn fault when the program does not exist', async () => {
    const error = await executor.run('ruff-claude-hook-no-such-binary', ['check']).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommandExecutionError);
    expect(error).toMatchObject({ kind: 'spawn', command: 'ruff-claude-hook-no-such-binary' });
    expect(String(error)).toContain('ENOENT');
  });

  it('rejects with a timeout fault when the program hangs', async () => {
    const error = await executor
      .run(NODE, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommandExecutionError);
    expect(error).toMatchObject({ kind: 'timeout', timeoutMs: 200, message: `${NODE} timed out after 200ms` });
  });
});
