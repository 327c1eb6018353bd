import { describe, it, expect, vi } from 'vitest';
import type { CommandExecutor, CommandResult, RunOptions } from '../lib/executor.js';

vi.mock('../lib/logger.js', () => ({
  createHookLogger: vi.fn().mockReturnValue({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { CommandExecutionError } from '../lib/executor.js';
import { RUFF_PHASES, runRuffPipeline } from '../lib/pipeline.js';

function makeExecutor() {
  const run = vi.fn<(command: string, args: readonly string[], options?: RunOptions) => Promise<CommandResult>>();
  const executor: CommandExecutor = { run };
  return { executor, run };
}

describe('pipeline', () => {
  it('defines fix, format, verify in that order', () => {
    expect(RUFF_PHASES.map((p) => p.phase)).toEqual(['fix', 'format', 'verify']);
  });

  it('collects every phase result and exposes verify', async () => {
    const { executor, run } = makeExecutor();
    run
      .mockResolvedValueOnce({ exitCode: 1, stdout: 'Found 2 errors (1 fixed, 1 remaining).', stderr: '' })
      .mockResolvedValueOnce({ exitCode: 0, stdout: '1 file reformatted', stderr: '' })
      .mockResolvedValueOnce({ exitCode: 1, stdout: 'a.py:1:1: E402', stderr: '' });

    const report = await runRuffPipeline('/w/a.py', { executor, ruffPath: 'ruff', timeoutMs: 100 });

    expect(report.phases).toEqual([
      { phase: 'fix', exitCode: 1, stdout: 'Found 2 errors (1 fixed, 1 remaining).', stderr: '' },
      { phase: 'format', exitCode: 0, stdout: '1 file reformatted', stderr: '' },
      { phase: 'verify', exitCode: 1, stdout: 'a.py:1:1: E402', stderr: '' },
    ]);
    expect(report.verify).toEqual({ phase: 'verify', exitCode: 1, stdout: 'a.py:1:1: E402', stderr: '' });
  });

  it('waits for each phase before starting the next', async () => {
    const { executor, run } = makeExecutor();
    const events: string[] = [];
    run.mockImplementation(async (_command, args) => {
      events.push(`start ${args[0]}`);
      await new Promise((r) => setTimeout(r, 5));
      events.push(`end ${args[0]}`);
      return { exitCode: 0, stdout: '', stderr: '' };
    });

    await runRuffPipeline('/w/a.py', { executor, ruffPath: 'ruff', timeoutMs: 100 });

    expect(events).toEqual(['start check', 'end check', 'start format', 'end format', 'start check', 'end check']);
  });

  it('propagates executor faults without running later phases', async () => {
    const { executor, run } = makeExecutor();
    run.mockRejectedValueOnce(new CommandExecutionError('spawn', 'ruff', 'spawn ruff ENOENT'));

    await expect(runRuffPipeline('/w/a.py', { executor, ruffPath: 'ruff', timeoutMs: 100 })).rejects.toThrow(
      'spawn ruff ENOENT',
    );
    expect(run).toHaveBeenCalledTimes(1);
  });
});
