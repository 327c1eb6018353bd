import { describe, it, expect, vi } from 'vitest';

vi.mock('../lib/logger.js', () => ({
  createHookLogger: vi.fn().mockReturnValue({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { loadHookConfig } from '../lib/config.js';

describe('loadHookConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadHookConfig({})).toEqual({
      ruffPath: 'ruff',
      timeoutMs: 30_000,
      disabled: false,
      templateDir: null,
    });
  });

  it('reads every supported variable', () => {
    const config = loadHookConfig({
      RUFF_CLAUDE_HOOK_RUFF_PATH: '/opt/bin/ruff',
      RUFF_CLAUDE_HOOK_TIMEOUT_MS: '1500',
      RUFF_CLAUDE_HOOK_DISABLED: '1',
      RUFF_CLAUDE_HOOK_TEMPLATE_DIR: '/tmp/templates',
    });

    expect(config).toEqual({
      ruffPath: '/opt/bin/ruff',
      timeoutMs: 1500,
      disabled: true,
      templateDir: '/tmp/templates',
    });
  });

  it('accepts "true" and "false" for the disable flag', () => {
    expect(loadHookConfig({ RUFF_CLAUDE_HOOK_DISABLED: 'true' }).disabled).toBe(true);
    expect(loadHookConfig({ RUFF_CLAUDE_HOOK_DISABLED: 'false' }).disabled).toBe(false);
  });

  it('falls back to the default for an invalid timeout and keeps valid values', () => {
    const config = loadHookConfig({
      RUFF_CLAUDE_HOOK_TIMEOUT_MS: 'soon',
      RUFF_CLAUDE_HOOK_RUFF_PATH: '/opt/bin/ruff',
    });

    expect(config.timeoutMs).toBe(30_000);
    expect(config.ruffPath).toBe('/opt/bin/ruff');
  });

  it('falls back for an unrecognized disable flag', () => {
    expect(loadHookConfig({ RUFF_CLAUDE_HOOK_DISABLED: 'maybe' }).disabled).toBe(false);
  });

  it('ignores unrelated variables', () => {
    expect(loadHookConfig({ PATH: '/usr/bin', HOME: '/home/test' }).ruffPath).toBe('ruff');
  });
});
