import { hookEnvSchema } from '@ruff-claude-hook/shared';
import type { HookConfig, HookEnv } from '@ruff-claude-hook/shared';
import { createHookLogger } from './logger.js';

const logger = createHookLogger('config');

/**
 * Read hook settings from the environment.
 * Invalid variables are dropped (and logged) so their defaults apply.
 */
export function loadHookConfig(env: NodeJS.ProcessEnv = process.env): HookConfig {
  const parsed = hookEnvSchema.safeParse(env);
  let values: HookEnv;

  if (parsed.success) {
    values = parsed.data;
  } else {
    const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
    logger.warn('Ignoring invalid environment variables', { variables: [...invalid] });
    const cleaned = Object.fromEntries(Object.entries(env).filter(([key]) => !invalid.has(key)));
    values = hookEnvSchema.parse(cleaned);
  }

  return {
    ruffPath: values.RUFF_CLAUDE_HOOK_RUFF_PATH,
    timeoutMs: values.RUFF_CLAUDE_HOOK_TIMEOUT_MS,
    disabled: values.RUFF_CLAUDE_HOOK_DISABLED,
    templateDir: values.RUFF_CLAUDE_HOOK_TEMPLATE_DIR ?? null,
  };
}
