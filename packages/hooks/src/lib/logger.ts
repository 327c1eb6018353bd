import { appendFileSync, mkdirSync, renameSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { LOG_DIR_NAME, hookEnvSchema } from '@ruff-claude-hook/shared';

const LOG_FILE_NAME = 'hooks.log';
const LOG_OLD_NAME = 'hooks.log.old';
const MAX_LOG_SIZE = 1024 * 1024; // 1MB

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface HookLogger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Resolved on every write so RUFF_CLAUDE_HOOK_LOG_DIR set after import
 * still applies.
 */
function resolveLogDir(): string {
  const override = hookEnvSchema.shape.RUFF_CLAUDE_HOOK_LOG_DIR.safeParse(process.env.RUFF_CLAUDE_HOOK_LOG_DIR);
  return override.success && override.data ? override.data : join(homedir(), LOG_DIR_NAME);
}

function ensureLogDir(dir: string): void {
  try {
    mkdirSync(dir, { recursive: true });
  } catch {
    // Cannot create directory, the append below fails and is skipped
  }
}

function rotateIfNeeded(logFile: string, oldFile: string): void {
  try {
    const stats = statSync(logFile);
    if (stats.size > MAX_LOG_SIZE) {
      try {
        renameSync(logFile, oldFile);
      } catch {
        // If rename fails, truncate instead
        writeFileSync(logFile, '');
      }
    }
  } catch {
    // File doesn't exist yet or can't stat, nothing to rotate
  }
}

function writeLine(level: LogLevel, component: string, message: string, context?: Record<string, unknown>): void {
  try {
    const dir = resolveLogDir();
    const logFile = join(dir, LOG_FILE_NAME);
    ensureLogDir(dir);
    rotateIfNeeded(logFile, join(dir, LOG_OLD_NAME));

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    const line = `[${timestamp}] [${level.toUpperCase()}] [${component}] ${message}${contextStr}\n`;

    appendFileSync(logFile, line, 'utf-8');
  } catch {
    // Never throw from logger: stdout belongs to the host protocol
  }
}

/**
 * Create a logger for a specific hook component.
 * Logs are written to ~/.ruff-claude-hook/hooks.log (or RUFF_CLAUDE_HOOK_LOG_DIR).
 * Auto-creates directory, rotates at 1MB, never throws.
 */
export function createHookLogger(component: string): HookLogger {
  return {
    error: (message, context) => writeLine('error', component, message, context),
    warn: (message, context) => writeLine('warn', component, message, context),
    info: (message, context) => writeLine('info', component, message, context),
    debug: (message, context) => writeLine('debug', component, message, context),
  };
}
