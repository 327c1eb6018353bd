import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import {
  HOOK_EVENT_NAME,
  SOURCE_FILE_SUFFIX,
  TRIGGER_TOOL_NAME,
  toolEventSchema,
} from '@ruff-claude-hook/shared';
import type { HookConfig, HookOutcome, HookOutput, ToolEvent } from '@ruff-claude-hook/shared';
import { CommandExecutionError } from '../lib/executor.js';
import type { CommandExecutor } from '../lib/executor.js';
import { runRuffPipeline } from '../lib/pipeline.js';
import type { PipelineReport } from '../lib/pipeline.js';
import { createHookLogger } from '../lib/logger.js';

const logger = createHookLogger('post-tool-use');

const NO_OP: HookOutcome = { output: null, exitCode: 0 };

export interface PostToolUseDeps {
  executor: CommandExecutor;
  config: Pick<HookConfig, 'ruffPath' | 'timeoutMs' | 'disabled'>;
}

/** Same text goes to the user (systemMessage) and to the model (additionalContext). */
export function buildHookOutput(message: string): HookOutput {
  return {
    continue: true,
    systemMessage: message,
    hookSpecificOutput: {
      hookEventName: HOOK_EVENT_NAME,
      additionalContext: message,
    },
  };
}

export function formatSuccessMessage(fileName: string): string {
  return `✅ Ruff checks passed: ${fileName}`;
}

export function formatLintFailureMessage(fileName: string, diagnostics: string): string {
  return (
    `❌ Ruff errors in ${fileName}:\n\n${diagnostics.trim()}\n\n` +
    '⚠️  Claude: You MUST fix these errors before continuing'
  );
}

export function formatFaultMessage(fileName: string, err: unknown, timeoutMs: number): string {
  if (err instanceof CommandExecutionError && err.kind === 'timeout') {
    return `Ruff timed out after ${err.timeoutMs ?? timeoutMs}ms on ${fileName}`;
  }
  const description = err instanceof Error ? err.message : String(err);
  return `Error running ruff: ${description}`;
}

/** `parameters.file_path` wins; `tool_input.file_path` is the legacy location. */
export function extractFilePath(event: ToolEvent): string {
  return event.parameters?.file_path || event.tool_input?.file_path || '';
}

async function isExistingFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Handle one PostToolUse event. Irrelevant or malformed input is a silent
 * no-op; lint failures and tool faults are reported with exit code 1 but
 * always tell the host to continue.
 */
export async function handlePostToolUse(raw: string, deps: PostToolUseDeps): Promise<HookOutcome> {
  if (deps.config.disabled) {
    logger.debug('Hook disabled via environment');
    return NO_OP;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    logger.debug('Input is not JSON, skipping', { rawLength: raw.length });
    return NO_OP;
  }

  const parsed = toolEventSchema.safeParse(payload);
  if (!parsed.success) {
    logger.debug('Input is not a tool event, skipping');
    return NO_OP;
  }

  const event = parsed.data;
  if (event.tool_name !== TRIGGER_TOOL_NAME) {
    return NO_OP;
  }

  const filePath = extractFilePath(event);
  if (!filePath || !filePath.endsWith(SOURCE_FILE_SUFFIX) || !(await isExistingFile(filePath))) {
    logger.debug('Not an existing Python file, skipping', { filePath });
    return NO_OP;
  }

  const fileName = basename(filePath);
  logger.info('Running ruff', { filePath });

  let report: PipelineReport;
  try {
    report = await runRuffPipeline(filePath, {
      executor: deps.executor,
      ruffPath: deps.config.ruffPath,
      timeoutMs: deps.config.timeoutMs,
    });
  } catch (err) {
    logger.error('Ruff could not be run', { filePath, error: String(err) });
    return { output: buildHookOutput(formatFaultMessage(fileName, err, deps.config.timeoutMs)), exitCode: 1 };
  }

  const { verify } = report;
  if (verify.exitCode === 0) {
    logger.info('Ruff checks passed', { filePath });
    return { output: buildHookOutput(formatSuccessMessage(fileName)), exitCode: 0 };
  }

  logger.info('Ruff reported remaining errors', { filePath, exitCode: verify.exitCode });
  return { output: buildHookOutput(formatLintFailureMessage(fileName, verify.stdout)), exitCode: 1 };
}
