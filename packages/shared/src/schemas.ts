import { z } from 'zod';
import { DEFAULT_PHASE_TIMEOUT_MS, DEFAULT_RUFF_PATH, HOOK_EVENT_NAME } from './constants.js';

const filePathHolderSchema = z
  .object({
    file_path: z.string().optional(),
  })
  .passthrough();

/**
 * PostToolUse payload as sent on stdin. Only the fields the hook reads are
 * typed; everything else passes through untouched.
 */
export const toolEventSchema = z
  .object({
    tool_name: z.string().default(''),
    parameters: filePathHolderSchema.optional(),
    // Legacy location of the edited file
    tool_input: filePathHolderSchema.optional(),
  })
  .passthrough();

/**
 * Any JSON object. `z.record` keeps the input's key order, which the
 * intersections below rely on: merged documents are written back with their
 * fields where the operator left them.
 */
export const jsonObjectSchema = z.record(z.unknown());

/** settings.json; only `hooks.PostToolUse` is recognized */
export const settingsDocumentSchema = jsonObjectSchema.and(
  z.object({
    hooks: jsonObjectSchema
      .and(
        z.object({
          PostToolUse: z.array(z.unknown()).optional(),
        }),
      )
      .optional(),
  }),
);

/** settings.local.json; only `permissions.allow` is recognized */
export const permissionsDocumentSchema = jsonObjectSchema.and(
  z.object({
    permissions: jsonObjectSchema
      .and(
        z.object({
          allow: z.array(z.unknown()).optional(),
        }),
      )
      .optional(),
  }),
);

export const hookOutputSchema = z.object({
  continue: z.literal(true),
  systemMessage: z.string(),
  hookSpecificOutput: z.object({
    hookEventName: z.literal(HOOK_EVENT_NAME),
    additionalContext: z.string(),
  }),
});

const flagSchema = z
  .enum(['1', 'true', '0', 'false', ''])
  .transform((value) => value === '1' || value === 'true');

/** Environment read by the hook binary */
export const hookEnvSchema = z.object({
  RUFF_CLAUDE_HOOK_RUFF_PATH: z.string().min(1).default(DEFAULT_RUFF_PATH),
  RUFF_CLAUDE_HOOK_TIMEOUT_MS: z.coerce.number().int().min(1).default(DEFAULT_PHASE_TIMEOUT_MS),
  RUFF_CLAUDE_HOOK_LOG_DIR: z.string().min(1).optional(),
  RUFF_CLAUDE_HOOK_DISABLED: flagSchema.default('0'),
  RUFF_CLAUDE_HOOK_TEMPLATE_DIR: z.string().min(1).optional(),
});
