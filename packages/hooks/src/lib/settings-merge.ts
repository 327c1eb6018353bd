import { HOOK_COMMAND, HOOK_PERMISSION, TRIGGER_TOOL_NAME } from '@ruff-claude-hook/shared';
import type { z } from 'zod';
import type { HookEntry, PermissionsDocument, SettingsDocument } from '@ruff-claude-hook/shared';

export interface MergeResult<T> {
  document: T;
  changed: boolean;
}

export type ParsedDocument<T> = { ok: true; document: T } | { ok: false; reason: string };

/** Parse a JSON artifact; invalid JSON and a wrongly shaped document both come back as `ok: false`. */
export function parseJsonDocument<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParsedDocument<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'document';
    return { ok: false, reason: `unexpected shape at ${where}: ${issue?.message ?? 'invalid'}` };
  }

  return { ok: true, document: parsed.data };
}

export function createHookEntry(matcher: string = TRIGGER_TOOL_NAME, command: string = HOOK_COMMAND): HookEntry {
  return {
    matcher,
    hooks: [{ type: 'command', command }],
  };
}

/**
 * Append `entry` to `hooks.PostToolUse` unless some existing entry already
 * mentions `command` anywhere in its JSON form. Existing entries are never
 * touched, so two registrations with different matchers both survive.
 *
 * The input document is not modified.
 */
export function mergeHookEntry(
  document: SettingsDocument,
  entry: HookEntry,
  command: string = HOOK_COMMAND,
): MergeResult<SettingsDocument> {
  const hooks: NonNullable<SettingsDocument['hooks']> = document.hooks ?? {};
  const postToolUse = hooks.PostToolUse ?? [];

  // TODO: match on { matcher, command } instead; a stray mention of the command in an unrelated entry suppresses registration
  const alreadyRegistered = postToolUse.some((existing) => JSON.stringify(existing).includes(command));
  if (alreadyRegistered) {
    return { document, changed: false };
  }

  return {
    document: {
      ...document,
      hooks: { ...hooks, PostToolUse: [...postToolUse, entry] },
    },
    changed: true,
  };
}

/** Append `permission` to `permissions.allow` unless an identical string is already there. */
export function mergePermission(
  document: PermissionsDocument,
  permission: string = HOOK_PERMISSION,
): MergeResult<PermissionsDocument> {
  const permissions: NonNullable<PermissionsDocument['permissions']> = document.permissions ?? {};
  const allow = permissions.allow ?? [];

  if (allow.includes(permission)) {
    return { document, changed: false };
  }

  return {
    document: {
      ...document,
      permissions: { ...permissions, allow: [...allow, permission] },
    },
    changed: true,
  };
}

export function serializeJsonDocument(document: Record<string, unknown>): string {
  return JSON.stringify(document, null, 2) + '\n';
}
