import type { z } from 'zod';
import type {
  hookEnvSchema,
  hookOutputSchema,
  permissionsDocumentSchema,
  settingsDocumentSchema,
  toolEventSchema,
} from './schemas.js';

export type ToolEvent = z.infer<typeof toolEventSchema>;
export type SettingsDocument = z.infer<typeof settingsDocumentSchema>;
export type PermissionsDocument = z.infer<typeof permissionsDocumentSchema>;

/** Single JSON line written to stdout for the host */
export type HookOutput = z.infer<typeof hookOutputSchema>;

export type HookEnv = z.infer<typeof hookEnvSchema>;

/** One command registration inside `hooks.PostToolUse` */
export interface HookEntry {
  matcher: string;
  hooks: Array<{ type: 'command'; command: string }>;
}

/** Pipeline phases, in execution order */
export type PhaseName = 'fix' | 'format' | 'verify';

/** Captured result of one ruff invocation */
export interface PhaseResult {
  phase: PhaseName;
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Outcome of one hook invocation. `output: null` means nothing is printed. */
export interface HookOutcome {
  output: HookOutput | null;
  exitCode: 0 | 1;
}

/** Resolved runtime configuration of the hook binary */
export interface HookConfig {
  ruffPath: string;
  timeoutMs: number;
  disabled: boolean;
  templateDir: string | null;
}
