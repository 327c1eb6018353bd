/** Package version, printed by `ruff-claude-hook --version` */
export const VERSION = '0.3.0';

/** Command the host runs for each PostToolUse event; also the dedup key for hook entries */
export const HOOK_COMMAND = 'ruff-claude-hook';

/** Linter executable (overridable via RUFF_CLAUDE_HOOK_RUFF_PATH) */
export const DEFAULT_RUFF_PATH = 'ruff';

/** Only edits from this tool trigger the pipeline */
export const TRIGGER_TOOL_NAME = 'Edit';

/** Files without this suffix are ignored */
export const SOURCE_FILE_SUFFIX = '.py';

/** Hook event reported back to the host */
export const HOOK_EVENT_NAME = 'PostToolUse';

/** Per-phase wait before ruff is treated as hung */
export const DEFAULT_PHASE_TIMEOUT_MS = 30_000; // 30 seconds

/** Max captured output per phase */
export const MAX_PHASE_OUTPUT_BYTES = 10 * 1024 * 1024; // 10 MB

/** Permission appended to settings.local.json */
export const HOOK_PERMISSION = `Bash(${HOOK_COMMAND}:*)`;

/**
 * Markers around the managed section of CLAUDE.md.
 * Never change these: already-initialized projects are detected by them.
 */
export const SECTION_START_MARKER = '<!-- ruff-claude-hook-start -->';
export const SECTION_END_MARKER = '<!-- ruff-claude-hook-end -->';

/** Config directory created inside the target project */
export const CONFIG_DIR_NAME = '.claude';

/** Managed artifacts */
export const SETTINGS_FILE = 'settings.json';
export const LOCAL_SETTINGS_FILE = 'settings.local.json';
export const INSTRUCTIONS_FILE = 'CLAUDE.md';

/** Suffixes for bundled templates and for backups of overwritten files */
export const TEMPLATE_SUFFIX = '.template';
export const BACKUP_SUFFIX = '.backup';

/** Default log directory name under the home directory */
export const LOG_DIR_NAME = '.ruff-claude-hook';
