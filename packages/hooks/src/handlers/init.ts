import { copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  CONFIG_DIR_NAME,
  INSTRUCTIONS_FILE,
  LOCAL_SETTINGS_FILE,
  SETTINGS_FILE,
  TEMPLATE_SUFFIX,
  permissionsDocumentSchema,
  settingsDocumentSchema,
} from '@ruff-claude-hook/shared';
import { withBackup } from '../lib/backup.js';
import { createConsoleReporter } from '../lib/reporter.js';
import type { Reporter } from '../lib/reporter.js';
import { mergeSection } from '../lib/section-merge.js';
import {
  createHookEntry,
  mergeHookEntry,
  mergePermission,
  parseJsonDocument,
  serializeJsonDocument,
} from '../lib/settings-merge.js';
import { createHookLogger } from '../lib/logger.js';

const logger = createHookLogger('init');

export interface InitOptions {
  /** Project root; artifacts go to `<targetDir>/.claude/` */
  targetDir: string;
  templateDir: string;
  /** Back up and overwrite existing artifacts instead of merging */
  force?: boolean;
  reporter?: Reporter;
}

type ArtifactMergeOutcome =
  | { kind: 'merged'; content: string; changed: boolean }
  | { kind: 'corrupt'; reason: string };

interface Artifact {
  fileName: string;
  merge(existing: string, template: string): ArtifactMergeOutcome;
  addedMessage: string;
  unchangedMessage: string;
}

const ARTIFACTS: readonly Artifact[] = [
  {
    fileName: SETTINGS_FILE,
    merge(existing) {
      const parsed = parseJsonDocument(existing, settingsDocumentSchema);
      if (!parsed.ok) return { kind: 'corrupt', reason: parsed.reason };
      const { document, changed } = mergeHookEntry(parsed.document, createHookEntry());
      return { kind: 'merged', content: serializeJsonDocument(document), changed };
    },
    addedMessage: 'Ruff hook added to existing settings',
    unchangedMessage: 'Ruff hook already configured',
  },
  {
    fileName: LOCAL_SETTINGS_FILE,
    merge(existing) {
      const parsed = parseJsonDocument(existing, permissionsDocumentSchema);
      if (!parsed.ok) return { kind: 'corrupt', reason: parsed.reason };
      const { document, changed } = mergePermission(parsed.document);
      return { kind: 'merged', content: serializeJsonDocument(document), changed };
    },
    addedMessage: 'Ruff permission added to existing settings',
    unchangedMessage: 'Ruff permission already configured',
  },
  {
    fileName: INSTRUCTIONS_FILE,
    merge(existing, template) {
      const content = mergeSection(existing, template);
      return { kind: 'merged', content, changed: content !== existing };
    },
    addedMessage: 'Ruff section updated',
    unchangedMessage: 'Ruff section already up to date',
  },
];

function processArtifact(artifact: Artifact, configDir: string, templateDir: string, force: boolean, reporter: Reporter): void {
  const targetPath = join(configDir, artifact.fileName);
  const templatePath = join(templateDir, `${artifact.fileName}${TEMPLATE_SUFFIX}`);

  if (!existsSync(targetPath)) {
    copyFileSync(templatePath, targetPath);
    reporter.success(`Created: ${targetPath}`);
    return;
  }

  if (force) {
    const { backupPath } = withBackup(targetPath, () => copyFileSync(templatePath, targetPath));
    reporter.success(`Backed up to: ${backupPath}`);
    reporter.success(`Overwrote: ${targetPath}`);
    return;
  }

  reporter.success(`Merging with existing: ${targetPath}`);
  const existing = readFileSync(targetPath, 'utf-8');
  const template = readFileSync(templatePath, 'utf-8');
  const outcome = artifact.merge(existing, template);

  if (outcome.kind === 'corrupt') {
    logger.warn('Existing artifact is corrupt, replacing with template', { targetPath, reason: outcome.reason });
    reporter.warn(`Error reading ${artifact.fileName}: ${outcome.reason}`);
    const { backupPath } = withBackup(targetPath, () => copyFileSync(templatePath, targetPath));
    reporter.warn(`Backed up to ${backupPath} and replaced with template`);
    return;
  }

  if (!outcome.changed) {
    reporter.success(artifact.unchangedMessage);
    return;
  }

  writeFileSync(targetPath, outcome.content, 'utf-8');
  reporter.success(artifact.addedMessage);
}

/**
 * Create or merge `.claude/settings.json`, `.claude/settings.local.json` and
 * `.claude/CLAUDE.md` under `targetDir`. Returns a process exit code.
 *
 * Artifacts are handled one after another; a failure part way leaves the
 * earlier ones written.
 */
export function initProject(options: InitOptions): number {
  const reporter = options.reporter ?? createConsoleReporter();
  const force = options.force ?? false;

  reporter.heading('🚀 Initializing ruff-claude-hook...');

  if (!existsSync(options.templateDir)) {
    reporter.error(`Template directory not found: ${options.templateDir}`);
    logger.error('Template directory not found', { templateDir: options.templateDir });
    return 1;
  }

  try {
    const configDir = join(options.targetDir, CONFIG_DIR_NAME);
    mkdirSync(configDir, { recursive: true });
    reporter.success(`Directory: ${configDir}`);

    for (const artifact of ARTIFACTS) {
      processArtifact(artifact, configDir, options.templateDir, force, reporter);
    }
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    reporter.error(`Initialization failed: ${msg}`);
    logger.error('Initialization failed', { targetDir: options.targetDir, error: msg });
    return 1;
  }

  logger.info('Project initialized', { targetDir: options.targetDir, force });
  reporter.heading('✅ Ruff hook initialized successfully!');
  reporter.heading('Next steps:');
  reporter.info('1. Review .claude/settings.json to ensure the hook is configured');
  reporter.info('2. Open this project in Claude Code');
  reporter.info('3. Edit a Python file, the hook will run automatically');
  reporter.heading('To update: ruff-claude-hook init --force');

  return 0;
}
