import { copyFileSync } from 'node:fs';
import { BACKUP_SUFFIX } from '@ruff-claude-hook/shared';

export function backupPathFor(filePath: string): string {
  return `${filePath}${BACKUP_SUFFIX}`;
}

/**
 * Copy `filePath` to its `.backup` sibling, then run `write`. If the copy
 * throws, `write` never runs.
 */
export function withBackup<T>(filePath: string, write: () => T): { backupPath: string; result: T } {
  const backupPath = backupPathFor(filePath);
  copyFileSync(filePath, backupPath);
  return { backupPath, result: write() };
}
