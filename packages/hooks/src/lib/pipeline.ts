import type { PhaseName, PhaseResult } from '@ruff-claude-hook/shared';
import type { CommandExecutor } from './executor.js';
import { createHookLogger } from './logger.js';

const logger = createHookLogger('pipeline');

interface PhaseDefinition {
  phase: PhaseName;
  args: readonly string[];
}

/**
 * Order matters: format must see the fixes, verify must see the formatting.
 * Only the verify phase decides the verdict.
 */
export const RUFF_PHASES: readonly PhaseDefinition[] = [
  { phase: 'fix', args: ['check', '--fix'] },
  { phase: 'format', args: ['format'] },
  { phase: 'verify', args: ['check'] },
];

export interface PipelineOptions {
  executor: CommandExecutor;
  ruffPath: string;
  timeoutMs: number;
}

export interface PipelineReport {
  phases: PhaseResult[];
  verify: PhaseResult;
}

/**
 * Run fix, format and verify against one file, strictly in sequence.
 * Non-zero exits never stop the pipeline; a CommandExecutionError from the
 * executor propagates and skips the remaining phases.
 */
export async function runRuffPipeline(filePath: string, options: PipelineOptions): Promise<PipelineReport> {
  const phases: PhaseResult[] = [];

  for (const { phase, args } of RUFF_PHASES) {
    const result = await options.executor.run(options.ruffPath, [...args, filePath], {
      timeoutMs: options.timeoutMs,
    });
    logger.debug(`Phase ${phase} finished`, { filePath, exitCode: result.exitCode });
    phases.push({ phase, ...result });
  }

  const verify = phases[phases.length - 1];
  if (!verify || verify.phase !== 'verify') {
    throw new Error('Pipeline ended without a verify phase');
  }

  return { phases, verify };
}
