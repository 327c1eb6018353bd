import { fileURLToPath } from 'node:url';
import { HOOK_COMMAND, VERSION } from '@ruff-claude-hook/shared';
import { handlePostToolUse } from './handlers/post-tool-use.js';
import { initProject } from './handlers/init.js';
import { loadHookConfig } from './lib/config.js';
import { createCommandExecutor } from './lib/executor.js';
import { createHookLogger } from './lib/logger.js';

const log = createHookLogger('cli');

const USAGE = `Automatic ruff linting and formatting hook for Claude Code

Usage:
  ${HOOK_COMMAND}                      Run as PostToolUse hook (reads the event from stdin)
  ${HOOK_COMMAND} init [dir] [--force] Write or merge .claude/ configuration into dir (default: cwd)
  ${HOOK_COMMAND} --version            Show version

Options:
  --force  Back up and overwrite existing files instead of merging
`;

export interface CliIo {
  readStdin(): Promise<string>;
  stdout(text: string): void;
  stderr(text: string): void;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function createProcessIo(): CliIo {
  return {
    readStdin: readProcessStdin,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    cwd: process.cwd(),
    env: process.env,
  };
}

/** Templates sit next to src/ and dist/ alike. */
export function bundledTemplateDir(): string {
  return fileURLToPath(new URL('../templates/', import.meta.url));
}

async function runHook(io: CliIo): Promise<number> {
  const config = loadHookConfig(io.env);

  let raw: string;
  try {
    raw = await io.readStdin();
  } catch (err) {
    log.error('Failed to read stdin', { error: String(err) });
    return 0;
  }

  const outcome = await handlePostToolUse(raw, {
    executor: createCommandExecutor(config.timeoutMs),
    config,
  });

  if (outcome.output) {
    io.stdout(`${JSON.stringify(outcome.output)}\n`);
  }
  return outcome.exitCode;
}

function runInit(args: string[], io: CliIo): number {
  let force = false;
  const positionals: string[] = [];

  for (const arg of args) {
    if (arg === '--force') {
      force = true;
    } else if (arg.startsWith('-')) {
      io.stderr(`Unknown option: ${arg}\n\n${USAGE}`);
      return 1;
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length > 1) {
    io.stderr(`Too many arguments\n\n${USAGE}`);
    return 1;
  }

  const config = loadHookConfig(io.env);
  return initProject({
    targetDir: positionals[0] ?? io.cwd,
    templateDir: config.templateDir ?? bundledTemplateDir(),
    force,
  });
}

/** Dispatch on argv (without node and script path); resolves to the exit code. */
export async function runCli(argv: string[], io: CliIo = createProcessIo()): Promise<number> {
  const [command, ...rest] = argv;

  switch (command) {
    case undefined:
      return runHook(io);
    case 'init':
      return runInit(rest, io);
    case '--version':
    case '-v':
      io.stdout(`${HOOK_COMMAND} ${VERSION}\n`);
      return 0;
    case '--help':
    case '-h':
      io.stdout(USAGE);
      return 0;
    default:
      io.stderr(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}
