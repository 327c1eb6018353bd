import { runCli } from './main.js';
import { createHookLogger } from './lib/logger.js';

const log = createHookLogger('cli');

const argv = process.argv.slice(2);

runCli(argv).then((code) => process.exit(code)).catch((err) => {
  try { log.error('Fatal error in runCli()', { error: String(err) }); } catch { /* never block exit */ }
  // Hook mode must never block the host; init reports failure
  process.exit(argv.length === 0 ? 0 : 1);
});
