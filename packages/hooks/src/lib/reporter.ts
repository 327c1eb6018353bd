/** Operator-facing output of the init command */
export interface Reporter {
  heading(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleReporter(): Reporter {
  return {
    heading: (message) => console.log(`\n${message}`),
    info: (message) => console.log(`  ${message}`),
    success: (message) => console.log(`  ✓ ${message}`),
    warn: (message) => console.log(`  ⚠ ${message}`),
    error: (message) => console.error(`  ✗ ${message}`),
  };
}
