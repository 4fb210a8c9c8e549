import chalk from 'chalk';

// Diagnostics go to stderr so that report output on stdout stays parseable.

let debugEnabled = Boolean(process.env.DEBUG);
let quiet = false;

export const log = {
  debug(message: string): void {
    if (!debugEnabled) return;
    process.stderr.write(chalk.gray(`[debug] ${message}`) + '\n');
  },

  warn(message: string): void {
    if (quiet) return;
    process.stderr.write(chalk.yellow(`⚠ ${message}`) + '\n');
  },

  /** Enables debug output (`--debug` or `DEBUG=1`). */
  setDebug(enabled: boolean): void {
    debugEnabled = enabled;
  },

  /** Silences warnings, e.g. while emitting JSON. Debug output is unaffected. */
  setQuiet(enabled: boolean): void {
    quiet = enabled;
  },

  isDebug(): boolean {
    return debugEnabled;
  },
};
