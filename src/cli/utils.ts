import chalk from 'chalk';

/**
 * CLI output helpers
 */

/** Width of divider lines and headers */
const LINE_WIDTH = 60;

/** Width of the progress bar in characters */
const BAR_WIDTH = 24;

// Styling helpers
export const styles = {
  header: (text: string) => chalk.bold.cyan(`\n${'═'.repeat(LINE_WIDTH)}\n  ${text}\n${'═'.repeat(LINE_WIDTH)}\n`),
  success: (text: string) => chalk.green(`✓ ${text}`),
  error: (text: string) => chalk.red(`✗ ${text}`),
  info: (text: string) => chalk.blue(`ℹ ${text}`),
  warn: (text: string) => chalk.yellow(`⚠ ${text}`),
  dim: (text: string) => chalk.dim(text),
  label: (label: string, value: string) => `${chalk.gray(label + ':')} ${chalk.white(value)}`,
};

export function printHeader(title: string): void {
  console.log(styles.header(title));
}

export function printSuccess(message: string): void {
  console.log(styles.success(message));
}

export function printError(message: string): void {
  console.error(styles.error(message));
}

export function printInfo(message: string): void {
  console.log(styles.info(message));
}

export function printWarn(message: string): void {
  console.log(styles.warn(message));
}

export function printLabel(label: string, value: string | number): void {
  console.log(styles.label(label, String(value)));
}

export function printDivider(): void {
  console.log(chalk.gray('─'.repeat(LINE_WIDTH)));
}

/**
 * Render a fixed-width text progress bar, e.g. "[██████░░░░] 60%"
 */
export function renderProgressBar(done: number, total: number, width = BAR_WIDTH): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, done / total)) : 0;
  const filled = Math.round(ratio * width);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${Math.round(ratio * 100)}%`;
}

/**
 * Parse `--flag value` / `--flag` style arguments, collecting bare words as positionals
 */
export function parseArgs(args: readonly string[]): {
  positional: string[];
  flags: Record<string, string | boolean>;
} {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      // Negative numbers are values, not flags
      if (next !== undefined && (!next.startsWith('-') || /^-\.?\d/.test(next))) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    } else {
      positional.push(arg);
    }
  }

  return { positional, flags };
}
