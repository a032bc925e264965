import chalk from 'chalk';

class Logger {
  private debugEnabled = false;
  private quiet = false;

  enableDebug(): void {
    this.debugEnabled = true;
  }

  /** Suppress info and success messages, e.g. while printing JSON to stdout */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      console.error(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.log(chalk.blue(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`⚠ ${message}`), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.log(chalk.green(`✓ ${message}`), ...args);
    }
  }
}

export const logger = new Logger();
