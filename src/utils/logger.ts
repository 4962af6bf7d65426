import chalk from 'chalk';

/** Assembly only ever logs debug detail and warnings, both on stderr. */
export enum LogLevel {
  DEBUG = 0,
  WARN = 1,
  SILENT = 2,
}

class Logger {
  private level: LogLevel = LogLevel.WARN;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.error(chalk.dim('[DEBUG]'), ...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(chalk.yellow('[WARN]'), ...args);
    }
  }
}

export const logger = new Logger();

if (process.env.DEBUG) {
  logger.setLevel(LogLevel.DEBUG);
}
