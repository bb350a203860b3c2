import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
  critical: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Map a level name as found in config files or on the command line
 * (`DEBUG`, `info`, `WARNING`...) to a LogLevel.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

/**
 * Diagnostics are written to stderr so that command output on stdout
 * (metadata JSON, search results) can be piped.
 */
export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  setQuiet(quiet: boolean): void {
    if (quiet) {
      this.logLevel = LogLevel.ERROR;
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      console.error(chalk.gray(`${chalk.dim('●')} ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.error(`${chalk.blue('ℹ')} ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.WARN) {
      console.error(`${chalk.yellow('⚠')} ${chalk.yellow(message)}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.ERROR) {
      console.error(`${chalk.red('✖')} ${chalk.red(message)}`, ...args);
    }
  }

  section(title: string): void {
    if (this.logLevel > LogLevel.INFO) return;
    console.error(chalk.bold(`\n▶ ${title}`));
  }

  item(message: string, icon = '•'): void {
    if (this.logLevel > LogLevel.INFO) return;
    console.error(`  ${chalk.dim(icon)} ${message}`);
  }

  stats(stats: Record<string, number | string>): void {
    if (this.logLevel > LogLevel.INFO) return;
    const maxKeyLength = Math.max(...Object.keys(stats).map(k => k.length));
    for (const [key, value] of Object.entries(stats)) {
      console.error(`  ${chalk.dim(key.padEnd(maxKeyLength))} : ${chalk.bold(value)}`);
    }
  }
}

export const logger = Logger.getInstance();
