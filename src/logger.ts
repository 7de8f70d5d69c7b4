import chalk from "chalk";

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export class NoOpLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Logger that prints coloured, level-tagged lines to the console
 */
export class ChalkLogger implements Logger {
  debug(message: string, data?: unknown): void {
    if (data !== undefined) {
      console.log(chalk.gray(`[DEBUG] ${message}`), data);
    } else {
      console.log(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  info(message: string, data?: unknown): void {
    if (data !== undefined) {
      console.log(chalk.blue(`[INFO] ${message}`), data);
    } else {
      console.log(chalk.blue(`[INFO] ${message}`));
    }
  }

  warn(message: string, data?: unknown): void {
    if (data !== undefined) {
      console.warn(chalk.yellow(`[WARN] ${message}`), data);
    } else {
      console.warn(chalk.yellow(`[WARN] ${message}`));
    }
  }

  error(message: string, data?: unknown): void {
    if (data !== undefined) {
      console.error(chalk.red(`[ERROR] ${message}`), data);
    } else {
      console.error(chalk.red(`[ERROR] ${message}`));
    }
  }
}

let activeLogger: Logger = new NoOpLogger();

/** Route the library's diagnostics to `logger`. */
export function setLogger(logger: Logger): void {
  activeLogger = logger;
}

export function getLogger(): Logger {
  return activeLogger;
}
