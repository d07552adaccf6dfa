import chalk from 'chalk';

/** Log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Logger configuration */
interface LoggerConfig {
  debugEnabled: boolean;
}

class Logger {
  private config: LoggerConfig = {
    debugEnabled: false,
  };

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.config.debugEnabled = enabled;
  }

  /** Check if debug is enabled */
  isDebugEnabled(): boolean {
    return this.config.debugEnabled;
  }

  /** Log debug message (only if debug enabled) */
  debug(message: string, ...args: unknown[]): void {
    if (this.config.debugEnabled) {
      console.log(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`[ERROR] ${message}`), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(message), ...args);
  }
}

/** Global logger instance */
export const logger = new Logger();
