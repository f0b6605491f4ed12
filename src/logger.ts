import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

/**
 * Console logger with chalk colouring. Diagnostics go to stderr so they never
 * interleave with values a script might read from stdout.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.error(chalk.gray(`[debug] ${message}`));
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.error(message);
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.error(chalk.yellow(`warning: ${message}`));
    }
  }

  error(message: string): void {
    console.error(chalk.red(message));
  }

  private enabled(level: LogLevel): boolean {
    return levelOrder[level] >= levelOrder[this.level];
  }
}

export function createLogger(verbose = false): Logger {
  const debugFromEnv = process.env.PROVISION_DEBUG === '1' || process.env.PROVISION_DEBUG === 'true';
  return new ConsoleLogger(verbose || debugFromEnv ? 'debug' : 'info');
}
