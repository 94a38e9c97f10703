import chalk from 'chalk';

/** Logger interface shared by the engine, the sandbox and the CLI */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  /** Run or task id shown in the prefix (first 8 characters) */
  scope?: string;
  /** Emit debug lines (default: false) */
  verbose?: boolean;
}

type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

const LEVEL_COLORS: Record<Level, (text: string) => string> = {
  INFO: chalk.cyan,
  WARN: chalk.yellow,
  ERROR: chalk.red,
  DEBUG: chalk.gray,
};

/** Console logger with a `[kiln:<scope>]` prefix */
export class ConsoleLogger implements Logger {
  private prefix: string;
  private verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.prefix = options.scope ? `[kiln:${options.scope.slice(0, 8)}]` : '[kiln]';
    this.verbose = options.verbose ?? false;
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(this.format('INFO', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(this.format('WARN', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(this.format('ERROR', message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(this.format('DEBUG', message, data));
    }
  }

  private format(level: Level, message: string, data?: Record<string, unknown>): string {
    const base = `${chalk.gray(this.prefix)} ${LEVEL_COLORS[level](level.padEnd(5))} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}

/** Logger that drops everything; used by tests and quiet embeddings */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

/** Default process-level logger for the CLI */
export const logger = new ConsoleLogger();

/** Trim long payloads before they reach the console */
export function truncateForLog(message: string, limit = 4000): string {
  return message.length > limit ? `${message.slice(0, limit)}\n...[truncated]` : message;
}
