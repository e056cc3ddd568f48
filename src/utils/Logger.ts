import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

export interface ScopedLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  success(message: string, meta?: unknown): void;
}

export class Logger implements ScopedLogger {
  private static instance: Logger;
  private logLevel: LogLevel = 'info';
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  private constructor() {
    const fromEnv = process.env.STACKUP_LOG_LEVEL;
    if (isLogLevel(fromEnv)) {
      this.logLevel = fromEnv;
    }
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  /**
   * Returns a logger whose messages carry a `[scope]` tag, e.g. `[installer]`.
   */
  child(scope: string): ScopedLogger {
    const tag = chalk.magenta(`[${scope}]`);
    return {
      debug: (message, meta) => this.log('debug', `${tag} ${message}`, meta),
      info: (message, meta) => this.log('info', `${tag} ${message}`, meta),
      warn: (message, meta) => this.log('warn', `${tag} ${message}`, meta),
      error: (message, meta) => this.log('error', `${tag} ${message}`, meta),
      success: (message, meta) => this.success(`${tag} ${message}`, meta),
    };
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  success(message: string, meta?: unknown): void {
    if (this.shouldLog('info')) {
      const timestamp = this.getTimestamp();
      const formatted = chalk.green(`✓ ${message}`);
      console.log(`${timestamp} ${formatted}${meta ? ` ${this.formatMeta(meta)}` : ''}`);
    }
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const timestamp = this.getTimestamp();
    const prefix = this.getLevelPrefix(level);
    const formatted = this.formatMessage(level, message);
    const metaStr = meta ? ` ${this.formatMeta(meta)}` : '';
    const line = `${timestamp} ${prefix} ${formatted}${metaStr}`;

    if (level === 'warn' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.logLevel];
  }

  private getTimestamp(): string {
    return chalk.gray(new Date().toISOString());
  }

  private getLevelPrefix(level: LogLevel): string {
    const prefixes = {
      debug: chalk.cyan('[DEBUG]'),
      info: chalk.blue('[INFO]'),
      warn: chalk.yellow('[WARN]'),
      error: chalk.red('[ERROR]'),
    };
    return prefixes[level];
  }

  private formatMessage(level: LogLevel, message: string): string {
    switch (level) {
      case 'error':
        return chalk.red(message);
      case 'warn':
        return chalk.yellow(message);
      case 'info':
        return chalk.white(message);
      case 'debug':
        return chalk.gray(message);
    }
  }

  private formatMeta(meta: unknown): string {
    if (typeof meta === 'string') {
      return chalk.gray(`(${meta})`);
    }

    if (meta instanceof Error) {
      return chalk.red(`(${meta.message})`);
    }

    try {
      return chalk.gray(`(${JSON.stringify(meta)})`);
    } catch {
      return chalk.gray(`(${String(meta)})`);
    }
  }
}

export const logger = Logger.getInstance();
