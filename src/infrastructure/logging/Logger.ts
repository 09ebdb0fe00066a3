export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const upper = value?.trim().toUpperCase();
  return Object.values(LogLevel).find((level) => level === upper) ?? fallback;
}

export class ConsoleLogger implements ILogger {
  constructor(
    private readonly name: string,
    private readonly minLevel: () => LogLevel
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel()];
  }

  private formatTimestamp(): string {
    return new Date().toISOString();
  }

  private formatContext(context?: Record<string, unknown>): string {
    if (!context || Object.keys(context).length === 0) return '';
    return ' ' + JSON.stringify(context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled(LogLevel.DEBUG)) return;
    console.log(`[${this.formatTimestamp()}] [DEBUG] [${this.name}] ${message}${this.formatContext(context)}`);
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled(LogLevel.INFO)) return;
    console.log(`[${this.formatTimestamp()}] [INFO] [${this.name}] ${message}${this.formatContext(context)}`);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled(LogLevel.WARN)) return;
    console.warn(`[${this.formatTimestamp()}] [WARN] [${this.name}] ${message}${this.formatContext(context)}`);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (!this.enabled(LogLevel.ERROR)) return;
    const errorDetails = error
      ? ` | Error: ${error.message}${error.stack ? `\nStack: ${error.stack}` : ''}`
      : '';
    console.error(`[${this.formatTimestamp()}] [ERROR] [${this.name}] ${message}${errorDetails}${this.formatContext(context)}`);
  }
}

export class LoggerFactory {
  private static level: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

  static setLevel(level: LogLevel): void {
    LoggerFactory.level = level;
  }

  static create(name: string): ILogger {
    return new ConsoleLogger(name, () => LoggerFactory.level);
  }
}
