import * as fs from 'fs';
import * as path from 'path';

export type LogEventType =
  | 'RUN_STARTED'
  | 'PAGE_FAILED'
  | 'CHECKPOINT_SAVED'
  | 'RUN_FINISHED'
  | 'CRITICAL_ERROR';

export interface LogEvent {
  timestamp: string;
  type: LogEventType;
  data: Record<string, unknown>;
}

export class FileLogger {
  private static instance: FileLogger | null = null;
  private readonly logPath: string;

  private constructor(logDir: string) {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    this.logPath = path.join(logDir, 'scraper.log');
  }

  /** Replaces the shared instance; later getInstance() calls write under `logDir`. */
  static configure(logDir: string): FileLogger {
    FileLogger.instance = new FileLogger(logDir);
    return FileLogger.instance;
  }

  static getInstance(): FileLogger {
    if (!FileLogger.instance) {
      FileLogger.instance = new FileLogger('./data');
    }
    return FileLogger.instance;
  }

  private write(event: LogEvent): void {
    try {
      const line = JSON.stringify(event) + '\n';
      fs.appendFileSync(this.logPath, line, 'utf8');
    } catch (err) {
      console.error(`[FileLogger] Failed to write log: ${err}`);
    }
  }

  logRunStarted(source: string, startPage: number, maxPages: number): void {
    this.write({
      timestamp: new Date().toISOString(),
      type: 'RUN_STARTED',
      data: { source, startPage, maxPages },
    });
  }

  logPageFailed(page: number, error: string, attempts: number, possibleCause: string): void {
    this.write({
      timestamp: new Date().toISOString(),
      type: 'PAGE_FAILED',
      data: { page, error, attempts, possibleCause },
    });
  }

  logCheckpointSaved(page: number, file: string, records: number): void {
    this.write({
      timestamp: new Date().toISOString(),
      type: 'CHECKPOINT_SAVED',
      data: { page, file, records },
    });
  }

  logRunFinished(data: Record<string, unknown>): void {
    this.write({
      timestamp: new Date().toISOString(),
      type: 'RUN_FINISHED',
      data,
    });
  }

  logCriticalError(source: string, error: string, context?: Record<string, unknown>): void {
    this.write({
      timestamp: new Date().toISOString(),
      type: 'CRITICAL_ERROR',
      data: { source, error, ...context },
    });
  }
}
