import { FileLogger } from '../logging/FileLogger.js';
import { RunSummary } from '../../domain/entities/RunState.js';
import { ProviderError } from '../providers/BaseProvider.js';

/** Writes run events to the file log. Failure streak warnings come from the provider. */
export class MonitoringService {
  private static instance: MonitoringService | null = null;
  private failedPages: number[] = [];

  private constructor(private readonly fileLogger: FileLogger) {}

  static getInstance(): MonitoringService {
    if (!MonitoringService.instance) {
      MonitoringService.instance = new MonitoringService(FileLogger.getInstance());
    }
    return MonitoringService.instance;
  }

  static create(fileLogger: FileLogger): MonitoringService {
    return new MonitoringService(fileLogger);
  }

  onRunStarted(source: string, startPage: number, maxPages: number): void {
    this.failedPages = [];
    this.fileLogger.logRunStarted(source, startPage, maxPages);
  }

  onPageFailed(failure: ProviderError, attempts: number): void {
    this.failedPages.push(failure.page);
    this.fileLogger.logPageFailed(failure.page, failure.error.message, attempts, failure.possibleCause);
  }

  onCheckpointSaved(page: number, file: string, records: number): void {
    this.fileLogger.logCheckpointSaved(page, file, records);
  }

  onRunFinished(summary: RunSummary): void {
    this.fileLogger.logRunFinished({
      state: summary.state,
      totalRecords: summary.totalRecords,
      pagesProcessed: summary.pagesProcessed,
      elapsedMs: summary.elapsedMs,
      failedPages: this.failedPages.length,
      finalFile: summary.finalFile,
      error: summary.error?.message,
    });
  }

  logCriticalError(source: string, error: Error | string, context?: Record<string, unknown>): void {
    const errorMessage = error instanceof Error ? error.message : error;
    this.fileLogger.logCriticalError(source, errorMessage, context);
  }
}
