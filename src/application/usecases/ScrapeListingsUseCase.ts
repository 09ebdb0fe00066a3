import { CheckpointService } from '../services/CheckpointService.js';
import { IListingProvider } from '../../domain/ports/IListingProvider.js';
import { ListingRecord } from '../../domain/entities/Listing.js';
import { RunState, RunSummary } from '../../domain/entities/RunState.js';
import { InterruptedError } from '../../domain/errors/InterruptedError.js';
import { MonitoringService } from '../../infrastructure/monitoring/MonitoringService.js';
import { ILogger, LoggerFactory } from '../../infrastructure/logging/Logger.js';
import { Sleep, sleep as defaultSleep } from '../../infrastructure/utils/sleep.js';

export interface ScrapeOptions {
  startPage: number;
  maxPages: number;
  pageDelayMs: number;
  emptyPageDelayMs: number;
  maxConsecutiveEmptyPages: number;
}

export class ScrapeListingsUseCase {
  private readonly logger: ILogger;
  private state: RunState = 'RUNNING';

  constructor(
    private readonly provider: IListingProvider,
    private readonly checkpoints: CheckpointService,
    private readonly options: ScrapeOptions,
    private readonly monitoring: MonitoringService = MonitoringService.getInstance(),
    private readonly sleep: Sleep = defaultSleep,
    private readonly clock: () => number = Date.now
  ) {
    this.logger = LoggerFactory.create('ScrapeListingsUseCase');
  }

  /**
   * Walks the result pages in order until `maxPages` is passed, the signal
   * aborts or something escapes the loop. Whatever ends the run, the final
   * file is written once before this resolves.
   */
  async run(signal?: AbortSignal): Promise<RunSummary> {
    const startedAt = this.clock();
    const records: ListingRecord[] = [];
    let page = this.options.startPage;
    let consecutiveEmpty = 0;
    let failure: Error | undefined;

    this.state = 'RUNNING';
    this.monitoring.onRunStarted(this.provider.name, page, this.options.maxPages);

    try {
      while (page <= this.options.maxPages) {
        if (signal?.aborted) throw new InterruptedError();

        const result = await this.provider.fetchPage(page, signal);

        if (result.records.length === 0) {
          this.logger.warn(`⚠️ No cars found on page ${page}`);
          consecutiveEmpty++;
          page++;

          const limit = this.options.maxConsecutiveEmptyPages;
          if (limit > 0 && consecutiveEmpty >= limit) {
            this.logger.warn(`Stopping after ${consecutiveEmpty} empty pages in a row`);
            break;
          }

          await this.sleep(this.options.emptyPageDelayMs, signal);
          continue;
        }

        consecutiveEmpty = 0;
        records.push(...result.records);
        this.logger.info(`📊 Total collected so far: ${records.length}`);

        const backup = await this.checkpoints.checkpoint(records, page);
        if (backup) this.monitoring.onCheckpointSaved(page, backup, records.length);

        page++;
        await this.sleep(this.options.pageDelayMs, signal);
      }
      this.state = 'DONE';
    } catch (error) {
      if (error instanceof InterruptedError) {
        this.state = 'INTERRUPTED';
        this.logger.warn('⚠️ Scraping interrupted by user!');
      } else {
        this.state = 'ERRORED';
        failure = error instanceof Error ? error : new Error(String(error));
        this.logger.error('❌ Unexpected error', failure);
      }
    }

    return this.finalize(records, page, consecutiveEmpty, startedAt, failure);
  }

  private async finalize(
    records: ListingRecord[],
    page: number,
    consecutiveEmpty: number,
    startedAt: number,
    failure: Error | undefined
  ): Promise<RunSummary> {
    const state = this.state === 'RUNNING' ? 'DONE' : this.state;
    const pagesProcessed = page - this.options.startPage;
    const elapsedMs = this.clock() - startedAt;

    this.logger.info('📈 Final statistics', {
      state,
      totalRecords: records.length,
      pagesProcessed,
      elapsedSeconds: Number((elapsedMs / 1000).toFixed(2)),
    });

    const finalFile = await this.checkpoints.saveFinal(records);

    const summary: RunSummary = {
      state,
      totalRecords: records.length,
      pagesProcessed,
      elapsedMs,
      consecutiveEmpty,
      finalFile,
      ...(failure ? { error: failure } : {}),
    };
    this.monitoring.onRunFinished(summary);
    return summary;
  }
}
