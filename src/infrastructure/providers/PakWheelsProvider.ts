import { BaseProvider, ProviderError } from './BaseProvider.js';
import { ListingExtractor } from './ListingExtractor.js';
import { PageResult } from '../../domain/entities/Listing.js';
import { IHttpClient } from '../../domain/ports/IHttpClient.js';
import { PageRetryPolicy, classifyFailure } from '../http/PageRetryPolicy.js';
import { Sleep, sleep as defaultSleep } from '../utils/sleep.js';

export const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Accept-Language': 'en-US,en;q=0.9',
};

export type OnPageFailedCallback = (failure: ProviderError, attempts: number) => void;

export interface PakWheelsProviderOptions {
  policy?: PageRetryPolicy;
  extractor?: ListingExtractor;
  sleep?: Sleep;
  onPageFailed?: OnPageFailedCallback;
}

export class PakWheelsProvider extends BaseProvider {
  readonly name = 'PakWheels';
  readonly id = 'pakwheels';

  private readonly policy: PageRetryPolicy;
  private readonly extractor: ListingExtractor;
  private readonly sleep: Sleep;
  private readonly onPageFailed?: OnPageFailedCallback;

  constructor(
    url: string,
    private readonly http: IHttpClient,
    options: PakWheelsProviderOptions = {}
  ) {
    super(url);
    this.policy = options.policy ?? new PageRetryPolicy();
    this.extractor = options.extractor ?? new ListingExtractor();
    this.sleep = options.sleep ?? defaultSleep;
    this.onPageFailed = options.onPageFailed;
  }

  async fetchPage(page: number, signal?: AbortSignal): Promise<PageResult> {
    const maxAttempts = this.policy.maxAttempts;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const timeoutMs = this.policy.timeoutFor(attempt);
      const startTime = Date.now();
      this.logger.info(`Scraping page ${page}... (attempt ${attempt + 1}/${maxAttempts})`, { timeoutMs });

      try {
        const response = await this.http.get(this.url, {
          headers: DEFAULT_HEADERS,
          query: { page },
          timeoutMs,
          signal,
        });
        const records = this.extractor.extract(response.body);

        this.logger.info(`  -> found ${records.length} cars on page ${page}`);
        this.resetErrors();
        return { page, records, success: true, attempts: attempt + 1 };
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        const failure = classifyFailure(err);
        if (failure === 'interrupted') {
          throw err;
        }

        const decision = this.policy.decide(attempt, failure);

        if (decision.action === 'retry') {
          this.logger.warn(`${failure === 'timeout' ? 'Timeout' : 'Request error'} on page ${page}`, {
            attempt: attempt + 1,
            of: maxAttempts,
            error: err.message,
            waitMs: decision.delayMs,
          });
          await this.sleep(decision.delayMs, signal);
          continue;
        }

        const message =
          decision.action === 'give-up'
            ? `Failed to scrape page ${page} after ${maxAttempts} attempts`
            : `Unexpected error on page ${page}`;
        const providerError = this.handleError(page, err, {
          reason: message,
          duration: `${Date.now() - startTime}ms`,
        });
        this.onPageFailed?.(providerError, attempt + 1);
        return this.emptyResult(page, attempt + 1);
      }
    }

    return this.emptyResult(page, maxAttempts);
  }
}
