import { AppConfig } from '../../config/index.js';
import { IListingProvider } from '../../domain/ports/IListingProvider.js';
import { FetchHttpClient } from '../http/FetchHttpClient.js';
import { PageRetryPolicy } from '../http/PageRetryPolicy.js';
import { ListingExtractor } from './ListingExtractor.js';
import { OnPageFailedCallback, PakWheelsProvider } from './PakWheelsProvider.js';

export class ProviderFactory {
  constructor(private readonly config: AppConfig) {}

  createProvider(onPageFailed?: OnPageFailedCallback): IListingProvider {
    const http = new FetchHttpClient({
      retries: this.config.statusRetries,
      backoffFactorMs: this.config.statusBackoffMs,
    });

    const policy = new PageRetryPolicy({
      maxAttempts: this.config.maxAttempts,
      baseTimeoutMs: this.config.baseTimeoutMs,
      timeoutIncrementMs: this.config.timeoutIncrementMs,
      baseDelayMs: this.config.baseDelayMs,
    });

    return new PakWheelsProvider(this.config.searchUrl, http, {
      policy,
      extractor: new ListingExtractor(),
      onPageFailed,
    });
  }
}
