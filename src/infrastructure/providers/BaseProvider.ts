import { IListingProvider } from '../../domain/ports/IListingProvider.js';
import { PageResult } from '../../domain/entities/Listing.js';
import { ILogger, LoggerFactory } from '../logging/Logger.js';

export interface ProviderError {
  provider: string;
  page: number;
  error: Error;
  timestamp: Date;
  possibleCause: string;
  consecutiveErrors: number;
}

export abstract class BaseProvider implements IListingProvider {
  abstract readonly name: string;
  abstract readonly id: string;
  protected readonly logger: ILogger;
  private consecutiveErrors = 0;

  constructor(protected readonly url: string) {
    this.logger = LoggerFactory.create(this.constructor.name);
  }

  abstract fetchPage(page: number, signal?: AbortSignal): Promise<PageResult>;

  protected resetErrors(): void {
    if (this.consecutiveErrors > 0) {
      this.logger.info(`Provider recovered after ${this.consecutiveErrors} consecutive failed pages`);
    }
    this.consecutiveErrors = 0;
  }

  protected handleError(page: number, error: Error, context?: Record<string, unknown>): ProviderError {
    this.consecutiveErrors++;
    const possibleCause = this.detectPossibleCause(error);

    this.logger.error(`Page ${page} failed`, error, {
      possibleCause,
      consecutiveErrors: this.consecutiveErrors,
      ...context,
    });

    if (this.consecutiveErrors >= 3) {
      this.logger.warn(
        `⚠️ ${this.name} has failed ${this.consecutiveErrors} pages in a row. Possible blocking or site changes!`,
        { possibleCause }
      );
    }

    return {
      provider: this.name,
      page,
      error,
      timestamp: new Date(),
      possibleCause,
      consecutiveErrors: this.consecutiveErrors,
    };
  }

  protected emptyResult(page: number, attempts: number): PageResult {
    return { page, records: [], success: false, attempts };
  }

  private detectPossibleCause(error: Error): string {
    const message = error.message.toLowerCase();

    if (message.includes('timed out') || message.includes('timeout')) {
      return 'Request timeout - site may be slow or blocking';
    }
    if (message.includes('403') || message.includes('forbidden')) {
      return 'HTTP 403 Forbidden - likely IP blocked or bot detection';
    }
    if (message.includes('429') || message.includes('too many')) {
      return 'HTTP 429 Too Many Requests - rate limited';
    }
    if (/http 5\d\d/.test(message)) {
      return 'Server error - site may be down or overloaded';
    }
    if (message.includes('captcha')) {
      return 'CAPTCHA detected - bot protection triggered';
    }
    if (message.includes('fetch failed') || message.includes('enotfound') || message.includes('econnreset')) {
      return 'Network failure - DNS or connection problem';
    }

    return 'Unknown error - check logs for details';
  }
}
