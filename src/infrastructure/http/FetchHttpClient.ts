import { HttpRequestOptions, HttpResponse, IHttpClient } from '../../domain/ports/IHttpClient.js';
import { InterruptedError } from '../../domain/errors/InterruptedError.js';
import { ILogger, LoggerFactory } from '../logging/Logger.js';
import { Sleep, sleep as defaultSleep } from '../utils/sleep.js';
import { HttpStatusError, HttpTimeoutError, HttpTransportError } from './HttpErrors.js';

export const RETRYABLE_STATUSES: readonly number[] = [429, 500, 502, 503, 504];

export interface StatusRetryOptions {
  retries: number;
  backoffFactorMs: number;
  statuses?: readonly number[];
}

/**
 * Thin wrapper over the global fetch. Responses with a retryable status are
 * retried here with linear backoff before the caller ever sees them; once the
 * retries run out an HttpStatusError is thrown. Any other non-2xx status is
 * thrown immediately.
 */
export class FetchHttpClient implements IHttpClient {
  private readonly logger: ILogger;
  private readonly statuses: ReadonlySet<number>;

  constructor(
    private readonly statusRetry: StatusRetryOptions,
    private readonly sleep: Sleep = defaultSleep
  ) {
    this.logger = LoggerFactory.create('FetchHttpClient');
    this.statuses = new Set(statusRetry.statuses ?? RETRYABLE_STATUSES);
  }

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const target = this.buildUrl(url, options.query);

    for (let retry = 0; ; retry++) {
      const response = await this.request(target, options);

      if (response.status >= 200 && response.status < 300) {
        return response;
      }

      if (!this.statuses.has(response.status)) {
        throw new HttpStatusError(target, response.status);
      }

      if (retry >= this.statusRetry.retries) {
        throw new HttpStatusError(target, response.status, true);
      }

      const backoffMs = this.statusRetry.backoffFactorMs * (retry + 1);
      this.logger.debug(`HTTP ${response.status}, retrying`, {
        retry: retry + 1,
        of: this.statusRetry.retries,
        backoffMs,
      });
      await this.sleep(backoffMs, options.signal);
    }
  }

  private async request(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const timeoutSignal = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([timeoutSignal, options.signal]) : timeoutSignal;

    try {
      const response = await fetch(url, { headers: options.headers, signal });
      const body = await response.text();
      return { status: response.status, url: response.url || url, body };
    } catch (error) {
      if (options.signal?.aborted) {
        throw new InterruptedError();
      }
      if (timeoutSignal.aborted) {
        throw new HttpTimeoutError(url, options.timeoutMs);
      }
      throw new HttpTransportError(url, error);
    }
  }

  private buildUrl(url: string, query?: Record<string, string | number>): string {
    if (!query) return url;

    const parsed = new URL(url);
    for (const [key, value] of Object.entries(query)) {
      parsed.searchParams.set(key, String(value));
    }
    return parsed.toString();
  }
}
