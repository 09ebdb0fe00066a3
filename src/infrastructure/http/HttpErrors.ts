export abstract class HttpError extends Error {
  constructor(
    message: string,
    readonly url: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class HttpTimeoutError extends HttpError {
  constructor(
    url: string,
    readonly timeoutMs: number
  ) {
    super(`Request timed out after ${timeoutMs}ms`, url);
  }
}

export class HttpTransportError extends HttpError {
  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? describeCause(cause) : String(cause);
    super(`Request failed: ${reason}`, url);
    this.cause = cause;
  }
}

export class HttpStatusError extends HttpError {
  constructor(
    url: string,
    readonly status: number,
    readonly retriesExhausted = false
  ) {
    super(
      retriesExhausted ? `HTTP ${status} after exhausting status retries` : `HTTP ${status}`,
      url
    );
  }
}

// fetch() reports network failures as TypeError('fetch failed') with the socket error as cause.
function describeCause(error: Error): string {
  const inner = error.cause;
  if (inner instanceof Error && inner.message) {
    return `${error.message} (${inner.message})`;
  }
  return error.message;
}
