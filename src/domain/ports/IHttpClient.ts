export interface HttpRequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string | number>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  url: string;
  body: string;
}

export interface IHttpClient {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}
