/**
 * Minimal HTTP surface the backend adapters need.
 * node-fetch's Response satisfies HttpResponse as is.
 */
export interface HttpRequest {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  body: AsyncIterable<string | Buffer>;
  text(): Promise<string>;
}

export type HttpTransport = (url: string, request: HttpRequest) => Promise<HttpResponse>;
