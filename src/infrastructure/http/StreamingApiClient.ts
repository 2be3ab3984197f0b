import { BackendKind } from '../../core/entities/Model.js';
import { HttpResponse, HttpTransport } from '../../core/interfaces/IHttpTransport.js';
import { BackendError, ChatRelayError, TransportError, errorMessage, isRetryableError } from '../../core/errors.js';
import { RetryConfig, createErrorLog, withRetry } from '../../utils/retry.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { readLines } from '../../utils/lines.js';
import { nodeFetchTransport } from './HttpTransport.js';

export interface StreamingClientOptions {
  baseUrl: string;
  transport?: HttpTransport;
  retryConfig?: RetryConfig;
}

/**
 * Shared plumbing for the streaming backends: opening the request with
 * retry, mapping HTTP failures onto the error taxonomy and decoding JSON
 * frames.
 */
export abstract class StreamingApiClient {
  protected readonly baseUrl: string;
  protected readonly transport: HttpTransport;
  protected readonly retryConfig: RetryConfig;
  protected readonly logger: Logger;

  protected constructor(
    readonly kind: BackendKind,
    options: StreamingClientOptions,
    defaultRetryConfig: RetryConfig
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.transport = options.transport ?? nodeFetchTransport;
    this.retryConfig = options.retryConfig ?? defaultRetryConfig;
    this.logger = createLogger(kind);
  }

  /**
   * POST the request and wait for a successful status.
   *
   * Retries cover establishment only: every attempt is a brand new request,
   * and once the response is returned nothing here will resend it.
   */
  protected async open(
    path: string,
    headers: Record<string, string>,
    body: unknown,
    modelId: string,
    signal: AbortSignal
  ): Promise<HttpResponse> {
    const url = `${this.baseUrl}${path}`;
    const serialized = JSON.stringify(body);

    return withRetry(
      async (attempt, attemptSignal) => {
        this.logger.debug('Opening stream', { url, model: modelId, attempt });

        let response: HttpResponse;
        try {
          response = await this.transport(url, {
            method: 'POST',
            headers: { 'content-type': 'application/json', ...headers },
            body: serialized,
            signal: attemptSignal,
          });
        } catch (error) {
          if (error instanceof ChatRelayError) {
            throw error;
          }
          throw new TransportError(
            this.kind,
            `Request to ${url} failed: ${errorMessage(error)}`,
            undefined,
            error
          );
        }

        return this.checkStatus(response);
      },
      this.retryConfig,
      {
        shouldRetry: isRetryableError,
        signal,
        onTimeout: (timeoutMs) =>
          new TransportError(this.kind, `No response from ${url} after ${timeoutMs}ms`),
        onLog: (log) => {
          if (!log.success) {
            this.logger.warn('Stream request failed', createErrorLog(log, modelId));
          }
        },
      }
    );
  }

  /**
   * Lines of an open response. A connection lost mid-body becomes a
   * TransportError and is never retried.
   */
  protected async *lines(response: HttpResponse, signal: AbortSignal): AsyncGenerator<string, void, undefined> {
    try {
      yield* readLines(response.body);
    } catch (error) {
      if (error instanceof ChatRelayError || signal.aborted) {
        throw error;
      }
      throw new TransportError(
        this.kind,
        `Connection to ${this.kind} lost: ${errorMessage(error)}`,
        undefined,
        error
      );
    }
  }

  /**
   * Parse one JSON frame; anything unparseable is a protocol error
   */
  protected parseFrame(raw: string): unknown {
    try {
      return JSON.parse(raw);
    } catch {
      throw new BackendError(this.kind, `Malformed payload from ${this.kind}: ${truncate(raw)}`);
    }
  }

  private async checkStatus(response: HttpResponse): Promise<HttpResponse> {
    if (response.ok) {
      return response;
    }

    const detail = extractErrorMessage(await readBody(response)) || response.statusText;
    const message = `HTTP ${response.status} from ${this.kind}: ${detail}`;

    // 408, 429 and 5xx are temporary; everything else is the request's fault
    if (response.status === 408 || response.status === 429 || response.status >= 500) {
      throw new TransportError(this.kind, message, response.status);
    }
    throw new BackendError(this.kind, message, response.status);
  }
}

async function readBody(response: HttpResponse): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `(unreadable body: ${errorMessage(error)})`;
  }
}

/**
 * Pull a human readable message out of an error body, if it is JSON
 */
export function extractErrorMessage(body: string): string {
  const parsed = tryParseJson(body);
  if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
    return describeError(parsed.error);
  }
  return body.trim();
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Error fields come as a bare string or as { message } depending on the backend
 */
export function describeError(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string') {
    return value.message;
  }
  return JSON.stringify(value);
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
