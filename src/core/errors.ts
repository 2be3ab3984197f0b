import { BackendKind } from './entities/Model.js';

/**
 * Error taxonomy for the chat engine.
 * Every error the core raises extends ChatRelayError so the CLI can tell
 * expected failures from bugs.
 */
export type ChatRelayErrorCode =
  | 'CONFIG'
  | 'CREDENTIAL'
  | 'EMPTY_HISTORY'
  | 'MESSAGE_TOO_LONG'
  | 'BACKEND'
  | 'TRANSPORT'
  | 'CANCELLED';

export class ChatRelayError extends Error {
  constructor(
    readonly code: ChatRelayErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Unknown model, unknown alias or an invalid configuration value
 */
export class ConfigError extends ChatRelayError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export class CredentialError extends ChatRelayError {
  constructor(readonly variable: string) {
    super('CREDENTIAL', `Please set env var ${variable}`);
  }
}

export class EmptyHistoryError extends ChatRelayError {
  constructor(message = 'Conversation history is empty') {
    super('EMPTY_HISTORY', message);
  }
}

export class MessageTooLongError extends ChatRelayError {
  constructor(
    readonly estimatedTokens: number,
    readonly maxTokens: number
  ) {
    super(
      'MESSAGE_TOO_LONG',
      `Your message is too long (~${estimatedTokens} tokens, limit ${maxTokens}). Please try again.`
    );
  }
}

/**
 * The backend answered, but with a structured error or a payload we cannot parse.
 * Never retried.
 */
export class BackendError extends ChatRelayError {
  constructor(
    readonly backend: BackendKind,
    message: string,
    readonly status?: number
  ) {
    super('BACKEND', message);
  }
}

/**
 * Network failure, timeout, or a status that signals a temporary condition
 * (408, 429, 5xx). Retried by the adapters that opt in.
 */
export class TransportError extends ChatRelayError {
  constructor(
    readonly backend: BackendKind,
    message: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super('TRANSPORT', message, { cause });
  }
}

/**
 * The consumer closed a stream while a read was still pending
 */
export class StreamCancelledError extends ChatRelayError {
  constructor() {
    super('CANCELLED', 'Stream was closed before it finished');
  }
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof TransportError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
