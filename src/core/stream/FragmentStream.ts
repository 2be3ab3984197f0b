import { StreamCancelledError } from '../errors.js';

/**
 * Produces fragments for one request. Must stop promptly once `signal` aborts.
 */
export type FragmentProducer = (signal: AbortSignal) => AsyncGenerator<string, void, undefined>;

/**
 * Lazy, single-use sequence of text fragments from one backend request.
 *
 * The stream owns an AbortController for the underlying connection.
 * close() releases it and runs on every exit path: normal completion,
 * a thrown error, or the consumer leaving a for-await loop early. Callers
 * may also call close() themselves, e.g. from a SIGINT handler; a read
 * that was pending at that moment rejects with StreamCancelledError.
 */
export class FragmentStream implements AsyncIterable<string> {
  private readonly controller = new AbortController();
  private started = false;

  constructor(private readonly produce: FragmentProducer) {}

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    if (this.started) {
      throw new Error('FragmentStream can only be consumed once');
    }
    this.started = true;

    // Closed before the first read: never open the connection
    if (this.closed) {
      throw new StreamCancelledError();
    }

    try {
      yield* this.produce(this.controller.signal);
    } catch (error) {
      // Pending reads fail with an abort error once close() runs
      if (this.closed) {
        throw new StreamCancelledError();
      }
      throw error;
    } finally {
      this.close();
    }
  }

  /**
   * Abort the underlying request. Idempotent.
   */
  close(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  /**
   * Consume the whole stream and return the concatenated text
   */
  async collect(): Promise<string> {
    let text = '';
    for await (const fragment of this) {
      text += fragment;
    }
    return text;
  }

  static of(fragments: readonly string[]): FragmentStream {
    return new FragmentStream(async function* () {
      yield* fragments;
    });
  }
}
