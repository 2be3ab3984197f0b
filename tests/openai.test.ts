/**
 * Tests for the OpenAI chat-completions adapter
 */

import { OpenAiApiClient } from '../src/infrastructure/http/OpenAiApiClient.js';
import { ModelConfig } from '../src/core/entities/Model.js';
import { ChatPayload } from '../src/core/templates/types.js';
import { BackendError, CredentialError, TransportError } from '../src/core/errors.js';
import { FAST_RETRY, brokenResponse, drain, errorResponse, stubTransport, streamResponse } from './helpers/transport.js';

const model: ModelConfig = { modelName: 'gpt-4o', backendKind: 'openai', maxTokens: 8000 };
const payload: ChatPayload = { type: 'chat', messages: [{ role: 'user', content: 'Hi' }] };

function sse(...data: string[]): string[] {
  return data.map((frame) => `data: ${frame}\n\n`);
}

describe('OpenAiApiClient', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should stream content deltas until [DONE]', async () => {
    const { transport, calls } = stubTransport(
      streamResponse([
        ...sse('{"choices":[{"delta":{"role":"assistant"}}]}'),
        'data: {"choices":[{"delta":{"content":"Hel"}}]}\n\ndata: {"choices":[{"delta":{"con',
        'tent":"lo"}}]}\n\n',
        ...sse('{"choices":[{"delta":{},"finish_reason":"stop"}]}', '[DONE]'),
        ...sse('{"choices":[{"delta":{"content":"ignored"}}]}'),
      ])
    );
    const client = new OpenAiApiClient({ baseUrl: 'https://api.test/v1/', apiKey: 'test-secret', transport });

    expect(await client.stream(payload, model).collect()).toBe('Hello');
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://api.test/v1/chat/completions');
    expect(calls[0].request.headers).toEqual({
      'content-type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(calls[0].body).toEqual({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'Hi' }],
      n: 1,
      temperature: 1,
      stream: true,
    });
  });

  it('should skip chunks with an unexpected shape', async () => {
    const { transport } = stubTransport(
      streamResponse(
        sse(
          '{"choices":[{"delta":{"content":"A"}}]}',
          '{"foo":1}',
          '{"choices":[]}',
          '{"choices":[{"delta":{"content":5}}]}',
          '{"choices":[{"delta":{"content":"B"}}]}',
          '[DONE]'
        )
      )
    );
    const client = new OpenAiApiClient({ baseUrl: 'https://api.test/v1', apiKey: 'test-secret', transport });

    expect(await client.stream(payload, model).collect()).toBe('AB');
  });

  it('should send the backend model id when one is configured', async () => {
    const { transport, calls } = stubTransport(streamResponse(sse('[DONE]')));
    const client = new OpenAiApiClient({ baseUrl: 'https://api.test/v1', apiKey: 'test-secret', transport });

    await client.stream(payload, { ...model, backendModelId: 'gpt-4o-2024-08-06' }).collect();
    expect(calls[0].body).toMatchObject({ model: 'gpt-4o-2024-08-06' });
  });

  it('should not send anything before the stream is read', () => {
    const { transport, calls } = stubTransport(streamResponse(sse('[DONE]')));
    const client = new OpenAiApiClient({ baseUrl: 'https://api.test/v1', apiKey: 'test-secret', transport });

    client.stream(payload, model);
    expect(calls).toHaveLength(0);
  });

  it('should require a credential', async () => {
    const { transport, calls } = stubTransport(streamResponse(sse('[DONE]')));
    const client = new OpenAiApiClient({ baseUrl: 'https://api.test/v1', transport });

    const result = client.stream(payload, model).collect();
    await expect(result).rejects.toBeInstanceOf(CredentialError);
    await expect(result).rejects.toThrow('Please set env var OPENAI_API_KEY');
    expect(calls).toHaveLength(0);
  });

  it('should raise an error frame as a BackendError', async () => {
    const { transport } = stubTransport(
      streamResponse(sse('{"choices":[{"delta":{"content":"Hi"}}]}', '{"error":{"message":"quota exceeded"}}'))
    );
    const client = new OpenAiApiClient({ baseUrl: 'https://api.test/v1', apiKey: 'test-secret', transport });

    const result = client.stream(payload, model).collect();
    await expect(result).rejects.toBeInstanceOf(BackendError);
    await expect(result).rejects.toThrow('quota exceeded');
  });

  it('should reject a frame that is not JSON', async () => {
    const { transport } = stubTransport(streamResponse(sse('{oops')));
    const client = new OpenAiApiClient({ baseUrl: 'https://api.test/v1', apiKey: 'test-secret', transport });

    await expect(client.stream(payload, model).collect()).rejects.toThrow(
      new BackendError('openai', 'Malformed payload from openai: {oops')
    );
  });

  it('should not retry a client error', async () => {
    const { transport, calls } = stubTransport(
      errorResponse(401, '{"error":{"message":"Invalid API key"}}', 'Unauthorized')
    );
    const client = new OpenAiApiClient({
      baseUrl: 'https://api.test/v1',
      apiKey: 'test-secret',
      transport,
      retryConfig: FAST_RETRY,
    });

    const result = client.stream(payload, model).collect();
    await expect(result).rejects.toThrow('HTTP 401 from openai: Invalid API key');
    await expect(result).rejects.toMatchObject({ code: 'BACKEND', status: 401 });
    expect(calls).toHaveLength(1);
  });

  it('should retry a temporary failure and succeed on the third attempt', async () => {
    const { transport, calls } = stubTransport(
      errorResponse(503, 'upstream busy', 'Service Unavailable'),
      new Error('socket hang up'),
      streamResponse(sse('{"choices":[{"delta":{"content":"ok"}}]}', '[DONE]'))
    );
    const client = new OpenAiApiClient({
      baseUrl: 'https://api.test/v1',
      apiKey: 'test-secret',
      transport,
      retryConfig: FAST_RETRY,
    });

    expect(await client.stream(payload, model).collect()).toBe('ok');
    expect(calls).toHaveLength(3);
  });

  it('should give up after the last attempt with a TransportError', async () => {
    const { transport, calls } = stubTransport(errorResponse(429, 'slow down', 'Too Many Requests'));
    const client = new OpenAiApiClient({
      baseUrl: 'https://api.test/v1',
      apiKey: 'test-secret',
      transport,
      retryConfig: FAST_RETRY,
    });

    const result = client.stream(payload, model).collect();
    await expect(result).rejects.toBeInstanceOf(TransportError);
    await expect(result).rejects.toThrow('HTTP 429 from openai: slow down');
    expect(calls).toHaveLength(3);
  });

  it('should report a connection lost mid-stream as a TransportError without resending', async () => {
    const cause = new Error('Invalid response body: aborted');
    const { transport, calls } = stubTransport(
      brokenResponse(sse('{"choices":[{"delta":{"content":"Hel"}}]}'), cause),
      streamResponse(sse('{"choices":[{"delta":{"content":"again"}}]}', '[DONE]'))
    );
    const client = new OpenAiApiClient({
      baseUrl: 'https://api.test/v1',
      apiKey: 'test-secret',
      transport,
      retryConfig: FAST_RETRY,
    });

    const fragments: string[] = [];
    const result = drain(client.stream(payload, model), fragments);
    await expect(result).rejects.toBeInstanceOf(TransportError);
    await expect(result).rejects.toThrow('Connection to openai lost: Invalid response body: aborted');
    await expect(result).rejects.toMatchObject({ cause });
    expect(fragments).toEqual(['Hel']);
    expect(calls).toHaveLength(1);
  });

  it('should abort an attempt that timed out before retrying', async () => {
    const { transport, calls } = stubTransport(
      () => new Promise<never>(() => undefined),
      streamResponse(sse('{"choices":[{"delta":{"content":"ok"}}]}', '[DONE]'))
    );
    const client = new OpenAiApiClient({
      baseUrl: 'https://api.test/v1',
      apiKey: 'test-secret',
      transport,
      retryConfig: { ...FAST_RETRY, timeoutMs: 50 },
    });

    const stream = client.stream(payload, model);
    for await (const fragment of stream) {
      expect(fragment).toBe('ok');
      expect(calls).toHaveLength(2);
      expect(calls[0].request.signal.aborted).toBe(true);
      expect(calls[1].request.signal.aborted).toBe(false);
    }
    expect(calls[1].request.signal.aborted).toBe(true);
  });

  it('should wrap network failures and keep the cause', async () => {
    const cause = new Error('socket hang up');
    const { transport } = stubTransport(cause);
    const client = new OpenAiApiClient({
      baseUrl: 'https://api.test/v1',
      apiKey: 'test-secret',
      transport,
      retryConfig: { ...FAST_RETRY, maxAttempts: 1 },
    });

    const result = client.stream(payload, model).collect();
    await expect(result).rejects.toThrow('Request to https://api.test/v1/chat/completions failed: socket hang up');
    await expect(result).rejects.toMatchObject({ cause });
  });
});
