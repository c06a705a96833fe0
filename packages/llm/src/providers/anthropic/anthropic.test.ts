import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AnthropicAdapter } from './index.js';
import { AuthenticationError, RateLimitError, userMessage } from '../../types/index.js';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('Anthropic Adapter', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function getCallBody(): unknown {
    const init = fetchMock.mock.calls[0]?.[1];
    const body = init?.body;
    if (typeof body !== 'string') {
      throw new Error('expected a string request body');
    }
    return JSON.parse(body);
  }

  it('should identify as the block-content family', () => {
    const adapter = new AnthropicAdapter('test-key');

    expect(adapter.name).toBe('anthropic');
    expect(adapter.family).toBe('block-content');
  });

  it('should send a turn and normalize the reply', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        id: 'msg-1',
        model: 'claude-3-5-haiku-latest',
        content: [{ type: 'text', text: '<html></html>' }],
        usage: { input_tokens: 12, output_tokens: 3 },
        stop_reason: 'end_turn',
      }),
    );
    const adapter = new AnthropicAdapter('test-key', { baseUrl: 'http://localhost:9999' });

    const response = await adapter.sendTurn({
      model: 'claude-3-5-haiku-latest',
      messages: [userMessage('hello')],
    });

    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:9999/v1/messages');
    expect(getCallBody()).toEqual({
      model: 'claude-3-5-haiku-latest',
      max_tokens: 4096,
      messages: [{ role: 'user', content: [{ type: 'text', text: 'hello' }] }],
    });
    expect(response.content).toEqual([{ kind: 'TEXT', text: '<html></html>' }]);
    expect(response.usage.totalTokens).toBe(15);
  });

  it('should raise AuthenticationError on 401', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ error: { type: 'authentication_error', message: 'bad key' } }, 401),
    );
    const adapter = new AnthropicAdapter('test-key');

    await expect(
      adapter.sendTurn({ model: 'claude-3-5-haiku-latest', messages: [userMessage('hi')] }),
    ).rejects.toBeInstanceOf(AuthenticationError);
  });

  it('should raise RateLimitError on 429 with the vendor code', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ error: { type: 'rate_limit_error', message: 'slow down' } }, 429),
    );
    const adapter = new AnthropicAdapter('test-key');

    const error = await adapter
      .sendTurn({ model: 'claude-3-5-haiku-latest', messages: [userMessage('hi')] })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimitError);
    if (error instanceof RateLimitError) {
      expect(error.errorCode).toBe('rate_limit_error');
      expect(error.retryable).toBe(true);
    }
  });
});
