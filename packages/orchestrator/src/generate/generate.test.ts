import { describe, it, expect, vi } from 'vitest';
import { Client, UnsupportedModelError, ValidationError } from '@docweave/llm';
import type { ProviderAdapter, TurnResponse } from '@docweave/llm';
import { generateDocument } from './generate.js';
import { createRateLimiter } from '../rate-limit/rate-limiter.js';
import { ExtractionError } from '../types/index.js';
import type { ToolGateway } from '../types/index.js';
import type { ConversationContext } from '../session/loop.js';

function answer(text: string): TurnResponse {
  return {
    id: 'resp_1',
    model: 'claude-3-5-haiku-latest',
    content: [{ kind: 'TEXT', text }],
    finishReason: 'stop',
    usage: { inputTokens: 12, outputTokens: 30, totalTokens: 42 },
  };
}

function createContext(text: string) {
  const adapter: ProviderAdapter = {
    name: 'anthropic',
    family: 'block-content',
    convertTools: () => [],
    sendTurn: vi.fn(async () => answer(text)),
    normalizeResponse: () => answer(text),
  };
  const gateway: ToolGateway = {
    connect: vi.fn().mockResolvedValue(undefined),
    listTools: vi.fn().mockResolvedValue([]),
    listPrompts: vi.fn().mockResolvedValue([]),
    callTool: vi.fn(),
    isConnected: () => false,
    close: vi.fn().mockResolvedValue(undefined),
  };
  const context: ConversationContext = {
    client: new Client({ providers: { anthropic: adapter } }),
    gateway,
    rateLimiter: createRateLimiter(),
    maxIterations: 10,
  };
  return { adapter, context };
}

const body = {
  prompt: 'Render the standings',
  modelConfig: { model: 'claude-3-5-haiku-latest' },
};

describe('generateDocument', () => {
  it('returns the document held in a fenced block', async () => {
    const { context } = createContext(
      'Here you go:\n```html\n<!DOCTYPE html><html><body>ok</body></html>\n```\nEnjoy.',
    );

    const result = await generateDocument(context, body);

    expect(result.html).toBe('<!DOCTYPE html><html><body>ok</body></html>');
    expect(result.conversation.iterations).toBe(1);
    expect(result.conversation.finalReason).toBe('completed');
  });

  it('raises ExtractionError with the full answer when no document is present', async () => {
    const { context } = createContext('I could not find any data.');

    const error = await generateDocument(context, body).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({
      message: 'No HTML content found in LLM response',
      fullResponse: 'I could not find any data.',
    });
  });

  it('rejects an invalid body before calling the model', async () => {
    const { adapter, context } = createContext('<html></html>');

    await expect(generateDocument(context, { prompt: 'x' })).rejects.toThrow(ValidationError);
    expect(adapter.sendTurn).not.toHaveBeenCalled();
  });

  it('rejects an unknown model before calling the model', async () => {
    const { adapter, context } = createContext('<html></html>');

    await expect(
      generateDocument(context, { prompt: 'x', modelConfig: { model: 'mystery-1' } }),
    ).rejects.toThrow(UnsupportedModelError);
    expect(adapter.sendTurn).not.toHaveBeenCalled();
  });
});
