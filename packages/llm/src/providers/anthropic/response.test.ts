import { describe, it, expect } from 'vitest';
import { translateResponse } from './response.js';

describe('Anthropic Response Translation', () => {
  it('should map id, model and text blocks', () => {
    const result = translateResponse({
      id: 'msg-123',
      model: 'claude-3-5-haiku-latest',
      content: [{ type: 'text', text: 'hello world' }],
      usage: { input_tokens: 10, output_tokens: 5 },
      stop_reason: 'end_turn',
    });

    expect(result.id).toBe('msg-123');
    expect(result.model).toBe('claude-3-5-haiku-latest');
    expect(result.content).toEqual([{ kind: 'TEXT', text: 'hello world' }]);
    expect(result.finishReason).toBe('stop');
  });

  it('should translate tool_use blocks with structured input', () => {
    const result = translateResponse({
      id: 'msg-123',
      model: 'claude-3-5-haiku-latest',
      content: [
        { type: 'text', text: 'Checking.' },
        { type: 'tool_use', id: 'toolu_1', name: 'get_weather', input: { location: 'NY' } },
      ],
      usage: { input_tokens: 10, output_tokens: 5 },
      stop_reason: 'tool_use',
    });

    expect(result.content).toEqual([
      { kind: 'TEXT', text: 'Checking.' },
      {
        kind: 'TOOL_CALL',
        toolCallId: 'toolu_1',
        toolName: 'get_weather',
        arguments: { ok: true, value: { location: 'NY' } },
      },
    ]);
    expect(result.finishReason).toBe('tool_calls');
  });

  it('should mark non-object tool input as undecodable', () => {
    const result = translateResponse({
      content: [{ type: 'tool_use', id: 'toolu_1', name: 'f', input: 'oops' }],
    });

    expect(result.content).toEqual([
      {
        kind: 'TOOL_CALL',
        toolCallId: 'toolu_1',
        toolName: 'f',
        arguments: { ok: false, raw: '"oops"', error: 'arguments must be a JSON object' },
      },
    ]);
  });

  it('should ignore unknown block types', () => {
    const result = translateResponse({
      content: [{ type: 'thinking', thinking: 'hmm' }, { type: 'text', text: 'done' }],
    });

    expect(result.content).toEqual([{ kind: 'TEXT', text: 'done' }]);
  });

  it('should total input and output tokens', () => {
    const result = translateResponse({
      content: [],
      usage: { input_tokens: 100, output_tokens: 50 },
    });

    expect(result.usage).toEqual({ inputTokens: 100, outputTokens: 50, totalTokens: 150 });
  });

  it('should map max_tokens to length', () => {
    const result = translateResponse({ content: [], stop_reason: 'max_tokens' });

    expect(result.finishReason).toBe('length');
  });
});
