import { describe, it, expect } from 'vitest';
import { ValidationError } from '@docweave/llm';
import { validatePayload } from './validate.js';

describe('validatePayload', () => {
  it('fills in defaults for optional fields', () => {
    expect(validatePayload({ prompt: 'Show standings', modelConfig: { model: 'gpt-4.1-mini' } })).toEqual({
      prompt: 'Show standings',
      systemPrompt: '',
      availableTools: [],
      modelConfig: { model: 'gpt-4.1-mini' },
    });
  });

  it('keeps tools and maxTokens', () => {
    const payload = validatePayload({
      prompt: 'p',
      systemPrompt: 's',
      availableTools: [
        { name: 'get_standings', inputSchema: { type: 'object', properties: {}, required: [] } },
      ],
      modelConfig: { model: 'gpt-4o-mini', maxTokens: 2048 },
    });

    expect(payload.systemPrompt).toBe('s');
    expect(payload.modelConfig).toEqual({ model: 'gpt-4o-mini', maxTokens: 2048 });
    expect(payload.availableTools).toEqual([
      { name: 'get_standings', inputSchema: { type: 'object', properties: {}, required: [] } },
    ]);
  });

  it.each([
    [{ modelConfig: { model: 'gpt-4.1-mini' } }],
    [{ prompt: '', modelConfig: { model: 'gpt-4.1-mini' } }],
    [{ prompt: 'p' }],
    [{ prompt: 'p', modelConfig: {} }],
  ])('rejects a body missing prompt or model: %j', (body) => {
    expect(() => validatePayload(body)).toThrow(
      new ValidationError('Missing required fields: prompt and modelConfig.model'),
    );
  });

  it('rejects non-object bodies', () => {
    expect(() => validatePayload('hello')).toThrow('Request body must be a JSON object');
    expect(() => validatePayload([1])).toThrow(ValidationError);
  });

  it('rejects tools without a name', () => {
    expect(() =>
      validatePayload({
        prompt: 'p',
        modelConfig: { model: 'm' },
        availableTools: [{ name: 'ok' }, { description: 'nameless' }],
      }),
    ).toThrow('availableTools[1] must have a string name');
  });

  it.each([0, -1, 1.5, '100'])('rejects maxTokens %j', (maxTokens) => {
    expect(() =>
      validatePayload({ prompt: 'p', modelConfig: { model: 'm', maxTokens } }),
    ).toThrow('modelConfig.maxTokens must be a positive integer');
  });

  it('rejects a non-string system prompt', () => {
    expect(() =>
      validatePayload({ prompt: 'p', systemPrompt: 42, modelConfig: { model: 'm' } }),
    ).toThrow('systemPrompt must be a string');
  });
});
