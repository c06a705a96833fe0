import { ValidationError, asRecord, asString } from '@docweave/llm';
import type { ToolSpec } from '@docweave/llm';
import type { RequestPayload } from '../types/index.js';
import { toToolSpec } from '../tools/tool-spec.js';

function validateTools(value: unknown): ReadonlyArray<ToolSpec> {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ValidationError('availableTools must be an array');
  }

  return value.map((entry: unknown, index) => {
    const record = asRecord(entry);
    const name = record?.['name'];
    if (typeof name !== 'string' || name.length === 0) {
      throw new ValidationError(`availableTools[${index}] must have a string name`);
    }
    return toToolSpec(record);
  });
}

function validateMaxTokens(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError('modelConfig.maxTokens must be a positive integer');
  }
  return value;
}

/**
 * Checks an untrusted request body and fills in defaults. Runs before any
 * network call.
 */
export function validatePayload(input: unknown): RequestPayload {
  const record = asRecord(input);
  if (!record) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const modelConfig = asRecord(record['modelConfig']);
  const prompt = asString(record['prompt']);
  const model = asString(modelConfig?.['model']);
  if (!prompt || !model) {
    throw new ValidationError('Missing required fields: prompt and modelConfig.model');
  }

  const systemPrompt = record['systemPrompt'] ?? '';
  if (typeof systemPrompt !== 'string') {
    throw new ValidationError('systemPrompt must be a string');
  }

  const maxTokens = validateMaxTokens(modelConfig?.['maxTokens']);

  return {
    prompt,
    systemPrompt,
    availableTools: validateTools(record['availableTools']),
    modelConfig: maxTokens === undefined ? { model } : { model, maxTokens },
  };
}
