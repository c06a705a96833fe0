import { asArray, asRecord, asString } from '@docweave/llm';
import type { ToolInputSchema, ToolSpec } from '@docweave/llm';

export function toInputSchema(schema: unknown): ToolInputSchema | undefined {
  const record = asRecord(schema);
  if (!record) {
    return undefined;
  }
  const properties = asRecord(record['properties']);
  const required = Array.isArray(record['required'])
    ? asArray(record['required']).filter((name): name is string => typeof name === 'string')
    : undefined;

  return {
    ...record,
    type: 'object',
    ...(properties ? { properties } : {}),
    ...(required ? { required } : {}),
  };
}

/**
 * Normalizes a tool descriptor from the backend or a request body. Unknown
 * schema keys are kept as they are.
 */
export function toToolSpec(tool: unknown): ToolSpec {
  const record = asRecord(tool) ?? {};
  const description = asString(record['description']);
  const inputSchema = toInputSchema(record['inputSchema']);
  const outputSchema = asRecord(record['outputSchema']);
  const annotations = asRecord(record['annotations']);

  return {
    name: asString(record['name']),
    ...(description ? { description } : {}),
    ...(inputSchema ? { inputSchema } : {}),
    ...(outputSchema ? { outputSchema } : {}),
    ...(annotations ? { annotations } : {}),
  };
}
