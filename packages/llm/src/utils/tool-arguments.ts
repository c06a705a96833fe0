import type { ToolArguments } from '../types/index.js';
import { asRecord } from './json.js';

export const MAX_TOOL_ARGUMENT_CHARS = 100_000;

/**
 * Decodes the JSON-encoded argument string of a function-calling tool call.
 * Never throws: malformed, non-object or oversize input yields `ok: false`.
 */
export function decodeToolArguments(raw: string): ToolArguments {
  if (raw.length > MAX_TOOL_ARGUMENT_CHARS) {
    return {
      ok: false,
      raw,
      error: `arguments exceed ${MAX_TOOL_ARGUMENT_CHARS} characters`,
    };
  }

  // Some models send an empty string for tools without parameters
  if (raw.trim() === '') {
    return { ok: true, value: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      ok: false,
      raw,
      error: error instanceof Error ? error.message : String(error),
    };
  }

  return structuredArguments(parsed, raw);
}

/**
 * Accepts arguments that arrived already structured (block-content style).
 */
export function structuredArguments(value: unknown, raw?: string): ToolArguments {
  const record = asRecord(value);
  if (!record) {
    return {
      ok: false,
      raw: raw ?? JSON.stringify(value) ?? '',
      error: 'arguments must be a JSON object',
    };
  }
  return { ok: true, value: record };
}

/**
 * Text form of the arguments, as a function-calling provider expects to see
 * them replayed in the conversation history.
 */
export function encodeToolArguments(args: ToolArguments): string {
  return args.ok ? JSON.stringify(args.value) : args.raw;
}
