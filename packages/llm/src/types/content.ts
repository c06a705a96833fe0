export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type ContentKind = 'TEXT' | 'TOOL_CALL' | 'TOOL_RESULT';

export type TextData = {
  readonly kind: 'TEXT';
  readonly text: string;
};

/**
 * Outcome of decoding model-emitted tool arguments. Decoding is allowed to
 * fail: the raw text is kept so it can be replayed to the provider and
 * reported back to the model.
 */
export type ToolArguments =
  | { readonly ok: true; readonly value: Record<string, unknown> }
  | { readonly ok: false; readonly raw: string; readonly error: string };

export type ToolCallData = {
  readonly kind: 'TOOL_CALL';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly arguments: ToolArguments;
};

export type ToolResultData = {
  readonly kind: 'TOOL_RESULT';
  readonly toolCallId: string;
  readonly content: string;
  readonly isError: boolean;
};

export type ContentPart = TextData | ToolCallData | ToolResultData;
