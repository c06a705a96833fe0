import type { ContentPart, TextData, ToolCallData } from './content.js';

export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter';

export type Usage = {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
};

export function usageAdd(a: Readonly<Usage>, b: Readonly<Usage>): Usage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

export function emptyUsage(): Usage {
  return {
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
  };
}

export type TurnResponse = {
  readonly id: string;
  readonly model: string;
  readonly content: ReadonlyArray<ContentPart>;
  readonly finishReason: FinishReason;
  readonly usage: Usage;
};

export function responseText(response: Readonly<TurnResponse>): string {
  return response.content
    .filter((part): part is TextData => part.kind === 'TEXT')
    .map((part) => part.text)
    .join('');
}

export function responseToolCalls(response: Readonly<TurnResponse>): ReadonlyArray<ToolCallData> {
  return response.content.filter((part): part is ToolCallData => part.kind === 'TOOL_CALL');
}
