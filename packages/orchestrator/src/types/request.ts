import type { ToolSpec } from '@docweave/llm';

export type ModelConfig = {
  readonly model: string;
  readonly maxTokens?: number;
};

/**
 * One generation request after validation. Never mutated.
 */
export type RequestPayload = {
  readonly prompt: string;
  readonly systemPrompt: string;
  readonly availableTools: ReadonlyArray<ToolSpec>;
  readonly modelConfig: ModelConfig;
};
