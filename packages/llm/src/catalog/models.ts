export type ModelInfo = {
  readonly id: string;
  readonly provider: string;
  readonly tokensPerMinute: number;
  readonly contextWindow: number;
  readonly maxOutputTokens: number;
};

export const MODEL_CATALOG: ReadonlyArray<ModelInfo> = [
  // OpenAI models
  {
    id: 'gpt-4.1-mini',
    provider: 'openai',
    tokensPerMinute: 200000,
    contextWindow: 1047576,
    maxOutputTokens: 32768,
  },
  {
    id: 'gpt-4.1-nano',
    provider: 'openai',
    tokensPerMinute: 200000,
    contextWindow: 1047576,
    maxOutputTokens: 32768,
  },
  {
    id: 'gpt-4o-mini',
    provider: 'openai',
    tokensPerMinute: 200000,
    contextWindow: 128000,
    maxOutputTokens: 16384,
  },
  // Anthropic models
  {
    id: 'claude-3-5-haiku-latest',
    provider: 'anthropic',
    tokensPerMinute: 50000,
    contextWindow: 200000,
    maxOutputTokens: 8192,
  },
  {
    id: 'claude-sonnet-4-0',
    provider: 'anthropic',
    tokensPerMinute: 30000,
    contextWindow: 200000,
    maxOutputTokens: 64000,
  },
];
