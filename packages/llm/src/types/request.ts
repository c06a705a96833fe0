import type { Message } from './message.js';
import type { ToolSpec } from './tool.js';
import type { TimeoutConfig } from './config.js';

export type TurnRequest = {
  readonly model: string;
  readonly messages: ReadonlyArray<Message>;
  readonly tools?: ReadonlyArray<ToolSpec>;
  readonly maxTokens?: number;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
};
