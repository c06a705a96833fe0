import type { Message, Usage } from '@docweave/llm';

export type LoopPhase = 'INIT' | 'AWAITING_MODEL' | 'EXECUTING_TOOLS' | 'DONE' | 'FAILED';

export type FinalReason = 'completed' | 'max_iterations' | 'rate_limit';

export type LoopState = {
  readonly phase: LoopPhase;
  readonly iteration: number;
  readonly isFinal: boolean;
  readonly finalReason: FinalReason | null;
  readonly messages: ReadonlyArray<Message>;
};

export type ToolInvocationResult = {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly content: string;
  readonly isError: boolean;
};

export type ConversationResult = {
  readonly text: string;
  readonly iterations: number;
  readonly finalReason: FinalReason;
  readonly messages: ReadonlyArray<Message>;
  readonly toolResults: ReadonlyArray<ToolInvocationResult>;
  readonly usage: Usage;
  readonly state: LoopState;
};
