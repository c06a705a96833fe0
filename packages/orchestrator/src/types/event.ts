import type { ToolArguments, Usage } from '@docweave/llm';
import type { FinalReason } from './conversation.js';

export type ConversationEventKind =
  | 'CONVERSATION_START'
  | 'CONVERSATION_END'
  | 'RATE_LIMITED'
  | 'PROMPT_TRUNCATED'
  | 'MODEL_CALL_START'
  | 'MODEL_CALL_END'
  | 'TOOL_CALL_START'
  | 'TOOL_CALL_END'
  | 'TOOL_RESULT_EMPTY'
  | 'TOOL_RESULT_IMAGES'
  | 'TOOL_CALLS_DISCARDED'
  | 'TURN_LIMIT'
  | 'ERROR';

export type ConversationEvent =
  | {
      readonly kind: 'CONVERSATION_START';
      readonly conversationId: string;
      readonly model: string;
      readonly toolCount: number;
    }
  | {
      readonly kind: 'CONVERSATION_END';
      readonly conversationId: string;
      readonly iterations: number;
      readonly finalReason: FinalReason;
    }
  | {
      readonly kind: 'RATE_LIMITED';
      readonly model: string;
      readonly stage: 'prompt' | 'tool_results';
      readonly estimatedTokens: number;
      readonly remainingTokens: number;
    }
  | {
      readonly kind: 'PROMPT_TRUNCATED';
      readonly originalTokens: number;
      readonly truncatedTokens: number;
    }
  | {
      readonly kind: 'MODEL_CALL_START';
      readonly iteration: number;
      readonly isFinal: boolean;
      readonly messageCount: number;
    }
  | {
      readonly kind: 'MODEL_CALL_END';
      readonly iteration: number;
      readonly toolCallCount: number;
      readonly usage: Usage;
    }
  | {
      readonly kind: 'TOOL_CALL_START';
      readonly toolCallId: string;
      readonly toolName: string;
      readonly arguments: ToolArguments;
    }
  | {
      readonly kind: 'TOOL_CALL_END';
      readonly toolCallId: string;
      readonly toolName: string;
      readonly output: string;
      readonly isError: boolean;
    }
  | { readonly kind: 'TOOL_RESULT_EMPTY'; readonly toolCallId: string; readonly toolName: string }
  | {
      readonly kind: 'TOOL_RESULT_IMAGES';
      readonly toolCallId: string;
      readonly toolName: string;
      readonly imageCount: number;
    }
  | { readonly kind: 'TOOL_CALLS_DISCARDED'; readonly iteration: number; readonly count: number }
  | {
      readonly kind: 'TURN_LIMIT';
      readonly reason: 'max_iterations' | 'rate_limit';
      readonly iteration: number;
    }
  | { readonly kind: 'ERROR'; readonly error: Error };

export type EventSink = {
  readonly emit: (event: ConversationEvent) => void;
};
