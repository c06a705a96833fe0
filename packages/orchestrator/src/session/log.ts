import type { ConversationEvent } from '../types/index.js';

export const MAX_LOGGED_OUTPUT_CHARS = 200;

function clip(text: string): string {
  return text.length > MAX_LOGGED_OUTPUT_CHARS
    ? `${text.substring(0, MAX_LOGGED_OUTPUT_CHARS)}...`
    : text;
}

/**
 * One log line per event.
 */
export function formatEvent(event: ConversationEvent): string {
  switch (event.kind) {
    case 'CONVERSATION_START':
      return `[conversation ${event.conversationId}] start model=${event.model} tools=${event.toolCount}`;
    case 'CONVERSATION_END':
      return `[conversation ${event.conversationId}] end iterations=${event.iterations} reason=${event.finalReason}`;
    case 'RATE_LIMITED':
      return `[rate-limit] ${event.model} ${event.stage} needs ${event.estimatedTokens} tokens, ${event.remainingTokens} remaining`;
    case 'PROMPT_TRUNCATED':
      return `[rate-limit] prompt truncated from ${event.originalTokens} to ${event.truncatedTokens} tokens`;
    case 'MODEL_CALL_START':
      return `[model] iteration ${event.iteration}${event.isFinal ? ' (final)' : ''} messages=${event.messageCount}`;
    case 'MODEL_CALL_END':
      return `[model] iteration ${event.iteration} tool_calls=${event.toolCallCount} tokens=${event.usage.totalTokens}`;
    case 'TOOL_CALL_START': {
      const args = event.arguments.ok ? JSON.stringify(event.arguments.value) : event.arguments.raw;
      return `[tool] ${event.toolName} (${event.toolCallId}) args=${clip(args)}`;
    }
    case 'TOOL_CALL_END':
      return `[tool] ${event.toolName} (${event.toolCallId}) ${event.isError ? 'failed' : 'ok'}: ${clip(event.output)}`;
    case 'TOOL_RESULT_EMPTY':
      return `[tool] ${event.toolName} (${event.toolCallId}) returned empty content`;
    case 'TOOL_RESULT_IMAGES':
      return `[tool] ${event.toolName} (${event.toolCallId}) returned ${event.imageCount} image(s)`;
    case 'TOOL_CALLS_DISCARDED':
      return `[model] iteration ${event.iteration} discarded ${event.count} tool call(s) on final turn`;
    case 'TURN_LIMIT':
      return `[loop] final turn at iteration ${event.iteration}: ${event.reason}`;
    case 'ERROR':
      return `[error] ${event.error.name}: ${event.error.message}`;
  }
}

/**
 * Drains an event stream into a line writer until the stream completes.
 */
export async function logEvents(
  events: AsyncIterable<ConversationEvent>,
  write: (line: string) => void,
): Promise<void> {
  for await (const event of events) {
    write(formatEvent(event));
  }
}
