import { SDKError } from '@docweave/llm';

/**
 * A single tool invocation failed in transport or protocol. The loop turns
 * this into an error tool result; it never escapes a conversation.
 */
export class ToolExecutionError extends SDKError {
  readonly toolName: string;

  constructor(toolName: string, message: string, cause?: Error) {
    super(`Tool execution failed for ${toolName}: ${message}`, cause);
    this.toolName = toolName;
  }
}

export class GatewayError extends SDKError {}

/**
 * The final assistant text held no recognizable HTML document.
 */
export class ExtractionError extends SDKError {
  readonly fullResponse: string;

  constructor(message: string, fullResponse: string) {
    super(message);
    this.fullResponse = fullResponse;
  }
}
