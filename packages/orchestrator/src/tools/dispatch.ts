import type { ToolCallData } from '@docweave/llm';
import type { EventSink, ToolGateway, ToolInvocationResult } from '../types/index.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

async function executeToolCall(
  call: ToolCallData,
  gateway: ToolGateway,
  events: EventSink | undefined,
): Promise<ToolInvocationResult> {
  const { toolCallId, toolName } = call;

  if (!call.arguments.ok) {
    return {
      toolCallId,
      toolName,
      content: `Invalid arguments for ${toolName}: ${call.arguments.error}`,
      isError: true,
    };
  }

  try {
    const outcome = await gateway.callTool(toolName, call.arguments.value);

    if (outcome.empty) {
      events?.emit({ kind: 'TOOL_RESULT_EMPTY', toolCallId, toolName });
    }
    if (outcome.imageCount > 0) {
      events?.emit({
        kind: 'TOOL_RESULT_IMAGES',
        toolCallId,
        toolName,
        imageCount: outcome.imageCount,
      });
    }

    return {
      toolCallId,
      toolName,
      content: JSON.stringify(outcome.content ?? null, null, 2),
      isError: outcome.isError,
    };
  } catch (error) {
    return {
      toolCallId,
      toolName,
      content: `Error executing ${toolName}: ${errorMessage(error)}`,
      isError: true,
    };
  }
}

/**
 * Runs tool calls one after another, in the order the model emitted them.
 * Exactly one result comes back per call; failures are results, not throws.
 */
export async function executeToolCalls(
  calls: ReadonlyArray<ToolCallData>,
  gateway: ToolGateway,
  events?: EventSink,
): Promise<ReadonlyArray<ToolInvocationResult>> {
  const results: Array<ToolInvocationResult> = [];

  for (const call of calls) {
    events?.emit({
      kind: 'TOOL_CALL_START',
      toolCallId: call.toolCallId,
      toolName: call.toolName,
      arguments: call.arguments,
    });

    const result = await executeToolCall(call, gateway, events);

    events?.emit({
      kind: 'TOOL_CALL_END',
      toolCallId: result.toolCallId,
      toolName: result.toolName,
      output: result.content,
      isError: result.isError,
    });
    results.push(result);
  }

  return results;
}
