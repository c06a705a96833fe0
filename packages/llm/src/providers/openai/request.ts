import type {
  TurnRequest,
  Message,
  ToolSpec,
  FunctionToolDefinition,
} from '../../types/index.js';
import { describeTool } from '../../types/index.js';
import { encodeToolArguments } from '../../utils/tool-arguments.js';

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

export function translateTools(tools: ReadonlyArray<ToolSpec>): Array<FunctionToolDefinition> {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: describeTool(tool),
      parameters: tool.inputSchema ? { ...tool.inputSchema } : {},
    },
  }));
}

function translateMessage(message: Message): Array<Record<string, unknown>> {
  if (message.role === 'system' || message.role === 'user') {
    if (typeof message.content === 'string') {
      return [{ role: message.role, content: message.content }];
    }
    const text = message.content
      .map((part) => (part.kind === 'TEXT' ? part.text : ''))
      .join('');
    return [{ role: message.role, content: text }];
  }

  if (message.role === 'assistant') {
    if (typeof message.content === 'string') {
      return [{ role: 'assistant', content: message.content }];
    }

    const textParts: Array<string> = [];
    const toolCalls: Array<Record<string, unknown>> = [];

    for (const part of message.content) {
      if (part.kind === 'TEXT') {
        textParts.push(part.text);
      } else if (part.kind === 'TOOL_CALL') {
        toolCalls.push({
          id: part.toolCallId,
          type: 'function',
          function: {
            name: part.toolName,
            arguments: encodeToolArguments(part.arguments),
          },
        });
      }
    }

    const assistant: Record<string, unknown> = {
      role: 'assistant',
      content: textParts.length > 0 ? textParts.join('') : null,
    };
    if (toolCalls.length > 0) {
      assistant['tool_calls'] = toolCalls;
    }
    return [assistant];
  }

  // Each tool result is its own message in this wire format
  if (typeof message.content === 'string') {
    return [];
  }
  const results: Array<Record<string, unknown>> = [];
  for (const part of message.content) {
    if (part.kind === 'TOOL_RESULT') {
      results.push({
        role: 'tool',
        tool_call_id: part.toolCallId,
        content: part.content,
      });
    }
  }
  return results;
}

export function translateRequest(
  request: Readonly<TurnRequest>,
  apiKey: string,
  baseUrl: string,
): RequestOutput {
  const url = `${baseUrl}/v1/chat/completions`;
  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
  };

  const body: Record<string, unknown> = {
    model: request.model,
    messages: request.messages.flatMap(translateMessage),
  };

  if (request.tools && request.tools.length > 0) {
    body['tools'] = translateTools(request.tools);
    body['tool_choice'] = 'auto';
  }

  if (request.maxTokens !== undefined) {
    body['max_tokens'] = request.maxTokens;
  }

  return { url, headers, body };
}
