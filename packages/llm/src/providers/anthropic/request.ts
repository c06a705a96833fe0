import type {
  TurnRequest,
  ContentPart,
  Message,
  ToolSpec,
  BlockToolDefinition,
} from '../../types/index.js';
import { describeTool, messageText } from '../../types/index.js';

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

type WireMessage = {
  role: 'user' | 'assistant';
  content: Array<Record<string, unknown>>;
};

export const DEFAULT_MAX_TOKENS = 4096;

export function translateTools(tools: ReadonlyArray<ToolSpec>): Array<BlockToolDefinition> {
  return tools.map((tool) => ({
    name: tool.name,
    description: describeTool(tool),
    input_schema: {
      ...tool.inputSchema,
      type: 'object' as const,
      properties: tool.inputSchema?.properties ?? {},
      required: tool.inputSchema?.required ?? [],
    },
  }));
}

function translateContent(content: ContentPart): Record<string, unknown> | null {
  if (content.kind === 'TEXT') {
    return content.text ? { type: 'text', text: content.text } : null;
  }
  if (content.kind === 'TOOL_CALL') {
    // Undecodable arguments are replayed as an empty input; the failure
    // itself reaches the model through the matching tool result.
    return {
      type: 'tool_use',
      id: content.toolCallId,
      name: content.toolName,
      input: content.arguments.ok ? content.arguments.value : {},
    };
  }
  return {
    type: 'tool_result',
    tool_use_id: content.toolCallId,
    content: content.content,
    ...(content.isError ? { is_error: true } : {}),
  };
}

function translateParts(message: Message): Array<Record<string, unknown>> {
  if (typeof message.content === 'string') {
    return message.content ? [{ type: 'text', text: message.content }] : [];
  }
  const parts: Array<Record<string, unknown>> = [];
  for (const part of message.content) {
    const translated = translateContent(part);
    if (translated) {
      parts.push(translated);
    }
  }
  return parts;
}

export function translateRequest(
  request: Readonly<TurnRequest>,
  apiKey: string,
  baseUrl: string,
): RequestOutput {
  const url = `${baseUrl}/v1/messages`;
  const headers: Record<string, string> = {
    'x-api-key': apiKey,
    'anthropic-version': '2023-06-01',
    'Content-Type': 'application/json',
  };

  const body: Record<string, unknown> = {
    model: request.model,
    max_tokens: request.maxTokens || DEFAULT_MAX_TOKENS,
  };

  // System messages are lifted out of the history into a top-level field
  const system = request.messages
    .filter((message) => message.role === 'system')
    .map(messageText)
    .filter((text) => text.length > 0)
    .join('\n\n');
  if (system) {
    body['system'] = system;
  }

  // Tool results travel as user turns, and adjacent user turns must merge
  const messages: Array<WireMessage> = [];
  for (const message of request.messages) {
    if (message.role === 'system') {
      continue;
    }

    const role = message.role === 'assistant' ? 'assistant' : 'user';
    const contentParts = translateParts(message);
    if (contentParts.length === 0) {
      continue;
    }

    const lastMessage = messages[messages.length - 1];
    if (lastMessage && lastMessage.role === role && role === 'user') {
      lastMessage.content.push(...contentParts);
    } else {
      messages.push({ role, content: contentParts });
    }
  }
  body['messages'] = messages;

  if (request.tools && request.tools.length > 0) {
    body['tools'] = translateTools(request.tools);
  }

  return { url, headers, body };
}
