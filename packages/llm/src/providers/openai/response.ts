import { nanoid } from 'nanoid';
import type { TurnResponse, FinishReason, ContentPart } from '../../types/index.js';
import { ProviderError } from '../../types/index.js';
import { asArray, asNumber, asRecord, asString } from '../../utils/json.js';
import { decodeToolArguments } from '../../utils/tool-arguments.js';

export function translateResponse(raw: unknown): TurnResponse {
  const body = asRecord(raw) ?? {};
  const id = asString(body['id']);
  const model = asString(body['model']);

  const firstChoice = asRecord(asArray(body['choices'])[0]);
  if (!firstChoice) {
    throw new ProviderError('No response from openai: choices were empty', {
      statusCode: 200,
      provider: 'openai',
      raw,
    });
  }
  const message = asRecord(firstChoice['message']) ?? {};

  const contentParts: Array<ContentPart> = [];

  const messageContent = asString(message['content']);
  if (messageContent) {
    contentParts.push({
      kind: 'TEXT',
      text: messageContent,
    });
  }

  for (const entry of asArray(message['tool_calls'])) {
    const toolCall = asRecord(entry);
    if (!toolCall) {
      continue;
    }
    const functionObj = asRecord(toolCall['function']) ?? {};

    contentParts.push({
      kind: 'TOOL_CALL',
      toolCallId: asString(toolCall['id']) || `call_${nanoid()}`,
      toolName: asString(functionObj['name'], 'unknown'),
      arguments: decodeToolArguments(asString(functionObj['arguments'])),
    });
  }

  const rawUsage = asRecord(body['usage']) ?? {};
  const inputTokens = asNumber(rawUsage['prompt_tokens']);
  const outputTokens = asNumber(rawUsage['completion_tokens']);
  const usage = {
    inputTokens,
    outputTokens,
    totalTokens: asNumber(rawUsage['total_tokens'], inputTokens + outputTokens),
  };

  let finishReason: FinishReason = 'stop';
  const rawFinishReason = asString(firstChoice['finish_reason']);
  if (rawFinishReason === 'length') {
    finishReason = 'length';
  } else if (rawFinishReason === 'tool_calls') {
    finishReason = 'tool_calls';
  } else if (rawFinishReason === 'content_filter') {
    finishReason = 'content_filter';
  }

  return {
    id,
    model,
    content: contentParts,
    finishReason,
    usage,
  };
}
