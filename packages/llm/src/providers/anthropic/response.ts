import { nanoid } from 'nanoid';
import type { TurnResponse, ContentPart, FinishReason } from '../../types/index.js';
import { asArray, asNumber, asRecord, asString } from '../../utils/json.js';
import { structuredArguments } from '../../utils/tool-arguments.js';

export function translateResponse(raw: unknown): TurnResponse {
  const body = asRecord(raw) ?? {};
  const id = asString(body['id']);
  const model = asString(body['model']);

  const content: Array<ContentPart> = [];
  for (const entry of asArray(body['content'])) {
    const item = asRecord(entry);
    if (!item) {
      continue;
    }
    const type = asString(item['type']);
    if (type === 'text') {
      content.push({
        kind: 'TEXT',
        text: asString(item['text']),
      });
    } else if (type === 'tool_use') {
      content.push({
        kind: 'TOOL_CALL',
        toolCallId: asString(item['id']) || `toolu_${nanoid()}`,
        toolName: asString(item['name'], 'unknown'),
        arguments: structuredArguments(item['input'] ?? {}),
      });
    }
  }

  const rawUsage = asRecord(body['usage']) ?? {};
  const inputTokens = asNumber(rawUsage['input_tokens']);
  const outputTokens = asNumber(rawUsage['output_tokens']);
  const usage = {
    inputTokens,
    outputTokens,
    totalTokens: inputTokens + outputTokens,
  };

  const stopReason = asString(body['stop_reason']);
  let finishReason: FinishReason = 'stop';
  if (stopReason === 'max_tokens') {
    finishReason = 'length';
  } else if (stopReason === 'tool_use') {
    finishReason = 'tool_calls';
  } else if (stopReason === 'refusal') {
    finishReason = 'content_filter';
  }

  return {
    id,
    model,
    content,
    finishReason,
    usage,
  };
}
