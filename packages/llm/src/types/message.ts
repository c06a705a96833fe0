import type { ContentPart, Role } from './content.js';

export type Message = {
  readonly role: Role;
  readonly content: ReadonlyArray<ContentPart> | string;
};

type MessageContent = Message['content'];

export const systemMessage = (text: string): Message => ({ role: 'system', content: text });

export const userMessage = (content: MessageContent): Message => ({ role: 'user', content });

export const assistantMessage = (content: MessageContent): Message => ({
  role: 'assistant',
  content,
});

/**
 * Wraps one tool outcome. A failed call is still a result: the model sees
 * the error text and `isError` set.
 */
export function toolMessage(toolCallId: string, content: string, isError = false): Message {
  return { role: 'tool', content: [{ kind: 'TOOL_RESULT', toolCallId, content, isError }] };
}

/**
 * Plain text of a message: string content as-is, TEXT and TOOL_RESULT parts
 * concatenated.
 */
export function messageText(message: Readonly<Message>): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content
    .map((part) => (part.kind === 'TEXT' ? part.text : part.kind === 'TOOL_RESULT' ? part.content : ''))
    .join('');
}
