import type { ConversationResult } from '../types/index.js';
import { ExtractionError } from '../types/index.js';
import { runConversation, type ConversationContext, type ConversationOptions } from '../session/loop.js';
import { extractHTML } from '../extract/extract-html.js';
import { validatePayload } from './validate.js';

export type GeneratedDocument = {
  readonly html: string;
  readonly conversation: ConversationResult;
};

/**
 * Validates a request body, runs the conversation and pulls the HTML
 * document out of the final answer. Unknown models fail before any
 * network call.
 */
export async function generateDocument(
  context: ConversationContext,
  input: unknown,
  options: ConversationOptions = {},
): Promise<GeneratedDocument> {
  const payload = validatePayload(input);
  context.client.resolve(payload.modelConfig.model);

  const conversation = await runConversation(context, payload, options);
  const html = extractHTML(conversation.text);
  if (!html) {
    throw new ExtractionError('No HTML content found in LLM response', conversation.text);
  }

  return { html, conversation };
}
