import { nanoid } from 'nanoid';
import {
  AbortError,
  assistantMessage,
  emptyUsage,
  responseText,
  responseToolCalls,
  systemMessage,
  toolMessage,
  usageAdd,
  userMessage,
} from '@docweave/llm';
import type { Message, Usage } from '@docweave/llm';
import type {
  ConversationResult,
  EventSink,
  FinalReason,
  LoopPhase,
  LoopState,
  RequestPayload,
  ToolInvocationResult,
} from '../types/index.js';
import type { OrchestratorContext } from '../context.js';
import { executeToolCalls } from '../tools/dispatch.js';

export const FINAL_INSTRUCTION =
  'This is the final response due to rate limits or iteration limits. Please provide your best final answer based on all the information gathered so far.';

export type ConversationContext = Pick<
  OrchestratorContext,
  'client' | 'gateway' | 'rateLimiter' | 'maxIterations'
>;

export type ConversationOptions = {
  readonly events?: EventSink;
  readonly signal?: AbortSignal;
  readonly conversationId?: string;
};

/**
 * Drives one conversation: call the model, run the tools it asks for, feed
 * the results back, and repeat until it answers without tools or the round
 * is final. Model calls never exceed `maxIterations`.
 */
export async function runConversation(
  context: ConversationContext,
  payload: RequestPayload,
  options: ConversationOptions = {},
): Promise<ConversationResult> {
  const { events, signal } = options;
  const conversationId = options.conversationId ?? nanoid();
  const model = payload.modelConfig.model;
  const limiter = context.rateLimiter;
  const hasTools = payload.availableTools.length > 0;

  const messages: Array<Message> = [];
  const toolResults: Array<ToolInvocationResult> = [];
  let phase: LoopPhase = 'INIT';
  let iteration = 0;
  let isFinal = false;
  let finalReason: FinalReason | null = null;
  let usage: Usage = emptyUsage();
  let lastText = '';
  let lastNonEmptyText = '';

  function markFinal(reason: FinalReason): void {
    if (isFinal) {
      return;
    }
    isFinal = true;
    finalReason = reason;
    if (reason !== 'completed') {
      events?.emit({ kind: 'TURN_LIMIT', reason, iteration });
    }
  }

  function state(): LoopState {
    return { phase, iteration, isFinal, finalReason, messages: [...messages] };
  }

  function throwIfAborted(): void {
    if (signal?.aborted) {
      throw new AbortError('Conversation was aborted');
    }
  }

  events?.emit({
    kind: 'CONVERSATION_START',
    conversationId,
    model,
    toolCount: payload.availableTools.length,
  });

  try {
    const adapter = context.client.resolve(model);

    let prompt = payload.prompt;
    const estimated = limiter.estimate(payload.systemPrompt + payload.prompt);
    const decision = limiter.check(model, estimated);
    if (!decision.allowed) {
      events?.emit({
        kind: 'RATE_LIMITED',
        model,
        stage: 'prompt',
        estimatedTokens: estimated,
        remainingTokens: decision.remaining,
      });
      const truncation = limiter.truncate(payload.prompt, decision.remaining);
      prompt = truncation.prompt;
      if (truncation.truncated) {
        events?.emit({
          kind: 'PROMPT_TRUNCATED',
          originalTokens: limiter.estimate(payload.prompt),
          truncatedTokens: limiter.estimate(prompt),
        });
        markFinal('rate_limit');
      }
    }

    messages.push(systemMessage(payload.systemPrompt), userMessage(prompt));
    const seedCount = messages.length;

    if (hasTools) {
      await context.gateway.connect();
    }

    while (true) {
      throwIfAborted();
      phase = 'AWAITING_MODEL';
      iteration += 1;

      if (iteration >= context.maxIterations) {
        markFinal('max_iterations');
      }
      if (isFinal && messages.length > seedCount) {
        messages.push(userMessage(FINAL_INSTRUCTION));
      }

      events?.emit({
        kind: 'MODEL_CALL_START',
        iteration,
        isFinal,
        messageCount: messages.length,
      });

      const response = await adapter.sendTurn({
        model,
        messages: [...messages],
        ...(hasTools ? { tools: payload.availableTools } : {}),
        ...(payload.modelConfig.maxTokens !== undefined
          ? { maxTokens: payload.modelConfig.maxTokens }
          : {}),
        ...(signal ? { signal } : {}),
      });

      usage = usageAdd(usage, response.usage);
      messages.push(assistantMessage(response.content));

      lastText = responseText(response);
      if (lastText) {
        lastNonEmptyText = lastText;
      }

      const toolCalls = responseToolCalls(response);
      events?.emit({
        kind: 'MODEL_CALL_END',
        iteration,
        toolCallCount: toolCalls.length,
        usage: response.usage,
      });

      if (toolCalls.length === 0 || isFinal || !hasTools) {
        if (toolCalls.length > 0) {
          events?.emit({ kind: 'TOOL_CALLS_DISCARDED', iteration, count: toolCalls.length });
        }
        break;
      }

      phase = 'EXECUTING_TOOLS';
      const results = await executeToolCalls(toolCalls, context.gateway, events);
      for (const result of results) {
        messages.push(toolMessage(result.toolCallId, result.content, result.isError));
        toolResults.push(result);
      }

      const toolTokens = limiter.estimate(results.map((result) => result.content).join(''));
      const toolDecision = limiter.check(model, toolTokens);
      if (!toolDecision.allowed) {
        events?.emit({
          kind: 'RATE_LIMITED',
          model,
          stage: 'tool_results',
          estimatedTokens: toolTokens,
          remainingTokens: toolDecision.remaining,
        });
        markFinal('rate_limit');
      }
    }

    phase = 'DONE';
    const reason: FinalReason = finalReason ?? 'completed';
    events?.emit({ kind: 'CONVERSATION_END', conversationId, iterations: iteration, finalReason: reason });

    return {
      text: lastText || lastNonEmptyText,
      iterations: iteration,
      finalReason: reason,
      messages: [...messages],
      toolResults,
      usage,
      state: state(),
    };
  } catch (error) {
    phase = 'FAILED';
    events?.emit({
      kind: 'ERROR',
      error: error instanceof Error ? error : new Error(String(error)),
    });
    throw error;
  }
}
