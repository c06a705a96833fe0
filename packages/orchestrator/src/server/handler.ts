import type { ConversationContext, ConversationOptions } from '../session/loop.js';
import type { ToolGateway } from '../types/index.js';
import { generateDocument } from '../generate/generate.js';
import { toErrorResponse } from './errors.js';

export type HandlerResponse = {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
};

export type RouteRequest = {
  readonly method: string;
  readonly path: string;
  readonly body: string;
};

const JSON_HEADERS = { 'Content-Type': 'application/json' };
const HTML_HEADERS = { 'Content-Type': 'text/html; charset=utf-8' };

function json(status: number, body: unknown): HandlerResponse {
  return { status, headers: JSON_HEADERS, body: JSON.stringify(body) };
}

function failure(error: unknown): HandlerResponse {
  const { status, body } = toErrorResponse(error);
  return json(status, body);
}

function parseBody(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Generates one document from a raw JSON request body.
 */
export async function handleGenerateRequest(
  context: ConversationContext,
  rawBody: string,
  options: ConversationOptions = {},
): Promise<HandlerResponse> {
  const parsed = parseBody(rawBody);
  if (!parsed.ok) {
    return json(400, { error: 'Request body must be valid JSON' });
  }

  try {
    const { html } = await generateDocument(context, parsed.value, options);
    return { status: 200, headers: HTML_HEADERS, body: html };
  } catch (error) {
    return failure(error);
  }
}

export async function handleListTools(gateway: ToolGateway): Promise<HandlerResponse> {
  try {
    return json(200, { tools: await gateway.listTools() });
  } catch (error) {
    return failure(error);
  }
}

export async function handleListPrompts(gateway: ToolGateway): Promise<HandlerResponse> {
  try {
    return json(200, { prompts: await gateway.listPrompts() });
  } catch (error) {
    return failure(error);
  }
}

export async function routeRequest(
  context: ConversationContext,
  request: RouteRequest,
  options: ConversationOptions = {},
): Promise<HandlerResponse> {
  const { method, path } = request;

  if (path === '/api/llm' && method === 'POST') {
    return handleGenerateRequest(context, request.body, options);
  }
  if (path === '/api/tools' && method === 'GET') {
    return handleListTools(context.gateway);
  }
  if (path === '/api/prompts' && method === 'GET') {
    return handleListPrompts(context.gateway);
  }
  return json(404, { error: `Not found: ${method} ${path}` });
}
