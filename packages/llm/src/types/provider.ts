import type { TurnRequest } from './request.js';
import type { TurnResponse } from './response.js';
import type { ProviderToolDefinition, ToolSpec } from './tool.js';

/**
 * Wire conventions shared by one vendor's models.
 * - function-calling: tools as `{ type: 'function' }`, arguments as JSON strings
 * - block-content: typed content blocks, arguments already structured
 */
export type ProviderFamily = 'function-calling' | 'block-content';

export interface ProviderAdapter {
  readonly name: string;
  readonly family: ProviderFamily;
  convertTools(tools: ReadonlyArray<ToolSpec>): ReadonlyArray<ProviderToolDefinition>;
  sendTurn(request: TurnRequest): Promise<TurnResponse>;
  normalizeResponse(raw: unknown): TurnResponse;
  close?(): Promise<void>;
}
