import type {
  ProviderAdapter,
  ProviderFamily,
  TurnRequest,
  TurnResponse,
  ToolSpec,
  BlockToolDefinition,
  TimeoutConfig,
} from '../../types/index.js';
import { fetchWithTimeout } from '../../utils/http.js';
import { translateRequest, translateTools } from './request.js';
import { translateResponse } from './response.js';

export type AnthropicAdapterOptions = {
  readonly baseUrl?: string;
  readonly timeout?: TimeoutConfig;
};

/**
 * Messages API adapter: the block-content provider family.
 */
export class AnthropicAdapter implements ProviderAdapter {
  readonly name = 'anthropic';
  readonly family: ProviderFamily = 'block-content';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeout: TimeoutConfig | undefined;

  constructor(apiKey: string, options?: AnthropicAdapterOptions) {
    this.apiKey = apiKey;
    this.baseUrl = options?.baseUrl || 'https://api.anthropic.com';
    this.timeout = options?.timeout;
  }

  convertTools(tools: ReadonlyArray<ToolSpec>): ReadonlyArray<BlockToolDefinition> {
    return translateTools(tools);
  }

  async sendTurn(request: TurnRequest): Promise<TurnResponse> {
    const { url, headers, body } = translateRequest(request, this.apiKey, this.baseUrl);

    const result = await fetchWithTimeout({
      url,
      method: 'POST',
      headers,
      body,
      timeout: request.timeout ?? this.timeout,
      signal: request.signal,
      provider: this.name,
    });

    return this.normalizeResponse(result.body);
  }

  normalizeResponse(raw: unknown): TurnResponse {
    return translateResponse(raw);
  }
}

export { translateRequest, translateResponse, translateTools };
