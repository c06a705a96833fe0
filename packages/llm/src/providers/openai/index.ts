import type {
  ProviderAdapter,
  ProviderFamily,
  TurnRequest,
  TurnResponse,
  ToolSpec,
  FunctionToolDefinition,
  TimeoutConfig,
} from '../../types/index.js';
import { fetchWithTimeout } from '../../utils/http.js';
import { translateRequest, translateTools } from './request.js';
import { translateResponse } from './response.js';

export type OpenAIAdapterOptions = {
  readonly baseUrl?: string;
  readonly timeout?: TimeoutConfig;
};

/**
 * Chat Completions adapter: the function-calling provider family.
 */
export class OpenAIAdapter implements ProviderAdapter {
  readonly name = 'openai';
  readonly family: ProviderFamily = 'function-calling';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeout: TimeoutConfig | undefined;

  constructor(apiKey: string, options?: OpenAIAdapterOptions) {
    this.apiKey = apiKey;
    this.baseUrl = options?.baseUrl || 'https://api.openai.com';
    this.timeout = options?.timeout;
  }

  convertTools(tools: ReadonlyArray<ToolSpec>): ReadonlyArray<FunctionToolDefinition> {
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
