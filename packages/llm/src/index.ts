export * from './types/index.js';
export { fetchWithTimeout, type FetchOptions, type FetchResult } from './utils/http.js';
export { mapHttpError, parseRetryAfter, parseErrorCode } from './utils/error-mapping.js';
export {
  decodeToolArguments,
  structuredArguments,
  encodeToolArguments,
  MAX_TOOL_ARGUMENT_CHARS,
} from './utils/tool-arguments.js';
export { asArray, asNumber, asRecord, asString } from './utils/json.js';
export { MODEL_CATALOG, type ModelInfo } from './catalog/models.js';
export { getModelInfo, listModels, catalogBudgets } from './catalog/lookup.js';
export {
  Client,
  DEFAULT_MODEL_ROUTES,
  DEFAULT_ADAPTER_FACTORIES,
  type AdapterFactory,
  type FromEnvOptions,
} from './client/client.js';
export {
  detectProviders,
  DEFAULT_PROVIDER_ENV_CONFIGS,
  DEFAULT_PROVIDER_OPTION_ENV_CONFIGS,
  type ClientConfig,
  type Env,
  type ModelRoute,
  type ProviderSettings,
} from './client/config.js';
export { OpenAIAdapter, type OpenAIAdapterOptions } from './providers/openai/index.js';
export { AnthropicAdapter, type AnthropicAdapterOptions } from './providers/anthropic/index.js';
