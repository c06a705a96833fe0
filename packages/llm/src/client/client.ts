import type { ProviderAdapter, TimeoutConfig } from '../types/index.js';
import { ConfigurationError, UnsupportedModelError } from '../types/index.js';
import { MODEL_CATALOG } from '../catalog/models.js';
import { OpenAIAdapter } from '../providers/openai/index.js';
import { AnthropicAdapter } from '../providers/anthropic/index.js';
import {
  detectProviders,
  type ClientConfig,
  type Env,
  type ModelRoute,
  type ProviderSettings,
} from './config.js';

export const DEFAULT_MODEL_ROUTES: ReadonlyArray<ModelRoute> = MODEL_CATALOG.map((model) => ({
  match: model.id,
  provider: model.provider,
}));

export type AdapterFactory = (
  apiKey: string,
  settings: Readonly<ProviderSettings>,
  timeout: TimeoutConfig | undefined,
) => ProviderAdapter;

export const DEFAULT_ADAPTER_FACTORIES: Readonly<Record<string, AdapterFactory>> = {
  openai: (apiKey, settings, timeout) =>
    new OpenAIAdapter(apiKey, { baseUrl: settings.baseUrl, timeout }),
  anthropic: (apiKey, settings, timeout) =>
    new AnthropicAdapter(apiKey, { baseUrl: settings.baseUrl, timeout }),
};

export type FromEnvOptions = {
  readonly env?: Env;
  readonly timeout?: TimeoutConfig;
  readonly routes?: ReadonlyArray<ModelRoute>;
  readonly adapterFactories?: Readonly<Record<string, AdapterFactory>>;
};

function routeMatches(route: ModelRoute, model: string): boolean {
  return typeof route.match === 'string' ? route.match === model : route.match.test(model);
}

/**
 * Maps model ids to provider adapters. Holds no per-conversation state.
 */
export class Client {
  private readonly providers: Record<string, ProviderAdapter>;
  private readonly routes: ReadonlyArray<ModelRoute>;

  constructor(config: ClientConfig) {
    this.providers = config.providers;
    this.routes = config.routes ?? DEFAULT_MODEL_ROUTES;
  }

  static fromEnv(options: FromEnvOptions = {}): Client {
    const detected = detectProviders(options.env);
    const factories = options.adapterFactories ?? DEFAULT_ADAPTER_FACTORIES;
    const providers: Record<string, ProviderAdapter> = {};

    for (const [providerName, settings] of Object.entries(detected)) {
      const factory = factories[providerName];
      if (factory && settings.apiKey) {
        providers[providerName] = factory(settings.apiKey, settings, options.timeout);
      }
    }

    return new Client({ providers, routes: options.routes });
  }

  /**
   * Returns the adapter for `model`. Unknown models are rejected before any
   * network call is made.
   */
  resolve(model: string): ProviderAdapter {
    const route = this.routes.find((candidate) => routeMatches(candidate, model));
    if (!route) {
      throw new UnsupportedModelError(model, this.supportedModels());
    }

    const adapter = this.providers[route.provider];
    if (!adapter) {
      throw new ConfigurationError(
        `provider '${route.provider}' not configured for model '${model}'`,
      );
    }
    return adapter;
  }

  supports(model: string): boolean {
    return this.routes.some((route) => routeMatches(route, model));
  }

  async close(): Promise<void> {
    const closePromises = Object.values(this.providers)
      .filter((adapter) => adapter.close !== undefined)
      .map((adapter) => adapter.close?.());

    await Promise.allSettled(closePromises);
  }

  private supportedModels(): Array<string> {
    return this.routes.flatMap((route) => (typeof route.match === 'string' ? [route.match] : []));
  }
}
