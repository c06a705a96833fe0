import type { ProviderAdapter } from '../types/index.js';

export type ProviderEnvConfig = {
  readonly envVar: string;
  readonly providerName: string;
};

export type ProviderOptionEnvConfig = {
  readonly envVar: string;
  readonly providerName: string;
  readonly option: 'baseUrl';
};

export type ProviderSettings = {
  apiKey?: string;
  baseUrl?: string;
};

/**
 * A route sends every model id it matches to one provider. A string
 * matches exactly.
 */
export type ModelRoute = {
  readonly match: string | RegExp;
  readonly provider: string;
};

export type ClientConfig = {
  readonly providers: Record<string, ProviderAdapter>;
  readonly routes?: ReadonlyArray<ModelRoute>;
};

export type Env = Readonly<Record<string, string | undefined>>;

export const DEFAULT_PROVIDER_ENV_CONFIGS: ReadonlyArray<ProviderEnvConfig> = [
  { envVar: 'OPENAI_API_KEY', providerName: 'openai' },
  { envVar: 'ANTHROPIC_API_KEY', providerName: 'anthropic' },
];

export const DEFAULT_PROVIDER_OPTION_ENV_CONFIGS: ReadonlyArray<ProviderOptionEnvConfig> = [
  { envVar: 'OPENAI_BASE_URL', providerName: 'openai', option: 'baseUrl' },
  { envVar: 'ANTHROPIC_BASE_URL', providerName: 'anthropic', option: 'baseUrl' },
];

function settingsFor(
  providers: Record<string, ProviderSettings>,
  providerName: string,
): ProviderSettings {
  const existing = providers[providerName];
  if (existing) {
    return existing;
  }
  const created: ProviderSettings = {};
  providers[providerName] = created;
  return created;
}

export function detectProviders(env: Env = process.env): Record<string, ProviderSettings> {
  const providers: Record<string, ProviderSettings> = {};

  for (const config of DEFAULT_PROVIDER_ENV_CONFIGS) {
    const apiKey = env[config.envVar];
    if (apiKey && apiKey.length > 0) {
      settingsFor(providers, config.providerName).apiKey = apiKey;
    }
  }

  for (const config of DEFAULT_PROVIDER_OPTION_ENV_CONFIGS) {
    const value = env[config.envVar];
    if (value && value.length > 0) {
      settingsFor(providers, config.providerName)[config.option] = value;
    }
  }

  return providers;
}
