import { ConfigurationError } from '@docweave/llm';
import type { Env } from '@docweave/llm';

export type OrchestratorConfig = {
  readonly port: number;
  readonly host: string;
  readonly toolGatewayUrl?: string;
  readonly maxIterations: number;
  readonly rateLimitWindowMs: number;
  readonly providerTimeoutMs?: number;
};

export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_MAX_ITERATIONS = 10;

function readInteger(env: Env, name: string, min: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(
      `Invalid ${name}: expected an integer >= ${min}, got "${raw}"`,
    );
  }
  return value;
}

export function loadConfig(env: Env = process.env): OrchestratorConfig {
  const toolGatewayUrl = env['TOOL_GATEWAY_URL'] || undefined;
  const providerTimeoutMs = readInteger(env, 'PROVIDER_TIMEOUT_MS', 1);

  return {
    port: readInteger(env, 'PORT', 0) ?? DEFAULT_PORT,
    host: env['HOST'] || DEFAULT_HOST,
    ...(toolGatewayUrl ? { toolGatewayUrl } : {}),
    maxIterations: readInteger(env, 'MAX_ITERATIONS', 1) ?? DEFAULT_MAX_ITERATIONS,
    rateLimitWindowMs: readInteger(env, 'RATE_LIMIT_WINDOW_MS', 1) ?? 60000,
    ...(providerTimeoutMs !== undefined ? { providerTimeoutMs } : {}),
  };
}
