import { Client } from '@docweave/llm';
import type { Env } from '@docweave/llm';
import type { ToolGateway } from './types/index.js';
import { createRateLimiter, type RateLimiter } from './rate-limit/rate-limiter.js';
import { createToolGateway } from './gateway/gateway.js';
import { DEFAULT_MAX_ITERATIONS, type OrchestratorConfig } from './config.js';

/**
 * Everything a conversation shares with other conversations in the same
 * process: the provider client, the tool connection and the rate-limit table.
 */
export type OrchestratorContext = {
  readonly client: Client;
  readonly gateway: ToolGateway;
  readonly rateLimiter: RateLimiter;
  readonly maxIterations: number;
  readonly close: () => Promise<void>;
};

export type OrchestratorContextOptions = {
  readonly client: Client;
  readonly gateway: ToolGateway;
  readonly rateLimiter?: RateLimiter;
  readonly maxIterations?: number;
};

export function createOrchestratorContext(
  options: OrchestratorContextOptions,
): OrchestratorContext {
  const { client, gateway } = options;
  let closing: Promise<void> | null = null;

  async function teardown(): Promise<void> {
    try {
      await gateway.close();
    } finally {
      await client.close();
    }
  }

  return {
    client,
    gateway,
    rateLimiter: options.rateLimiter ?? createRateLimiter(),
    maxIterations: options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    close: () => {
      if (!closing) {
        closing = teardown();
      }
      return closing;
    },
  };
}

export function createOrchestratorContextFromEnv(
  config: OrchestratorConfig,
  env?: Env,
): OrchestratorContext {
  const client = Client.fromEnv({
    env,
    timeout:
      config.providerTimeoutMs !== undefined ? { requestMs: config.providerTimeoutMs } : undefined,
  });

  return createOrchestratorContext({
    client,
    gateway: createToolGateway({ url: config.toolGatewayUrl }),
    rateLimiter: createRateLimiter({ windowMs: config.rateLimitWindowMs }),
    maxIterations: config.maxIterations,
  });
}
