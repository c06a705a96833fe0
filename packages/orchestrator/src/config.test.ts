import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@docweave/llm';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: '127.0.0.1',
      maxIterations: 10,
      rateLimitWindowMs: 60000,
    });
  });

  it('reads every variable', () => {
    expect(
      loadConfig({
        PORT: '8080',
        HOST: '0.0.0.0',
        TOOL_GATEWAY_URL: 'http://localhost:8000/mcp',
        MAX_ITERATIONS: '4',
        RATE_LIMIT_WINDOW_MS: '1000',
        PROVIDER_TIMEOUT_MS: '30000',
      }),
    ).toEqual({
      port: 8080,
      host: '0.0.0.0',
      toolGatewayUrl: 'http://localhost:8000/mcp',
      maxIterations: 4,
      rateLimitWindowMs: 1000,
      providerTimeoutMs: 30000,
    });
  });

  it('ignores blank values', () => {
    expect(loadConfig({ PORT: ' ', TOOL_GATEWAY_URL: '' }).port).toBe(3000);
  });

  it.each([
    ['PORT', 'abc'],
    ['MAX_ITERATIONS', '0'],
    ['RATE_LIMIT_WINDOW_MS', '1.5'],
    ['PROVIDER_TIMEOUT_MS', '-5'],
  ])('rejects %s=%s', (name, value) => {
    expect(() => loadConfig({ [name]: value })).toThrow(ConfigurationError);
  });

  it('names the bad variable in the message', () => {
    expect(() => loadConfig({ MAX_ITERATIONS: 'ten' })).toThrow(
      'Invalid MAX_ITERATIONS: expected an integer >= 1, got "ten"',
    );
  });
});
