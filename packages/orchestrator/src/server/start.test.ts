import { describe, it, expect } from 'vitest';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { asRecord, asString } from '@docweave/llm';
import { startServer } from './start.js';
import { loadConfig } from '../config.js';

const ROOT = new URL('../../../../', import.meta.url);

describe('startServer', () => {
  it('listens on the configured address and closes cleanly', async () => {
    const lines: Array<string> = [];
    const env = { PORT: '0', OPENAI_API_KEY: 'test-key' };
    const running = await startServer(loadConfig(env), { env, log: (line) => lines.push(line) });

    try {
      expect(running.port).toBeGreaterThan(0);
      expect(running.context.client.resolve('gpt-4o-mini').name).toBe('openai');

      const response = await fetch(`http://127.0.0.1:${running.port}/api/prompts`);
      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        error: 'Internal server error',
        message: 'Failed to connect to tool gateway: TOOL_GATEWAY_URL is not configured',
      });
      expect(lines).toContain('GET /api/prompts 500');
    } finally {
      await running.close();
    }
    expect(running.server.listening).toBe(false);
  });

  it('is what the start script runs', async () => {
    const manifest = asRecord(JSON.parse(await readFile(new URL('package.json', ROOT), 'utf8')));
    const start = asString(asRecord(manifest?.['scripts'])?.['start']);
    const entry = start.split(' ').pop() ?? '';

    expect(start).toBe('tsx packages/orchestrator/src/server/main.ts');
    expect(existsSync(new URL(entry, ROOT))).toBe(true);
    const main = await readFile(new URL(entry, ROOT), 'utf8');
    expect(main).toContain("from './start.js'");
  });
});
