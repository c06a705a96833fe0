import type { Server } from 'node:http';
import type { Env } from '@docweave/llm';
import type { OrchestratorConfig } from '../config.js';
import { createOrchestratorContextFromEnv, type OrchestratorContext } from '../context.js';
import { createServer } from './http.js';

export type RunningServer = {
  readonly server: Server;
  readonly context: OrchestratorContext;
  readonly port: number;
  readonly close: () => Promise<void>;
};

export type StartOptions = {
  readonly env?: Env;
  readonly log?: (line: string) => void;
};

/**
 * Builds the context from `config`, starts listening, and resolves once the
 * port is bound. `close` stops accepting requests and tears the context down.
 */
export async function startServer(
  config: OrchestratorConfig,
  options: StartOptions = {},
): Promise<RunningServer> {
  const context = createOrchestratorContextFromEnv(config, options.env);
  const server = createServer(context, options.log ? { log: options.log } : {});

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : config.port;

  return {
    server,
    context,
    port,
    close: async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await context.close();
    },
  };
}
