import { createServer as createHttpServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { ConversationContext } from '../session/loop.js';
import { createConversationEventEmitter } from '../session/events.js';
import { logEvents } from '../session/log.js';
import { routeRequest, type HandlerResponse } from './handler.js';

export type ServerOptions = {
  readonly log?: (line: string) => void;
};

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Array<Buffer> = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

function send(res: ServerResponse, response: HandlerResponse): void {
  res.writeHead(response.status, response.headers);
  res.end(response.body);
}

/**
 * Serves the generation and gateway listing routes. Each request gets its
 * own event stream, drained into `log`.
 */
export function createServer(context: ConversationContext, options: ServerOptions = {}): Server {
  const log = options.log ?? ((line: string) => process.stderr.write(`${line}\n`));

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    const events = createConversationEventEmitter();
    const logging = logEvents(events.iterator(), log);

    try {
      const body = method === 'POST' ? await readBody(req) : '';
      const response = await routeRequest(
        context,
        { method, path, body },
        { events, signal: controller.signal },
      );
      send(res, response);
      log(`${method} ${path} ${response.status}`);
    } finally {
      events.complete();
      await logging;
    }
  }

  return createHttpServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      log(`[error] ${error instanceof Error ? error.message : String(error)}`);
      if (!res.headersSent) {
        send(res, {
          status: 500,
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ error: 'Internal server error' }),
        });
      } else {
        res.end();
      }
    });
  });
}
