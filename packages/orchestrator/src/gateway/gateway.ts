import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ConfigurationError, asArray, asRecord, asString } from '@docweave/llm';
import type { ToolSpec } from '@docweave/llm';
import { GatewayError, ToolExecutionError } from '../types/index.js';
import { toToolSpec } from '../tools/tool-spec.js';
import type {
  PromptArgumentSpec,
  PromptSpec,
  ToolCallOutcome,
  ToolGateway,
} from '../types/index.js';

export type ClientInfo = {
  readonly name: string;
  readonly version: string;
};

export type ToolGatewayOptions = {
  readonly url?: string;
  readonly clientInfo?: ClientInfo;
  readonly createTransport?: () => Transport | Promise<Transport>;
};

export const DEFAULT_CLIENT_INFO: ClientInfo = {
  name: 'docweave-orchestrator',
  version: '0.1.0',
};

// Matches the key both as plain JSON and inside a JSON string that was
// serialized a second time.
const IMAGE_FIELD_PATTERN = /\\?"image_base64\\?"\s*:/g;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toPromptSpec(prompt: unknown): PromptSpec {
  const record = asRecord(prompt) ?? {};
  const description = asString(record['description']);
  const args: Array<PromptArgumentSpec> = [];
  for (const entry of asArray(record['arguments'])) {
    const arg = asRecord(entry);
    if (!arg) {
      continue;
    }
    const argDescription = asString(arg['description']);
    const required = arg['required'];
    args.push({
      name: asString(arg['name']),
      ...(argDescription ? { description: argDescription } : {}),
      ...(typeof required === 'boolean' ? { required } : {}),
    });
  }

  return {
    name: asString(record['name']),
    ...(description ? { description } : {}),
    ...(Array.isArray(record['arguments']) ? { arguments: args } : {}),
  };
}

export function isEmptyContent(content: unknown): boolean {
  if (content === undefined || content === null) {
    return true;
  }
  if (Array.isArray(content)) {
    return content.length === 0;
  }
  return typeof content !== 'object';
}

export function countImages(content: unknown): number {
  const serialized = JSON.stringify(content ?? null);
  return serialized.match(IMAGE_FIELD_PATTERN)?.length ?? 0;
}

/**
 * Holds at most one live connection to the tool backend. Setup is
 * single-flight: callers arriving while a connection is being opened share
 * the same attempt, and a failed attempt leaves nothing cached behind.
 */
export function createToolGateway(options: ToolGatewayOptions = {}): ToolGateway {
  const clientInfo = options.clientInfo ?? DEFAULT_CLIENT_INFO;
  let client: Client | null = null;
  let connecting: Promise<Client> | null = null;

  async function openTransport(): Promise<Transport> {
    if (options.createTransport) {
      return options.createTransport();
    }
    if (!options.url) {
      throw new ConfigurationError('TOOL_GATEWAY_URL is not configured');
    }
    return new StreamableHTTPClientTransport(new URL(options.url));
  }

  async function open(): Promise<Client> {
    const transport = await openTransport();
    const candidate = new Client(
      { name: clientInfo.name, version: clientInfo.version },
      { capabilities: {} },
    );
    await candidate.connect(transport);
    // A dropped connection is reopened on next use
    candidate.onclose = () => {
      if (client === candidate) {
        client = null;
      }
    };
    return candidate;
  }

  function ensureClient(): Promise<Client> {
    if (client) {
      return Promise.resolve(client);
    }
    if (!connecting) {
      connecting = open().then(
        (opened) => {
          client = opened;
          connecting = null;
          return opened;
        },
        (error: unknown) => {
          client = null;
          connecting = null;
          throw new GatewayError(
            `Failed to connect to tool gateway: ${errorMessage(error)}`,
            error instanceof Error ? error : undefined,
          );
        },
      );
    }
    return connecting;
  }

  async function connect(): Promise<void> {
    await ensureClient();
  }

  async function listTools(): Promise<ReadonlyArray<ToolSpec>> {
    const active = await ensureClient();
    const tools: Array<ToolSpec> = [];
    let cursor: string | undefined;
    do {
      const page = await active.listTools(cursor ? { cursor } : undefined);
      tools.push(...page.tools.map(toToolSpec));
      cursor = page.nextCursor;
    } while (cursor);
    return tools;
  }

  async function listPrompts(): Promise<ReadonlyArray<PromptSpec>> {
    const active = await ensureClient();
    const result = await active.listPrompts();
    return result.prompts.map(toPromptSpec);
  }

  async function callTool(
    name: string,
    args: Record<string, unknown>,
  ): Promise<ToolCallOutcome> {
    let result: Record<string, unknown> | undefined;
    try {
      const active = await ensureClient();
      result = asRecord(await active.callTool({ name, arguments: args }));
    } catch (error) {
      throw new ToolExecutionError(
        name,
        errorMessage(error),
        error instanceof Error ? error : undefined,
      );
    }

    const content = result?.['content'];
    return {
      content,
      isError: result?.['isError'] === true,
      empty: isEmptyContent(content),
      imageCount: countImages(content),
    };
  }

  function isConnected(): boolean {
    return client !== null;
  }

  async function close(): Promise<void> {
    const pending = connecting;
    connecting = null;
    // A failed in-flight attempt was already reported to its callers
    const current = client ?? (pending ? await pending.catch(() => null) : null);
    client = null;
    if (current) {
      await current.close();
    }
  }

  return {
    connect,
    listTools,
    listPrompts,
    callTool,
    isConnected,
    close,
  };
}
