import type { ToolSpec } from '@docweave/llm';

export type PromptArgumentSpec = {
  readonly name: string;
  readonly description?: string;
  readonly required?: boolean;
};

export type PromptSpec = {
  readonly name: string;
  readonly description?: string;
  readonly arguments?: ReadonlyArray<PromptArgumentSpec>;
};

export type ToolCallOutcome = {
  readonly content: unknown;
  readonly isError: boolean;
  readonly empty: boolean;
  readonly imageCount: number;
};

export interface ToolGateway {
  connect(): Promise<void>;
  listTools(): Promise<ReadonlyArray<ToolSpec>>;
  listPrompts(): Promise<ReadonlyArray<PromptSpec>>;
  callTool(name: string, args: Record<string, unknown>): Promise<ToolCallOutcome>;
  isConnected(): boolean;
  close(): Promise<void>;
}
