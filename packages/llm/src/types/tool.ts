export type ToolInputSchema = {
  readonly type?: 'object';
  readonly properties?: Record<string, unknown>;
  readonly required?: ReadonlyArray<string>;
  readonly [key: string]: unknown;
};

/**
 * A tool as advertised by the tool backend. Only `name` is guaranteed.
 */
export type ToolSpec = {
  readonly name: string;
  readonly description?: string;
  readonly inputSchema?: ToolInputSchema;
  readonly outputSchema?: Record<string, unknown>;
  readonly annotations?: Record<string, unknown>;
};

export type FunctionToolDefinition = {
  readonly type: 'function';
  readonly function: {
    readonly name: string;
    readonly description: string;
    readonly parameters: Record<string, unknown>;
  };
};

export type BlockToolDefinition = {
  readonly name: string;
  readonly description: string;
  readonly input_schema: {
    readonly type: 'object';
    readonly properties: Record<string, unknown>;
    readonly required: ReadonlyArray<string>;
    readonly [key: string]: unknown;
  };
};

export type ProviderToolDefinition = FunctionToolDefinition | BlockToolDefinition;

export function describeTool(tool: Readonly<ToolSpec>): string {
  return tool.description || `Execute ${tool.name}`;
}
