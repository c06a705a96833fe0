import { describe, it, expect, vi } from 'vitest';
import type { ToolCallData } from '@docweave/llm';
import { executeToolCalls } from './dispatch.js';
import { ToolExecutionError } from '../types/index.js';
import type { ConversationEvent, ToolCallOutcome, ToolGateway } from '../types/index.js';

function createMockGateway(
  callTool: (name: string, args: Record<string, unknown>) => Promise<ToolCallOutcome>,
): ToolGateway {
  return {
    connect: vi.fn().mockResolvedValue(undefined),
    listTools: vi.fn().mockResolvedValue([]),
    listPrompts: vi.fn().mockResolvedValue([]),
    callTool: vi.fn(callTool),
    isConnected: () => true,
    close: vi.fn().mockResolvedValue(undefined),
  };
}

function call(id: string, name: string, value: Record<string, unknown>): ToolCallData {
  return { kind: 'TOOL_CALL', toolCallId: id, toolName: name, arguments: { ok: true, value } };
}

function outcome(content: unknown, overrides?: Partial<ToolCallOutcome>): ToolCallOutcome {
  return { content, isError: false, empty: false, imageCount: 0, ...overrides };
}

describe('executeToolCalls', () => {
  it('serializes successful content with two-space indentation', async () => {
    const gateway = createMockGateway(async () => outcome({ wins: 90 }));

    const results = await executeToolCalls([call('c1', 'get_team', { id: 1 })], gateway);

    expect(results).toEqual([
      { toolCallId: 'c1', toolName: 'get_team', content: '{\n  "wins": 90\n}', isError: false },
    ]);
    expect(gateway.callTool).toHaveBeenCalledWith('get_team', { id: 1 });
  });

  it('reports undecodable arguments without calling the gateway', async () => {
    const gateway = createMockGateway(async () => outcome([]));
    const bad: ToolCallData = {
      kind: 'TOOL_CALL',
      toolCallId: 'c2',
      toolName: 'get_player',
      arguments: { ok: false, raw: '{"id":', error: 'Unexpected end of JSON input' },
    };

    const results = await executeToolCalls([bad], gateway);

    expect(results).toEqual([
      {
        toolCallId: 'c2',
        toolName: 'get_player',
        content: 'Invalid arguments for get_player: Unexpected end of JSON input',
        isError: true,
      },
    ]);
    expect(gateway.callTool).not.toHaveBeenCalled();
  });

  it('turns gateway failures into error results', async () => {
    const gateway = createMockGateway(async (name) => {
      throw new ToolExecutionError(name, 'socket hang up');
    });

    const results = await executeToolCalls([call('c3', 'get_schedule', {})], gateway);

    expect(results[0]).toEqual({
      toolCallId: 'c3',
      toolName: 'get_schedule',
      content: 'Error executing get_schedule: Tool execution failed for get_schedule: socket hang up',
      isError: true,
    });
  });

  it('keeps one result per call in emission order and runs them sequentially', async () => {
    const order: Array<string> = [];
    let active = 0;
    let maxActive = 0;
    const gateway = createMockGateway(async (name) => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      order.push(name);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      if (name === 'b') {
        throw new Error('boom');
      }
      return outcome(name);
    });

    const results = await executeToolCalls(
      [call('1', 'a', {}), call('2', 'b', {}), call('3', 'c', {})],
      gateway,
    );

    expect(order).toEqual(['a', 'b', 'c']);
    expect(maxActive).toBe(1);
    expect(results.map((r) => [r.toolCallId, r.isError])).toEqual([
      ['1', false],
      ['2', true],
      ['3', false],
    ]);
  });

  it('emits start, diagnostic and end events', async () => {
    const events: Array<ConversationEvent> = [];
    const gateway = createMockGateway(async () =>
      outcome([], { empty: true, imageCount: 0 }),
    );
    const plotGateway = createMockGateway(async () =>
      outcome([{ image_base64: 'x' }], { imageCount: 1 }),
    );

    await executeToolCalls([call('c1', 'empty_tool', {})], gateway, {
      emit: (event) => events.push(event),
    });
    await executeToolCalls([call('c2', 'plot', {})], plotGateway, {
      emit: (event) => events.push(event),
    });

    expect(events.map((event) => event.kind)).toEqual([
      'TOOL_CALL_START',
      'TOOL_RESULT_EMPTY',
      'TOOL_CALL_END',
      'TOOL_CALL_START',
      'TOOL_RESULT_IMAGES',
      'TOOL_CALL_END',
    ]);
    expect(events[2]).toEqual({
      kind: 'TOOL_CALL_END',
      toolCallId: 'c1',
      toolName: 'empty_tool',
      output: '[]',
      isError: false,
    });
  });

  it('passes the backend error flag into the result', async () => {
    const gateway = createMockGateway(async () => outcome('bad season', { isError: true }));

    const results = await executeToolCalls([call('c1', 'f', {})], gateway);

    expect(results[0]?.isError).toBe(true);
    expect(results[0]?.content).toBe('"bad season"');
  });
});
