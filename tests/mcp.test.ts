import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createAgentMcpServer } from '../src/mcp/agent-mcp-server.js';
import { RunManager } from '../src/task/run-manager.js';
import { APP, createTestRuntime, finishingVlm, type TestRuntime } from './helpers.js';

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  isError: z.boolean().optional(),
});

// Helper: parse MCP tool result text
function parseResult(result: unknown): { data: Record<string, unknown>; isError: boolean } {
  const parsed = toolResultSchema.parse(result);
  return { data: z.record(z.unknown()).parse(JSON.parse(parsed.content[0].text)), isError: parsed.isError === true };
}

describe('Agent MCP Server', () => {
  let env: TestRuntime;
  let runManager: RunManager;
  let mcpServer: McpServer;
  let mcpClient: Client;

  beforeEach(async () => {
    env = createTestRuntime(finishingVlm());
    runManager = new RunManager({ createSession: env.runtime.sessionFactory });
    mcpServer = createAgentMcpServer(runManager, env.knowledge);
    const [ct, st] = InMemoryTransport.createLinkedPair();
    await mcpServer.connect(st);
    mcpClient = new Client({ name: 'test', version: '0.1.0' });
    await mcpClient.connect(ct);
  });

  afterEach(async () => {
    await mcpClient.close();
    await mcpServer.close();
    runManager.dispose();
    env.cleanup();
  });

  async function call(name: string, args: Record<string, unknown>) {
    return parseResult(await mcpClient.callTool({ name, arguments: args }));
  }

  it('lists the session and knowledge tools', async () => {
    const { tools } = await mcpClient.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(['cancel_session', 'get_session', 'lookup_knowledge', 'start_session']);
  });

  it('start_session runs a task to completion when waiting', async () => {
    const { data, isError } = await call('start_session', { goal: 'Open the menu', app: APP, wait: true });
    expect(isError).toBe(false);
    expect(data).toMatchObject({ goal: 'Open the menu', mode: 'execute', status: 'completed' });
    expect(data.result).toMatchObject({ recordCount: 1, message: 'Done' });
  });

  it('start_session rejects an empty goal', async () => {
    const { data, isError } = await call('start_session', { goal: ' ' });
    expect(isError).toBe(true);
    expect(data).toEqual({ error: 'Task goal must not be empty', errorCode: 'InvalidTask' });
  });

  it('get_session returns records on request', async () => {
    const started = await call('start_session', { goal: 'Open the menu', wait: true });
    const runId = started.data.runId;

    const plain = await call('get_session', { runId });
    expect(plain.data.records).toBeUndefined();

    const { data } = await call('get_session', { runId, includeRecords: true });
    expect(data.records).toEqual([expect.objectContaining({ round: 1, description: 'Task complete: Done' })]);
  });

  it('get_session reports unknown sessions', async () => {
    const { data, isError } = await call('get_session', { runId: 'missing' });
    expect(isError).toBe(true);
    expect(data).toEqual({ error: 'Session not found: missing', errorCode: 'SESSION_NOT_FOUND' });
  });

  it('cancel_session refuses finished sessions', async () => {
    const started = await call('start_session', { goal: 'Open the menu', wait: true });
    const { data, isError } = await call('cancel_session', { runId: started.data.runId });
    expect(isError).toBe(true);
    expect(data).toEqual({ error: 'Session already completed', errorCode: 'SESSION_NOT_ACTIVE' });
  });

  it('lookup_knowledge summarizes an app or one screen', async () => {
    env.knowledge.open('com.example.music').merge({
      screenSignature: 'screen-1',
      elementSignature: 'el-1',
      description: 'Starts playback',
    });

    const missing = await call('lookup_knowledge', { app: 'com.example.unknown' });
    expect(missing.data).toEqual({ error: 'No knowledge for app: com.example.unknown', errorCode: 'APP_NOT_FOUND' });

    const summary = await call('lookup_knowledge', { app: 'com.example.music' });
    expect(summary.data).toMatchObject({ app: 'com.example.music', screens: 1, entries: 1 });

    const screen = await call('lookup_knowledge', { app: 'com.example.music', screen: 'screen-1' });
    expect(screen.data.entries).toEqual([expect.objectContaining({ descriptions: ['Starts playback'], visits: 1 })]);
  });
});
