import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { errorMessage, isAgentError } from '../agent/errors.js';
import { taskSchema } from '../agent/types.js';
import type { KnowledgeStore } from '../memory/KnowledgeStore.js';
import { isSafeAppId } from '../memory/KnowledgeStore.js';
import { isTerminal, toRunView, type RunManager } from '../task/run-manager.js';
import { VERSION } from '../version.js';

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: true;
};

// Helper: wrap result as MCP text content
function textResult(data: unknown): ToolResult {
  return { content: [{ type: 'text' as const, text: JSON.stringify(data) }] };
}

// Helper: wrap error as MCP error content
function errorResult(message: string, errorCode?: string): ToolResult {
  const payload: { error: string; errorCode?: string } = { error: message };
  if (errorCode) payload.errorCode = errorCode;
  return { content: [{ type: 'text' as const, text: JSON.stringify(payload) }], isError: true as const };
}

async function guard(fn: () => Promise<ToolResult> | ToolResult): Promise<ToolResult> {
  try {
    return await fn();
  } catch (err) {
    return errorResult(errorMessage(err), isAgentError(err) ? err.kind : undefined);
  }
}

export function createAgentMcpServer(runManager: RunManager, knowledgeStore: KnowledgeStore): McpServer {
  const server = new McpServer(
    { name: 'android-pilot', version: VERSION },
    { capabilities: { tools: {} } }
  );

  // ===== start_session =====
  server.tool(
    'start_session',
    'Start an agent session on the connected Android device',
    {
      goal: z.string().describe('Natural-language task for the agent'),
      mode: z.enum(['execute', 'explore']).optional().describe('execute (default) or explore'),
      app: z.string().optional().describe('App identifier the knowledge base is keyed by'),
      packageName: z.string().optional().describe('Package to launch before the first round'),
      wait: z.boolean().optional().describe('Block until the session ends, default false'),
    },
    async ({ goal, mode, app, packageName, wait }) => guard(async () => {
      const parsed = taskSchema.safeParse({ goal, mode: mode ?? 'execute', app, packageName });
      if (!parsed.success) {
        return errorResult(parsed.error.issues.map((i) => i.message).join('; '), 'InvalidTask');
      }
      const { runId } = await runManager.submit(parsed.data, { mode: wait ? 'sync' : 'async' });
      const run = runManager.get(runId);
      return textResult(run ? toRunView(run) : { runId });
    })
  );

  // ===== get_session =====
  server.tool(
    'get_session',
    'Get the status of a session, optionally with its action records',
    {
      runId: z.string().describe('Session id returned by start_session'),
      includeRecords: z.boolean().optional().describe('Include per-round records, default false'),
    },
    async ({ runId, includeRecords }) => guard(() => {
      const run = runManager.get(runId);
      if (!run) return errorResult(`Session not found: ${runId}`, 'SESSION_NOT_FOUND');
      const view = toRunView(run);
      return textResult(includeRecords ? { ...view, records: runManager.records(runId) ?? [] } : view);
    })
  );

  // ===== cancel_session =====
  server.tool(
    'cancel_session',
    'Request cooperative cancellation; the session stops before its next round',
    {
      runId: z.string().describe('Session id returned by start_session'),
    },
    async ({ runId }) => guard(() => {
      const run = runManager.get(runId);
      if (!run) return errorResult(`Session not found: ${runId}`, 'SESSION_NOT_FOUND');
      if (isTerminal(run.status)) {
        return errorResult(`Session already ${run.status}`, 'SESSION_NOT_ACTIVE');
      }
      runManager.cancel(runId);
      return textResult({ runId, cancelRequested: true, status: run.status });
    })
  );

  // ===== lookup_knowledge =====
  server.tool(
    'lookup_knowledge',
    'Read what earlier sessions learned about an app, for one screen or as a summary',
    {
      app: z.string().describe('App identifier'),
      screen: z.string().optional().describe('Screen signature; omit for an app summary'),
    },
    async ({ app, screen }) => guard(() => {
      if (!isSafeAppId(app) || !knowledgeStore.hasApp(app)) {
        return errorResult(`No knowledge for app: ${app}`, 'APP_NOT_FOUND');
      }
      if (screen) {
        return textResult({ app, screen, entries: knowledgeStore.lookup(app, screen) });
      }
      return textResult(knowledgeStore.open(app).summary());
    })
  );

  return server;
}
