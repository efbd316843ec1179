import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { taskSchema, type Task } from '../agent/types.js';
import type { KnowledgeStore } from '../memory/KnowledgeStore.js';
import { isTerminal, toRunView, type RunManager, type RunState } from '../task/run-manager.js';
import { VERSION } from '../version.js';
import { ApiError, ErrorCode } from './errors.js';

const createSessionSchema = taskSchema.extend({
  mode: z.enum(['execute', 'explore']).default('execute'),
  /** Block until the session terminates */
  wait: z.boolean().default(false),
});

const listQuerySchema = z.object({
  status: z.enum(['queued', 'running', 'completed', 'incomplete', 'failed', 'cancelled']).optional(),
  app: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

export function registerRoutes(
  app: FastifyInstance,
  runManager: RunManager,
  knowledgeStore: KnowledgeStore
) {
  const requireRun = (id: string): RunState => {
    const run = runManager.get(id);
    if (!run) {
      throw new ApiError(ErrorCode.SESSION_NOT_FOUND, `Session not found: ${id}`, 404);
    }
    return run;
  };

  // 健康检查
  app.get('/health', async () => {
    return { status: 'healthy', version: VERSION };
  });

  // ========== 会话 API ==========

  app.post('/v1/sessions', async (request, reply) => {
    const parsed = createSessionSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      throw new ApiError(ErrorCode.INVALID_TASK, formatIssues(parsed.error), 400);
    }
    const { wait, ...fields } = parsed.data;
    const task: Task = fields;

    if (wait) {
      const { runId } = await runManager.submit(task, { mode: 'sync' });
      return toRunView(requireRun(runId));
    }
    const { runId } = await runManager.submit(task, { mode: 'async' });
    reply.status(202);
    return { runId, status: requireRun(runId).status };
  });

  app.get('/v1/sessions', async (request) => {
    const parsed = listQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      throw new ApiError(ErrorCode.INVALID_REQUEST, formatIssues(parsed.error), 400);
    }
    const { status, app: appId, limit, offset } = parsed.data;
    return {
      sessions: runManager.list({ status, app: appId, limit, offset }).map(toRunView),
      total: runManager.count({ status, app: appId }),
    };
  });

  app.get<{ Params: { id: string } }>('/v1/sessions/:id', async (request) => {
    return toRunView(requireRun(request.params.id));
  });

  app.get<{ Params: { id: string } }>('/v1/sessions/:id/records', async (request) => {
    const { id } = request.params;
    requireRun(id);
    return { runId: id, records: runManager.records(id) ?? [] };
  });

  app.post<{ Params: { id: string } }>('/v1/sessions/:id/cancel', async (request) => {
    const run = requireRun(request.params.id);
    if (isTerminal(run.status)) {
      throw new ApiError(ErrorCode.SESSION_NOT_ACTIVE, `Session already ${run.status}`, 409);
    }
    runManager.cancel(run.runId);
    return { runId: run.runId, cancelRequested: true, status: run.status };
  });

  // ========== 知识库 API ==========

  app.get('/v1/knowledge', async () => {
    return { apps: knowledgeStore.listApps() };
  });

  app.get<{ Params: { app: string }; Querystring: { screen?: string } }>('/v1/knowledge/:app', async (request) => {
    const { app: appId } = request.params;
    if (!knowledgeStore.hasApp(appId)) {
      throw new ApiError(ErrorCode.APP_NOT_FOUND, `No knowledge for app: ${appId}`, 404);
    }
    const { screen } = request.query;
    if (screen) {
      return { app: appId, screen, entries: knowledgeStore.lookup(appId, screen) };
    }
    return knowledgeStore.open(appId).snapshot();
  });

  app.delete<{ Params: { app: string } }>('/v1/knowledge/:app', async (request) => {
    const { app: appId } = request.params;
    if (!knowledgeStore.clearApp(appId)) {
      throw new ApiError(ErrorCode.APP_NOT_FOUND, `No knowledge for app: ${appId}`, 404);
    }
    return { app: appId, deleted: true };
  });
}
