import { Router } from 'express';
import type { ContextPipeline } from '../services/contextPipeline.service';
import { createContextRouter } from './context.routes';
import { createServerLogsRouter } from './serverLogs.routes';

export function createApiRouter(pipeline: ContextPipeline) {
  const apiRouter = Router();

  apiRouter.get('/health', (_req, res) => {
    res.json({ ok: true, ts: Date.now() });
  });

  apiRouter.use('/context', createContextRouter(pipeline));
  apiRouter.use('/server-logs', createServerLogsRouter());

  return apiRouter;
}
