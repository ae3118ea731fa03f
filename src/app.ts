import express from 'express';
import cors from 'cors';
import { createApiRouter } from './routes';
import type { ContextPipeline } from './services/contextPipeline.service';

export function createApp(pipeline: ContextPipeline) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true, ts: Date.now() });
  });

  app.use('/api', createApiRouter(pipeline));

  return app;
}
