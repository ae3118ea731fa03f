import { Router } from 'express';
import { createContextController } from '../controllers/context.controller';
import type { ContextPipeline } from '../services/contextPipeline.service';

export function createContextRouter(pipeline: ContextPipeline) {
  const router = Router();
  router.post('/', createContextController(pipeline));
  return router;
}
