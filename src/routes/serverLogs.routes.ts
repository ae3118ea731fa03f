import { Router } from 'express';
import { createServerLogsController } from '../controllers/serverLogs.controller';
import type { ServerLogsService } from '../services/serverLogs.service';

/** GET lists buffered entries (`?limit=&level=`), DELETE empties the buffer. */
export function createServerLogsRouter(service?: ServerLogsService) {
  const controller = createServerLogsController(service);
  const router = Router();
  router.get('/', controller.list);
  router.delete('/', controller.clear);
  return router;
}
