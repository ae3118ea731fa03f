import type { Request, Response } from 'express';
import { ServerLogsService, parseServerLogQuery } from '../services/serverLogs.service';
import { errorMessage } from '../lib/errors';

function failure(res: Response, e: unknown) {
  res.status(500).json({
    success: false,
    timestamp: new Date().toISOString(),
    error: errorMessage(e),
  });
}

export function createServerLogsController(service = new ServerLogsService()) {
  return {
    list(req: Request, res: Response) {
      try {
        const entries = service.list(parseServerLogQuery(req.query));
        res.json({ success: true, timestamp: new Date().toISOString(), entries });
      } catch (e) {
        failure(res, e);
      }
    },

    clear(_req: Request, res: Response) {
      try {
        service.clearAll();
        res.json({ success: true, timestamp: new Date().toISOString() });
      } catch (e) {
        failure(res, e);
      }
    },
  };
}
