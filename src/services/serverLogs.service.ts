import {
  clearServerLogs,
  getServerLogs,
  isServerLogLevel,
  LEVEL_RANK,
  type ServerLogEntry,
  type ServerLogLevel,
} from '../lib/serverLogs';

export type ServerLogQuery = {
  limit: number;
  minLevel: ServerLogLevel | null;
};

export function parseServerLogQuery(query: Record<string, unknown>): ServerLogQuery {
  const n = Number(query.limit);
  const level = typeof query.level === 'string' ? query.level.toLowerCase() : null;
  return {
    limit: Number.isFinite(n) && n > 0 ? Math.min(500, Math.floor(n)) : 500,
    minLevel: isServerLogLevel(level) ? level : null,
  };
}

export class ServerLogsService {
  /** Newest `limit` entries at or above `minLevel`, oldest first. */
  list({ limit, minLevel }: ServerLogQuery): ServerLogEntry[] {
    const entries = getServerLogs();
    if (!minLevel) return entries.slice(-limit);
    const floor = LEVEL_RANK[minLevel];
    return entries.filter((e) => LEVEL_RANK[e.level] >= floor).slice(-limit);
  }

  clearAll() {
    clearServerLogs();
  }
}
