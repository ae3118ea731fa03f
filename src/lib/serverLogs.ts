export type ServerLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ServerLogEntry = {
  id: string;
  ts: number;
  level: ServerLogLevel;
  message: string;
  details?: string;
  source?: string;
};

const MAX_ENTRIES = 500;

export const LEVEL_RANK: Record<ServerLogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

type ServerLogStore = {
  seq: number;
  buffer: ServerLogEntry[];
  consoleLevel: ServerLogLevel;
};

const store: ServerLogStore = { seq: 0, buffer: [], consoleLevel: 'info' };

export function isServerLogLevel(v: unknown): v is ServerLogLevel {
  return v === 'debug' || v === 'info' || v === 'warn' || v === 'error';
}

/** Minimum level mirrored to the console. The buffer always keeps every level. */
export function setConsoleLogLevel(level: ServerLogLevel) {
  store.consoleLevel = level;
}

function safeString(v: unknown): string {
  if (v instanceof Error) {
    return `${v.name}: ${v.message}`;
  }
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean' || v === null || v === undefined) return String(v);
  try {
    return JSON.stringify(v);
  } catch {
    return Object.prototype.toString.call(v);
  }
}

function mirror(entry: ServerLogEntry) {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[store.consoleLevel]) return;
  const line = `[${entry.source ?? 'app'}] ${entry.message}`;
  const args = entry.details === undefined ? [line] : [line, entry.details];
  switch (entry.level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.log(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}

export function addServerLog(entry: Omit<ServerLogEntry, 'id'>) {
  const id = `${entry.ts}-${store.seq++}`;
  const full = { ...entry, id };
  store.buffer.push(full);
  if (store.buffer.length > MAX_ENTRIES) store.buffer.splice(0, store.buffer.length - MAX_ENTRIES);
  mirror(full);
}

export function serverLog(level: ServerLogLevel, message: string, details?: unknown, source?: string) {
  addServerLog({
    ts: Date.now(),
    level,
    message,
    details: details === undefined ? undefined : safeString(details),
    source,
  });
}

export type Logger = Record<ServerLogLevel, (message: string, details?: unknown) => void>;

export function createLogger(source: string): Logger {
  return {
    debug: (message, details) => serverLog('debug', message, details, source),
    info: (message, details) => serverLog('info', message, details, source),
    warn: (message, details) => serverLog('warn', message, details, source),
    error: (message, details) => serverLog('error', message, details, source),
  };
}

export function getServerLogs(): ServerLogEntry[] {
  return store.buffer.slice();
}

export function clearServerLogs() {
  store.buffer.splice(0, store.buffer.length);
}
