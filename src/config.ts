import { isServerLogLevel, type ServerLogLevel } from './lib/serverLogs';

export type AppConfig = {
  port: number;
  fmp: { apiKey: string | null; baseUrl: string };
  coingecko: { apiKey: string | null; baseUrl: string };
  fearGreedUrl: string;
  providerTimeoutMs: number;
  indicatorCacheTtlMs: number;
  lookupCacheTtlMs: number;
  assetStoreDir: string;
  bellwetherSymbols: string[];
  logLevel: ServerLogLevel;
};

const DEFAULT_BELLWETHERS = ['SPY', 'QQQ', 'BTCUSD', 'ETHUSD', 'GLD', 'TLT'];

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return raw && Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
}

function nonEmpty(raw: string | undefined): string | null {
  const v = raw?.trim();
  return v ? v : null;
}

function symbolList(raw: string | undefined): string[] {
  if (!raw) return DEFAULT_BELLWETHERS;
  const list = raw
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter(Boolean);
  return list.length ? list : DEFAULT_BELLWETHERS;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const level = env.LOG_LEVEL?.toLowerCase();
  return {
    port: positiveInt(env.PORT, 3001),
    fmp: {
      apiKey: nonEmpty(env.FMP_API_KEY),
      baseUrl: nonEmpty(env.FMP_BASE_URL) ?? 'https://financialmodelingprep.com',
    },
    coingecko: {
      apiKey: nonEmpty(env.COINGECKO_API_KEY),
      baseUrl: nonEmpty(env.COINGECKO_BASE_URL) ?? 'https://pro-api.coingecko.com/api/v3',
    },
    fearGreedUrl: nonEmpty(env.FEAR_GREED_URL) ?? 'https://api.alternative.me/fng/?limit=1',
    providerTimeoutMs: positiveInt(env.PROVIDER_TIMEOUT_MS, 5000),
    indicatorCacheTtlMs: positiveInt(env.INDICATOR_CACHE_TTL_MS, 60 * 60 * 1000),
    lookupCacheTtlMs: positiveInt(env.LOOKUP_CACHE_TTL_MS, 5 * 60 * 1000),
    assetStoreDir: nonEmpty(env.ASSET_STORE_DIR) ?? '.data',
    bellwetherSymbols: symbolList(env.BELLWETHER_SYMBOLS),
    logLevel: isServerLogLevel(level) ? level : 'info',
  };
}
