import type {
  AssetClass,
  IndicatorKey,
  IndicatorMap,
  IndicatorPoint,
  IndicatorSeries,
  IndicatorType,
  Timeframe,
} from '../types';
import type { MarketDataProvider } from '../providers/types';
import { TtlCache } from '../lib/cache';
import { InvalidTickerError, PartialDataError } from '../lib/errors';
import { err, guardCall, ok, type Result } from '../lib/result';
import { isRecord } from '../lib/shared';
import { createLogger } from '../lib/serverLogs';

const log = createLogger('indicators');

export const INDICATOR_CONFIG = {
  RSI: { key: 'rsi', timeframe: '2h', period: 28 },
  EMA: { key: 'ema', timeframe: '4h', period: 50 },
  DEMA: { key: 'dema', timeframe: '4h', period: 20 },
  SMA: { key: 'sma', timeframe: '4h', period: 200 },
} as const satisfies Record<IndicatorType, { key: IndicatorKey; timeframe: Timeframe; period: number }>;

const INDICATOR_TYPES: readonly IndicatorType[] = ['RSI', 'EMA', 'SMA', 'DEMA'];

export const MAX_POINTS = 12;

export type TickerInput = string | { symbol: string; assetClass?: AssetClass };

export type NormalizedTicker = {
  symbol: string;
  /** Symbol sent upstream; crypto assets are quoted against USD. */
  querySymbol: string;
};

const TICKER_RE = /^[A-Z0-9][A-Z0-9.\-/^=]{0,19}$/;

export function normalizeTicker(input: unknown): Result<NormalizedTicker, InvalidTickerError> {
  let raw: unknown = input;
  let assetClass: AssetClass | undefined;
  if (isRecord(input)) {
    raw = input.symbol;
    const cls = input.assetClass;
    assetClass = cls === 'CRYPTO' || cls === 'EQUITY' ? cls : undefined;
  }
  if (typeof raw !== 'string') return err(new InvalidTickerError(input, assetClass));

  const symbol = raw.trim().toUpperCase();
  if (!TICKER_RE.test(symbol)) return err(new InvalidTickerError(input, assetClass));

  const querySymbol = assetClass === 'CRYPTO' && !symbol.endsWith('USD') ? `${symbol}USD` : symbol;
  return ok({ symbol, querySymbol });
}

export function indicatorCacheKey(type: IndicatorType, symbol: string, timeframe: Timeframe, period: number) {
  return `indicator:${type}:${symbol}:${timeframe}:${period}`;
}

export type IndicatorAggregatorOptions = {
  provider: MarketDataProvider;
  timeoutMs: number;
  cache?: TtlCache<IndicatorPoint[]>;
  cacheTtlMs?: number;
};

export class IndicatorAggregator {
  private readonly cache: TtlCache<IndicatorPoint[]>;

  constructor(private readonly opts: IndicatorAggregatorOptions) {
    this.cache = opts.cache ?? new TtlCache<IndicatorPoint[]>(opts.cacheTtlMs ?? 60 * 60 * 1000);
  }

  private async fetchSeries(type: IndicatorType, symbol: string): Promise<IndicatorSeries | null> {
    const { timeframe, period } = INDICATOR_CONFIG[type];
    const key = indicatorCacheKey(type, symbol, timeframe, period);

    let points = this.cache.get(key);
    if (!points) {
      const res = await guardCall(`indicator.${type}`, this.opts.timeoutMs, () =>
        this.opts.provider.fetchIndicator(symbol, type, timeframe, period)
      );
      if (!res.ok) {
        log.warn(`${symbol} ${res.error.message}`);
        return null;
      }
      points = res.value
        .map((p) => ({ date: p.date, value: p.value, timeframe, period }))
        .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
      if (points.length > 0) this.cache.set(key, points, this.opts.cacheTtlMs);
    }

    if (points.length === 0) return null;
    return { indicatorType: type, timeframe, period, points: points.slice(0, MAX_POINTS) };
  }

  /**
   * Fetches every configured indicator concurrently. Failed or empty series are
   * left out of the map; only an unusable ticker is an error.
   */
  async fetchIndicators(asset: TickerInput): Promise<Result<IndicatorMap, InvalidTickerError>> {
    const ticker = normalizeTicker(asset);
    if (!ticker.ok) return ticker;

    const { symbol, querySymbol } = ticker.value;
    const series = await Promise.all(INDICATOR_TYPES.map((t) => this.fetchSeries(t, querySymbol)));

    const map: IndicatorMap = {};
    const missing: IndicatorType[] = [];
    INDICATOR_TYPES.forEach((type, i) => {
      const s = series[i];
      if (s) map[INDICATOR_CONFIG[type].key] = s;
      else missing.push(type);
    });

    if (missing.length > 0) {
      const partial = new PartialDataError(symbol, missing);
      log.debug(partial.message);
    }
    return ok(map);
  }
}
