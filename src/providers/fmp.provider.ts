import type {
  EconomicEvent,
  EventImpact,
  IndicatorType,
  RawIndicatorPoint,
  ResolvedAsset,
  Timeframe,
} from '../types';
import { ok, type ProviderResult } from '../lib/result';
import { asNumber, fetchJson, isRecord } from '../lib/shared';
import type { CalendarProvider, MarketDataProvider } from './types';

export type FmpOptions = {
  apiKey: string | null;
  baseUrl: string;
  timeoutMs: number;
  /** Days of history requested per indicator call. */
  indicatorLookbackDays?: number;
  now?: () => Date;
};

const DAY_MS = 24 * 60 * 60 * 1000;

export function toFmpTimeframe(tf: Timeframe): string {
  switch (tf) {
    case '1h':
    case '2h':
    case '4h':
      return `${tf.slice(0, -1)}hour`;
    case '1d':
      return '1day';
    default: {
      const exhaustive: never = tf;
      return exhaustive;
    }
  }
}

function isoDay(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function parseImpact(v: unknown): EventImpact {
  return v === 'Low' || v === 'Medium' || v === 'High' ? v : 'None';
}

function parseQuote(row: unknown): ResolvedAsset | null {
  if (!isRecord(row)) return null;
  const symbol = typeof row.symbol === 'string' ? row.symbol : null;
  const price = asNumber(row.price);
  if (!symbol || price === null) return null;

  return {
    symbol: symbol.toUpperCase(),
    name: typeof row.name === 'string' && row.name ? row.name : symbol,
    // FMP lists crypto pairs (BTCUSD, ETHUSD, ...) on a pseudo-exchange named CRYPTO.
    assetClass: row.exchange === 'CRYPTO' ? 'CRYPTO' : 'EQUITY',
    price,
    changePercent: asNumber(row.changesPercentage) ?? 0,
    marketCap: asNumber(row.marketCap) ?? 0,
    volume: asNumber(row.volume) ?? 0,
    dataSource: 'fmp',
  };
}

/**
 * Financial Modeling Prep adapter: quotes, technical indicators and the
 * economic calendar. Without an API key every call answers with an empty result.
 */
export class FmpProvider implements MarketDataProvider, CalendarProvider {
  readonly name = 'fmp';
  private readonly now: () => Date;

  constructor(private readonly opts: FmpOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  private url(path: string, params: Record<string, string | number>): string {
    const qs = new URLSearchParams();
    for (const [k, v] of Object.entries(params)) qs.set(k, String(v));
    qs.set('apikey', this.opts.apiKey ?? '');
    return `${this.opts.baseUrl.replace(/\/+$/, '')}${path}?${qs.toString()}`;
  }

  async lookupBySymbol(symbol: string): Promise<ProviderResult<ResolvedAsset | null>> {
    if (!this.opts.apiKey) return ok(null);
    const res = await fetchJson(
      'fmp.quote',
      this.url(`/api/v3/quote/${encodeURIComponent(symbol)}`, {}),
      {},
      this.opts.timeoutMs
    );
    if (!res.ok) return res;
    if (!Array.isArray(res.value)) return ok(null);

    const wanted = symbol.toUpperCase();
    const quotes = res.value.map(parseQuote).filter((q): q is ResolvedAsset => q !== null);
    return ok(quotes.find((q) => q.symbol === wanted) ?? null);
  }

  async fetchIndicator(
    symbol: string,
    type: IndicatorType,
    timeframe: Timeframe,
    period: number
  ): Promise<ProviderResult<RawIndicatorPoint[]>> {
    if (!this.opts.apiKey) return ok([]);
    const key = type.toLowerCase();
    const today = this.now();
    const from = new Date(today.getTime() - (this.opts.indicatorLookbackDays ?? 10) * DAY_MS);

    const res = await fetchJson(
      `fmp.indicator.${key}`,
      this.url(`/stable/technical-indicators/${key}`, {
        symbol,
        periodLength: period,
        timeframe: toFmpTimeframe(timeframe),
        from: isoDay(from),
        to: isoDay(today),
      }),
      {},
      this.opts.timeoutMs
    );
    if (!res.ok) return res;
    if (!Array.isArray(res.value)) return ok([]);

    const points: RawIndicatorPoint[] = [];
    for (const row of res.value) {
      if (!isRecord(row) || typeof row.date !== 'string') continue;
      const value = asNumber(row[key]);
      if (value === null) continue;
      points.push({ date: row.date, value });
    }
    return ok(points);
  }

  async fetchEvents(from: string, to: string): Promise<ProviderResult<EconomicEvent[]>> {
    if (!this.opts.apiKey) return ok([]);
    const res = await fetchJson(
      'fmp.economic_calendar',
      this.url('/api/v3/economic_calendar', { from, to }),
      {},
      this.opts.timeoutMs
    );
    if (!res.ok) return res;
    if (!Array.isArray(res.value)) return ok([]);

    const events: EconomicEvent[] = [];
    for (const row of res.value) {
      if (!isRecord(row)) continue;
      if (typeof row.date !== 'string' || typeof row.event !== 'string') continue;
      events.push({
        date: row.date,
        country: typeof row.country === 'string' ? row.country : '',
        event: row.event,
        currency: typeof row.currency === 'string' ? row.currency : '',
        impact: parseImpact(row.impact),
      });
    }
    return ok(events);
  }
}
