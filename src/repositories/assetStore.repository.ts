import fs from 'fs';
import path from 'path';
import type { IndicatorType, NewsFeed, NewsItem, RawIndicatorPoint } from '../types';
import { isRecord, asNumber } from '../lib/shared';
import { createLogger } from '../lib/serverLogs';

const log = createLogger('assetStore');

export type BellwetherRecord = {
  symbol: string;
  name: string;
  descriptors: string[];
};

export type IndicatorSnapshot = {
  symbol: string;
  indicatorType: IndicatorType;
  points: RawIndicatorPoint[];
  updatedAt?: string;
};

/** One batch of headlines published by the news refresh job. */
export type NewsAlert = {
  feed: NewsFeed;
  timestamp: string;
  articles: NewsItem[];
};

/** Read-only view over snapshots written by an external refresh job. */
export interface AssetStore {
  findSnapshot(symbol: string, indicatorType: IndicatorType): Promise<IndicatorSnapshot | null>;
  listBellwethers(): Promise<BellwetherRecord[]>;
  /** Newest `limit` alerts of `feed`, newest first. */
  listNewsAlerts(feed: NewsFeed, limit: number): Promise<NewsAlert[]>;
}

const INDICATOR_TYPES: readonly IndicatorType[] = ['RSI', 'EMA', 'SMA', 'DEMA'];

function parseIndicatorType(v: unknown): IndicatorType | null {
  return INDICATOR_TYPES.find((t) => t === v) ?? null;
}

function parsePoints(v: unknown): RawIndicatorPoint[] {
  if (!Array.isArray(v)) return [];
  const out: RawIndicatorPoint[] = [];
  for (const p of v) {
    if (!isRecord(p) || typeof p.date !== 'string') continue;
    const value = asNumber(p.value);
    if (value !== null) out.push({ date: p.date, value });
  }
  return out;
}

function parseSnapshot(v: unknown): IndicatorSnapshot | null {
  if (!isRecord(v) || typeof v.symbol !== 'string') return null;
  const indicatorType = parseIndicatorType(v.indicatorType);
  if (!indicatorType) return null;
  return {
    symbol: v.symbol.toUpperCase(),
    indicatorType,
    points: parsePoints(v.points),
    updatedAt: typeof v.updatedAt === 'string' ? v.updatedAt : undefined,
  };
}

function parseBellwether(v: unknown): BellwetherRecord | null {
  if (!isRecord(v) || typeof v.symbol !== 'string') return null;
  const descriptors = Array.isArray(v.descriptors)
    ? v.descriptors.filter((d): d is string => typeof d === 'string')
    : [];
  return {
    symbol: v.symbol.toUpperCase(),
    name: typeof v.name === 'string' ? v.name : v.symbol,
    descriptors,
  };
}

function parseNewsItem(v: unknown): NewsItem | null {
  if (!isRecord(v) || typeof v.headline !== 'string' || !v.headline.trim()) return null;
  const item: NewsItem = {
    headline: v.headline.trim(),
    date: typeof v.date === 'string' ? v.date : '',
    source: typeof v.source === 'string' ? v.source : '',
  };
  if (typeof v.url === 'string' && v.url) item.url = v.url;
  return item;
}

function parseFeed(v: unknown): NewsFeed | null {
  return v === 'market' || v === 'crypto' ? v : null;
}

function parseNewsAlert(v: unknown): NewsAlert | null {
  if (!isRecord(v) || typeof v.timestamp !== 'string') return null;
  const feed = parseFeed(v.feed);
  if (!feed) return null;
  const articles = Array.isArray(v.articles) ? v.articles : [];
  return {
    feed,
    timestamp: v.timestamp,
    articles: articles.map(parseNewsItem).filter((a): a is NewsItem => a !== null),
  };
}

/**
 * Reads `<dir>/bellwethers.json`, `<dir>/indicator-snapshots.json` and `<dir>/news-alerts.json`.
 * A missing or malformed file reads as an empty collection.
 */
export class JsonFileAssetStore implements AssetStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(process.cwd(), dir);
  }

  private readCollection(collection: string): unknown[] {
    const fp = path.join(this.dir, `${collection}.json`);
    if (!fs.existsSync(fp)) return [];
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(fp, 'utf-8'));
      return Array.isArray(parsed) ? parsed : [];
    } catch (e) {
      log.warn(`unreadable collection ${collection}`, e);
      return [];
    }
  }

  async findSnapshot(symbol: string, indicatorType: IndicatorType): Promise<IndicatorSnapshot | null> {
    const wanted = symbol.toUpperCase();
    for (const row of this.readCollection('indicator-snapshots')) {
      const snap = parseSnapshot(row);
      if (snap && snap.symbol === wanted && snap.indicatorType === indicatorType) return snap;
    }
    return null;
  }

  async listBellwethers(): Promise<BellwetherRecord[]> {
    return this.readCollection('bellwethers')
      .map(parseBellwether)
      .filter((b): b is BellwetherRecord => b !== null);
  }

  async listNewsAlerts(feed: NewsFeed, limit: number): Promise<NewsAlert[]> {
    return this.readCollection('news-alerts')
      .map(parseNewsAlert)
      .filter((a): a is NewsAlert => a !== null && a.feed === feed)
      .sort((a, b) => (a.timestamp < b.timestamp ? 1 : a.timestamp > b.timestamp ? -1 : 0))
      .slice(0, limit);
  }
}
