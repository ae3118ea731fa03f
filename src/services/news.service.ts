import type { NewsData, NewsFeed, NewsItem } from '../types';
import type { AssetStore } from '../repositories/assetStore.repository';
import { errorMessage } from '../lib/errors';
import { createLogger } from '../lib/serverLogs';

const log = createLogger('news');

/** Newest alerts read per feed. */
export const NEWS_ALERT_WINDOW = 8;
export const MAX_NEWS_ITEMS = 30;

/** First occurrence per (headline, date), capped at `MAX_NEWS_ITEMS`. */
export function dedupeNews(items: readonly NewsItem[]): NewsItem[] {
  const seen = new Set<string>();
  const out: NewsItem[] = [];
  for (const item of items) {
    const key = `${item.headline}\u0000${item.date}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
    if (out.length === MAX_NEWS_ITEMS) break;
  }
  return out;
}

export class NewsService {
  constructor(private readonly store: AssetStore) {}

  private async feed(feed: NewsFeed): Promise<NewsItem[]> {
    try {
      const alerts = await this.store.listNewsAlerts(feed, NEWS_ALERT_WINDOW);
      return dedupeNews(alerts.flatMap((a) => a.articles));
    } catch (e) {
      log.warn(`${feed} news unavailable: ${errorMessage(e)}`);
      return [];
    }
  }

  /** Market and crypto headlines from the latest alerts; `undefined` when both are empty. */
  async load(): Promise<NewsData | undefined> {
    const [market, crypto] = await Promise.all([this.feed('market'), this.feed('crypto')]);

    const data: NewsData = {};
    if (market.length > 0) data.market = market;
    if (crypto.length > 0) data.crypto = crypto;
    return data.market || data.crypto ? data : undefined;
  }
}
