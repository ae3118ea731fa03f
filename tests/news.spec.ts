import { describe, it, expect } from 'vitest';
import type { NewsItem } from '../src/types';
import type { NewsAlert } from '../src/repositories/assetStore.repository';
import { MAX_NEWS_ITEMS, NEWS_ALERT_WINDOW, NewsService, dedupeNews } from '../src/services/news.service';
import { FakeAssetStore } from './fakes';

function item(headline: string, date = '2026-03-10T09:00:00Z', source = 'Wire'): NewsItem {
  return { headline, date, source };
}

function alert(feed: NewsAlert['feed'], timestamp: string, articles: NewsItem[]): NewsAlert {
  return { feed, timestamp, articles };
}

describe('dedupeNews', () => {
  it('keeps the first item per headline and date', () => {
    const items = [item('A'), item('B'), item('A', '2026-03-10T09:00:00Z', 'Other'), item('A', '2026-03-09T09:00:00Z')];
    expect(dedupeNews(items)).toEqual([item('A'), item('B'), item('A', '2026-03-09T09:00:00Z')]);
  });

  it('caps the list', () => {
    const items = Array.from({ length: 40 }, (_, i) => item(`Headline ${i}`));
    const out = dedupeNews(items);
    expect(out).toHaveLength(MAX_NEWS_ITEMS);
    expect(out[29].headline).toBe('Headline 29');
  });
});

describe('NewsService', () => {
  it('flattens the latest alerts per feed', async () => {
    const store = new FakeAssetStore([], [], [
      alert('market', '2026-03-10T10:00:00Z', [item('Yields climb'), item('Oil slips')]),
      alert('market', '2026-03-10T09:45:00Z', [item('Yields climb'), item('Dollar firms')]),
      alert('crypto', '2026-03-10T10:00:00Z', [item('Bitcoin holds range')]),
    ]);

    expect(await new NewsService(store).load()).toEqual({
      market: [item('Yields climb'), item('Oil slips'), item('Dollar firms')],
      crypto: [item('Bitcoin holds range')],
    });
  });

  it('reads only the newest alerts', async () => {
    const alerts = Array.from({ length: NEWS_ALERT_WINDOW + 2 }, (_, i) =>
      alert('crypto', `2026-03-10T${String(20 - i).padStart(2, '0')}:00:00Z`, [item(`Alert ${i}`)])
    );
    const news = await new NewsService(new FakeAssetStore([], [], alerts)).load();
    expect(news?.market).toBeUndefined();
    expect(news?.crypto?.map((n) => n.headline)).toEqual(
      Array.from({ length: NEWS_ALERT_WINDOW }, (_, i) => `Alert ${i}`)
    );
  });

  it('is absent when no feed has headlines', async () => {
    expect(await new NewsService(new FakeAssetStore()).load()).toBeUndefined();
  });

  it('treats a failing store as empty', async () => {
    class BrokenStore extends FakeAssetStore {
      async listNewsAlerts(): Promise<NewsAlert[]> {
        throw new Error('disk gone');
      }
    }
    expect(await new NewsService(new BrokenStore()).load()).toBeUndefined();
  });
});
