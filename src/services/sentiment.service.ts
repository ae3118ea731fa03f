import type { BellwetherEntry, FearGreedReading, RawIndicatorPoint, SentimentData } from '../types';
import type { AssetStore, BellwetherRecord } from '../repositories/assetStore.repository';
import type { FearGreedProvider } from '../providers/types';
import { errorMessage } from '../lib/errors';
import { guardCall } from '../lib/result';
import { createLogger } from '../lib/serverLogs';

const log = createLogger('sentiment');

export const BELLWETHER_POINTS = 12;

export type SentimentServiceOptions = {
  store: AssetStore;
  fearGreed: FearGreedProvider;
  symbols: readonly string[];
  timeoutMs: number;
};

function newestFirst(points: readonly RawIndicatorPoint[]): RawIndicatorPoint[] {
  return [...points].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0)).slice(0, BELLWETHER_POINTS);
}

export class SentimentService {
  constructor(private readonly opts: SentimentServiceOptions) {}

  private async bellwether(record: BellwetherRecord): Promise<BellwetherEntry> {
    const { store } = this.opts;
    const [rsi, ema] = await Promise.all([
      store.findSnapshot(record.symbol, 'RSI'),
      store.findSnapshot(record.symbol, 'EMA'),
    ]);

    const entry: BellwetherEntry = { symbol: record.symbol, name: record.name, descriptors: record.descriptors };
    if (rsi && rsi.points.length > 0) entry.rsi = newestFirst(rsi.points);
    if (ema && ema.points.length > 0) entry.ema = newestFirst(ema.points);
    return entry;
  }

  private async bellwethers(): Promise<BellwetherEntry[]> {
    try {
      const wanted = new Set(this.opts.symbols.map((s) => s.toUpperCase()));
      const records = (await this.opts.store.listBellwethers()).filter((r) => wanted.has(r.symbol));
      return await Promise.all(records.map((r) => this.bellwether(r)));
    } catch (e) {
      log.warn(`bellwethers unavailable: ${errorMessage(e)}`);
      return [];
    }
  }

  private async fearGreed(): Promise<FearGreedReading | null> {
    const res = await guardCall('fear_greed', this.opts.timeoutMs, () => this.opts.fearGreed.latest());
    if (!res.ok) {
      log.warn(res.error.message);
      return null;
    }
    return res.value;
  }

  /** Bellwethers and Fear & Greed, loaded concurrently; `undefined` when both are empty. */
  async load(): Promise<SentimentData | undefined> {
    const [bellwethers, fearGreed] = await Promise.all([this.bellwethers(), this.fearGreed()]);

    const data: SentimentData = {};
    if (bellwethers.length > 0) data.bellwethers = bellwethers;
    if (fearGreed) data.fearGreed = fearGreed;
    return data.bellwethers || data.fearGreed ? data : undefined;
  }
}
