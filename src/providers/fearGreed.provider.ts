import type { FearGreedReading } from '../types';
import { ok, type ProviderResult } from '../lib/result';
import { fetchJson, isRecord } from '../lib/shared';
import type { FearGreedProvider } from './types';

/** Crypto Fear & Greed index from alternative.me. */
export class AlternativeMeFearGreedProvider implements FearGreedProvider {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number
  ) {}

  async latest(): Promise<ProviderResult<FearGreedReading | null>> {
    const res = await fetchJson('fear_greed', this.url, {}, this.timeoutMs);
    if (!res.ok) return res;

    const json = res.value;
    if (!isRecord(json) || !Array.isArray(json.data)) return ok(null);

    const fng: unknown = json.data[0];
    if (!isRecord(fng)) return ok(null);
    const value = typeof fng.value === 'string' ? Number.parseInt(fng.value, 10) : Number.NaN;
    const classification = typeof fng.value_classification === 'string' ? fng.value_classification : null;
    const ts = typeof fng.timestamp === 'string' ? Number.parseInt(fng.timestamp, 10) : Number.NaN;

    if (!Number.isFinite(value) || !classification) return ok(null);

    return ok({
      value,
      classification,
      timestamp: Number.isFinite(ts) ? new Date(ts * 1000).toISOString() : new Date().toISOString(),
    });
  }
}
