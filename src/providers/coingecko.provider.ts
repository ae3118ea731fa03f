import type { DataSource, ResolvedAsset } from '../types';
import { ok, type ProviderResult } from '../lib/result';
import { asNumber, fetchJson, isRecord } from '../lib/shared';
import type { CryptoDataProvider } from './types';

export type CoinGeckoOptions = {
  apiKey: string | null;
  baseUrl: string;
  timeoutMs: number;
  /** Search hits priced per call. */
  searchLimit?: number;
};

function parseMarketRow(row: unknown, dataSource: DataSource): (ResolvedAsset & { id: string }) | null {
  if (!isRecord(row)) return null;
  if (typeof row.id !== 'string' || typeof row.symbol !== 'string') return null;
  const price = asNumber(row.current_price);
  if (price === null) return null;

  return {
    id: row.id,
    symbol: row.symbol.toUpperCase(),
    name: typeof row.name === 'string' && row.name ? row.name : row.symbol.toUpperCase(),
    assetClass: 'CRYPTO',
    price,
    changePercent: asNumber(row.price_change_percentage_24h) ?? 0,
    marketCap: asNumber(row.market_cap) ?? 0,
    volume: asNumber(row.total_volume) ?? 0,
    dataSource,
  };
}

function usd(v: unknown): number | null {
  return isRecord(v) ? asNumber(v.usd) : null;
}

function parseContractToken(body: unknown, address: string, platform: string): ResolvedAsset | null {
  if (!isRecord(body) || typeof body.symbol !== 'string' || !isRecord(body.market_data)) return null;
  const md = body.market_data;
  const price = usd(md.current_price);
  if (price === null) return null;

  const symbol = body.symbol.toUpperCase();
  return {
    symbol,
    name: typeof body.name === 'string' && body.name ? body.name : symbol,
    assetClass: 'CRYPTO',
    price,
    changePercent: asNumber(md.price_change_percentage_24h) ?? 0,
    marketCap: usd(md.market_cap) ?? 0,
    volume: usd(md.total_volume) ?? 0,
    dataSource: 'coingecko',
    contract: { address, platform },
  };
}

function stripId({ id: _id, ...asset }: ResolvedAsset & { id: string }): ResolvedAsset {
  return asset;
}

/**
 * CoinGecko adapter. Symbol lookups go through `/coins/markets?symbols=`,
 * free-text lookups through `/search` and are then priced via `/coins/markets?ids=`.
 * Contract addresses go through `/coins/{platform}/contract/{address}`.
 */
export class CoinGeckoProvider implements CryptoDataProvider {
  readonly name = 'coingecko';

  constructor(private readonly opts: CoinGeckoOptions) {}

  private get headers(): Record<string, string> {
    return this.opts.apiKey ? { 'x-cg-pro-api-key': this.opts.apiKey } : {};
  }

  private url(path: string, params: Record<string, string>): string {
    const qs = new URLSearchParams(params);
    return `${this.opts.baseUrl.replace(/\/+$/, '')}${path}?${qs.toString()}`;
  }

  private async markets(
    operation: string,
    params: Record<string, string>,
    dataSource: DataSource
  ): Promise<ProviderResult<Array<ResolvedAsset & { id: string }>>> {
    const res = await fetchJson(
      operation,
      this.url('/coins/markets', { vs_currency: 'usd', order: 'market_cap_desc', ...params }),
      this.headers,
      this.opts.timeoutMs
    );
    if (!res.ok) return res;
    if (!Array.isArray(res.value)) return ok([]);
    return ok(
      res.value
        .map((row) => parseMarketRow(row, dataSource))
        .filter((a): a is ResolvedAsset & { id: string } => a !== null)
    );
  }

  async lookupBySymbol(normalizedSymbol: string): Promise<ProviderResult<ResolvedAsset | null>> {
    if (!this.opts.apiKey) return ok(null);
    const res = await this.markets(
      'coingecko.lookup',
      { symbols: normalizedSymbol.toLowerCase() },
      'coingecko'
    );
    if (!res.ok) return res;

    const wanted = normalizedSymbol.toUpperCase();
    const hit = res.value
      .filter((a) => a.symbol === wanted)
      .sort((a, b) => b.marketCap - a.marketCap)[0];
    return ok(hit ? stripId(hit) : null);
  }

  async search(text: string): Promise<ProviderResult<ResolvedAsset[]>> {
    if (!this.opts.apiKey) return ok([]);
    const found = await fetchJson(
      'coingecko.search',
      this.url('/search', { query: text }),
      this.headers,
      this.opts.timeoutMs
    );
    if (!found.ok) return found;
    if (!isRecord(found.value) || !Array.isArray(found.value.coins)) return ok([]);

    const ids: string[] = [];
    for (const coin of found.value.coins) {
      if (isRecord(coin) && typeof coin.id === 'string') ids.push(coin.id);
      if (ids.length >= (this.opts.searchLimit ?? 5)) break;
    }
    if (ids.length === 0) return ok([]);

    const priced = await this.markets('coingecko.search.markets', { ids: ids.join(',') }, 'coingecko_search');
    if (!priced.ok) return priced;

    const byId = new Map(priced.value.map((a) => [a.id, a]));
    const ordered: ResolvedAsset[] = [];
    for (const id of ids) {
      const asset = byId.get(id);
      if (asset) ordered.push(stripId(asset));
    }
    return ok(ordered);
  }

  async lookupByContract(address: string, platform: string): Promise<ProviderResult<ResolvedAsset | null>> {
    if (!this.opts.apiKey) return ok(null);
    const res = await fetchJson(
      'coingecko.contract',
      `${this.opts.baseUrl.replace(/\/+$/, '')}/coins/${encodeURIComponent(platform)}/contract/${encodeURIComponent(address)}`,
      this.headers,
      this.opts.timeoutMs
    );
    if (!res.ok) {
      // Unknown contracts answer 404.
      if (res.error.reason === 'http' && res.error.detail === '404') return ok(null);
      return res;
    }
    return ok(parseContractToken(res.value, address, platform));
  }
}
