import type { CandidateSymbol, ConflictReport, ResolutionOutcome, ResolvedAsset } from '../types';
import type { CryptoDataProvider, MarketDataProvider } from '../providers/types';
import { TtlCache } from '../lib/cache';
import { NotFoundError } from '../lib/errors';
import { firstSome, guardCall, type ProviderResult, type Strategy } from '../lib/result';
import { createLogger } from '../lib/serverLogs';
import { ConflictDetector, dedupeAssets } from './conflictDetector.service';

const log = createLogger('resolver');

export const QUOTE_SUFFIXES = ['USDT', 'USDC', 'BUSD', 'USD', 'EUR'] as const;

/** Crypto tiers and the cross-class checks only run for this many leading candidates. */
export const CRYPTO_TIER_CANDIDATES = 2;

/** Chain assumed for a bare contract address. */
export const DEFAULT_CONTRACT_PLATFORM = 'ethereum';

/**
 * `ktausd` -> `KTA`, `BTC-USDT` -> `BTC`. Free text (anything with whitespace) is only trimmed.
 * At most one suffix is removed and at least two characters always remain.
 */
export function normalizeCryptoSymbol(raw: string): string {
  const trimmed = raw.trim();
  if (/\s/.test(trimmed)) return trimmed;

  const upper = trimmed.toUpperCase();
  for (const suffix of QUOTE_SUFFIXES) {
    if (!upper.endsWith(suffix)) continue;
    const base = upper.slice(0, -suffix.length).replace(/[-/]$/, '');
    if (base.length >= 2) return base;
  }
  return upper;
}

function isConflict(o: ResolutionOutcome): o is ConflictReport {
  return 'kind' in o && o.kind === 'conflict';
}

export type AssetResolverOptions = {
  market: MarketDataProvider;
  crypto: CryptoDataProvider;
  timeoutMs: number;
  cache?: TtlCache<ResolvedAsset>;
  lookupTtlMs?: number;
  conflictDetector?: ConflictDetector;
};

export type ResolutionResult = {
  outcomes: ResolutionOutcome[];
  limitations: string[];
};

type CandidateResolution = { outcome: ResolutionOutcome } | { notFound: NotFoundError };

export class AssetResolver {
  private readonly cache: TtlCache<ResolvedAsset>;
  private readonly detector: ConflictDetector;

  constructor(private readonly opts: AssetResolverOptions) {
    this.cache = opts.cache ?? new TtlCache<ResolvedAsset>(opts.lookupTtlMs ?? 5 * 60 * 1000);
    this.detector = opts.conflictDetector ?? new ConflictDetector();
  }

  /** Provider failures and timeouts count as "nothing found" for that tier. */
  private async guarded<T>(operation: string, call: () => Promise<ProviderResult<T>>): Promise<T | null> {
    const res = await guardCall(operation, this.opts.timeoutMs, call);
    if (!res.ok) {
      log.warn(res.error.message);
      return null;
    }
    return res.value;
  }

  private async cachedLookup(
    key: string,
    operation: string,
    call: () => Promise<ProviderResult<ResolvedAsset | null>>
  ): Promise<ResolvedAsset | null> {
    const hit = this.cache.get(key);
    if (hit) return hit;
    const found = await this.guarded(operation, call);
    if (found) this.cache.set(key, found, this.opts.lookupTtlMs);
    return found;
  }

  private equityLookup(raw: string): Promise<ResolvedAsset | null> {
    const symbol = raw.trim().toUpperCase();
    if (!symbol || /\s/.test(symbol)) return Promise.resolve(null);
    const { market } = this.opts;
    return this.cachedLookup(`lookup:${market.name}:${symbol}`, `${market.name}.lookup`, () =>
      market.lookupBySymbol(symbol)
    );
  }

  private cryptoLookup(normalized: string): Promise<ResolvedAsset | null> {
    if (!normalized || /\s/.test(normalized)) return Promise.resolve(null);
    const { crypto } = this.opts;
    return this.cachedLookup(`lookup:${crypto.name}:${normalized}`, `${crypto.name}.lookup`, () =>
      crypto.lookupBySymbol(normalized)
    );
  }

  private async cryptoSearch(normalized: string): Promise<ResolvedAsset | null> {
    if (!normalized) return null;
    const { crypto } = this.opts;
    const key = `lookup:${crypto.name}:search:${normalized.toUpperCase()}`;
    const hit = this.cache.get(key);
    if (hit) return hit;

    const results = await this.guarded(`${crypto.name}.search`, () => crypto.search(normalized));
    if (!results || results.length === 0) return null;

    const wanted = normalized.toUpperCase();
    const best = results.find((r) => r.symbol.toUpperCase() === wanted) ?? results[0];
    this.cache.set(key, best, this.opts.lookupTtlMs);
    return best;
  }

  private async resolveContract(address: string): Promise<CandidateResolution> {
    const { crypto } = this.opts;
    const platform = DEFAULT_CONTRACT_PLATFORM;
    const found = await this.cachedLookup(
      `lookup:${crypto.name}:contract:${platform}:${address.toLowerCase()}`,
      `${crypto.name}.contract`,
      () => crypto.lookupByContract(address, platform)
    );
    return found ? { outcome: found } : { notFound: new NotFoundError(address) };
  }

  /**
   * The other asset class's match for the same symbol, when it names a different
   * instrument. Equity hits are checked against crypto; crypto and search hits whose
   * symbol differs from what the user typed are checked against equities.
   */
  private async otherClassMatch(raw: string, strategy: string, hit: ResolvedAsset): Promise<ResolvedAsset | null> {
    if (strategy === 'equity') {
      if (hit.assetClass !== 'EQUITY') return null;
      const other = await this.cryptoLookup(normalizeCryptoSymbol(raw));
      return other && this.detector.isCollision(hit, other) ? other : null;
    }
    if (hit.symbol.toUpperCase() === raw.trim().toUpperCase()) return null;
    const other = await this.equityLookup(hit.symbol);
    return other && other.assetClass === 'EQUITY' && this.detector.isCollision(other, hit) ? other : null;
  }

  private strategies(index: number): Strategy<string, ResolvedAsset>[] {
    const tiers: Strategy<string, ResolvedAsset>[] = [
      { name: 'equity', run: (raw) => this.equityLookup(raw) },
    ];
    if (index < CRYPTO_TIER_CANDIDATES) {
      tiers.push(
        { name: 'crypto', run: (raw) => this.cryptoLookup(normalizeCryptoSymbol(raw)) },
        { name: 'search', run: (raw) => this.cryptoSearch(normalizeCryptoSymbol(raw)) }
      );
    }
    return tiers;
  }

  private async resolveOne(candidate: CandidateSymbol, index: number): Promise<CandidateResolution> {
    const raw = candidate.value;
    if (candidate.kind === 'contract') return this.resolveContract(raw);

    const first = await firstSome(this.strategies(index), raw);
    if (!first) return { notFound: new NotFoundError(raw) };

    const matches: ResolvedAsset[] = [first.value];
    if (index < CRYPTO_TIER_CANDIDATES) {
      const other = await this.otherClassMatch(raw, first.strategy, first.value);
      // Equity first, matching tier order.
      if (other) matches.splice(other.assetClass === 'EQUITY' ? 0 : 1, 0, other);
    }

    const detected = this.detector.detect(first.value.symbol, matches);
    if (!detected) return { notFound: new NotFoundError(raw) };
    if (detected.ok) return { outcome: detected.value };

    log.info(detected.error.message);
    return {
      outcome: { kind: 'conflict', symbol: detected.error.symbol, candidates: detected.error.candidates },
    };
  }

  /**
   * Resolves candidates in parallel; tiers within one candidate run in order.
   * Never rejects: candidates that resolve nothing come back as limitations.
   */
  async resolve(candidates: readonly CandidateSymbol[]): Promise<ResolutionResult> {
    const settled = await Promise.all(candidates.map((c, i) => this.resolveOne(c, i)));

    const limitations: string[] = [];
    const conflicts: ConflictReport[] = [];
    const assets: ResolvedAsset[] = [];
    for (const r of settled) {
      if ('notFound' in r) {
        limitations.push(r.notFound.message);
        continue;
      }
      const outcome = r.outcome;
      if (!isConflict(outcome)) {
        assets.push(outcome);
      } else if (!conflicts.some((c) => c.symbol === outcome.symbol)) {
        conflicts.push(outcome);
      }
    }

    return { outcomes: [...dedupeAssets(assets), ...conflicts], limitations };
  }
}
