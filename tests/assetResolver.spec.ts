import { describe, it, expect } from 'vitest';
import type { CandidateSymbol } from '../src/types';
import {
  AssetResolver,
  DEFAULT_CONTRACT_PLATFORM,
  normalizeCryptoSymbol,
} from '../src/services/assetResolver.service';
import { SymbolExtractor } from '../src/services/symbolExtractor.service';
import { FakeCryptoProvider, FakeMarketProvider, coin, equity, q } from './fakes';

function ticker(value: string): CandidateSymbol {
  return { value, confidence: 0.9, kind: 'ticker' };
}

function setup(timeoutMs = 50) {
  const market = new FakeMarketProvider();
  const crypto = new FakeCryptoProvider();
  const resolver = new AssetResolver({ market, crypto, timeoutMs });
  return { market, crypto, resolver };
}

describe('normalizeCryptoSymbol', () => {
  it('strips one quote-currency suffix', () => {
    expect(normalizeCryptoSymbol('KTAUSD')).toBe('KTA');
    expect(normalizeCryptoSymbol(' ktausd ')).toBe('KTA');
    expect(normalizeCryptoSymbol('SOLUSDT')).toBe('SOL');
    expect(normalizeCryptoSymbol('BTC-USDT')).toBe('BTC');
    expect(normalizeCryptoSymbol('ETHEUR')).toBe('ETH');
  });

  it('leaves at least two characters', () => {
    expect(normalizeCryptoSymbol('USD')).toBe('USD');
    expect(normalizeCryptoSymbol('XUSD')).toBe('XUSD');
    expect(normalizeCryptoSymbol('BUSD')).toBe('BUSD');
  });

  it('only trims free text', () => {
    expect(normalizeCryptoSymbol(' pudgy penguins ')).toBe('pudgy penguins');
  });

  it('is idempotent', () => {
    for (const raw of ['KTAUSD', 'SOLUSDT', 'eth', 'XUSD']) {
      const once = normalizeCryptoSymbol(raw);
      expect(normalizeCryptoSymbol(once)).toBe(once);
    }
  });
});

describe('AssetResolver', () => {
  it('prefers the equity tier', async () => {
    const { market, crypto, resolver } = setup();
    const apple = equity('AAPL', 'Apple Inc.');
    market.quotes.set('AAPL', apple);

    const result = await resolver.resolve([ticker('AAPL')]);
    expect(result).toEqual({ outcomes: [apple], limitations: [] });
    expect(crypto.lookups).toEqual(['AAPL']);
    expect(crypto.searches).toEqual([]);
  });

  it('falls back to a crypto lookup on the normalized symbol', async () => {
    const { market, crypto, resolver } = setup();
    const keeta = coin('KTA', 'Keeta');
    crypto.coins.set('KTA', keeta);

    const result = await resolver.resolve([ticker('KTAUSD')]);
    expect(result.outcomes).toEqual([keeta]);
    // The second lookup checks whether KTA is also a listed stock.
    expect(market.lookups).toEqual(['KTAUSD', 'KTA']);
    expect(crypto.lookups).toEqual(['KTA']);
  });

  it('keeps a crypto pair quoted by the market provider as crypto', async () => {
    const { market, crypto, resolver } = setup();
    const bitcoin = coin('BTCUSD', 'Bitcoin USD', 65_000, 'fmp');
    market.quotes.set('BTCUSD', bitcoin);

    const result = await resolver.resolve([ticker('BTCUSD')]);
    expect(result.outcomes).toEqual([bitcoin]);
    expect(crypto.lookups).toEqual([]);
  });

  it('checks a coin found by name against the stock with its symbol', async () => {
    const { market, crypto, resolver } = setup();
    const valvoline = equity('VVV', 'Valvoline Inc.');
    const venice = coin('VVV', 'Venice Token', 3.1, 'coingecko_search');
    market.quotes.set('VVV', valvoline);
    crypto.searchResults.set('VENICE', [venice]);

    const candidates = new SymbolExtractor().extract(q('Venice token outlook'));
    expect(candidates).toEqual([{ value: 'Venice', confidence: 0.5, kind: 'phrase' }]);

    const result = await resolver.resolve(candidates);
    expect(result.outcomes).toEqual([{ kind: 'conflict', symbol: 'VVV', candidates: [valvoline, venice] }]);
    expect(market.lookups).toEqual(['VENICE', 'VVV']);
  });

  it('does not flag a coin found by name when the stock is the same instrument', async () => {
    const { market, crypto, resolver } = setup();
    market.quotes.set('PENGU', equity('PENGU', 'Pudgy Penguins'));
    const pengu = coin('PENGU', 'Pudgy Penguins', 0.03, 'coingecko_search');
    crypto.searchResults.set('pudgy penguins', [pengu]);

    const result = await resolver.resolve([{ value: 'pudgy penguins', confidence: 0.7, kind: 'phrase' }]);
    expect(result.outcomes).toEqual([pengu]);
  });

  it('resolves a contract address through the crypto provider only', async () => {
    const { market, crypto, resolver } = setup();
    const address = `0x${'ab12'.repeat(10)}`;
    const token = { ...coin('SMPL', 'Sample Token', 0.004), contract: { address, platform: 'ethereum' } };
    crypto.contracts.set(address, token);

    const result = await resolver.resolve([{ value: address, confidence: 1, kind: 'contract' }]);
    expect(result.outcomes).toEqual([token]);
    expect(crypto.contractLookups).toEqual([{ address, platform: DEFAULT_CONTRACT_PLATFORM }]);
    expect(market.lookups).toEqual([]);
    expect(crypto.searches).toEqual([]);
  });

  it('records an unknown contract address as a limitation', async () => {
    const { resolver } = setup();
    const address = `0x${'0'.repeat(40)}`;
    const result = await resolver.resolve([{ value: address, confidence: 1, kind: 'contract' }]);
    expect(result).toEqual({ outcomes: [], limitations: [`No asset found for "${address}"`] });
  });

  it('takes the exact symbol match from search results', async () => {
    const { crypto, resolver } = setup();
    const venice = coin('VVV', 'Venice Token', 3, 'coingecko_search');
    crypto.searchResults.set('VVV', [coin('VVVX', 'Other', 1, 'coingecko_search'), venice]);

    const result = await resolver.resolve([ticker('VVV')]);
    expect(result.outcomes).toEqual([venice]);
  });

  it('takes the top search result when no symbol matches exactly', async () => {
    const { crypto, resolver } = setup();
    const pengu = coin('PENGU', 'Pudgy Penguins', 0.03, 'coingecko_search');
    crypto.searchResults.set('pudgy penguins', [pengu, coin('PUDGY', 'Pudgy Fork', 0.01, 'coingecko_search')]);

    const result = await resolver.resolve([{ value: 'pudgy penguins', confidence: 0.7, kind: 'phrase' }]);
    expect(result.outcomes).toEqual([pengu]);
    expect(crypto.lookups).toEqual([]);
  });

  it('reports a cross-class collision instead of picking one', async () => {
    const { market, crypto, resolver } = setup();
    const kratos = equity('KTA', 'Kratos Defense');
    const keeta = coin('KTA', 'Keeta');
    market.quotes.set('KTA', kratos);
    crypto.coins.set('KTA', keeta);

    const result = await resolver.resolve([ticker('KTA')]);
    expect(result.outcomes).toEqual([{ kind: 'conflict', symbol: 'KTA', candidates: [kratos, keeta] }]);
  });

  it('does not flag the same instrument listed under both classes', async () => {
    const { market, crypto, resolver } = setup();
    const btcEquity = equity('BTC', 'Bitcoin');
    market.quotes.set('BTC', btcEquity);
    crypto.coins.set('BTC', coin('BTC', 'Bitcoin'));

    const result = await resolver.resolve([ticker('BTC')]);
    expect(result.outcomes).toEqual([btcEquity]);
  });

  it('runs crypto tiers only for the first two candidates', async () => {
    const { market, crypto, resolver } = setup();
    market.quotes.set('AAA', equity('AAA', 'Alpha'));
    market.quotes.set('BBB', equity('BBB', 'Beta'));
    crypto.coins.set('CCC', coin('CCC', 'Gamma Coin'));

    const result = await resolver.resolve([ticker('AAA'), ticker('BBB'), ticker('CCC')]);
    expect(result.outcomes.map((o) => ('kind' in o ? o.kind : o.symbol))).toEqual(['AAA', 'BBB']);
    expect(result.limitations).toEqual(['No asset found for "CCC"']);
    expect(crypto.lookups).not.toContain('CCC');
  });

  it('treats provider errors and timeouts as empty tiers', async () => {
    const { market, crypto, resolver } = setup(20);
    const keeta = coin('KTA', 'Keeta');
    crypto.coins.set('KTA', keeta);
    market.failing.set('quote:KTA', 'error');
    market.failing.set('quote:SOL', 'hang');
    const sol = coin('SOL', 'Solana', 150);
    crypto.coins.set('SOL', sol);

    const result = await resolver.resolve([ticker('KTA'), ticker('SOL')]);
    expect(result.outcomes).toEqual([keeta, sol]);
    expect(result.limitations).toEqual([]);
  });

  it('records unresolved candidates as limitations', async () => {
    const { resolver } = setup();
    const result = await resolver.resolve([ticker('ZZZZ')]);
    expect(result).toEqual({ outcomes: [], limitations: ['No asset found for "ZZZZ"'] });
  });

  it('caches successful lookups', async () => {
    const { market, resolver } = setup();
    market.quotes.set('AAPL', equity('AAPL', 'Apple Inc.'));

    await resolver.resolve([ticker('AAPL')]);
    await resolver.resolve([ticker('AAPL')]);
    expect(market.lookups).toEqual(['AAPL']);
  });

  it('keeps one asset per symbol and class', async () => {
    const { crypto, resolver } = setup();
    const eth = coin('ETH', 'Ethereum', 3000);
    crypto.coins.set('ETH', eth);

    const result = await resolver.resolve([ticker('ETH'), ticker('ETHUSD')]);
    expect(result.outcomes).toEqual([eth]);
  });
});
