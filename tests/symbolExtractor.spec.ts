import { describe, it, expect } from 'vitest';
import { SymbolExtractor, stripFiller } from '../src/services/symbolExtractor.service';
import { q } from './fakes';

const extractor = new SymbolExtractor();

describe('SymbolExtractor', () => {
  it('finds a bare ticker and skips indicator jargon', () => {
    expect(extractor.extract(q('What is the RSI for ETH?'))).toEqual([
      { value: 'ETH', confidence: 0.9, kind: 'ticker' },
    ]);
  });

  it('extracts a contract address ahead of everything else', () => {
    const address = `0x${'AB12'.repeat(10)}`;
    expect(extractor.extract(q(`what about ${address} today`))).toEqual([
      { value: address.toLowerCase(), confidence: 1, kind: 'contract' },
    ]);
  });

  it('ignores hex strings of the wrong length', () => {
    const kinds = extractor.extract(q(`0x${'a'.repeat(39)}`)).map((c) => c.kind);
    expect(kinds).not.toContain('contract');
  });

  it('treats generic analysis words as stop words', () => {
    expect(extractor.extract(q('VVV analysis'))).toEqual([{ value: 'VVV', confidence: 0.9, kind: 'ticker' }]);
  });

  it('ranks dollar tickers, then aliases, then bare tickers', () => {
    expect(extractor.extract(q('$aapl vs bank of america and NVDA'))).toEqual([
      { value: 'AAPL', confidence: 1, kind: 'dollar' },
      { value: 'BAC', confidence: 0.95, kind: 'alias' },
      { value: 'NVDA', confidence: 0.9, kind: 'ticker' },
    ]);
  });

  it('keeps at most four candidates', () => {
    const out = extractor.extract(q('$A1 $B2 $C3 $D4 $E5'));
    expect(out.map((c) => c.value)).toEqual(['A1', 'B2', 'C3', 'D4']);
  });

  it('dedupes case-insensitively, keeping the higher confidence', () => {
    expect(extractor.extract(q('BTC and bitcoin'))).toEqual([{ value: 'BTC', confidence: 0.95, kind: 'alias' }]);
  });

  it('keeps a filler word when the rest of the phrase is too short', () => {
    expect(extractor.extract(q('should I long kta coin'))).toEqual([
      { value: 'kta coin', confidence: 0.7, kind: 'phrase' },
    ]);
  });

  it('strips filler words from a descriptive phrase', () => {
    expect(extractor.extract(q('pudgy penguins token price'))).toEqual([
      { value: 'pudgy penguins', confidence: 0.7, kind: 'phrase' },
    ]);
  });

  it('emits nothing for a phrase made only of filler words', () => {
    expect(extractor.extract(q('crypto token'))).toEqual([]);
  });

  it('accepts a custom alias table', () => {
    const custom = new SymbolExtractor({ 'acme widgets': 'ACME' });
    expect(custom.extract(q('news on acme widgets'))).toEqual([{ value: 'ACME', confidence: 0.95, kind: 'alias' }]);
  });
});

describe('stripFiller', () => {
  it('preserves context when no long word remains', () => {
    expect(stripFiller('kta coin')).toBe('kta coin');
    expect(stripFiller('coin')).toBe('coin');
  });

  it('drops filler when a long word remains', () => {
    expect(stripFiller('render token')).toBe('render');
    expect(stripFiller('crypto Venice')).toBe('Venice');
  });

  it('is idempotent', () => {
    for (const phrase of ['kta coin', 'render token', 'crypto token coin', 'pudgy penguins cryptocurrency', 'doge']) {
      const once = stripFiller(phrase);
      expect(stripFiller(once)).toBe(once);
    }
  });
});
