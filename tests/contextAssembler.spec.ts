import { describe, it, expect } from 'vitest';
import type { IndicatorMap, ResolutionOutcome } from '../src/types';
import { DISAMBIGUATION_INSTRUCTION } from '../src/services/conflictDetector.service';
import { ContextAssembler, rsiReading } from '../src/services/contextAssembler.service';
import { DEFAULT_CLASSIFICATION } from '../src/services/queryClassifier.service';
import { coin, equity } from './fakes';

const assembler = new ContextAssembler();

function rsiMap(value: number): IndicatorMap {
  return {
    rsi: {
      indicatorType: 'RSI',
      timeframe: '2h',
      period: 28,
      points: [
        { date: '2026-03-10 12:00:00', value, timeframe: '2h', period: 28 },
        { date: '2026-03-10 10:00:00', value: 50, timeframe: '2h', period: 28 },
      ],
    },
  };
}

describe('rsiReading', () => {
  it('uses strict 70/30 bounds', () => {
    expect(rsiReading(70.01)).toBe('overbought');
    expect(rsiReading(70)).toBe('neutral');
    expect(rsiReading(30)).toBe('neutral');
    expect(rsiReading(29.9)).toBe('oversold');
  });
});

describe('ContextAssembler', () => {
  it('includes assets without indicator series', () => {
    const apple = equity('AAPL', 'Apple Inc.');
    const context = assembler.assemble({
      query: 'AAPL?',
      classification: DEFAULT_CLASSIFICATION,
      resolved: [apple],
    });

    expect(context).toEqual({ query: 'AAPL?', classification: DEFAULT_CLASSIFICATION, assets: [apple] });
    expect('indicators' in context.assets[0]).toBe(false);
    expect('rsi' in context.assets[0]).toBe(false);
  });

  it('derives the RSI reading from the newest point', () => {
    const eth = coin('ETH', 'Ethereum', 3000);
    const context = assembler.assemble({
      query: 'What is the RSI for ETH?',
      classification: DEFAULT_CLASSIFICATION,
      resolved: [eth],
      indicatorsByAsset: { 'CRYPTO:ETH': rsiMap(75) },
    });

    expect(context.assets[0].rsi).toEqual({ value: 75, date: '2026-03-10 12:00:00', reading: 'overbought' });
    expect(context.assets[0].indicators?.rsi?.points).toHaveLength(2);
  });

  it('turns conflicts into a disambiguation section', () => {
    const apple = equity('AAPL', 'Apple Inc.');
    const kratos = equity('KTA', 'Kratos Defense', 20);
    const keeta = coin('KTA', 'Keeta', 0.5);
    const resolved: ResolutionOutcome[] = [
      apple,
      keeta,
      { kind: 'conflict', symbol: 'KTA', candidates: [kratos, keeta] },
    ];

    const context = assembler.assemble({ query: 'KTA vs AAPL', classification: DEFAULT_CLASSIFICATION, resolved });

    expect(context.assets.map((a) => a.symbol)).toEqual(['AAPL']);
    expect(context.disambiguation).toEqual({
      symbols: ['KTA'],
      options: [
        { symbol: 'KTA', name: 'Kratos Defense', assetClass: 'EQUITY', dataSource: 'fmp', price: 20, marketCap: 1_000_000 },
        { symbol: 'KTA', name: 'Keeta', assetClass: 'CRYPTO', dataSource: 'coingecko', price: 0.5, marketCap: 50_000 },
      ],
      instruction: DISAMBIGUATION_INSTRUCTION,
    });
  });

  it('omits empty optional sections', () => {
    const context = assembler.assemble({
      query: 'hello',
      classification: DEFAULT_CLASSIFICATION,
      resolved: [],
      sentiment: {},
      calendar: { currentDate: '2026-03-10', days: [], thresholds: { low: 0, medium: 0, high: 0 } },
      limitations: [],
    });

    expect(Object.keys(context).sort()).toEqual(['assets', 'classification', 'query']);
  });

  it('keeps limitations and freezes the result', () => {
    const context = assembler.assemble({
      query: 'ZZZZ',
      classification: DEFAULT_CLASSIFICATION,
      resolved: [equity('AAPL', 'Apple Inc.')],
      limitations: ['No asset found for "ZZZZ"'],
    });

    expect(context.limitations).toEqual(['No asset found for "ZZZZ"']);
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.assets)).toBe(true);
    expect(Object.isFrozen(context.assets[0])).toBe(true);
  });

  it('degrades to a minimal context on internal failure', () => {
    const exploding: Record<string, IndicatorMap> = {
      get 'EQUITY:AAPL'(): IndicatorMap {
        throw new Error('boom');
      },
    };
    const context = assembler.assemble({
      query: 'AAPL',
      classification: DEFAULT_CLASSIFICATION,
      resolved: [equity('AAPL', 'Apple Inc.')],
      indicatorsByAsset: exploding,
    });

    expect(context).toEqual({ query: 'AAPL', classification: DEFAULT_CLASSIFICATION, assets: [], degraded: true });
  });
});
