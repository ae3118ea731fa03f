import type {
  AggregatedContext,
  AssetContext,
  CalendarWeek,
  ConflictReport,
  Disambiguation,
  IndicatorMap,
  NewsData,
  QueryClassification,
  ResolutionOutcome,
  ResolvedAsset,
  RsiReading,
  SentimentData,
} from '../types';
import { createLogger } from '../lib/serverLogs';
import { DISAMBIGUATION_INSTRUCTION } from './conflictDetector.service';

const log = createLogger('assembler');

export const RSI_OVERBOUGHT = 70;
export const RSI_OVERSOLD = 30;

export type AssembleInput = {
  query: string;
  classification: QueryClassification;
  resolved: readonly ResolutionOutcome[];
  /** Keyed by `assetKey(asset)`. */
  indicatorsByAsset?: Readonly<Record<string, IndicatorMap>>;
  sentiment?: SentimentData;
  calendar?: CalendarWeek;
  news?: NewsData;
  limitations?: readonly string[];
};

export function assetKey(asset: Pick<ResolvedAsset, 'assetClass' | 'symbol'>): string {
  return `${asset.assetClass}:${asset.symbol.toUpperCase()}`;
}

export function rsiReading(value: number): RsiReading {
  if (value > RSI_OVERBOUGHT) return 'overbought';
  if (value < RSI_OVERSOLD) return 'oversold';
  return 'neutral';
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

function isConflict(o: ResolutionOutcome): o is ConflictReport {
  return 'kind' in o && o.kind === 'conflict';
}

/** Context carrying only the query and its classification. */
export function minimalContext(query: string, classification: QueryClassification): AggregatedContext {
  const context: AggregatedContext = { query, classification, assets: [], degraded: true };
  return deepFreeze(context);
}

function toAssetContext(asset: ResolvedAsset, indicators: IndicatorMap | undefined): AssetContext {
  const out: AssetContext = { ...asset };
  if (indicators && Object.keys(indicators).length > 0) {
    out.indicators = indicators;
    const newest = indicators.rsi?.points[0];
    if (newest) out.rsi = { value: newest.value, date: newest.date, reading: rsiReading(newest.value) };
  }
  return out;
}

function disambiguationFor(conflicts: readonly ConflictReport[]): Disambiguation {
  return {
    symbols: conflicts.map((c) => c.symbol),
    options: conflicts.flatMap((c) =>
      c.candidates.map((a) => ({
        symbol: a.symbol,
        name: a.name,
        assetClass: a.assetClass,
        dataSource: a.dataSource,
        price: a.price,
        marketCap: a.marketCap,
      }))
    ),
    instruction: DISAMBIGUATION_INSTRUCTION,
  };
}

export class ContextAssembler {
  /** Never throws; a failure yields the minimal context flagged `degraded`. */
  assemble(input: AssembleInput): AggregatedContext {
    try {
      const conflicts = input.resolved.filter(isConflict);
      const contested = new Set(conflicts.flatMap((c) => c.candidates.map(assetKey)));

      const assets: AssetContext[] = [];
      for (const o of input.resolved) {
        if (isConflict(o) || contested.has(assetKey(o))) continue;
        assets.push(toAssetContext(o, input.indicatorsByAsset?.[assetKey(o)]));
      }

      const context: AggregatedContext = {
        query: input.query,
        classification: input.classification,
        assets,
      };
      if (conflicts.length > 0) context.disambiguation = disambiguationFor(conflicts);
      if (input.sentiment && (input.sentiment.bellwethers?.length || input.sentiment.fearGreed)) {
        context.sentiment = input.sentiment;
      }
      if (input.calendar && input.calendar.days.length > 0) context.calendar = input.calendar;
      if (input.news && (input.news.market?.length || input.news.crypto?.length)) context.news = input.news;
      if (input.limitations && input.limitations.length > 0) context.limitations = [...input.limitations];

      return deepFreeze(context);
    } catch (e) {
      log.error('assembly failed, returning minimal context', e);
      return minimalContext(input.query, input.classification);
    }
  }
}
