import type {
  EconomicEvent,
  FearGreedReading,
  IndicatorType,
  RawIndicatorPoint,
  ResolvedAsset,
  Timeframe,
} from '../types';
import type { ProviderResult } from '../lib/result';

export interface MarketDataProvider {
  readonly name: string;
  lookupBySymbol(symbol: string): Promise<ProviderResult<ResolvedAsset | null>>;
  fetchIndicator(
    symbol: string,
    type: IndicatorType,
    timeframe: Timeframe,
    period: number
  ): Promise<ProviderResult<RawIndicatorPoint[]>>;
}

export interface CryptoDataProvider {
  readonly name: string;
  lookupBySymbol(normalizedSymbol: string): Promise<ProviderResult<ResolvedAsset | null>>;
  search(text: string): Promise<ProviderResult<ResolvedAsset[]>>;
  /** Token by contract address on `platform` (e.g. `ethereum`); `null` when unknown. */
  lookupByContract(address: string, platform: string): Promise<ProviderResult<ResolvedAsset | null>>;
}

export interface CalendarProvider {
  fetchEvents(from: string, to: string): Promise<ProviderResult<EconomicEvent[]>>;
}

export interface FearGreedProvider {
  latest(): Promise<ProviderResult<FearGreedReading | null>>;
}
