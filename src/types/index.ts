// ===== QUERY =====

export interface Query {
  readonly text: string;
  readonly normalized: string;
  readonly tokens: ReadonlySet<string>;
}

// ===== CLASSIFICATION =====

export type Category = 'options' | 'daytrading' | 'memecoin' | 'crypto' | 'forex' | 'economic';

export type RiskContext = Readonly<Record<string, string>>;

export interface QueryClassification {
  readonly categories: readonly Category[];
  readonly riskSource: Category | 'default';
  readonly riskContext: RiskContext;
}

// ===== EXTRACTION =====

export type CandidateKind = 'contract' | 'dollar' | 'alias' | 'ticker' | 'phrase';

export interface CandidateSymbol {
  value: string;
  confidence: number;
  kind: CandidateKind;
}

// ===== ASSETS =====

export type AssetClass = 'EQUITY' | 'CRYPTO';

export type DataSource = 'fmp' | 'coingecko' | 'coingecko_search';

export interface ResolvedAsset {
  symbol: string;
  name: string;
  assetClass: AssetClass;
  price: number;
  changePercent: number;
  marketCap: number;
  volume: number;
  dataSource: DataSource;
  /** Set when the asset was resolved from a token contract address. */
  contract?: { address: string; platform: string };
}

export interface ConflictReport {
  kind: 'conflict';
  symbol: string;
  candidates: ResolvedAsset[];
}

export type ResolutionOutcome = ResolvedAsset | ConflictReport;

// ===== INDICATORS =====

export type IndicatorType = 'RSI' | 'EMA' | 'SMA' | 'DEMA';

export type IndicatorKey = 'rsi' | 'ema' | 'sma' | 'dema';

export type Timeframe = '1h' | '2h' | '4h' | '1d';

export interface RawIndicatorPoint {
  date: string;
  value: number;
}

export interface IndicatorPoint extends RawIndicatorPoint {
  timeframe: Timeframe;
  period: number;
}

export interface IndicatorSeries {
  indicatorType: IndicatorType;
  timeframe: Timeframe;
  period: number;
  points: IndicatorPoint[];
}

export type IndicatorMap = Partial<Record<IndicatorKey, IndicatorSeries>>;

export type RsiReading = 'overbought' | 'oversold' | 'neutral';

// ===== SENTIMENT & CALENDAR =====

export interface BellwetherEntry {
  symbol: string;
  name: string;
  descriptors: string[];
  rsi?: RawIndicatorPoint[];
  ema?: RawIndicatorPoint[];
}

export interface FearGreedReading {
  value: number;
  classification: string;
  timestamp: string;
}

export interface SentimentData {
  bellwethers?: BellwetherEntry[];
  fearGreed?: FearGreedReading;
}

export type EventImpact = 'Low' | 'Medium' | 'High' | 'None';

export interface EconomicEvent {
  date: string;
  country: string;
  event: string;
  currency: string;
  impact: EventImpact;
}

export type CalendarVolatility = 'none' | 'low' | 'medium' | 'high';

export interface CalendarDay {
  date: string;
  isToday: boolean;
  volatilityScore: number;
  volatility: CalendarVolatility;
  numberOfEvents: number;
  topEvents: Array<{ name: string; country: string; currency: string; impact: EventImpact }>;
}

export interface CalendarThresholds {
  low: number;
  medium: number;
  high: number;
}

export interface CalendarWeek {
  currentDate: string;
  days: CalendarDay[];
  thresholds: CalendarThresholds;
}

// ===== NEWS =====

export type NewsFeed = 'market' | 'crypto';

export interface NewsItem {
  headline: string;
  date: string;
  source: string;
  url?: string;
}

export interface NewsData {
  market?: NewsItem[];
  crypto?: NewsItem[];
}

// ===== AGGREGATED CONTEXT =====

export interface AssetContext extends ResolvedAsset {
  indicators?: IndicatorMap;
  rsi?: { value: number; date: string; reading: RsiReading };
}

export interface DisambiguationOption {
  symbol: string;
  name: string;
  assetClass: AssetClass;
  dataSource: DataSource;
  price: number;
  marketCap: number;
}

export interface Disambiguation {
  symbols: string[];
  options: DisambiguationOption[];
  instruction: string;
}

export interface AggregatedContext {
  query: string;
  classification: QueryClassification;
  assets: AssetContext[];
  disambiguation?: Disambiguation;
  sentiment?: SentimentData;
  calendar?: CalendarWeek;
  news?: NewsData;
  limitations?: string[];
  degraded?: true;
}
