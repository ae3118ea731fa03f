import type {
  AggregatedContext,
  CalendarWeek,
  CandidateSymbol,
  IndicatorMap,
  NewsData,
  QueryClassification,
  ResolutionOutcome,
  ResolvedAsset,
  SentimentData,
} from '../types';
import { errorMessage } from '../lib/errors';
import { emptyQuery, parseQuery } from '../lib/query';
import { createLogger } from '../lib/serverLogs';
import type { AssetResolver } from './assetResolver.service';
import type { CalendarService } from './calendar.service';
import { ContextAssembler, assetKey, minimalContext } from './contextAssembler.service';
import type { IndicatorAggregator } from './indicatorAggregator.service';
import type { NewsService } from './news.service';
import { DEFAULT_CLASSIFICATION, type QueryClassifier } from './queryClassifier.service';
import type { SentimentService } from './sentiment.service';
import type { SymbolExtractor } from './symbolExtractor.service';

const log = createLogger('pipeline');

export type ContextRunOptions = {
  includeSentiment?: boolean;
  includeCalendar?: boolean;
  includeNews?: boolean;
};

export type ContextPipelineDeps = {
  classifier: QueryClassifier;
  extractor: SymbolExtractor;
  resolver: AssetResolver;
  aggregator: IndicatorAggregator;
  assembler?: ContextAssembler;
  sentiment?: SentimentService;
  calendar?: CalendarService;
  news?: NewsService;
};

function isAsset(o: ResolutionOutcome): o is ResolvedAsset {
  return !('kind' in o);
}

/**
 * Query text in, frozen `AggregatedContext` out. Sentiment, calendar and news load
 * alongside classification, extraction, resolution and indicators; resolution
 * waits for extraction and indicators wait for resolution.
 */
export class ContextPipeline {
  private readonly assembler: ContextAssembler;

  constructor(private readonly deps: ContextPipelineDeps) {
    this.assembler = deps.assembler ?? new ContextAssembler();
  }

  private async loadSentiment(enabled: boolean): Promise<SentimentData | undefined> {
    if (!enabled || !this.deps.sentiment) return undefined;
    try {
      return await this.deps.sentiment.load();
    } catch (e) {
      log.warn(`sentiment skipped: ${errorMessage(e)}`);
      return undefined;
    }
  }

  private async loadCalendar(enabled: boolean): Promise<CalendarWeek | undefined> {
    if (!enabled || !this.deps.calendar) return undefined;
    try {
      return await this.deps.calendar.week();
    } catch (e) {
      log.warn(`calendar skipped: ${errorMessage(e)}`);
      return undefined;
    }
  }

  private async loadNews(enabled: boolean): Promise<NewsData | undefined> {
    if (!enabled || !this.deps.news) return undefined;
    try {
      return await this.deps.news.load();
    } catch (e) {
      log.warn(`news skipped: ${errorMessage(e)}`);
      return undefined;
    }
  }

  private async indicatorsFor(assets: readonly ResolvedAsset[]): Promise<Record<string, IndicatorMap>> {
    const maps = await Promise.all(assets.map((a) => this.deps.aggregator.fetchIndicators(a)));
    const out: Record<string, IndicatorMap> = {};
    assets.forEach((a, i) => {
      const res = maps[i];
      if (res.ok) out[assetKey(a)] = res.value;
      else log.warn(res.error.message);
    });
    return out;
  }

  /** Never rejects; any failure past classification yields a degraded context. */
  async run(text: string, options: ContextRunOptions = {}): Promise<AggregatedContext> {
    let classification: QueryClassification = DEFAULT_CLASSIFICATION;
    try {
      const parsed = parseQuery(text);
      if (!parsed.ok) log.info(parsed.error.message);
      const query = parsed.ok ? parsed.value : emptyQuery(text);

      // Sentiment, calendar and news are I/O bound; start them before the CPU-only steps.
      const sentimentP = this.loadSentiment(options.includeSentiment ?? true);
      const calendarP = this.loadCalendar(options.includeCalendar ?? true);
      const newsP = this.loadNews(options.includeNews ?? true);

      classification = this.deps.classifier.classify(query);
      const candidates: CandidateSymbol[] = parsed.ok ? this.deps.extractor.extract(query) : [];

      const resolution = await this.deps.resolver.resolve(candidates);
      const assets = resolution.outcomes.filter(isAsset);

      const [indicatorsByAsset, sentiment, calendar, news] = await Promise.all([
        this.indicatorsFor(assets),
        sentimentP,
        calendarP,
        newsP,
      ]);

      return this.assembler.assemble({
        query: text,
        classification,
        resolved: resolution.outcomes,
        indicatorsByAsset,
        sentiment,
        calendar,
        news,
        limitations: resolution.limitations,
      });
    } catch (e) {
      log.error('pipeline failed, returning minimal context', e);
      return minimalContext(text, classification);
    }
  }
}
