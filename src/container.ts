import type { AppConfig } from './config';
import { CoinGeckoProvider } from './providers/coingecko.provider';
import { AlternativeMeFearGreedProvider } from './providers/fearGreed.provider';
import { FmpProvider } from './providers/fmp.provider';
import { JsonFileAssetStore } from './repositories/assetStore.repository';
import { AssetResolver } from './services/assetResolver.service';
import { CalendarService } from './services/calendar.service';
import { ContextPipeline } from './services/contextPipeline.service';
import { IndicatorAggregator } from './services/indicatorAggregator.service';
import { NewsService } from './services/news.service';
import { QueryClassifier } from './services/queryClassifier.service';
import { SentimentService } from './services/sentiment.service';
import { SymbolExtractor } from './services/symbolExtractor.service';

/** Wires the production adapters into one pipeline. Caches live as long as the pipeline. */
export function buildPipeline(config: AppConfig): ContextPipeline {
  const timeoutMs = config.providerTimeoutMs;
  const fmp = new FmpProvider({ apiKey: config.fmp.apiKey, baseUrl: config.fmp.baseUrl, timeoutMs });
  const coingecko = new CoinGeckoProvider({
    apiKey: config.coingecko.apiKey,
    baseUrl: config.coingecko.baseUrl,
    timeoutMs,
  });

  const store = new JsonFileAssetStore(config.assetStoreDir);

  return new ContextPipeline({
    classifier: new QueryClassifier(),
    extractor: new SymbolExtractor(),
    resolver: new AssetResolver({
      market: fmp,
      crypto: coingecko,
      timeoutMs,
      lookupTtlMs: config.lookupCacheTtlMs,
    }),
    aggregator: new IndicatorAggregator({
      provider: fmp,
      timeoutMs,
      cacheTtlMs: config.indicatorCacheTtlMs,
    }),
    sentiment: new SentimentService({
      store,
      fearGreed: new AlternativeMeFearGreedProvider(config.fearGreedUrl, timeoutMs),
      symbols: config.bellwetherSymbols,
      timeoutMs,
    }),
    calendar: new CalendarService(fmp, { timeoutMs, cacheTtlMs: config.indicatorCacheTtlMs }),
    news: new NewsService(store),
  });
}
