import type { AggregatedContext, AssetContext, CalendarWeek, IndicatorKey, NewsItem, SentimentData } from '../types';

/**
 * Template text with `{{query}}`, `{{risk}}` and `{{context}}` placeholders.
 * Unknown placeholders are left as written.
 */
export type NarrativeTemplate = string;

/** Consumer of an assembled context; every field it receives is populated or absent. */
export interface NarrativeGenerator {
  generate(context: AggregatedContext, query: string, template: NarrativeTemplate): Promise<string>;
}

export const DEFAULT_TEMPLATE: NarrativeTemplate = `# User's query

{{query}}

# Risk guidance

{{risk}}

# Market context

{{context}}

# Instructions

Answer the user's query using only the market context above. Quote figures as given and say when data is missing.`;

const INDICATOR_ORDER: readonly IndicatorKey[] = ['rsi', 'ema', 'sma', 'dema'];

function fmt(n: number, digits = 2): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(digits);
}

function renderAsset(a: AssetContext): string[] {
  const lines = [
    `## ${a.symbol} (${a.name}, ${a.assetClass})`,
    `- Price: ${fmt(a.price)} (${a.changePercent >= 0 ? '+' : ''}${fmt(a.changePercent)}%)`,
    `- Market cap: ${fmt(a.marketCap, 0)}; volume: ${fmt(a.volume, 0)}; source: ${a.dataSource}`,
  ];
  if (a.contract) lines.push(`- Contract: ${a.contract.address} on ${a.contract.platform}`);
  if (a.rsi) lines.push(`- RSI ${fmt(a.rsi.value)} on ${a.rsi.date}: ${a.rsi.reading}`);
  for (const key of INDICATOR_ORDER) {
    const s = a.indicators?.[key];
    if (!s) continue;
    const values = s.points.map((p) => fmt(p.value)).join(', ');
    lines.push(`- ${s.indicatorType} (${s.timeframe}, period ${s.period}), newest first: ${values}`);
  }
  return lines;
}

function renderSentiment(s: SentimentData): string[] {
  const lines = ['## Market sentiment'];
  if (s.fearGreed) {
    lines.push(`- Crypto Fear & Greed: ${s.fearGreed.value} (${s.fearGreed.classification}) at ${s.fearGreed.timestamp}`);
  }
  for (const b of s.bellwethers ?? []) {
    const rsi = b.rsi?.[0];
    const tags = b.descriptors.length ? ` [${b.descriptors.join(', ')}]` : '';
    lines.push(`- ${b.symbol} ${b.name}${tags}${rsi ? `: RSI ${fmt(rsi.value)}` : ''}`);
  }
  return lines;
}

function renderCalendar(c: CalendarWeek): string[] {
  const lines = [`## Economic calendar (today ${c.currentDate})`];
  for (const d of c.days) {
    const top = d.topEvents
      .slice(0, 3)
      .map((e) => `${e.name} (${e.country}, ${e.impact})`)
      .join('; ');
    lines.push(`- ${d.date}: ${d.volatility} volatility, ${d.numberOfEvents} events${top ? `: ${top}` : ''}`);
  }
  return lines;
}

function renderNews(title: string, items: readonly NewsItem[]): string[] {
  return [title, ...items.map((n) => `- [${n.date.slice(0, 10)}] ${n.headline}${n.source ? ` (${n.source})` : ''}`)];
}

export function renderContext(context: AggregatedContext): string {
  const blocks: string[][] = [];
  for (const a of context.assets) blocks.push(renderAsset(a));

  if (context.disambiguation) {
    const d = context.disambiguation;
    blocks.push([
      '## Disambiguation required',
      ...d.options.map((o) => `- ${o.symbol}: ${o.name} (${o.assetClass}, ${o.dataSource}), price ${fmt(o.price)}`),
      d.instruction,
    ]);
  }
  if (context.sentiment) blocks.push(renderSentiment(context.sentiment));
  if (context.calendar) blocks.push(renderCalendar(context.calendar));
  if (context.news?.market) blocks.push(renderNews('## Recent market news', context.news.market));
  if (context.news?.crypto) blocks.push(renderNews('## Recent crypto news', context.news.crypto));
  if (context.limitations) blocks.push(['## Limitations', ...context.limitations.map((l) => `- ${l}`)]);
  if (context.degraded) blocks.push(['Market data could not be assembled for this query.']);

  return blocks.length ? blocks.map((b) => b.join('\n')).join('\n\n') : 'No market data was found for this query.';
}

export function renderRisk(context: AggregatedContext): string {
  return Object.values(context.classification.riskContext)
    .map((v) => `- ${v}`)
    .join('\n');
}

/** Fills a template from an assembled context. Makes no model call. */
export class PromptNarrativeRenderer implements NarrativeGenerator {
  render(context: AggregatedContext, query: string, template: NarrativeTemplate = DEFAULT_TEMPLATE): string {
    const values: Record<string, string> = {
      query,
      risk: renderRisk(context),
      context: renderContext(context),
    };
    return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (whole, name: string) => values[name] ?? whole);
  }

  async generate(context: AggregatedContext, query: string, template: NarrativeTemplate): Promise<string> {
    return this.render(context, query, template);
  }
}
