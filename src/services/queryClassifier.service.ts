import type { Category, Query, QueryClassification, RiskContext } from '../types';
import { createLogger } from '../lib/serverLogs';

const log = createLogger('classifier');

export type CategoryTerms = {
  /** Matched as substrings of the normalized query. */
  primary: readonly string[];
  /** Matched against whole tokens only. */
  secondary: readonly string[];
};

export const CATEGORY_TERMS: Readonly<Record<Category, CategoryTerms>> = {
  crypto: {
    primary: ['crypto', 'bitcoin', 'ethereum', 'blockchain', 'altcoin', 'stablecoin'],
    secondary: ['btc', 'eth', 'sol', 'coin', 'coins', 'token', 'nft', 'web3', 'xrp', 'defi'],
  },
  options: {
    primary: ['options', 'call option', 'put option', 'implied volatility', 'strike price', 'expiration date'],
    secondary: ['calls', 'puts', 'iv', 'theta', 'delta', 'gamma', 'vega', 'strike', 'premium'],
  },
  daytrading: {
    primary: ['day trade', 'day trading', 'daytrading', 'daytrade', 'scalp', 'intraday'],
    secondary: ['scalping', 'scalper', 'momentum', 'breakout'],
  },
  forex: {
    primary: ['forex', 'currency pair', 'exchange rate', 'foreign exchange'],
    secondary: ['eurusd', 'gbpusd', 'usdjpy', 'audusd', 'fx', 'pip', 'pips', 'dxy'],
  },
  economic: {
    primary: ['economic calendar', 'inflation', 'interest rate', 'federal reserve', 'unemployment', 'gdp', 'jobs report'],
    secondary: ['cpi', 'fomc', 'fed', 'nfp', 'ppi', 'macro', 'recession', 'payrolls'],
  },
  memecoin: {
    primary: ['memecoin', 'meme coin', 'meme token'],
    secondary: ['doge', 'shib', 'pepe', 'bonk', 'meme', 'memes'],
  },
};

/** Highest first. The active risk context comes from the first matched entry. */
export const CATEGORY_PRIORITY: readonly Category[] = [
  'options',
  'daytrading',
  'memecoin',
  'crypto',
  'forex',
  'economic',
];

export const DEFAULT_RISK_CONTEXT: RiskContext = Object.freeze({
  disclaimer: 'Market data is informational only and is not investment advice.',
  positionSizing: 'Size positions so that a single loss stays small relative to the account.',
  verification: 'Confirm prices with a live source before acting; quotes may be delayed.',
});

export function riskContextFor(category: Category): RiskContext {
  switch (category) {
    case 'options':
      return {
        disclaimer: 'Options can expire worthless; losses can reach the full premium paid.',
        leverage: 'Options are leveraged instruments; small moves in the underlying cause large swings.',
        timeDecay: 'Time value decays toward expiration, fastest in the final weeks.',
        volatility: 'Implied volatility changes reprice options even when the underlying is flat.',
      };
    case 'daytrading':
      return {
        disclaimer: 'Most intraday traders lose money after costs.',
        execution: 'Spreads, slippage and fees compound across frequent trades.',
        regulation: 'Pattern day trader rules may apply to margin accounts under 25,000 USD.',
        stops: 'Define the exit before the entry.',
      };
    case 'memecoin':
      return {
        disclaimer: 'Meme tokens are driven by social sentiment and can lose most of their value in hours.',
        liquidity: 'Thin order books make exits at quoted prices unreliable.',
        contracts: 'Verify the contract address; copycat tokens share names and symbols.',
      };
    case 'crypto':
      return {
        disclaimer: 'Crypto assets are highly volatile and trade around the clock.',
        custody: 'Exchange and wallet custody carry counterparty and loss risk.',
        regulation: 'Regulatory treatment differs by jurisdiction and can change quickly.',
      };
    case 'forex':
      return {
        disclaimer: 'Currency trading is typically leveraged; losses can exceed deposits.',
        events: 'Central bank decisions and macro releases move pairs sharply.',
        sessions: 'Liquidity varies across the Asian, European and US sessions.',
      };
    case 'economic':
      return {
        disclaimer: 'Economic releases are often revised after publication.',
        volatility: 'Markets can gap around scheduled releases.',
        expectations: 'Price reaction depends on the surprise versus consensus, not the headline figure.',
      };
    default: {
      const exhaustive: never = category;
      return exhaustive;
    }
  }
}

export const DEFAULT_CLASSIFICATION: QueryClassification = Object.freeze({
  categories: Object.freeze<Category[]>([]),
  riskSource: 'default',
  riskContext: DEFAULT_RISK_CONTEXT,
});

function matches(query: Query, terms: CategoryTerms): boolean {
  if (terms.primary.some((t) => query.normalized.includes(t))) return true;
  return terms.secondary.some((t) => query.tokens.has(t));
}

export class QueryClassifier {
  constructor(private readonly terms: Readonly<Record<Category, CategoryTerms>> = CATEGORY_TERMS) {}

  /** Never throws; any internal failure yields the default classification. */
  classify(query: Query): QueryClassification {
    try {
      if (!query.normalized) return DEFAULT_CLASSIFICATION;

      const categories = CATEGORY_PRIORITY.filter((c) => matches(query, this.terms[c]));
      if (categories.length === 0) return DEFAULT_CLASSIFICATION;

      const top = categories[0];
      return Object.freeze({
        categories: Object.freeze(categories),
        riskSource: top,
        riskContext: Object.freeze(riskContextFor(top)),
      });
    } catch (e) {
      log.warn('classification failed, using default', e);
      return DEFAULT_CLASSIFICATION;
    }
  }
}
