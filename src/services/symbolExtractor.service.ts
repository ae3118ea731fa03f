import type { CandidateSymbol, Query } from '../types';
import wordLists from '../../data/stopwords.json';
import aliasTable from '../../data/instrument-aliases.json';

export const MAX_CANDIDATES = 4;

export const FILLER_WORDS: ReadonlySet<string> = new Set(['token', 'coin', 'crypto', 'cryptocurrency']);

const STOPWORDS: ReadonlySet<string> = new Set(wordLists.stopwords);
const JARGON: ReadonlySet<string> = new Set(wordLists.jargon);

/** EVM token contract address. */
export const CONTRACT_ADDRESS_RE = /^0x[a-fA-F0-9]{40}$/;

const CONFIDENCE = {
  contract: 1.0,
  dollar: 1.0,
  alias: 0.95,
  ticker: 0.9,
  multiWordPhrase: 0.7,
  singleWordPhrase: 0.5,
} as const;

type Word = {
  raw: string;
  lower: string;
};

type AliasEntry = {
  words: string[];
  symbol: string;
};

function buildAliases(table: Record<string, string>): AliasEntry[] {
  return Object.entries(table)
    .map(([name, symbol]) => ({ words: name.toLowerCase().split(/\s+/).filter(Boolean), symbol }))
    .filter((a) => a.words.length > 0)
    .sort((a, b) => b.words.length - a.words.length);
}

const DEFAULT_ALIASES = buildAliases(aliasTable);

function splitWords(text: string): Word[] {
  const out: Word[] = [];
  for (const chunk of text.split(/[\s,;:!?()[\]{}"“”]+/)) {
    const raw = chunk
      .replace(/['’]s$/i, '')
      .replace(/^[^A-Za-z0-9$]+/, '')
      .replace(/[^A-Za-z0-9]+$/, '');
    if (!raw) continue;
    const lower = raw.toLowerCase().replace(/[^a-z0-9.&$]/g, '');
    if (!lower) continue;
    out.push({ raw, lower });
  }
  return out;
}

/**
 * Drops the generic nouns (token, coin, ...) from a phrase, but only when a word
 * longer than three characters survives; otherwise the phrase is returned as given.
 * Applying it twice gives the same result as applying it once.
 */
export function stripFiller(phrase: string): string {
  const words = phrase.split(/\s+/).filter(Boolean);
  const remaining = words.filter((w) => !FILLER_WORDS.has(w.toLowerCase()));
  if (remaining.some((w) => w.length > 3)) return remaining.join(' ');
  return words.join(' ');
}

function isBareTicker(word: Word): boolean {
  if (!/^[A-Z][A-Z0-9.]{1,9}$/.test(word.raw)) return false;
  return !STOPWORDS.has(word.lower) && !JARGON.has(word.lower);
}

function isNoise(word: Word): boolean {
  return STOPWORDS.has(word.lower) || JARGON.has(word.lower) || !/[a-z]/.test(word.lower);
}

export class SymbolExtractor {
  private readonly aliases: AliasEntry[];

  constructor(aliases: Record<string, string> = aliasTable) {
    this.aliases = aliases === aliasTable ? DEFAULT_ALIASES : buildAliases(aliases);
  }

  /** Candidate symbols ordered by confidence, at most four. Pure. */
  extract(query: Query): CandidateSymbol[] {
    const words = splitWords(query.text);
    const consumed = words.map(() => false);
    const found: Array<CandidateSymbol & { pos: number }> = [];

    words.forEach((w, i) => {
      if (!CONTRACT_ADDRESS_RE.test(w.raw)) return;
      consumed[i] = true;
      found.push({ value: w.raw.toLowerCase(), confidence: CONFIDENCE.contract, kind: 'contract', pos: i });
    });

    words.forEach((w, i) => {
      const m = /^\$([A-Za-z][A-Za-z0-9.]{0,9})$/.exec(w.raw);
      if (!m) return;
      consumed[i] = true;
      found.push({ value: m[1].toUpperCase(), confidence: CONFIDENCE.dollar, kind: 'dollar', pos: i });
    });

    for (const alias of this.aliases) {
      const n = alias.words.length;
      for (let i = 0; i + n <= words.length; i += 1) {
        let hit = true;
        for (let k = 0; k < n; k += 1) {
          if (consumed[i + k] || words[i + k].lower !== alias.words[k]) {
            hit = false;
            break;
          }
        }
        if (!hit) continue;
        for (let k = 0; k < n; k += 1) consumed[i + k] = true;
        found.push({ value: alias.symbol, confidence: CONFIDENCE.alias, kind: 'alias', pos: i });
      }
    }

    words.forEach((w, i) => {
      if (consumed[i] || !isBareTicker(w)) return;
      consumed[i] = true;
      found.push({ value: w.raw, confidence: CONFIDENCE.ticker, kind: 'ticker', pos: i });
    });

    let run: Word[] = [];
    let runStart = 0;
    const flush = () => {
      if (run.length === 0) return;
      const allFiller = run.every((w) => FILLER_WORDS.has(w.lower));
      if (!allFiller) {
        const value = stripFiller(run.map((w) => w.raw).join(' '));
        const confidence = value.includes(' ') ? CONFIDENCE.multiWordPhrase : CONFIDENCE.singleWordPhrase;
        found.push({ value, confidence, kind: 'phrase', pos: runStart });
      }
      run = [];
    };
    words.forEach((w, i) => {
      if (consumed[i] || isNoise(w)) {
        flush();
        return;
      }
      if (run.length === 0) runStart = i;
      run.push(w);
    });
    flush();

    const ranked = found.sort((a, b) => b.confidence - a.confidence || a.pos - b.pos);
    const seen = new Set<string>();
    const out: CandidateSymbol[] = [];
    for (const c of ranked) {
      const key = c.value.toUpperCase();
      if (seen.has(key)) continue;
      seen.add(key);
      out.push({ value: c.value, confidence: c.confidence, kind: c.kind });
      if (out.length === MAX_CANDIDATES) break;
    }
    return out;
  }
}
