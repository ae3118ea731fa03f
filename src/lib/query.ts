import type { Query } from '../types';
import { InvalidQueryError } from './errors';
import { err, ok, type Result } from './result';

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function tokenize(normalized: string): string[] {
  return normalized.match(/[a-z0-9]+/g) ?? [];
}

export function parseQuery(text: string): Result<Query, InvalidQueryError> {
  const normalized = normalizeText(text);
  if (!normalized) return err(new InvalidQueryError());

  return ok(
    Object.freeze({
      text,
      normalized,
      tokens: new Set(tokenize(normalized)),
    })
  );
}

/** Stand-in for an unparseable query: no tokens, so every matcher comes back empty. */
export function emptyQuery(text: string): Query {
  return Object.freeze({ text, normalized: '', tokens: new Set<string>() });
}
