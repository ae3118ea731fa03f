/**
 * Helpers shared by the provider adapters.
 */

import { UpstreamUnavailableError, errorMessage } from './errors';
import { err, ok, type ProviderResult } from './result';

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function asNumber(v: unknown): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export async function fetchWithTimeout(
  input: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(input, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(t);
  }
}

export const EXTERNAL_HEADERS: Record<string, string> = {
  accept: 'application/json',
  'user-agent': 'Mozilla/5.0 (compatible; asset-context-engine/0.1)',
};

/** GET a JSON document. Non-2xx, aborts and bad bodies come back as `UpstreamUnavailableError`. */
export async function fetchJson(
  operation: string,
  url: string,
  headers: Record<string, string>,
  timeoutMs: number
): Promise<ProviderResult<unknown>> {
  try {
    const res = await fetchWithTimeout(url, { headers: { ...EXTERNAL_HEADERS, ...headers } }, timeoutMs);
    if (!res.ok) return err(new UpstreamUnavailableError(operation, 'http', String(res.status)));
    const json: unknown = await res.json();
    return ok(json);
  } catch (e) {
    const aborted = e instanceof Error && e.name === 'AbortError';
    return err(new UpstreamUnavailableError(operation, aborted ? 'timeout' : 'error', errorMessage(e)));
  }
}
