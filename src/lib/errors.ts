import type { AssetClass, IndicatorType, ResolvedAsset } from '../types';

export type PipelineErrorKind =
  | 'NOT_FOUND'
  | 'AMBIGUOUS_ASSET'
  | 'UPSTREAM_UNAVAILABLE'
  | 'PARTIAL_DATA'
  | 'INVALID_QUERY'
  | 'INVALID_TICKER';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends PipelineError {
  readonly kind = 'NOT_FOUND';

  constructor(readonly candidate: string) {
    super(`No asset found for "${candidate}"`);
  }
}

/** One raw symbol matched assets of different classes; the user has to pick. */
export class AmbiguousAssetError extends PipelineError {
  readonly kind = 'AMBIGUOUS_ASSET';

  constructor(readonly symbol: string, readonly candidates: ResolvedAsset[]) {
    const classes = [...new Set(candidates.map((c) => c.assetClass))].join('/');
    super(`Symbol "${symbol}" matches ${candidates.length} assets across ${classes}`);
  }
}

export class UpstreamUnavailableError extends PipelineError {
  readonly kind = 'UPSTREAM_UNAVAILABLE';

  constructor(
    readonly operation: string,
    readonly reason: 'timeout' | 'error' | 'http',
    readonly detail?: string
  ) {
    super(`${operation} unavailable (${reason}${detail ? `: ${detail}` : ''})`);
  }
}

export class PartialDataError extends PipelineError {
  readonly kind = 'PARTIAL_DATA';

  constructor(readonly symbol: string, readonly missing: IndicatorType[]) {
    super(`${symbol}: missing ${missing.join(', ')}`);
  }
}

export class InvalidQueryError extends PipelineError {
  readonly kind = 'INVALID_QUERY';

  constructor(reason = 'Query text is empty') {
    super(reason);
  }
}

export class InvalidTickerError extends PipelineError {
  readonly kind = 'INVALID_TICKER';

  constructor(readonly input: unknown, readonly assetClass?: AssetClass) {
    super(`Cannot derive a ticker symbol from ${describe(input)}`);
  }
}

function describe(v: unknown): string {
  if (v === null) return 'null';
  if (Array.isArray(v)) return 'array';
  return typeof v;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
