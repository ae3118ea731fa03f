import type { ResolvedAsset } from '../types';
import { AmbiguousAssetError } from '../lib/errors';
import { err, ok, type Result } from '../lib/result';

export const DISAMBIGUATION_INSTRUCTION =
  'Multiple assets found with the same symbol(s). Please show both/all options to the user and ask them to clarify which asset they meant.';

/** Keeps the first asset seen per (symbol, assetClass). */
export function dedupeAssets(assets: readonly ResolvedAsset[]): ResolvedAsset[] {
  const seen = new Set<string>();
  const out: ResolvedAsset[] = [];
  for (const a of assets) {
    const key = `${a.assetClass}:${a.symbol.toUpperCase()}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(a);
  }
  return out;
}

export class ConflictDetector {
  /**
   * Every asset `rawSymbol` resolved to, in tier order. One asset class left after
   * dedupe is a clean resolution; two or more is a collision nobody may pick for the user.
   */
  detect(rawSymbol: string, assets: readonly ResolvedAsset[]): Result<ResolvedAsset, AmbiguousAssetError> | null {
    const unique = dedupeAssets(assets);
    if (unique.length === 0) return null;

    const classes = new Set(unique.map((a) => a.assetClass));
    if (classes.size < 2) return ok(unique[0]);
    return err(new AmbiguousAssetError(rawSymbol.toUpperCase(), unique));
  }

  /**
   * An equity hit and a crypto lookup of the same symbol collide only when the
   * crypto symbol matches exactly and the names differ.
   */
  isCollision(equity: ResolvedAsset, crypto: ResolvedAsset): boolean {
    return (
      equity.symbol.toUpperCase() === crypto.symbol.toUpperCase() &&
      equity.name.trim().toLowerCase() !== crypto.name.trim().toLowerCase()
    );
  }
}
