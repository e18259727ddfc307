// ---------------------------------------------------------------------------
// Random row and feature sampling
// ---------------------------------------------------------------------------

import type { Matrix, PRNG } from './types.js';

/** Draw `n` indices from `[0, n)` uniformly with replacement. */
export function bootstrapIndices(n: number, rng: PRNG): number[] {
  const indices = new Array<number>(n);
  for (let i = 0; i < n; i++) {
    indices[i] = Math.floor(rng() * n);
  }
  return indices;
}

/** Sample `k` unique feature indices from `[0, nFeatures)`, in draw order. */
export function sampleFeatureIndices(nFeatures: number, k: number, rng: PRNG): number[] {
  const all = Array.from({ length: nFeatures }, (_, i) => i);
  // Fisher-Yates partial shuffle
  const count = Math.max(0, Math.min(k, nFeatures));
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(rng() * (nFeatures - i));
    const tmp = all[i] ?? i;
    all[i] = all[j] ?? j;
    all[j] = tmp;
  }
  return all.slice(0, count);
}

/** Select the given rows of X, restricted to the given columns. */
export function projectMatrix(
  X: Matrix,
  rows: readonly number[],
  columns: readonly number[],
): number[][] {
  return rows.map((r) => {
    const source = X[r] ?? [];
    return columns.map((c) => source[c] ?? 0);
  });
}
