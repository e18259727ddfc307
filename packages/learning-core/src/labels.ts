// ---------------------------------------------------------------------------
// Label ordering, counting and voting
// ---------------------------------------------------------------------------

import type { Label } from './types.js';

/**
 * Natural ascending order: numbers numerically, strings by code unit,
 * numbers before strings.
 */
export function compareLabels(a: Label, b: Label): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Distinct labels in ascending order. */
export function uniqueLabels<L extends Label>(labels: Iterable<L>): L[] {
  return [...new Set(labels)].sort(compareLabels);
}

/** Occurrence count per label, keyed in first-seen order. */
export function countLabels<L extends Label>(labels: Iterable<L>): Map<L, number> {
  const counts = new Map<L, number>();
  for (const label of labels) {
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return counts;
}

/**
 * Most frequent label. Count ties resolve to the label that comes first
 * in ascending order. `labels` must be non-empty.
 */
export function majorityLabel<L extends Label>(labels: readonly L[]): L {
  const counts = countLabels(labels);
  let best: L | undefined;
  let bestCount = 0;
  for (const label of uniqueLabels(counts.keys())) {
    const count = counts.get(label) ?? 0;
    if (best === undefined || count > bestCount) {
      best = label;
      bestCount = count;
    }
  }
  if (best === undefined) {
    throw new RangeError('majorityLabel requires at least one label');
  }
  return best;
}

/** Fraction of positions where predicted and actual labels are equal. */
export function accuracy<L extends Label>(predicted: readonly L[], actual: readonly L[]): number {
  if (predicted.length === 0) return 0;
  let hits = 0;
  for (let i = 0; i < predicted.length; i++) {
    if (predicted[i] === actual[i]) hits++;
  }
  return hits / predicted.length;
}

/** Label at position i; callers have already checked the vector's length. */
export function labelAt<L extends Label>(labels: readonly L[], i: number): L {
  const label = labels[i];
  if (label === undefined) {
    throw new RangeError(`No label at index ${i}`);
  }
  return label;
}
