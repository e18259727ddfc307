// ---------------------------------------------------------------------------
// Impurity measures for classification splits
// ---------------------------------------------------------------------------

import type { Criterion } from '@sylva/shared';
import { countLabels } from '../labels.js';
import type { Label } from '../types.js';

/** Added inside the log so a zero proportion never reaches log2(0). */
export const LOG_EPSILON = 1e-8;

/**
 * Shannon entropy in bits: H = -Σ p_i log2(p_i + ε)
 * Input is a vector of class counts.
 */
export function entropyFromCounts(counts: Iterable<number>): number {
  const values = [...counts];
  let total = 0;
  for (const c of values) total += c;
  if (total <= 0) return 0;

  let h = 0;
  for (const c of values) {
    const p = c / total;
    h -= p * Math.log2(p + LOG_EPSILON);
  }
  return h;
}

/** Gini impurity: G = 1 - Σ p_i² */
export function giniFromCounts(counts: Iterable<number>): number {
  const values = [...counts];
  let total = 0;
  for (const c of values) total += c;
  if (total <= 0) return 0;

  let sumSq = 0;
  for (const c of values) {
    const p = c / total;
    sumSq += p * p;
  }
  return 1 - sumSq;
}

/** Entropy of a label vector, in bits. */
export function entropy(labels: readonly Label[]): number {
  return entropyFromCounts(countLabels(labels).values());
}

/** Gini impurity of a label vector. */
export function gini(labels: readonly Label[]): number {
  return giniFromCounts(countLabels(labels).values());
}

export function impurity(labels: readonly Label[], criterion: Criterion): number {
  return impurityFromCounts(countLabels(labels).values(), criterion);
}

/**
 * Impurity reduction of splitting `parent` into `left` and `right`.
 * A split with an empty side carries no information and scores 0.
 */
export function informationGain(
  parent: readonly Label[],
  left: readonly Label[],
  right: readonly Label[],
  criterion: Criterion = 'entropy',
): number {
  return splitGain(
    impurity(parent, criterion),
    [...countLabels(left).values()],
    [...countLabels(right).values()],
    criterion,
  );
}

/**
 * Gain of a split given the parent's impurity and each side's class
 * counts: parent - (nL/n) * I(left) - (nR/n) * I(right).
 * Returns 0 when either side is empty.
 */
export function splitGain(
  parentImpurity: number,
  leftCounts: readonly number[],
  rightCounts: readonly number[],
  criterion: Criterion,
): number {
  const nLeft = sum(leftCounts);
  const nRight = sum(rightCounts);
  if (nLeft === 0 || nRight === 0) return 0;
  const n = nLeft + nRight;
  return (
    parentImpurity -
    (nLeft / n) * impurityFromCounts(leftCounts, criterion) -
    (nRight / n) * impurityFromCounts(rightCounts, criterion)
  );
}

/** Impurity of a class-count vector under the chosen criterion. */
export function impurityFromCounts(counts: Iterable<number>, criterion: Criterion): number {
  return criterion === 'gini' ? giniFromCounts(counts) : entropyFromCounts(counts);
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}
