// ---------------------------------------------------------------------------
// Learning Core — Shared Types
// ---------------------------------------------------------------------------

/** Seedable PRNG function returning floats in [0, 1). */
export type PRNG = () => number;

/** Row-major sample matrix: rows are observations, columns are features. */
export type Matrix = readonly (readonly number[])[];

/** Class labels are compared with `===`; numbers and strings are both valid. */
export type Label = number | string;

// ---------------------------------------------------------------------------
// Decision tree nodes
// ---------------------------------------------------------------------------

export interface LeafNode<L extends Label = Label> {
  readonly kind: 'leaf';
  readonly value: L;
  readonly nSamples: number;
}

export interface SplitNode<L extends Label = Label> {
  readonly kind: 'split';
  readonly featureIndex: number;
  /** Observed value of `featureIndex`; rows with `x <= threshold` go left. */
  readonly threshold: number;
  readonly gain: number;
  readonly nSamples: number;
  readonly left: TreeNode<L>;
  readonly right: TreeNode<L>;
}

export type TreeNode<L extends Label = Label> = LeafNode<L> | SplitNode<L>;

// ---------------------------------------------------------------------------
// Ensembles
// ---------------------------------------------------------------------------

export interface ClassProbabilities<L extends Label = Label> {
  /** Labels voted for anywhere in the batch, ascending. */
  classes: L[];
  /** probabilities[row][c] is the vote share of classes[c]. */
  probabilities: number[][];
}

// ---------------------------------------------------------------------------
// Clustering
// ---------------------------------------------------------------------------

export type KMeansStatus = 'uninitialized' | 'converged' | 'max_iter_reached';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Seedable PRNG — mulberry32. */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Draw a 32-bit seed for fits that were not given one. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296) | 0;
}
