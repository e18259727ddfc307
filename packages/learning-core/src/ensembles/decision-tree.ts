// ---------------------------------------------------------------------------
// Decision Tree Classifier (information-gain splits)
// ---------------------------------------------------------------------------

import {
  decisionTreeOptionsSchema,
  silentLogger,
  type Criterion,
  type DecisionTreeOptions,
  type DecisionTreeOptionsInput,
  type Logger,
} from '@sylva/shared';
import { NotFittedError } from '../errors.js';
import { impurityFromCounts, splitGain } from '../information/impurity.js';
import { accuracy, countLabels, labelAt, majorityLabel, uniqueLabels } from '../labels.js';
import { sampleFeatureIndices } from '../sampling.js';
import type { Label, LeafNode, Matrix, PRNG, TreeNode } from '../types.js';
import { createPRNG, randomSeed } from '../types.js';
import { assertFeatureCount, assertLabels, assertMatrix, parseOptions } from '../validation.js';

/** Type guard: is this node a leaf? */
export function isLeaf<L extends Label>(node: TreeNode<L>): node is LeafNode<L> {
  return node.kind === 'leaf';
}

/** Everything a recursive build step reads but never changes. */
interface BuildContext<L extends Label> {
  X: Matrix;
  y: readonly L[];
  nFeatures: number;
  maxDepth: number;
  minSamplesSplit: number;
  minSamplesLeaf: number;
  criterion: Criterion;
  maxFeatures: number | undefined;
  rng: PRNG | null;
}

interface SplitCandidate {
  featureIndex: number;
  threshold: number;
  gain: number;
}

/**
 * Decision tree classifier.
 *
 * Builds the tree by exhaustive search over features (ascending index)
 * and their distinct observed values (ascending) as `<=` thresholds,
 * keeping the first split with the highest information gain. When the
 * winning split would leave a side with fewer than `minSamplesLeaf`
 * rows the node becomes a leaf; the second-best split is not tried.
 */
export class DecisionTree<L extends Label = Label> {
  readonly options: Readonly<DecisionTreeOptions>;
  private readonly logger: Logger;
  private root: TreeNode<L> | null = null;
  private nFeatures = 0;

  constructor(options: DecisionTreeOptionsInput = {}, logger: Logger = silentLogger) {
    this.options = parseOptions(decisionTreeOptionsSchema, options, 'DecisionTree');
    this.logger = logger;
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /** Build the tree from training data X (n x d) and labels y (n). */
  fit(X: Matrix, y: readonly L[]): this {
    const nFeatures = assertMatrix(X);
    assertLabels(X, y);

    const { maxFeatures, randomState } = this.options;
    const rng =
      maxFeatures !== undefined && maxFeatures < nFeatures
        ? createPRNG(randomState ?? randomSeed())
        : null;

    const ctx: BuildContext<L> = {
      X,
      y,
      nFeatures,
      maxDepth: this.options.maxDepth,
      minSamplesSplit: this.options.minSamplesSplit,
      minSamplesLeaf: this.options.minSamplesLeaf,
      criterion: this.options.criterion,
      maxFeatures,
      rng,
    };

    const indices = Array.from({ length: X.length }, (_, i) => i);
    const root = buildNode(ctx, indices, 0);
    this.root = root;
    this.nFeatures = nFeatures;

    this.logger.debug('decision_tree.fit', {
      nSamples: X.length,
      nFeatures,
      depth: nodeDepth(root),
      leaves: leafCount(root),
    });
    return this;
  }

  /** Predict a label for every row of X. */
  predict(X: Matrix): L[] {
    const root = this.requireRoot('predict');
    assertFeatureCount(X, this.nFeatures);
    return X.map((x) => descend(root, x).value);
  }

  /** Predict the label of a single sample. */
  predictSingle(x: readonly number[]): L {
    const root = this.requireRoot('predictSingle');
    assertFeatureCount([x], this.nFeatures);
    return descend(root, x).value;
  }

  /** Fraction of rows whose predicted label equals the given one. */
  score(X: Matrix, y: readonly L[]): number {
    assertLabels(X, y);
    return accuracy(this.predict(X), y);
  }

  /** Expose the tree root for inspection. */
  getRoot(): TreeNode<L> {
    return this.requireRoot('getRoot');
  }

  /** Number of split levels below the root (0 for a single leaf). */
  getDepth(): number {
    return nodeDepth(this.requireRoot('getDepth'));
  }

  getLeafCount(): number {
    return leafCount(this.requireRoot('getLeafCount'));
  }

  private requireRoot(method: string): TreeNode<L> {
    if (this.root === null) {
      throw new NotFittedError('DecisionTree', method);
    }
    return this.root;
  }
}

// ---------------------------------------------------------------------------
// Recursive tree building
// ---------------------------------------------------------------------------

function buildNode<L extends Label>(
  ctx: BuildContext<L>,
  indices: number[],
  depth: number,
): TreeNode<L> {
  const labels = indices.map((i) => labelAt(ctx.y, i));
  const counts = countLabels(labels);

  // Stop conditions: max depth, pure node, or too few samples to split
  if (
    depth >= ctx.maxDepth ||
    counts.size === 1 ||
    indices.length < ctx.minSamplesSplit
  ) {
    return makeLeaf(labels);
  }

  // Class index per row, in ascending label order
  const classIndex = new Map(uniqueLabels(labels).map((label, c) => [label, c] as const));
  const rowClasses = labels.map((label) => classIndex.get(label) ?? 0);

  const best = findBestSplit(ctx, indices, rowClasses, classIndex.size);
  if (best === null || best.gain <= 0) {
    return makeLeaf(labels);
  }

  const leftIndices: number[] = [];
  const rightIndices: number[] = [];
  for (const i of indices) {
    if (featureAt(ctx.X, i, best.featureIndex) <= best.threshold) {
      leftIndices.push(i);
    } else {
      rightIndices.push(i);
    }
  }

  if (leftIndices.length < ctx.minSamplesLeaf || rightIndices.length < ctx.minSamplesLeaf) {
    return makeLeaf(labels);
  }

  return {
    kind: 'split',
    featureIndex: best.featureIndex,
    threshold: best.threshold,
    gain: best.gain,
    nSamples: indices.length,
    left: buildNode(ctx, leftIndices, depth + 1),
    right: buildNode(ctx, rightIndices, depth + 1),
  };
}

/**
 * Scan (feature, threshold) pairs in ascending order and keep the first
 * pair reaching the maximum gain. Starts below any attainable gain so the
 * first candidate is always recorded.
 *
 * Each feature is swept once over its rows sorted by value: every distinct
 * value moves its rows from the right-hand counts to the left-hand counts,
 * then the split `x <= value` is scored.
 */
function findBestSplit<L extends Label>(
  ctx: BuildContext<L>,
  indices: readonly number[],
  rowClasses: readonly number[],
  nClasses: number,
): SplitCandidate | null {
  const totals = new Array<number>(nClasses).fill(0);
  for (const c of rowClasses) totals[c] = (totals[c] ?? 0) + 1;
  const parentImpurity = impurityFromCounts(totals, ctx.criterion);

  let best: SplitCandidate | null = null;
  let bestGain = -1;

  for (const fIdx of candidateFeatures(ctx)) {
    const sorted = indices
      .map((row, pos) => ({ value: featureAt(ctx.X, row, fIdx), cls: rowClasses[pos] ?? 0 }))
      .sort((a, b) => a.value - b.value);
    const left = new Array<number>(nClasses).fill(0);
    const right = [...totals];

    let pos = 0;
    while (pos < sorted.length) {
      const threshold = sorted[pos]?.value ?? 0;
      let entry = sorted[pos];
      while (entry !== undefined && entry.value === threshold) {
        left[entry.cls] = (left[entry.cls] ?? 0) + 1;
        right[entry.cls] = (right[entry.cls] ?? 0) - 1;
        pos++;
        entry = sorted[pos];
      }

      // The largest value leaves the right side empty, which scores 0
      const gain = splitGain(parentImpurity, left, right, ctx.criterion);
      if (gain > bestGain) {
        bestGain = gain;
        best = { featureIndex: fIdx, threshold, gain };
      }
    }
  }

  return best;
}

/** All features, or a fresh ascending sample of `maxFeatures` per node. */
function candidateFeatures<L extends Label>(ctx: BuildContext<L>): number[] {
  if (ctx.rng === null || ctx.maxFeatures === undefined) {
    return Array.from({ length: ctx.nFeatures }, (_, i) => i);
  }
  return sampleFeatureIndices(ctx.nFeatures, ctx.maxFeatures, ctx.rng).sort((a, b) => a - b);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeLeaf<L extends Label>(labels: readonly L[]): LeafNode<L> {
  return { kind: 'leaf', value: majorityLabel(labels), nSamples: labels.length };
}

function descend<L extends Label>(root: TreeNode<L>, x: readonly number[]): LeafNode<L> {
  let node = root;
  while (node.kind === 'split') {
    node = (x[node.featureIndex] ?? 0) <= node.threshold ? node.left : node.right;
  }
  return node;
}

function nodeDepth(node: TreeNode): number {
  if (node.kind === 'leaf') return 0;
  return 1 + Math.max(nodeDepth(node.left), nodeDepth(node.right));
}

function leafCount(node: TreeNode): number {
  if (node.kind === 'leaf') return 1;
  return leafCount(node.left) + leafCount(node.right);
}

function featureAt(X: Matrix, row: number, feature: number): number {
  return X[row]?.[feature] ?? 0;
}
