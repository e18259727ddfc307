// ---------------------------------------------------------------------------
// Random Forest Classifier (bagging + random feature subsets)
// ---------------------------------------------------------------------------

import {
  randomForestOptionsSchema,
  silentLogger,
  type Logger,
  type MaxFeatures,
  type RandomForestOptions,
  type RandomForestOptionsInput,
} from '@sylva/shared';
import { NotFittedError } from '../errors.js';
import { accuracy, countLabels, labelAt, majorityLabel, uniqueLabels } from '../labels.js';
import { bootstrapIndices, projectMatrix, sampleFeatureIndices } from '../sampling.js';
import type { ClassProbabilities, Label, Matrix } from '../types.js';
import { createPRNG, randomSeed } from '../types.js';
import { assertFeatureCount, assertLabels, assertMatrix, parseOptions } from '../validation.js';
import { DecisionTree } from './decision-tree.js';

/** One ensemble member and the columns it was trained on. */
export interface ForestMember<L extends Label = Label> {
  readonly tree: DecisionTree<L>;
  /** Columns of the caller's X the tree was trained on, ascending. */
  readonly featureIndices: readonly number[];
}

/**
 * Random forest classifier.
 *
 * Each tree is trained on its own row sample (bootstrap, or all rows) and
 * its own column subset, both drawn from a PRNG seeded with
 * `baseSeed + treeIndex`. A tree's sample therefore does not depend on the
 * order in which trees are trained. Predictions are aggregated by
 * plurality vote.
 */
export class RandomForest<L extends Label = Label> {
  readonly options: Readonly<RandomForestOptions>;
  private readonly logger: Logger;
  private members: ForestMember<L>[] = [];
  private nFeatures = 0;

  constructor(options: RandomForestOptionsInput = {}, logger: Logger = silentLogger) {
    this.options = parseOptions(randomForestOptionsSchema, options, 'RandomForest');
    this.logger = logger;
  }

  // -----------------------------------------------------------------------
  // Training
  // -----------------------------------------------------------------------

  /** Fit the forest on training data X (n x d) and labels y (n). */
  fit(X: Matrix, y: readonly L[]): this {
    const nFeatures = assertMatrix(X);
    assertLabels(X, y);

    const baseSeed = this.options.randomState ?? randomSeed();
    const nSelected = resolveMaxFeatures(this.options.maxFeatures, nFeatures);

    const members: ForestMember<L>[] = [];
    for (let t = 0; t < this.options.nEstimators; t++) {
      members.push(this.fitMember(X, y, nFeatures, nSelected, baseSeed + t));
    }

    this.members = members;
    this.nFeatures = nFeatures;

    this.logger.debug('random_forest.fit', {
      nSamples: X.length,
      nFeatures,
      nEstimators: members.length,
      featuresPerTree: nSelected,
      bootstrap: this.options.bootstrap,
    });
    return this;
  }

  /** Train a single member. Reads only its own seed, so members are independent. */
  private fitMember(
    X: Matrix,
    y: readonly L[],
    nFeatures: number,
    nSelected: number,
    seed: number,
  ): ForestMember<L> {
    const rng = createPRNG(seed);
    const n = X.length;

    const rows = this.options.bootstrap
      ? bootstrapIndices(n, rng)
      : Array.from({ length: n }, (_, i) => i);
    // Ascending, so a full subset keeps the caller's column order
    const featureIndices = sampleFeatureIndices(nFeatures, nSelected, rng).sort((a, b) => a - b);

    const tree = new DecisionTree<L>({
      maxDepth: this.options.maxDepth,
      minSamplesSplit: this.options.minSamplesSplit,
      minSamplesLeaf: this.options.minSamplesLeaf,
      criterion: this.options.criterion,
    });
    tree.fit(
      projectMatrix(X, rows, featureIndices),
      rows.map((r) => labelAt(y, r)),
    );

    return { tree, featureIndices };
  }

  // -----------------------------------------------------------------------
  // Prediction
  // -----------------------------------------------------------------------

  /** Plurality vote of every tree for each row of X. */
  predict(X: Matrix): L[] {
    const votes = this.collectVotes(X, 'predict');
    return votes.map((rowVotes) => pluralityVote(rowVotes));
  }

  /**
   * Vote share per class. The class set is the union of labels any tree
   * predicted for this batch, so it can differ between calls.
   */
  predictProba(X: Matrix): ClassProbabilities<L> {
    const votes = this.collectVotes(X, 'predictProba');
    const classes = uniqueLabels(votes.flat());

    const probabilities = votes.map((rowVotes) => {
      const counts = countLabels(rowVotes);
      return classes.map((c) => (counts.get(c) ?? 0) / rowVotes.length);
    });

    return { classes, probabilities };
  }

  score(X: Matrix, y: readonly L[]): number {
    assertLabels(X, y);
    return accuracy(this.predict(X), y);
  }

  /**
   * Uniform placeholder importances: `1 / k` for each of the `k` features
   * a tree was trained on. Not derived from the fitted trees.
   */
  featureImportance(): number[] {
    const first = this.requireMembers('featureImportance')[0];
    const k = first?.featureIndices.length ?? 0;
    return new Array<number>(k).fill(1 / k);
  }

  /** Expose ensemble members in training order. */
  getEstimators(): readonly ForestMember<L>[] {
    return this.requireMembers('getEstimators');
  }

  /** votes[row][tree] — each tree's prediction on its own columns. */
  private collectVotes(X: Matrix, method: string): L[][] {
    const members = this.requireMembers(method);
    assertFeatureCount(X, this.nFeatures);

    const perTree = members.map(({ tree, featureIndices }) =>
      tree.predict(projectMatrix(X, X.map((_, i) => i), featureIndices)),
    );

    return X.map((_, row) => perTree.map((preds) => labelAt(preds, row)));
  }

  private requireMembers(method: string): ForestMember<L>[] {
    if (this.members.length === 0) {
      throw new NotFittedError('RandomForest', method);
    }
    return this.members;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Number of columns each tree sees; never fewer than one. */
export function resolveMaxFeatures(mode: MaxFeatures, nFeatures: number): number {
  let k: number;
  if (mode === 'sqrt') {
    k = Math.round(Math.sqrt(nFeatures));
  } else if (mode === 'log2') {
    k = Math.round(Math.log2(nFeatures));
  } else if (mode === 'all') {
    k = nFeatures;
  } else if (Number.isInteger(mode)) {
    k = Math.min(mode, nFeatures);
  } else {
    k = Math.round(mode * nFeatures);
  }
  return Math.max(1, Math.min(k, nFeatures));
}

/**
 * Label with the most votes. Candidates are enumerated in ascending label
 * order and only a strictly higher count replaces the leader.
 */
export function pluralityVote<L extends Label>(votes: readonly L[]): L {
  return majorityLabel(votes);
}
