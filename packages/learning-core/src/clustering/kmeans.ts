// ---------------------------------------------------------------------------
// K-Means Clustering (Lloyd iterations)
// ---------------------------------------------------------------------------
//
// Centroids start as k rows drawn uniformly with replacement, so duplicate
// starting centroids are possible. Each iteration assigns every sample to
// its nearest centroid and moves each centroid to the mean of its samples.
// The loop stops as soon as an assignment repeats the stored one; at that
// point the stored assignment and centroids come from the same iteration.
// A centroid that receives no samples stays where it was.
// ---------------------------------------------------------------------------

import {
  kMeansOptionsSchema,
  silentLogger,
  type KMeansOptions,
  type KMeansOptionsInput,
  type Logger,
} from '@sylva/shared';
import { InvalidInputError, NotFittedError } from '../errors.js';
import type { KMeansStatus, Matrix, PRNG } from '../types.js';
import { createPRNG, randomSeed } from '../types.js';
import { assertFeatureCount, assertMatrix, parseOptions } from '../validation.js';

interface FittedState {
  centroids: number[][];
  labels: number[];
  inertia: number;
  inertiaHistory: number[];
  nIter: number;
  status: Exclude<KMeansStatus, 'uninitialized'>;
  nFeatures: number;
}

export class KMeans {
  readonly options: Readonly<KMeansOptions>;
  private readonly logger: Logger;
  private state: FittedState | null = null;

  constructor(options: KMeansOptionsInput = {}, logger: Logger = silentLogger) {
    this.options = parseOptions(kMeansOptionsSchema, options, 'KMeans');
    this.logger = logger;
  }

  // -----------------------------------------------------------------------
  // Training
  // -----------------------------------------------------------------------

  fit(X: Matrix): this {
    const nFeatures = assertMatrix(X);
    const k = this.options.nClusters;
    if (k > X.length) {
      throw new InvalidInputError(
        `nClusters (${k}) cannot exceed the number of samples (${X.length})`,
      );
    }

    const rng = createPRNG(this.options.randomState ?? randomSeed());
    let centroids = initializeCentroids(X, k, rng);
    let labels: number[] = [];
    const inertiaHistory: number[] = [];
    let status: FittedState['status'] = 'max_iter_reached';

    for (let iter = 0; iter < this.options.maxIters; iter++) {
      const assignment = assignClusters(X, centroids);

      // Converged: keep the stored assignment and the centroids built from it
      if (iter > 0 && sameAssignment(assignment, labels)) {
        status = 'converged';
        break;
      }

      labels = assignment;
      centroids = updateCentroids(X, labels, centroids);
      inertiaHistory.push(computeInertia(X, labels, centroids));
    }

    const inertia = computeInertia(X, labels, centroids);
    if (!Number.isFinite(inertia)) {
      throw new InvalidInputError(
        'Squared distances overflow: feature values are too large to cluster',
      );
    }
    this.state = {
      centroids,
      labels,
      inertia,
      inertiaHistory,
      nIter: inertiaHistory.length,
      status,
      nFeatures,
    };

    this.logger.debug('kmeans.fit', {
      nSamples: X.length,
      nClusters: k,
      nIter: inertiaHistory.length,
      status,
      inertia,
    });
    return this;
  }

  /** Fit on X and return its cluster assignment. */
  fitPredict(X: Matrix): number[] {
    this.fit(X);
    return this.labels;
  }

  // -----------------------------------------------------------------------
  // Prediction
  // -----------------------------------------------------------------------

  /** Nearest stored centroid for each row; ties go to the lowest index. */
  predict(X: Matrix): number[] {
    const state = this.requireState('predict');
    assertFeatureCount(X, state.nFeatures);
    return nearestCentroids(finiteDistanceMatrix(X, state.centroids));
  }

  /** Euclidean distance from each row to each stored centroid (n x k). */
  transform(X: Matrix): number[][] {
    const state = this.requireState('transform');
    assertFeatureCount(X, state.nFeatures);
    return finiteDistanceMatrix(X, state.centroids);
  }

  // -----------------------------------------------------------------------
  // Fitted state
  // -----------------------------------------------------------------------

  get status(): KMeansStatus {
    return this.state?.status ?? 'uninitialized';
  }

  get centroids(): number[][] {
    return this.requireState('centroids').centroids.map((c) => [...c]);
  }

  get labels(): number[] {
    return [...this.requireState('labels').labels];
  }

  /** Sum of squared distances from each sample to its assigned centroid. */
  get inertia(): number {
    return this.requireState('inertia').inertia;
  }

  /** Number of centroid updates performed. */
  get nIter(): number {
    return this.requireState('nIter').nIter;
  }

  /** Inertia after each centroid update, oldest first. */
  get inertiaHistory(): number[] {
    return [...this.requireState('inertiaHistory').inertiaHistory];
  }

  private requireState(method: string): FittedState {
    if (this.state === null) {
      throw new NotFittedError('KMeans', method);
    }
    return this.state;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function initializeCentroids(X: Matrix, k: number, rng: PRNG): number[][] {
  const centroids: number[][] = [];
  for (let c = 0; c < k; c++) {
    const idx = Math.floor(rng() * X.length);
    centroids.push([...(X[idx] ?? [])]);
  }
  return centroids;
}

function squaredDistance(a: readonly number[], b: readonly number[]): number {
  let dist = 0;
  for (let j = 0; j < a.length; j++) {
    const diff = (a[j] ?? 0) - (b[j] ?? 0);
    dist += diff * diff;
  }
  return dist;
}

function distanceMatrix(X: Matrix, centroids: readonly (readonly number[])[]): number[][] {
  return X.map((x) => centroids.map((c) => Math.sqrt(squaredDistance(x, c))));
}

function finiteDistanceMatrix(X: Matrix, centroids: readonly (readonly number[])[]): number[][] {
  const distances = distanceMatrix(X, centroids);
  if (distances.some((row) => row.some((d) => !Number.isFinite(d)))) {
    throw new InvalidInputError(
      'Squared distances overflow: feature values are too far from the centroids',
    );
  }
  return distances;
}

function assignClusters(X: Matrix, centroids: readonly (readonly number[])[]): number[] {
  return nearestCentroids(distanceMatrix(X, centroids));
}

/** First minimum per row, so ties go to the lowest centroid index. */
function nearestCentroids(distances: readonly (readonly number[])[]): number[] {
  return distances.map((row) => {
    let bestCluster = 0;
    let bestDist = Infinity;
    for (let c = 0; c < row.length; c++) {
      const dist = row[c] ?? Infinity;
      if (dist < bestDist) {
        bestDist = dist;
        bestCluster = c;
      }
    }
    return bestCluster;
  });
}

function updateCentroids(
  X: Matrix,
  labels: readonly number[],
  previous: readonly (readonly number[])[],
): number[][] {
  const d = X[0]?.length ?? 0;
  const sums = previous.map(() => new Array<number>(d).fill(0));
  const counts = new Array<number>(previous.length).fill(0);

  for (let i = 0; i < X.length; i++) {
    const c = labels[i] ?? 0;
    const row = X[i] ?? [];
    const sum = sums[c];
    if (sum === undefined) continue;
    for (let j = 0; j < d; j++) {
      sum[j] = (sum[j] ?? 0) + (row[j] ?? 0);
    }
    counts[c] = (counts[c] ?? 0) + 1;
  }

  return previous.map((centroid, c) => {
    const count = counts[c] ?? 0;
    if (count === 0) return [...centroid];
    return (sums[c] ?? []).map((s) => s / count);
  });
}

function computeInertia(
  X: Matrix,
  labels: readonly number[],
  centroids: readonly (readonly number[])[],
): number {
  let total = 0;
  for (let i = 0; i < X.length; i++) {
    const centroid = centroids[labels[i] ?? 0] ?? [];
    total += squaredDistance(X[i] ?? [], centroid);
  }
  return total;
}

function sameAssignment(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
