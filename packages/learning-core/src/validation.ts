// ---------------------------------------------------------------------------
// Input guards shared by every estimator
// ---------------------------------------------------------------------------

import type { z } from 'zod';
import { InvalidInputError } from './errors.js';
import type { Label, Matrix } from './types.js';

/**
 * Check that X is a non-empty rectangular matrix of finite numbers.
 * @returns the number of features
 */
export function assertMatrix(X: Matrix, name = 'X'): number {
  if (X.length === 0) {
    throw new InvalidInputError(`${name} must contain at least one row`);
  }
  const nFeatures = X[0]?.length ?? 0;
  if (nFeatures === 0) {
    throw new InvalidInputError(`${name} must contain at least one feature`);
  }
  for (let i = 0; i < X.length; i++) {
    const row = X[i] ?? [];
    if (row.length !== nFeatures) {
      throw new InvalidInputError(
        `${name} row ${i} has ${row.length} features, expected ${nFeatures}`,
      );
    }
    for (let j = 0; j < nFeatures; j++) {
      if (!Number.isFinite(row[j])) {
        throw new InvalidInputError(`${name}[${i}][${j}] is not a finite number`);
      }
    }
  }
  return nFeatures;
}

/** Check that y pairs one label with each row of X. */
export function assertLabels(X: Matrix, y: readonly Label[]): void {
  if (y.length !== X.length) {
    throw new InvalidInputError(
      `y has ${y.length} labels but X has ${X.length} rows`,
    );
  }
  for (let i = 0; i < y.length; i++) {
    const label = y[i];
    if (typeof label === 'number' && !Number.isFinite(label)) {
      throw new InvalidInputError(`y[${i}] is not a finite number`);
    }
  }
}

/** Check that X has the feature count the estimator was fitted with. */
export function assertFeatureCount(X: Matrix, expected: number): void {
  const actual = assertMatrix(X);
  if (actual !== expected) {
    throw new InvalidInputError(
      `X has ${actual} features, but the estimator was fitted with ${expected}`,
    );
  }
}

/**
 * Parse estimator options through their schema.
 * Failures surface as InvalidInputError with per-field messages.
 */
export function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  estimator: string,
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const fields: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const key = issue.path.join('.') || '(root)';
      (fields[key] ??= []).push(issue.message);
    }
    const summary = Object.entries(fields)
      .map(([key, messages]) => `${key}: ${messages.join(', ')}`)
      .join('; ');
    throw new InvalidInputError(`Invalid ${estimator} options (${summary})`, fields);
  }
  return result.data;
}
