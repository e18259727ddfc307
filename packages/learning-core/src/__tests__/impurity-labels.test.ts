// ---------------------------------------------------------------------------
// Tests: Impurity measures, label helpers, sampling, input guards
// ---------------------------------------------------------------------------

import { describe, it, expect } from 'vitest';
import { createPRNG } from '../types.js';
import {
  entropy,
  entropyFromCounts,
  gini,
  informationGain,
  splitGain,
} from '../information/impurity.js';
import {
  accuracy,
  compareLabels,
  countLabels,
  majorityLabel,
  uniqueLabels,
} from '../labels.js';
import { bootstrapIndices, projectMatrix, sampleFeatureIndices } from '../sampling.js';
import { assertFeatureCount, assertLabels, assertMatrix } from '../validation.js';
import { InvalidInputError, LearningError } from '../errors.js';

// ===========================================================================
// Impurity
// ===========================================================================

describe('entropy', () => {
  it('is one bit for an even two-class split', () => {
    expect(entropy([0, 0, 1, 1])).toBeCloseTo(1.0, 6);
  });

  it('is zero for a pure vector', () => {
    expect(entropy([0, 0, 0, 0])).toBeCloseTo(0.0, 6);
  });

  it('is two bits for four equiprobable classes', () => {
    expect(entropy(['a', 'b', 'c', 'd'])).toBeCloseTo(2.0, 6);
  });

  it('returns 0 for empty counts', () => {
    expect(entropyFromCounts([])).toBe(0);
    expect(entropyFromCounts([0, 0])).toBe(0);
  });
});

describe('gini', () => {
  it('is 0.5 for an even two-class split', () => {
    expect(gini([1, 2, 1, 2])).toBeCloseTo(0.5, 12);
  });

  it('is 0 for a pure vector', () => {
    expect(gini(['x', 'x', 'x'])).toBe(0);
  });
});

describe('informationGain', () => {
  it('equals the parent entropy for a perfect split', () => {
    const gain = informationGain([0, 0, 1, 1], [0, 0], [1, 1]);
    expect(gain).toBeCloseTo(1.0, 6);
  });

  it('is 0 when one side is empty', () => {
    expect(informationGain([0, 1], [0, 1], [])).toBe(0);
  });

  it('supports gini', () => {
    const gain = informationGain([0, 0, 1, 1], [0, 0], [1, 1], 'gini');
    expect(gain).toBeCloseTo(0.5, 12);
  });
});

describe('splitGain', () => {
  it('scores a split from per-side class counts', () => {
    // parent [2, 2]; left holds both 0s, right both 1s
    expect(splitGain(0.5, [2, 0], [0, 2], 'gini')).toBeCloseTo(0.5, 12);
  });

  it('weights each side by its share of the rows', () => {
    // left [1, 0] is pure; right [1, 2] has gini 4/9, weighted by 3/4
    expect(splitGain(0.5, [1, 0], [1, 2], 'gini')).toBeCloseTo(0.5 - 0.75 * (4 / 9), 12);
  });

  it('is 0 when a side has no rows', () => {
    expect(splitGain(1, [2, 2], [0, 0], 'entropy')).toBe(0);
  });

  it('agrees with informationGain on the same partition', () => {
    const parent = [0, 0, 0, 1, 1, 2];
    const left = [0, 0, 1];
    const right = [0, 1, 2];
    expect(splitGain(entropy(parent), [2, 1, 0], [1, 1, 1], 'entropy')).toBeCloseTo(
      informationGain(parent, left, right),
      12,
    );
  });
});

// ===========================================================================
// Labels
// ===========================================================================

describe('compareLabels', () => {
  it('orders numbers numerically, not lexically', () => {
    expect([10, 9, 100].sort(compareLabels)).toEqual([9, 10, 100]);
  });

  it('places numbers before strings', () => {
    expect(['b', 2, 'a', 1].sort(compareLabels)).toEqual([1, 2, 'a', 'b']);
  });
});

describe('uniqueLabels / countLabels', () => {
  it('returns distinct labels ascending', () => {
    expect(uniqueLabels([3, 1, 3, 2, 1])).toEqual([1, 2, 3]);
  });

  it('counts occurrences', () => {
    const counts = countLabels(['a', 'b', 'a']);
    expect(counts.get('a')).toBe(2);
    expect(counts.get('b')).toBe(1);
  });
});

describe('majorityLabel', () => {
  it('picks the most frequent label', () => {
    expect(majorityLabel([2, 5, 5, 2, 5])).toBe(5);
  });

  it('breaks count ties by ascending order', () => {
    expect(majorityLabel([2, 1, 2, 1])).toBe(1);
    expect(majorityLabel(['dog', 'cat'])).toBe('cat');
  });

  it('throws on an empty vector', () => {
    expect(() => majorityLabel([])).toThrow(RangeError);
  });
});

describe('accuracy', () => {
  it('is the fraction of exact matches', () => {
    expect(accuracy([1, 0, 1, 1], [1, 1, 1, 0])).toBe(0.5);
  });

  it('is 0 for empty input', () => {
    expect(accuracy([], [])).toBe(0);
  });
});

// ===========================================================================
// Sampling
// ===========================================================================

describe('sampling', () => {
  it('bootstrap draws n indices within range', () => {
    const idx = bootstrapIndices(50, createPRNG(1));
    expect(idx).toHaveLength(50);
    for (const i of idx) {
      expect(i).toBeGreaterThanOrEqual(0);
      expect(i).toBeLessThan(50);
    }
  });

  it('feature sampling draws distinct indices', () => {
    const idx = sampleFeatureIndices(10, 4, createPRNG(5));
    expect(idx).toHaveLength(4);
    expect(new Set(idx).size).toBe(4);
  });

  it('feature sampling caps at the feature count', () => {
    const idx = sampleFeatureIndices(3, 8, createPRNG(5));
    expect([...idx].sort((a, b) => a - b)).toEqual([0, 1, 2]);
  });

  it('projects rows and columns', () => {
    const X = [
      [1, 2, 3],
      [4, 5, 6],
    ];
    expect(projectMatrix(X, [1, 1, 0], [2, 0])).toEqual([
      [6, 4],
      [6, 4],
      [3, 1],
    ]);
  });
});

// ===========================================================================
// Input guards
// ===========================================================================

describe('input guards', () => {
  it('returns the feature count of a valid matrix', () => {
    expect(assertMatrix([[1, 2], [3, 4]])).toBe(2);
  });

  it('rejects an empty matrix', () => {
    expect(() => assertMatrix([])).toThrow(InvalidInputError);
  });

  it('rejects rows without features', () => {
    expect(() => assertMatrix([[]])).toThrow(InvalidInputError);
  });

  it('rejects ragged rows', () => {
    expect(() => assertMatrix([[1, 2], [3]])).toThrow('X row 1 has 1 features, expected 2');
  });

  it('rejects non-finite values', () => {
    expect(() => assertMatrix([[1, Number.NaN]])).toThrow('X[0][1] is not a finite number');
    expect(() => assertMatrix([[Infinity]])).toThrow(InvalidInputError);
  });

  it('rejects label vectors of the wrong length', () => {
    expect(() => assertLabels([[1], [2]], [0])).toThrow('y has 1 labels but X has 2 rows');
  });

  it('rejects a feature count that differs from training', () => {
    expect(() => assertFeatureCount([[1, 2, 3]], 2)).toThrow(InvalidInputError);
  });

  it('raises errors carrying the INVALID_INPUT code', () => {
    try {
      assertMatrix([]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LearningError);
      if (err instanceof LearningError) {
        expect(err.code).toBe('INVALID_INPUT');
        expect(err.name).toBe('InvalidInputError');
      }
    }
  });
});
