import { describe, expect, it } from 'vitest';

import { CalculatorError } from '../utils/errors.js';
import { Grid } from '../utils/grid.js';
import { probabilityTotal, reduceRows, weight } from './expectation.js';

describe('weight', () => {
  const matrix = Grid.fromRows([
    [100, 200, 300],
    [-50, 0, 50]
  ]);

  it('multiplies each cell by the probability of its column', () => {
    const probabilities = [0.5, 0.25, 0.25];
    const weighted = weight(matrix, probabilities);
    expect(weighted.rows).toBe(2);
    expect(weighted.columns).toBe(3);
    for (let row = 0; row < matrix.rows; row++) {
      for (let column = 0; column < matrix.columns; column++) {
        expect(weighted.get(row, column)).toBe(matrix.get(row, column) * probabilities[column]);
      }
    }
  });

  it('leaves the source grid untouched', () => {
    weight(matrix, [0, 0, 0]);
    expect(matrix.row(0)).toEqual([100, 200, 300]);
  });

  it('rejects probabilities that are not finite numbers', () => {
    expect(() => weight(matrix, [0.5, Number.NaN, 0.25])).toThrow(
      expect.objectContaining({ kind: 'InvalidArgument', details: { index: 1, probability: Number.NaN } })
    );
    expect(() => weight(matrix, [Infinity, 0, 0])).toThrow('Probability 0 is not a finite number');
  });

  it('rejects a probability vector of the wrong length', () => {
    expect(() => weight(matrix, [0.5, 0.5])).toThrow(CalculatorError);
    expect(() => weight(matrix, [0.5, 0.5])).toThrow(
      expect.objectContaining({ kind: 'DimensionMismatch', details: { columns: 3, probabilities: 2 } })
    );
  });
});

describe('reduceRows', () => {
  it('sums each row', () => {
    const weighted = Grid.fromRows([
      [1, 2, 3],
      [10, -20, 5.5]
    ]);
    expect(reduceRows(weighted)).toEqual([6, -4.5]);
  });

  it('sums weighted profits into expected profits', () => {
    const matrix = Grid.fromRows([
      [2_400_000, 2_400_000],
      [1_900_000, 3_600_000]
    ]);
    expect(reduceRows(weight(matrix, [0.25, 0.75]))).toEqual([2_400_000, 3_175_000]);
  });

  it('gives 0 for rows without columns', () => {
    expect(reduceRows(Grid.fromRows([[], []]))).toEqual([0, 0]);
  });

  it('gives no sums for a grid without rows', () => {
    expect(reduceRows(Grid.fromRows([]))).toEqual([]);
  });
});

describe('probabilityTotal', () => {
  it('adds the probabilities', () => {
    expect(probabilityTotal([0.1, 0.15, 0.25, 0.3, 0.2])).toBe(1);
    expect(probabilityTotal([0.5, 0.25])).toBe(0.75);
    expect(probabilityTotal([])).toBe(0);
  });
});
