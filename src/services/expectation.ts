import { CalculatorError } from '../utils/errors.js';
import type { Grid } from '../utils/grid.js';

export function weight(matrix: Grid, probabilities: readonly number[]): Grid {
  if (probabilities.length !== matrix.columns) {
    throw new CalculatorError(
      'DimensionMismatch',
      `Expected ${matrix.columns} probabilities, one per demand, got ${probabilities.length}`,
      { columns: matrix.columns, probabilities: probabilities.length }
    );
  }
  const invalid = probabilities.findIndex((probability) => !Number.isFinite(probability));
  if (invalid !== -1) {
    throw new CalculatorError('InvalidArgument', `Probability ${invalid} is not a finite number`, {
      index: invalid,
      probability: probabilities[invalid]
    });
  }
  return matrix.map((value, _row, column) => value * probabilities[column]);
}

/** Sums each row left to right; a row without columns sums to 0. */
export function reduceRows(weighted: Grid): number[] {
  const sums: number[] = [];
  for (let row = 0; row < weighted.rows; row++) {
    let sum = 0;
    for (let column = 0; column < weighted.columns; column++) {
      sum += weighted.get(row, column);
    }
    sums.push(sum);
  }
  return sums;
}

export function probabilityTotal(probabilities: readonly number[]): number {
  return probabilities.reduce((sum, probability) => sum + probability, 0);
}
