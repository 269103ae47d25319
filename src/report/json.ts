import type { CalculationResult } from '../models/types.js';

export function renderJsonReport(result: CalculationResult): string {
  return `${JSON.stringify(
    {
      ...result,
      profitMatrix: result.profitMatrix.toArrays(),
      expectedValues: result.expectedValues.toArrays()
    },
    null,
    2
  )}\n`;
}
