import { stringify } from 'csv-stringify/sync';

import type { CalculationResult } from '../models/types.js';

export function renderCsvReport(result: CalculationResult): string {
  const { orders, demands, probabilities } = result.scenario;
  const records = orders.flatMap((order, row) =>
    demands.map((demand, column) => ({
      order,
      demand,
      probability: probabilities[column],
      profit: result.profitMatrix.get(row, column),
      expectedValue: result.expectedValues.get(row, column)
    }))
  );

  return stringify(records, {
    header: true,
    columns: ['order', 'demand', 'probability', 'profit', 'expectedValue']
  });
}
