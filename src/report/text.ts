import type { CalculationResult } from '../models/types.js';
import type { Grid } from '../utils/grid.js';

const LABEL_WIDTH = 12;
const CELL_WIDTH = 11;

// Fixed notation at any magnitude; exact ties round half away from zero.
const money = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  useGrouping: false
});

export function formatMoney(value: number): string {
  // -0 would otherwise print as "-0.00"
  return money.format(value === 0 ? 0 : value);
}

export function formatTable(orders: readonly number[], demands: readonly number[], grid: Grid, title: string): string[] {
  const header = 'Order\\Demand'.padEnd(LABEL_WIDTH) + demands.map((demand) => String(demand).padStart(CELL_WIDTH)).join('');
  const rows = grid
    .toArrays()
    .map(
      (values, index) =>
        `Order ${orders[index]}`.padEnd(LABEL_WIDTH) + values.map((value) => formatMoney(value).padStart(CELL_WIDTH)).join('')
    );
  return [title, header, ...rows];
}

export function renderTextReport(result: CalculationResult): string {
  const { orders, demands } = result.scenario;
  const lines = [
    ...formatTable(orders, demands, result.profitMatrix, 'Profit Matrix'),
    '',
    ...formatTable(orders, demands, result.expectedValues, 'Expected Values (eij*qj)'),
    '',
    'Expected Profits:',
    ...result.expectedProfits.map(
      (expectedProfit, index) => `For Order ${orders[index]}: Expected Profit = ${formatMoney(expectedProfit)} dollars`
    ),
    '',
    `Optimal order quantity: ${result.optimal.order}`,
    `Optimal expected profit: ${formatMoney(result.optimal.expectedProfit)} dollars`
  ];
  return `${lines.join('\n')}\n`;
}
