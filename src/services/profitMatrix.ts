import { DEFAULT_PRICING } from '../config.js';
import type { Pricing } from '../models/types.js';
import { Grid } from '../utils/grid.js';
import { profit } from './profit.js';

export function buildProfitMatrix(
  orders: readonly number[],
  demands: readonly number[],
  pricing: Pricing = DEFAULT_PRICING
): Grid {
  return Grid.build(orders.length, demands.length, (row, column) => profit(orders[row], demands[column], pricing));
}
