import type { OptimalDecision } from '../models/types.js';
import { CalculatorError } from '../utils/errors.js';

/**
 * Picks the order with the highest expected profit. Ties keep the earliest
 * order: a later candidate must be strictly greater to take over.
 */
export function optimize(orders: readonly number[], expectedProfits: readonly number[]): OptimalDecision {
  if (orders.length === 0 || expectedProfits.length === 0) {
    throw new CalculatorError('EmptyInput', 'At least one order quantity is required', {
      orders: orders.length,
      expectedProfits: expectedProfits.length
    });
  }
  if (orders.length !== expectedProfits.length) {
    throw new CalculatorError(
      'DimensionMismatch',
      `Got ${orders.length} orders but ${expectedProfits.length} expected profits`,
      { orders: orders.length, expectedProfits: expectedProfits.length }
    );
  }

  const invalid = expectedProfits.findIndex((expectedProfit) => !Number.isFinite(expectedProfit));
  if (invalid !== -1) {
    throw new CalculatorError(
      'InvalidArgument',
      `Expected profit for order ${orders[invalid]} is not a finite number: ${expectedProfits[invalid]}`,
      { order: orders[invalid], expectedProfit: expectedProfits[invalid] }
    );
  }

  let best: OptimalDecision = { order: orders[0], expectedProfit: -Infinity };
  for (const [index, expectedProfit] of expectedProfits.entries()) {
    if (expectedProfit > best.expectedProfit) {
      best = { order: orders[index], expectedProfit };
    }
  }
  return best;
}
