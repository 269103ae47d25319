import { DEFAULT_PRICING } from '../config.js';
import type { Pricing } from '../models/types.js';
import { CalculatorError } from '../utils/errors.js';

function assertQuantity(name: 'order' | 'demand', value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new CalculatorError('InvalidArgument', `${name} must be a non-negative integer, got ${value}`, {
      [name]: value
    });
  }
}

/**
 * Profit of stocking `order` units when `demand` units are wanted. Units up to
 * demand sell at the primary price, surplus is cleared at the secondary price,
 * and every ordered unit is paid for.
 */
export function profit(order: number, demand: number, pricing: Pricing = DEFAULT_PRICING): number {
  assertQuantity('order', order);
  assertQuantity('demand', demand);

  const sold = Math.min(order, demand);
  const leftover = Math.max(0, order - demand);
  return pricing.primaryPrice * sold + pricing.secondaryPrice * leftover - pricing.costPerUnit * order;
}
