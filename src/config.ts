import { z } from 'zod';

import type { Pricing, Scenario } from './models/types.js';
import { CalculatorError } from './utils/errors.js';

export const DEFAULT_PRICING: Pricing = {
  primaryPrice: 49_000,
  secondaryPrice: 15_000,
  costPerUnit: 25_000
};

export const DEFAULT_SCENARIO: Scenario = {
  orders: [100, 150, 200, 250, 300],
  demands: [100, 150, 200, 250, 300],
  probabilities: [0.1, 0.15, 0.25, 0.3, 0.2],
  pricing: DEFAULT_PRICING,
  requireNormalizedProbabilities: false
};

// Allowed drift of the probability total from 1 before it counts as non-normalized.
export const PROBABILITY_TOLERANCE = 1e-9;

const quantitySchema = z.number().int().nonnegative();

export const pricingSchema = z.object({
  primaryPrice: z.number().positive().default(DEFAULT_PRICING.primaryPrice),
  secondaryPrice: z.number().positive().default(DEFAULT_PRICING.secondaryPrice),
  costPerUnit: z.number().positive().default(DEFAULT_PRICING.costPerUnit)
});

export const scenarioSchema = z.object({
  orders: z.array(quantitySchema).default(() => [...DEFAULT_SCENARIO.orders]),
  demands: z.array(quantitySchema).default(() => [...DEFAULT_SCENARIO.demands]),
  probabilities: z.array(z.number().min(0).max(1)).default(() => [...DEFAULT_SCENARIO.probabilities]),
  pricing: pricingSchema.default({}),
  requireNormalizedProbabilities: z.boolean().default(false)
});

export type ScenarioInput = z.input<typeof scenarioSchema>;

export function parseScenario(input: unknown): Scenario {
  const parseResult = scenarioSchema.safeParse(input);
  if (!parseResult.success) {
    throw new CalculatorError('InvalidArgument', 'Invalid scenario', { issues: parseResult.error.issues });
  }
  return parseResult.data;
}
