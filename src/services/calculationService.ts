import { PROBABILITY_TOLERANCE } from '../config.js';
import type { CalculationResult, Scenario } from '../models/types.js';
import { CalculatorError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { probabilityTotal, reduceRows, weight } from './expectation.js';
import { optimize } from './optimizer.js';
import { buildProfitMatrix } from './profitMatrix.js';

function checkProbabilityTotal(scenario: Scenario): number {
  const total = probabilityTotal(scenario.probabilities);
  if (Math.abs(total - 1) <= PROBABILITY_TOLERANCE) {
    return total;
  }
  if (scenario.requireNormalizedProbabilities) {
    throw new CalculatorError('InvalidArgument', `Probabilities must sum to 1, got ${total}`, { total });
  }
  logger.warn({ total }, 'Probabilities do not sum to 1; expected profits are weighted sums');
  return total;
}

export function calculate(scenario: Scenario): CalculationResult {
  const total = checkProbabilityTotal(scenario);

  const profitMatrix = buildProfitMatrix(scenario.orders, scenario.demands, scenario.pricing);
  const expectedValues = weight(profitMatrix, scenario.probabilities);
  const expectedProfits = reduceRows(expectedValues);
  const optimal = optimize(scenario.orders, expectedProfits);

  logger.debug(
    { order: optimal.order, expectedProfit: optimal.expectedProfit, candidates: scenario.orders.length },
    'Selected optimal order quantity'
  );

  return {
    scenario,
    profitMatrix,
    expectedValues,
    expectedProfits,
    optimal,
    probabilityTotal: total
  } satisfies CalculationResult;
}
