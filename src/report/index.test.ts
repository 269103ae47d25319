import { describe, expect, it } from 'vitest';

import type { Scenario } from '../models/types.js';
import { DEFAULT_PRICING } from '../config.js';
import { calculate } from '../services/calculationService.js';
import { renderReport } from './index.js';

const scenario: Scenario = {
  orders: [100, 300],
  demands: [100, 200],
  probabilities: [0.5, 0.5],
  pricing: DEFAULT_PRICING,
  requireNormalizedProbabilities: false
};

describe('renderReport', () => {
  const result = calculate(scenario);

  it('writes one csv record per cell', () => {
    expect(renderReport(result, 'csv').split('\n')).toEqual([
      'order,demand,probability,profit,expectedValue',
      '100,100,0.5,2400000,1200000',
      '100,200,0.5,2400000,1200000',
      '300,100,0.5,400000,200000',
      '300,200,0.5,3800000,1900000',
      ''
    ]);
  });

  it('writes grids as nested arrays in json', () => {
    const parsed: unknown = JSON.parse(renderReport(result, 'json'));
    expect(parsed).toEqual({
      scenario,
      profitMatrix: [
        [2_400_000, 2_400_000],
        [400_000, 3_800_000]
      ],
      expectedValues: [
        [1_200_000, 1_200_000],
        [200_000, 1_900_000]
      ],
      expectedProfits: [2_400_000, 2_100_000],
      optimal: { order: 100, expectedProfit: 2_400_000 },
      probabilityTotal: 1
    });
  });

  it('starts the text report with the profit matrix', () => {
    expect(renderReport(result, 'text').split('\n')[0]).toBe('Profit Matrix');
  });
});
