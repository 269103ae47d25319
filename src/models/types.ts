import type { Grid } from '../utils/grid.js';

export type Pricing = {
  primaryPrice: number;
  secondaryPrice: number;
  costPerUnit: number;
};

export type Scenario = {
  orders: number[];
  demands: number[];
  probabilities: number[];
  pricing: Pricing;
  requireNormalizedProbabilities: boolean;
};

export type OptimalDecision = {
  order: number;
  expectedProfit: number;
};

export type CalculationResult = {
  scenario: Scenario;
  profitMatrix: Grid;
  expectedValues: Grid;
  expectedProfits: number[];
  optimal: OptimalDecision;
  probabilityTotal: number;
};

export type ReportFormat = 'text' | 'csv' | 'json';
