import { parseArgs } from 'node:util';

import { z } from 'zod';

import { parseScenario, type ScenarioInput } from './config.js';
import type { ReportFormat, Scenario } from './models/types.js';
import { CalculatorError } from './utils/errors.js';

export const USAGE = `Usage: newsvendor [options]

Options:
  --orders <list>          candidate order quantities, e.g. 100,150,200
  --demands <list>         demand scenarios, one per probability
  --probabilities <list>   probability of each demand scenario
  --primary-price <n>      price of units sold against demand
  --secondary-price <n>    clearance price of surplus units
  --cost <n>               procurement cost per ordered unit
  --format <fmt>           text, csv or json (default: text)
  --require-normalized     reject probabilities that do not sum to 1
  -h, --help               show this help
`;

export type CliOptions =
  | { help: true }
  | {
      help: false;
      scenario: Scenario;
      format: ReportFormat;
    };

const formatSchema = z.enum(['text', 'csv', 'json']);

// An empty item becomes NaN so validation reports it instead of dropping it.
function parseList(value: string): number[] {
  if (value.trim().length === 0) {
    return [];
  }
  return value.split(',').map((item) => (item.trim().length === 0 ? Number.NaN : Number(item)));
}

function parseNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        orders: { type: 'string' },
        demands: { type: 'string' },
        probabilities: { type: 'string' },
        'primary-price': { type: 'string' },
        'secondary-price': { type: 'string' },
        cost: { type: 'string' },
        format: { type: 'string', default: 'text' },
        'require-normalized': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false }
      },
      strict: true,
      allowPositionals: false
    }).values;
  } catch (error) {
    throw new CalculatorError('InvalidArgument', error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readArgs(argv);
  if (values.help === true) {
    return { help: true };
  }

  const format = formatSchema.safeParse(values.format);
  if (!format.success) {
    throw new CalculatorError('InvalidArgument', `Unknown report format "${values.format}"`, {
      issues: format.error.issues
    });
  }

  const input: ScenarioInput = {
    orders: values.orders === undefined ? undefined : parseList(values.orders),
    demands: values.demands === undefined ? undefined : parseList(values.demands),
    probabilities: values.probabilities === undefined ? undefined : parseList(values.probabilities),
    pricing: {
      primaryPrice: parseNumber(values['primary-price']),
      secondaryPrice: parseNumber(values['secondary-price']),
      costPerUnit: parseNumber(values.cost)
    },
    requireNormalizedProbabilities: values['require-normalized'] === true
  };

  return {
    help: false,
    scenario: parseScenario(input),
    format: format.data
  };
}
