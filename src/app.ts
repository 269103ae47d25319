import { parseCliArgs, USAGE } from './cli.js';
import { renderReport } from './report/index.js';
import { calculate } from './services/calculationService.js';
import { isCalculatorError } from './utils/errors.js';
import { logger } from './utils/logger.js';

export type Write = (text: string) => void;

/** Runs one calculation for the given arguments and returns the exit code. */
export function run(argv: string[], write: Write = (text) => process.stdout.write(text)): number {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      write(USAGE);
      return 0;
    }

    const result = calculate(options.scenario);
    write(renderReport(result, options.format));
    return 0;
  } catch (err) {
    if (isCalculatorError(err)) {
      logger.fatal({ kind: err.kind, details: err.details }, err.message);
    } else {
      logger.fatal({ err }, 'Failed to run calculator');
    }
    return 1;
  }
}
