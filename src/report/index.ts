import type { CalculationResult, ReportFormat } from '../models/types.js';
import { renderCsvReport } from './csv.js';
import { renderJsonReport } from './json.js';
import { renderTextReport } from './text.js';

const renderers: Record<ReportFormat, (result: CalculationResult) => string> = {
  text: renderTextReport,
  csv: renderCsvReport,
  json: renderJsonReport
};

export function renderReport(result: CalculationResult, format: ReportFormat): string {
  return renderers[format](result);
}
