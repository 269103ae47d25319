export type CalculatorErrorKind = 'InvalidArgument' | 'DimensionMismatch' | 'EmptyInput';

export class CalculatorError extends Error {
  readonly kind: CalculatorErrorKind;
  readonly details: Record<string, unknown>;

  constructor(kind: CalculatorErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'CalculatorError';
    this.kind = kind;
    this.details = details;
  }
}

export function isCalculatorError(error: unknown): error is CalculatorError {
  return error instanceof CalculatorError;
}
