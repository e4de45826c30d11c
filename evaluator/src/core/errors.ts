import { DealType } from "./dto";

/**
 * Malformed or out-of-range input, raised before any arithmetic
 */
export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/**
 * A field the selected deal type requires was not supplied
 */
export class MissingFieldError extends Error {
  readonly field: string;
  readonly dealType: DealType;

  constructor(field: string, dealType: DealType) {
    super(`${field} is required for ${dealType} deals`);
    this.name = "MissingFieldError";
    this.field = field;
    this.dealType = dealType;
  }
}

export type EvaluationError = ValidationError | MissingFieldError;

export function isEvaluationError(error: unknown): error is EvaluationError {
  return error instanceof ValidationError || error instanceof MissingFieldError;
}
