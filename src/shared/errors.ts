export type MatchingErrorCode =
  | "validation_error"
  | "not_found"
  | "unavailable";

export abstract class MatchingError extends Error {
  abstract readonly code: MatchingErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends MatchingError {
  readonly code = "validation_error";

  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
  }
}

/**
 * A field required by an enabled filter is absent on the source document.
 * Reported with the validation class since the match cannot be evaluated.
 */
export class MissingFieldError extends ValidationError {
  constructor(readonly field: string, message?: string) {
    super(message ?? `Missing required field: ${field}`, [field]);
  }
}

export class NotFoundError extends MatchingError {
  readonly code = "not_found";
}

export class UnavailableError extends MatchingError {
  readonly code = "unavailable";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
