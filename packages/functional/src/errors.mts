/**
 * Error classes thrown by the library itself.
 *
 * Errors raised by user-supplied functions are never wrapped in these;
 * they reach the caller exactly as thrown.
 */

/**
 * Base class for every error the library raises on its own behalf
 */
export class FunctionalError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "FunctionalError";

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown by `partial` when no arity was passed and `fn.length` reports none
 */
export class ArityResolutionError extends FunctionalError {
  constructor(public readonly functionName: string) {
    super(
      `partial: cannot determine the arity of ${functionName || "an anonymous function"}. ` +
        "This happens when:\n" +
        "  1. the function only takes a rest parameter (...args)\n" +
        "  2. every parameter has a default value or is destructured with one, which `length` does not count\n" +
        "  3. the function is native, bound or proxied and reports a length of 0\n" +
        "Pass the 'arity' argument explicitly, or use curry2..curry8 instead.",
      "ARITY_UNRESOLVED",
      { functionName },
    );
    this.name = "ArityResolutionError";
  }
}

/**
 * Thrown by `partial` when the explicit arity is not a non-negative integer
 */
export class InvalidArityError extends FunctionalError {
  constructor(public readonly arity: number) {
    super(
      `partial: arity must be a non-negative integer, got ${arity}`,
      "INVALID_ARITY",
      { arity },
    );
    this.name = "InvalidArityError";
  }
}

/**
 * Thrown by list operations that have no result for an empty array
 */
export class EmptyListError extends FunctionalError {
  constructor(public readonly operation: string) {
    super(`${operation}: empty list`, "EMPTY_LIST", { operation });
    this.name = "EmptyListError";
  }
}

export const isFunctionalError = (error: unknown): error is FunctionalError =>
  error instanceof FunctionalError;
