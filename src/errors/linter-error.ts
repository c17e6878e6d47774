import { USAGE_MESSAGE, type LinterErrorKind } from "./types.js";

export class LinterError extends Error {
  readonly kind: LinterErrorKind;

  constructor(kind: LinterErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LinterError";
    this.kind = kind;
  }
}

export function usageError(): LinterError {
  return new LinterError("usage", USAGE_MESSAGE);
}

export function configurationError(message: string): LinterError {
  return new LinterError("configuration", message);
}

export function collaboratorError(
  message: string,
  cause?: unknown,
): LinterError {
  return new LinterError("collaborator", message, { cause });
}

export function arithmeticError(message: string): LinterError {
  return new LinterError("arithmetic", message);
}

/**
 * Anything thrown by the model loader, rule source or analyzer that is not
 * already classified is treated as a collaborator failure.
 */
export function toLinterError(error: unknown): LinterError {
  if (error instanceof LinterError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return collaboratorError(message, error);
}

/**
 * Single-line rendering shown to the user. Stack traces are never printed.
 */
export function renderError(error: LinterError): string {
  if (error.kind === "usage") {
    return error.message;
  }
  return `An error occurred: ${error.message}`;
}
