/**
 * Error bodies returned by the HTTP layer.
 *
 * Every failing response carries `{ error: { code, message, details? } }`.
 * `code` is one of the HTTP layer's own codes, or the `code` of the domain
 * error (NO_LOCKER, ARITHMETIC_UNDERFLOW, ...) that reached the handler.
 */

import type { ZodError } from "zod";

export type HttpErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

/** One failed input field, addressed by its dotted path. */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export interface ErrorBody {
  readonly code: HttpErrorCode | (string & {});
  readonly message: string;
  readonly details?: { readonly issues: readonly ValidationIssue[] };
}

export interface ErrorResponse {
  readonly error: ErrorBody;
}

export function errorResponse(code: ErrorBody["code"], message: string): ErrorResponse {
  return { error: { code, message } };
}

/**
 * VALIDATION_ERROR response. With a zod error, lists its issues.
 */
export function validationError(message: string, cause?: ZodError): ErrorResponse {
  if (cause === undefined) {
    return errorResponse("VALIDATION_ERROR", message);
  }
  const issues = cause.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  return { error: { code: "VALIDATION_ERROR", message, details: { issues } } };
}
