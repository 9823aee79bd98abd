/**
 * JSON bodies for everything that is not the page: unknown paths,
 * wrong methods, handler crashes.
 */

export type ErrorCode = "NOT_FOUND" | "METHOD_NOT_ALLOWED" | "INTERNAL_ERROR";

/** Status line sent with each code. */
export const ERROR_STATUS = {
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  INTERNAL_ERROR: 500,
} as const satisfies Record<ErrorCode, number>;

export interface ApiErrorPayload {
  readonly error: {
    readonly code: ErrorCode;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}

export function apiError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ApiErrorPayload {
  return { error: { code, message, ...(details != null && { details }) } };
}
