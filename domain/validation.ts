/**
 * Validation helpers.
 */

import { ValidationError, type ErrorMetadata } from "./errors.js";

/** Throws ValidationError if condition is falsy. TypeScript narrows after a successful call. */
export function assert(
  condition: unknown,
  message: string,
  metadata?: ErrorMetadata
): asserts condition {
  if (!condition) {
    throw new ValidationError(message, metadata);
  }
}
