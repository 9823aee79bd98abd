/**
 * Errors raised while configuring and starting the page server.
 * None of them can come out of a request; the handler has no failure mode of its own.
 */

/** Context carried alongside the message, e.g. the offending env value. */
export type ErrorMetadata = Record<string, unknown>;

export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.metadata = metadata;
    // Keeps instanceof working for subclasses when compiled down.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad HOST or PORT. */
export class ValidationError extends DomainError {}

/**
 * The listener could not bind (port taken, no permission for port 80).
 * `cause` is the system error from `listen`.
 */
export class StartupError extends DomainError {}

/** `Name: message` for a stderr line; anything that is not an Error is stringified. */
export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
