/**
 * Error types
 *
 * One class per failure category. Commands let these propagate to the CLI
 * entry point, which prints the message and exits non-zero.
 */

export class OrderkitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing credentials or an invalid configuration file. Raised before any network call. */
export class ConfigurationError extends OrderkitError {}

/** DNS/connect/timeout failures and non-success HTTP statuses. */
export class TransportError extends OrderkitError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export interface UserError {
  field?: string[] | null;
  message: string;
}

/** GraphQL `errors`, mutation `userErrors`, or REST `errors` bodies. */
export class RemoteApplicationError extends OrderkitError {
  readonly details: string[];

  constructor(operation: string, details: string[]) {
    super(`${operation} failed: ${details.join('; ')}`);
    this.details = details;
  }

  static fromUserErrors(operation: string, userErrors: UserError[]): RemoteApplicationError {
    return new RemoteApplicationError(
      operation,
      userErrors.map((e) => (e.field && e.field.length > 0 ? `${e.field.join('.')}: ${e.message}` : e.message)),
    );
  }
}

/** A response that lacks a field the caller relies on. */
export class ResponseShapeError extends OrderkitError {}

/** Unreadable or invalid local input file. */
export class InputError extends OrderkitError {}

/**
 * Throws when a mutation payload carries user errors.
 */
export function assertNoUserErrors(operation: string, userErrors: UserError[] | undefined | null): void {
  if (userErrors && userErrors.length > 0) {
    throw RemoteApplicationError.fromUserErrors(operation, userErrors);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
