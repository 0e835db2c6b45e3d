import type { DomainError, InfraError } from "./types/domain-error.js";

export abstract class SessionError extends Error implements DomainError {
  abstract readonly code: string;
  readonly details?: Record<string, unknown>;

  protected constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

/**
 * Raised by `getRequiredAttribute` when the session holds no value under the name.
 */
export class MissingAttributeError extends SessionError {
  readonly code = "session.missing_attribute";

  constructor(readonly attributeName: string) {
    super(`Required attribute '${attributeName}' is missing.`, { attributeName });
  }
}

export class NotSerializableError extends SessionError {
  readonly code = "session.not_serializable";

  constructor(
    message: string,
    readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, { path }, options);
  }
}

/**
 * A backend fault: connection loss, timeout, driver error. Never means "not found".
 */
export class StorageUnavailableError extends SessionError implements InfraError {
  readonly code = "session.storage_unavailable";
  readonly retryable = true;

  constructor(
    readonly operation: string,
    cause: unknown,
    details?: Record<string, unknown>,
  ) {
    super(
      `Session storage unavailable during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { ...details, operation },
      { cause },
    );
  }
}

export class InvalidArgumentError extends SessionError {
  readonly code = "session.invalid_argument";

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}

export const isSessionError = (error: unknown): error is SessionError => error instanceof SessionError;

/**
 * Wraps a backend failure, passing through errors the session layer raised itself.
 */
export const toStorageUnavailable = (
  operation: string,
  error: unknown,
  details?: Record<string, unknown>,
): SessionError => (isSessionError(error) ? error : new StorageUnavailableError(operation, error, details));
