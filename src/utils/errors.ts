import { formatHttpError, isAuthFailure } from './http';

/**
 * The server could not be reached, timed out, or answered with a non-auth error.
 */
export class TransportError extends Error {
  readonly kind = 'transport' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The server rejected the configured API key (401/403).
 */
export class AuthError extends Error {
  readonly kind = 'auth' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/**
 * The server answered, but the body does not have the expected shape.
 */
export class MalformedResponseError extends Error {
  readonly kind = 'malformed' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}

export type ClientError = TransportError | AuthError | MalformedResponseError;

export function isClientErrorInstance(error: unknown): error is ClientError {
  return (
    error instanceof TransportError ||
    error instanceof AuthError ||
    error instanceof MalformedResponseError
  );
}

/**
 * Map anything thrown by axios (or elsewhere) onto the client error taxonomy.
 */
export function toClientError(error: unknown, context: string): ClientError {
  if (isClientErrorInstance(error)) {
    return error;
  }

  const message = `${context}: ${formatHttpError(error)}`;
  if (isAuthFailure(error)) {
    return new AuthError(message, { cause: error });
  }
  return new TransportError(message, { cause: error });
}
