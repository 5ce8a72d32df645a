// HTTP utilities
export {
  createHttpClient,
  formatHttpError,
  isHttpStatus,
  isAuthFailure,
} from './http';

// Client errors
export {
  TransportError,
  AuthError,
  MalformedResponseError,
  isClientErrorInstance,
  toClientError,
} from './errors';

// Re-export types
export type { ClientError } from './errors';
export type { HttpClientConfig, RetryConfig } from '../types/http.types';
