/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  baseURL: string;
  timeout?: number;
  verifySsl?: boolean;
  headers?: Record<string, string>;
  retries?: number;
  retryDelay?: number;
  retryOn?: number[];
  retryMethods?: string[];
}

/**
 * Retry configuration for HTTP requests
 */
export interface RetryConfig {
  retries: number;
  retryDelay: number;
  retryOn: number[];
  /** Lowercase HTTP methods that may be replayed */
  retryMethods: string[];
}
