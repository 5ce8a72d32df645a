import axios from 'axios';
import type {
  AxiosInstance,
  AxiosRequestConfig,
  AxiosError,
  InternalAxiosRequestConfig,
} from 'axios';
import https from 'https';
import { createLogger } from '../core/Logger';
import type { HttpClientConfig, RetryConfig } from '../types/http.types';

const logger = createLogger('HTTP');

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  retries: 2,
  retryDelay: 500,
  retryOn: [408, 429, 500, 502, 503, 504],
  retryMethods: ['get'],
};

/**
 * Create an HTTP client with retry logic and error handling
 */
export function createHttpClient(config: HttpClientConfig): AxiosInstance {
  const retryConfig: RetryConfig = {
    retries: config.retries ?? DEFAULT_RETRY_CONFIG.retries,
    retryDelay: config.retryDelay ?? DEFAULT_RETRY_CONFIG.retryDelay,
    retryOn: config.retryOn ?? DEFAULT_RETRY_CONFIG.retryOn,
    retryMethods: config.retryMethods ?? DEFAULT_RETRY_CONFIG.retryMethods,
  };

  const axiosConfig: AxiosRequestConfig = {
    baseURL: config.baseURL,
    timeout: config.timeout ?? 30000,
    headers: config.headers ?? {},
  };

  // Handle SSL verification
  if (config.verifySsl === false) {
    axiosConfig.httpsAgent = new https.Agent({
      rejectUnauthorized: false,
    });
  }

  const client = axios.create(axiosConfig);

  addRetryInterceptor(client, retryConfig);
  addLoggingInterceptor(client);

  return client;
}

/**
 * Add retry logic to an Axios instance.
 * Only methods listed in `retryMethods` are retried.
 */
function addRetryInterceptor(client: AxiosInstance, retryConfig: RetryConfig): void {
  client.interceptors.response.use(
    (response) => response,
    async (error: AxiosError) => {
      // The count rides on the config, which axios copies into the retried request
      const config = error.config as (InternalAxiosRequestConfig & { _retryCount?: number }) | undefined;

      if (!config) {
        return Promise.reject(error);
      }

      const method = (config.method ?? 'get').toLowerCase();
      if (!retryConfig.retryMethods.includes(method)) {
        return Promise.reject(error);
      }

      const attempts = config._retryCount ?? 0;

      const statusCode = error.response?.status;
      const shouldRetry =
        attempts < retryConfig.retries &&
        (statusCode === undefined || retryConfig.retryOn.includes(statusCode));

      if (!shouldRetry) {
        return Promise.reject(error);
      }

      const attempt = attempts + 1;
      config._retryCount = attempt;

      // Exponential backoff
      const delay = retryConfig.retryDelay * Math.pow(2, attempt - 1);

      logger.debug(
        `Retrying request to ${config.url} (attempt ${attempt}/${retryConfig.retries}) after ${delay}ms`
      );

      await sleep(delay);

      return client.request(config);
    }
  );
}

/**
 * Add request/response logging interceptor
 */
function addLoggingInterceptor(client: AxiosInstance): void {
  client.interceptors.request.use(
    (config) => {
      logger.debug(`${config.method?.toUpperCase()} ${config.baseURL}${config.url}`);
      return config;
    },
    (error: unknown) => {
      logger.error(`Request error: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return Promise.reject(error);
    }
  );

  client.interceptors.response.use(
    (response) => {
      logger.debug(
        `${response.config.method?.toUpperCase()} ${response.config.url} - ${response.status}`
      );
      return response;
    },
    (error: AxiosError) => {
      if (error.response) {
        logger.debug(
          `${error.config?.method?.toUpperCase()} ${error.config?.url} - ${error.response.status}`
        );
      } else if (error.request) {
        logger.debug(`${error.config?.method?.toUpperCase()} ${error.config?.url} - No response`);
      }
      return Promise.reject(error);
    }
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Format an Axios error for logging
 */
export function formatHttpError(error: unknown): string {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error.message : 'Unknown error';
  }

  if (error.response) {
    const status = error.response.status;
    const statusText = error.response.statusText;
    const url = error.config?.url || 'unknown';
    const data: unknown = error.response.data;

    let message = `HTTP ${status} ${statusText} for ${url}`;

    // Try to extract error message from response body
    if (data && typeof data === 'object') {
      if ('message' in data && data.message) {
        message += `: ${String(data.message)}`;
      } else if ('error' in data && data.error) {
        message += `: ${String(data.error)}`;
      }
    } else if (typeof data === 'string' && data.length > 0 && data.length < 200) {
      message += `: ${data}`;
    }

    return message;
  } else if (error.request) {
    const url = error.config?.url || 'unknown';
    if (error.code === 'ECONNREFUSED') {
      return `Connection refused to ${url}`;
    } else if (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') {
      return `Request timed out for ${url}`;
    } else if (error.code === 'ENOTFOUND') {
      return `Host not found for ${url}`;
    }
    return `No response received from ${url}: ${error.code || error.message}`;
  }

  return error.message;
}

/**
 * Check if an error is a specific HTTP status code
 */
export function isHttpStatus(error: unknown, status: number): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  return error.response?.status === status;
}

/**
 * Check if an error means the credentials were rejected (401/403)
 */
export function isAuthFailure(error: unknown): boolean {
  return isHttpStatus(error, 401) || isHttpStatus(error, 403);
}
