/**
 * Health and status types
 */

import type { ServerStatus } from './sensor.types';

/**
 * Overall health status of the bridge
 */
export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

/**
 * Public scheduler status
 */
export interface SchedulerStatus {
  name: string;
  intervalSeconds: number;
  isRunning: boolean;
  lastRunAt?: Date;
  lastError?: string;
  consecutiveErrors: number;
}

/**
 * Polling coordinator status
 */
export interface PollingStatus {
  isRunning: boolean;
  tick: number;
  consecutiveFailures: number;
  nextDelayMs: number;
  lastSuccessAt?: Date;
  lastError?: string;
}

/**
 * Health check response for GET /health
 */
export interface HealthResponse {
  status: HealthStatus;
  server: ServerStatus;
  version: string;
  uptime: number;
  timestamp: Date;
}

/**
 * Status response for GET /status
 */
export interface StatusResponse {
  status: HealthStatus;
  version: string;
  uptime: number;
  timestamp: Date;
  polling: PollingStatus;
  stats: {
    entities: number;
    activeEntities: number;
  };
  schedulers: SchedulerStatus[];
}
