import { AuthError } from '../utils/errors';
import { SENSOR_DEFINITIONS } from './definitions';
import type { SystemInfo } from '../types/jellyfin.types';
import type { SensorAdapter, SensorState, ServerStatus } from '../types/sensor.types';

export interface ServerAttributes {
  server_name: string | null;
  server_id: string | null;
  version: string | null;
  operating_system: string | null;
}

export function toServerAttributes(info: SystemInfo): ServerAttributes {
  return {
    server_name: info.ServerName || null,
    server_id: info.Id || null,
    version: info.Version || null,
    operating_system: info.OperatingSystemDisplayName ?? info.OperatingSystem ?? null,
  };
}

export function toServerStatus(error: unknown): ServerStatus {
  return error instanceof AuthError ? 'auth_failed' : 'offline';
}

/**
 * Reachability of the Jellyfin server. Poll failures surface here and only
 * here; playback entities keep their last state.
 */
export class ServerStatusSensor implements SensorAdapter {
  readonly name = 'ServerStatus';

  private status: ServerStatus = 'unknown';
  private server: ServerAttributes = {
    server_name: null,
    server_id: null,
    version: null,
    operating_system: null,
  };
  private lastError: string | null = null;
  private consecutiveFailures = 0;
  private updatedAt: Date | null = null;

  recordSuccess(): void {
    this.status = 'online';
    this.lastError = null;
    this.consecutiveFailures = 0;
    this.updatedAt = new Date();
  }

  recordSystemInfo(info: SystemInfo): void {
    this.server = toServerAttributes(info);
    this.recordSuccess();
  }

  recordFailure(error: unknown): void {
    this.status = toServerStatus(error);
    this.lastError = error instanceof Error ? error.message : String(error);
    this.consecutiveFailures++;
    this.updatedAt = new Date();
  }

  getStatus(): ServerStatus {
    return this.status;
  }

  getServerName(): string | null {
    return this.server.server_name;
  }

  getStates(): SensorState[] {
    return [
      {
        ...SENSOR_DEFINITIONS.server_status,
        value: this.status,
        attributes: {
          ...this.server,
          last_error: this.lastError,
          consecutive_failures: this.consecutiveFailures,
        },
        updatedAt: this.updatedAt,
      },
    ];
  }
}
