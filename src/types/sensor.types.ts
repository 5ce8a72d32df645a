/**
 * Sensor types
 */

export type ServerStatus = 'unknown' | 'online' | 'offline' | 'auth_failed';

export type SensorKey =
  | 'server_status'
  | 'active_sessions'
  | 'upcoming_media'
  | 'movies'
  | 'shows'
  | 'episodes'
  | 'music';

export interface SensorDefinition {
  key: SensorKey;
  name: string;
  icon: string;
  unit: string | null;
}

export type SensorValue = string | number | null;

export interface SensorState extends SensorDefinition {
  value: SensorValue;
  attributes: Record<string, unknown>;
  updatedAt: Date | null;
}

/**
 * A sensor exposes one or more states built from its last API response.
 */
export interface SensorAdapter {
  readonly name: string;
  getStates(): SensorState[];
}
