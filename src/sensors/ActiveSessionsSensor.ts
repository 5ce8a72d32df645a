import { SENSOR_DEFINITIONS } from './definitions';
import type { RawSession } from '../types/jellyfin.types';
import type { SensorAdapter, SensorState } from '../types/sensor.types';

export interface ActiveSessionSummary {
  user_name: string;
  client: string;
  device_name: string;
  device_id: string;
  application_version: string;
  remote_end_point: string;
  supports_remote_control: boolean;
  last_activity_date: string;
  media_type: string | null;
  media_title: string | null;
  media_series: string | null;
}

export function toSessionSummary(session: RawSession): ActiveSessionSummary {
  const item = session.NowPlayingItem;
  return {
    user_name: session.UserName ?? 'Unknown',
    client: session.Client ?? 'Unknown',
    device_name: session.DeviceName ?? 'Unknown',
    device_id: session.DeviceId ?? '',
    application_version: session.ApplicationVersion ?? '',
    remote_end_point: session.RemoteEndPoint ?? '',
    supports_remote_control: session.SupportsRemoteControl ?? false,
    last_activity_date: session.LastActivityDate ?? '',
    media_type: item?.Type ?? null,
    media_title: item?.Name ?? null,
    media_series: item?.SeriesName ?? null,
  };
}

/**
 * Every session with something loaded, including ones displaced from the
 * per-user media player entities.
 */
export class ActiveSessionsSensor implements SensorAdapter {
  readonly name = 'ActiveSessions';

  private sessions: ActiveSessionSummary[] = [];
  private ids: string[] = [];
  private updatedAt: Date | null = null;

  update(activeSessions: readonly RawSession[]): void {
    this.sessions = activeSessions.map(toSessionSummary);
    this.ids = activeSessions.flatMap((session) => (session.Id ? [session.Id] : []));
    this.updatedAt = new Date();
  }

  /**
   * Ids of the sessions seen in the last successful poll.
   */
  getSessionIds(): string[] {
    return [...this.ids];
  }

  getStates(): SensorState[] {
    return [
      {
        ...SENSOR_DEFINITIONS.active_sessions,
        value: this.updatedAt ? this.sessions.length : null,
        attributes: {
          total_sessions: this.sessions.length,
          sessions: this.sessions,
        },
        updatedAt: this.updatedAt,
      },
    ];
  }
}
