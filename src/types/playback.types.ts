/**
 * Normalized playback state and entity records
 */

export type MediaType = 'Movie' | 'Episode' | 'Audio' | 'Other';

/**
 * Flattened, platform-agnostic view of one session.
 * Optional values are `null` rather than missing so two states compare by value.
 */
export interface PlaybackState {
  entityKey: string;
  sessionId: string;
  userName: string;
  client: string;
  deviceName: string;
  deviceId: string;
  isPlaying: boolean;
  positionSeconds: number;
  durationSeconds: number;
  volumePercent: number;
  isMuted: boolean;
  mediaType: MediaType | null;
  title: string;
  seriesName: string | null;
  seasonNumber: number | null;
  episodeNumber: number | null;
  productionYear: number | null;
  communityRating: number | null;
  officialRating: string | null;
  artist: string | null;
  albumName: string | null;
  artworkUrl: string | null;
  capabilityMask: number;
}

/**
 * Entity was seen at least once but has no active session this poll.
 */
export interface IdleState {
  readonly status: 'idle';
}

export const IDLE: IdleState = Object.freeze({ status: 'idle' });

export type EntityState = PlaybackState | IdleState;

export interface EntityRecord {
  entityKey: string;
  /** User name from the last active sighting */
  userName: string;
  createdAtTick: number;
  /** Tick of the last poll in which the user had an active session */
  lastSeenPollTick: number;
  currentState: EntityState;
  previousSessionId: string | null;
}

export type EntityUpdateType = 'create' | 'update';

export interface EntityUpdate {
  type: EntityUpdateType;
  entityKey: string;
  record: Readonly<EntityRecord>;
}

export interface ReconcileResult {
  tick: number;
  updates: EntityUpdate[];
  /** Records dropped as malformed (no user id or no session id) */
  skipped: number;
  /** Session ids hidden by the one-entity-per-user policy */
  displaced: string[];
}

export function isIdle(state: EntityState): state is IdleState {
  return 'status' in state && state.status === 'idle';
}
