/**
 * Jellyfin client configuration and request types
 */

export type {
  RawSession,
  RawNowPlayingItem,
  RawPlayState,
  SystemInfo,
  ItemCounts,
  RawLibraryItem,
} from '../jellyfin/schemas';

// Configuration
export interface JellyfinClientConfig {
  host: string;
  port: number;
  useSsl: boolean;
  verifySsl: boolean;
  apiKey: string;
  timeoutMs: number;
}

/**
 * Commands accepted by POST /Sessions/{id}/Playing/{command}
 */
export type PlaystateCommand =
  | 'PlayPause'
  | 'Pause'
  | 'Unpause'
  | 'Stop'
  | 'Seek'
  | 'NextTrack'
  | 'PreviousTrack';

/**
 * General commands sent through POST /Sessions/{id}/Command
 */
export type GeneralCommandName = 'SetVolume' | 'Mute' | 'Unmute';

export interface GeneralCommand {
  Name: GeneralCommandName;
  Arguments?: Record<string, string>;
}

/**
 * Item types listed by the latest-media sensors
 */
export type LatestItemType = 'Movie' | 'Episode' | 'Audio';

export type ImageType = 'Primary' | 'Backdrop' | 'Thumb' | 'Logo';

export interface SessionMessage {
  text: string;
  header: string;
  timeoutMs: number;
}
