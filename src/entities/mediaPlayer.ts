import { listCapabilities } from '../engine/capabilities';
import type { CapabilityName } from '../engine/capabilities';
import { isIdle } from '../types/playback.types';
import type { EntityRecord, MediaType, PlaybackState } from '../types/playback.types';

export type MediaPlayerState = 'playing' | 'paused' | 'idle';

export type MediaPlayerFeature =
  | 'PLAY'
  | 'PAUSE'
  | 'STOP'
  | 'NEXT_TRACK'
  | 'PREVIOUS_TRACK'
  | 'SEEK'
  | 'VOLUME_SET'
  | 'VOLUME_MUTE';

const FEATURES: Record<CapabilityName, MediaPlayerFeature[]> = {
  CanSeek: ['SEEK'],
  CanPause: ['PLAY', 'PAUSE'],
  CanSetVolume: ['VOLUME_SET'],
  CanSkipNext: ['NEXT_TRACK'],
  CanSkipPrevious: ['PREVIOUS_TRACK'],
  CanStop: ['STOP'],
  CanMute: ['VOLUME_MUTE'],
};

const CONTENT_TYPES: Record<MediaType, string> = {
  Movie: 'movie',
  Episode: 'tvshow',
  Audio: 'music',
  Other: 'video',
};

export interface MediaPlayerAttributes {
  // Platform attributes
  media_title: string | null;
  media_content_type: string | null;
  media_duration: number | null;
  media_position: number | null;
  volume_level: number | null;
  is_volume_muted: boolean | null;
  media_series_title: string | null;
  media_season: number | null;
  media_episode: number | null;
  media_artist: string | null;
  media_album_name: string | null;
  entity_picture: string | null;
  supported_features: MediaPlayerFeature[];
  // Extension attributes
  session_id: string | null;
  previous_session_id: string | null;
  client: string | null;
  device_name: string | null;
  user_name: string;
  media_type: MediaType | null;
  production_year: number | null;
  community_rating: number | null;
  official_rating: string | null;
  series_name: string | null;
  season_number: number | null;
  episode_number: number | null;
}

export interface MediaPlayerView {
  entity_key: string;
  name: string;
  state: MediaPlayerState;
  attributes: MediaPlayerAttributes;
  last_seen_poll: number;
}

export function toSupportedFeatures(mask: number): MediaPlayerFeature[] {
  return listCapabilities(mask).flatMap((name) => FEATURES[name]);
}

function toPlayerState(state: PlaybackState): MediaPlayerState {
  if (state.isPlaying) {
    return 'playing';
  }
  return state.mediaType === null ? 'idle' : 'paused';
}

function emptyAttributes(record: Readonly<EntityRecord>): MediaPlayerAttributes {
  return {
    media_title: null,
    media_content_type: null,
    media_duration: null,
    media_position: null,
    volume_level: null,
    is_volume_muted: null,
    media_series_title: null,
    media_season: null,
    media_episode: null,
    media_artist: null,
    media_album_name: null,
    entity_picture: null,
    supported_features: [],
    session_id: null,
    previous_session_id: record.previousSessionId,
    client: null,
    device_name: null,
    user_name: record.userName,
    media_type: null,
    production_year: null,
    community_rating: null,
    official_rating: null,
    series_name: null,
    season_number: null,
    episode_number: null,
  };
}

/**
 * Media player representation of an entity record.
 */
export function toMediaPlayerView(record: Readonly<EntityRecord>): MediaPlayerView {
  const name = record.userName || record.entityKey;
  const base = {
    entity_key: record.entityKey,
    name,
    last_seen_poll: record.lastSeenPollTick,
  };

  const state = record.currentState;
  if (isIdle(state)) {
    return { ...base, state: 'idle', attributes: emptyAttributes(record) };
  }

  const hasMedia = state.mediaType !== null;
  return {
    ...base,
    state: toPlayerState(state),
    attributes: {
      media_title: state.title || null,
      media_content_type: state.mediaType ? CONTENT_TYPES[state.mediaType] : null,
      media_duration: hasMedia ? state.durationSeconds : null,
      media_position: hasMedia ? state.positionSeconds : null,
      volume_level: state.volumePercent / 100,
      is_volume_muted: state.isMuted,
      media_series_title: state.seriesName,
      media_season: state.seasonNumber,
      media_episode: state.episodeNumber,
      media_artist: state.artist,
      media_album_name: state.albumName,
      entity_picture: state.artworkUrl,
      supported_features: toSupportedFeatures(state.capabilityMask),
      session_id: state.sessionId,
      previous_session_id: record.previousSessionId,
      client: state.client || null,
      device_name: state.deviceName || null,
      user_name: state.userName || record.userName,
      media_type: state.mediaType,
      production_year: state.productionYear,
      community_rating: state.communityRating,
      official_rating: state.officialRating,
      series_name: state.seriesName,
      season_number: state.seasonNumber,
      episode_number: state.episodeNumber,
    },
  };
}
