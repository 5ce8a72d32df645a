import { computeCapabilityMask } from './capabilities';
import type { RawNowPlayingItem, RawPlayState, RawSession } from '../types/jellyfin.types';
import type { MediaType, PlaybackState } from '../types/playback.types';

export const TICKS_PER_SECOND = 10_000_000;

export interface NormalizeOptions {
  /** Builds the artwork URL of an item from its id and Primary image tag */
  imageUrl?: (itemId: string, tag: string) => string;
}

/**
 * Server ticks to whole seconds, truncating like the server's own tick math.
 */
export function ticksToSeconds(ticks: number | undefined): number {
  if (ticks === undefined || !Number.isFinite(ticks) || ticks <= 0) {
    return 0;
  }
  return Math.trunc(ticks / TICKS_PER_SECOND);
}

export function secondsToTicks(seconds: number): number {
  return Math.trunc(Math.max(0, seconds) * TICKS_PER_SECOND);
}

function toMediaType(item: RawNowPlayingItem | undefined): MediaType | null {
  if (!item) {
    return null;
  }
  switch (item.Type) {
    case 'Movie':
    case 'Episode':
    case 'Audio':
      return item.Type;
    default:
      return 'Other';
  }
}

function clampPercent(value: number | undefined): number {
  if (value === undefined) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.round(value)));
}

function supportedCommandsOf(raw: RawSession): Set<string> {
  return new Set([...(raw.SupportedCommands ?? []), ...(raw.Capabilities?.SupportedCommands ?? [])]);
}

function artistOf(item: RawNowPlayingItem): string | null {
  if (item.Type !== 'Audio') {
    return null;
  }
  if (item.Artists && item.Artists.length > 0) {
    return item.Artists.join(', ');
  }
  return item.AlbumArtist ?? null;
}

function artworkUrlOf(item: RawNowPlayingItem, options: NormalizeOptions): string | null {
  const tag = item.ImageTags?.Primary;
  if (!options.imageUrl || !item.Id || !tag) {
    return null;
  }
  return options.imageUrl(item.Id, tag);
}

/**
 * Flatten one /Sessions record into a PlaybackState.
 *
 * Total over the lenient session shape: any absent field becomes `''`, `0`,
 * `false` or `null`, so one odd record never aborts a poll cycle.
 */
export function normalize(raw: RawSession, options: NormalizeOptions = {}): PlaybackState {
  const item = raw.NowPlayingItem;
  const playState: RawPlayState = raw.PlayState ?? {};
  const isEpisode = item?.Type === 'Episode';

  return {
    entityKey: raw.UserId ?? '',
    sessionId: raw.Id ?? '',
    userName: raw.UserName ?? '',
    client: raw.Client ?? '',
    deviceName: raw.DeviceName ?? '',
    deviceId: raw.DeviceId ?? '',
    isPlaying: item !== undefined && playState.IsPaused !== true,
    positionSeconds: ticksToSeconds(playState.PositionTicks),
    durationSeconds: ticksToSeconds(item?.RunTimeTicks),
    volumePercent: clampPercent(playState.VolumeLevel),
    isMuted: playState.IsMuted ?? false,
    mediaType: toMediaType(item),
    title: item?.Name ?? '',
    seriesName: isEpisode ? item?.SeriesName ?? null : null,
    seasonNumber: isEpisode ? item?.ParentIndexNumber ?? null : null,
    episodeNumber: isEpisode ? item?.IndexNumber ?? null : null,
    productionYear: item?.ProductionYear ?? null,
    communityRating: item?.CommunityRating ?? null,
    officialRating: item?.OfficialRating ?? null,
    artist: item ? artistOf(item) : null,
    albumName: item?.Type === 'Audio' ? item.Album ?? null : null,
    artworkUrl: item ? artworkUrlOf(item, options) : null,
    capabilityMask: computeCapabilityMask(supportedCommandsOf(raw)),
  };
}

/**
 * Whether a session is playing something (paused or not).
 */
export function hasNowPlaying(raw: RawSession): boolean {
  return raw.NowPlayingItem !== undefined;
}
