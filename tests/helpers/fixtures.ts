import { vi } from 'vitest';
import type { JellyfinApi } from '../../src/jellyfin/JellyfinClient';
import type { ItemCounts, RawLibraryItem, RawSession, SystemInfo } from '../../src/types/jellyfin.types';
import type { PlaybackState } from '../../src/types/playback.types';

/**
 * A playing movie session of user-1 that supports every command.
 */
export function rawSession(overrides: Partial<RawSession> = {}): RawSession {
  return {
    Id: 'session-1',
    UserId: 'user-1',
    UserName: 'alice',
    Client: 'Jellyfin Web',
    DeviceName: 'Firefox',
    DeviceId: 'device-1',
    SupportsRemoteControl: true,
    PlayState: {
      PositionTicks: 600_000_000,
      IsPaused: false,
      IsMuted: false,
      VolumeLevel: 80,
    },
    NowPlayingItem: {
      Id: 'item-1',
      Name: 'Test Movie',
      Type: 'Movie',
      RunTimeTicks: 72_000_000_000,
      ProductionYear: 2020,
      ImageTags: { Primary: 'tag-1' },
    },
    SupportedCommands: ['PlayState', 'SetVolume', 'Mute', 'Unmute'],
    ...overrides,
  };
}

export function playbackState(overrides: Partial<PlaybackState> = {}): PlaybackState {
  return {
    entityKey: 'user-1',
    sessionId: 'session-1',
    userName: 'alice',
    client: 'Jellyfin Web',
    deviceName: 'Firefox',
    deviceId: 'device-1',
    isPlaying: true,
    positionSeconds: 60,
    durationSeconds: 7200,
    volumePercent: 80,
    isMuted: false,
    mediaType: 'Movie',
    title: 'Test Movie',
    seriesName: null,
    seasonNumber: null,
    episodeNumber: null,
    productionYear: 2020,
    communityRating: null,
    officialRating: null,
    artist: null,
    albumName: null,
    artworkUrl: null,
    // CanSeek | CanPause | CanSetVolume | CanSkipNext | CanSkipPrevious | CanStop | CanMute
    capabilityMask: 127,
    ...overrides,
  };
}

export function systemInfo(overrides: Partial<SystemInfo> = {}): SystemInfo {
  return {
    ServerName: 'Test Server',
    Version: '10.9.0',
    Id: 'server-1',
    OperatingSystemDisplayName: 'Linux',
    ...overrides,
  };
}

export function itemCounts(overrides: Partial<ItemCounts> = {}): ItemCounts {
  return {
    MovieCount: 10,
    SeriesCount: 3,
    EpisodeCount: 42,
    ArtistCount: 5,
    AlbumCount: 7,
    SongCount: 99,
    MusicVideoCount: 1,
    BoxSetCount: 2,
    BookCount: 4,
    ItemCount: 173,
    ...overrides,
  };
}

/**
 * A newly added episode with series artwork.
 */
export function libraryItem(overrides: Partial<RawLibraryItem> = {}): RawLibraryItem {
  return {
    Id: 'episode-1',
    Name: 'Pilot',
    Type: 'Episode',
    SeriesId: 'series-1',
    SeriesName: 'Test Show',
    SeasonName: 'Season 1',
    ParentIndexNumber: 1,
    IndexNumber: 2,
    Overview: 'It begins.',
    Genres: ['Drama'],
    Studios: [{ Name: 'Studio A' }, { Name: 'Studio B' }],
    CommunityRating: 8.1,
    OfficialRating: 'TV-14',
    ProductionYear: 2024,
    PremiereDate: '2024-05-01T00:00:00.0000000Z',
    DateCreated: '2024-05-02T10:00:00.0000000Z',
    RunTimeTicks: 27_000_000_000,
    ...overrides,
  };
}

/**
 * In-process stand-in for the Jellyfin API; every call resolves by default.
 */
export function createFakeClient() {
  return {
    getSessions: vi.fn<() => Promise<RawSession[]>>().mockResolvedValue([]),
    getSystemInfo: vi.fn<() => Promise<SystemInfo>>().mockResolvedValue(systemInfo()),
    getItemCounts: vi.fn<() => Promise<ItemCounts>>().mockResolvedValue(itemCounts()),
    getUpcoming: vi.fn<JellyfinApi['getUpcoming']>().mockResolvedValue([]),
    getLatestItems: vi.fn<JellyfinApi['getLatestItems']>().mockResolvedValue([]),
    sendPlaystateCommand: vi.fn<JellyfinApi['sendPlaystateCommand']>().mockResolvedValue(undefined),
    sendGeneralCommand: vi.fn<JellyfinApi['sendGeneralCommand']>().mockResolvedValue(undefined),
    sendMessage: vi.fn<JellyfinApi['sendMessage']>().mockResolvedValue(undefined),
    refreshLibrary: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    restartServer: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    shutdownServer: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    getImageUrl: vi.fn<JellyfinApi['getImageUrl']>(
      (itemId, tag, imageType = 'Primary') =>
        `http://jellyfin.local:8096/Items/${itemId}/Images/${imageType}?maxWidth=300${tag ? `&tag=${tag}` : ''}`
    ),
  } satisfies JellyfinApi;
}

export type FakeClient = ReturnType<typeof createFakeClient>;
