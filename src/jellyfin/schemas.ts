import { z } from 'zod';

// Every field of a session record is best-effort: a value of the wrong type is
// read as absent instead of failing the whole /Sessions response.

const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().finite().optional().catch(undefined);
const optionalBoolean = z.boolean().optional().catch(undefined);
const optionalStringList = z.array(z.string()).optional().catch(undefined);

export const NowPlayingItemSchema = z.object({
  Id: optionalString,
  Name: optionalString,
  Type: optionalString,
  MediaType: optionalString,
  SeriesName: optionalString,
  ParentIndexNumber: optionalNumber,
  IndexNumber: optionalNumber,
  RunTimeTicks: optionalNumber,
  ProductionYear: optionalNumber,
  CommunityRating: optionalNumber,
  OfficialRating: optionalString,
  Album: optionalString,
  AlbumArtist: optionalString,
  Artists: optionalStringList,
  ImageTags: z.record(z.string()).optional().catch(undefined),
});

export const PlayStateSchema = z.object({
  PositionTicks: optionalNumber,
  IsPaused: optionalBoolean,
  IsMuted: optionalBoolean,
  VolumeLevel: optionalNumber,
  CanSeek: optionalBoolean,
});

export const SessionSchema = z.object({
  Id: optionalString,
  UserId: optionalString,
  UserName: optionalString,
  Client: optionalString,
  DeviceName: optionalString,
  DeviceId: optionalString,
  ApplicationVersion: optionalString,
  RemoteEndPoint: optionalString,
  LastActivityDate: optionalString,
  SupportsRemoteControl: optionalBoolean,
  PlayState: PlayStateSchema.optional().catch(undefined),
  NowPlayingItem: NowPlayingItemSchema.optional().catch(undefined),
  SupportedCommands: optionalStringList,
  Capabilities: z
    .object({ SupportedCommands: optionalStringList })
    .optional()
    .catch(undefined),
});

/** `/Sessions` body; a non-object element becomes an empty record. */
export const SessionListSchema = z.array(SessionSchema.catch({}));

export const SystemInfoSchema = z
  .object({
    ServerName: z.string().default('Unknown'),
    Version: z.string().default(''),
    Id: z.string().default(''),
    OperatingSystem: z.string().optional(),
    OperatingSystemDisplayName: z.string().optional(),
    HasPendingRestart: z.boolean().optional(),
    IsShuttingDown: z.boolean().optional(),
  })
  .passthrough();

const count = z.number().int().nonnegative().catch(0);

export const ItemCountsSchema = z.object({
  MovieCount: count,
  SeriesCount: count,
  EpisodeCount: count,
  ArtistCount: count,
  AlbumCount: count,
  SongCount: count,
  MusicVideoCount: count,
  BoxSetCount: count,
  BookCount: count,
  ItemCount: count,
});

/** An item of a library listing (`/Shows/Upcoming`, `/Items`). */
export const LibraryItemSchema = z.object({
  Id: optionalString,
  Name: optionalString,
  Type: optionalString,
  SeriesId: optionalString,
  SeriesName: optionalString,
  SeasonName: optionalString,
  ParentIndexNumber: optionalNumber,
  IndexNumber: optionalNumber,
  Overview: optionalString,
  Genres: optionalStringList,
  Studios: z
    .array(z.object({ Name: optionalString }).catch({}))
    .optional()
    .catch(undefined),
  CommunityRating: optionalNumber,
  OfficialRating: optionalString,
  ProductionYear: optionalNumber,
  PremiereDate: optionalString,
  DateCreated: optionalString,
  RunTimeTicks: optionalNumber,
});

/** Query result envelope; a non-object element becomes an empty record. */
export const ItemListSchema = z.object({
  Items: z.array(LibraryItemSchema.catch({})).default([]),
});

export type RawSession = z.infer<typeof SessionSchema>;
export type RawNowPlayingItem = z.infer<typeof NowPlayingItemSchema>;
export type RawPlayState = z.infer<typeof PlayStateSchema>;
export type SystemInfo = z.infer<typeof SystemInfoSchema>;
export type ItemCounts = z.infer<typeof ItemCountsSchema>;
export type RawLibraryItem = z.infer<typeof LibraryItemSchema>;
