import { SENSOR_DEFINITIONS } from './definitions';
import { toLatestItem } from './mediaItems';
import type { ItemImageUrl, LatestMediaItem } from './mediaItems';
import type { ItemCounts, LatestItemType, RawLibraryItem } from '../types/jellyfin.types';
import type { SensorAdapter, SensorKey, SensorState } from '../types/sensor.types';

export interface LibraryCounts {
  movies: number;
  shows: number;
  episodes: number;
  music: number;
  albums: number;
  artists: number;
  musicVideos: number;
  boxSets: number;
  books: number;
  total: number;
}

export function toLibraryCounts(counts: ItemCounts): LibraryCounts {
  return {
    movies: counts.MovieCount,
    shows: counts.SeriesCount,
    episodes: counts.EpisodeCount,
    music: counts.SongCount,
    albums: counts.AlbumCount,
    artists: counts.ArtistCount,
    musicVideos: counts.MusicVideoCount,
    boxSets: counts.BoxSetCount,
    books: counts.BookCount,
    total: counts.ItemCount,
  };
}

const COUNT_SENSORS: readonly (SensorKey & keyof LibraryCounts)[] = ['movies', 'shows', 'episodes', 'music'];

export type LatestSensorKey = 'movies' | 'episodes' | 'music';

export const LATEST_ITEM_TYPES: Record<LatestSensorKey, LatestItemType> = {
  movies: 'Movie',
  episodes: 'Episode',
  music: 'Audio',
};

function isLatestSensorKey(key: SensorKey): key is LatestSensorKey {
  return key in LATEST_ITEM_TYPES;
}

/**
 * Library totals from /Items/Counts, one sensor state per media kind.
 * Movies, episodes and music also list their most recently added items.
 */
export class LibraryCountsSensor implements SensorAdapter {
  readonly name = 'LibraryCounts';

  private counts: LibraryCounts | null = null;
  private latest: Record<LatestSensorKey, LatestMediaItem[]> = { movies: [], episodes: [], music: [] };
  private updatedAt: Date | null = null;

  update(counts: ItemCounts): void {
    this.counts = toLibraryCounts(counts);
    this.updatedAt = new Date();
  }

  updateLatest(key: LatestSensorKey, items: readonly RawLibraryItem[], imageUrl: ItemImageUrl): void {
    this.latest[key] = items.map((item) => toLatestItem(item, LATEST_ITEM_TYPES[key], imageUrl));
  }

  getCounts(): LibraryCounts | null {
    return this.counts;
  }

  getLatest(key: LatestSensorKey): LatestMediaItem[] {
    return [...this.latest[key]];
  }

  getStates(): SensorState[] {
    return COUNT_SENSORS.map((key) => ({
      ...SENSOR_DEFINITIONS[key],
      value: this.counts ? this.counts[key] : null,
      attributes: this.attributesFor(key),
      updatedAt: this.updatedAt,
    }));
  }

  private attributesFor(key: SensorKey): Record<string, unknown> {
    const attributes: Record<string, unknown> = {};
    if (key === 'music' && this.counts) {
      attributes.albums = this.counts.albums;
      attributes.artists = this.counts.artists;
      attributes.music_videos = this.counts.musicVideos;
    }
    if (isLatestSensorKey(key)) {
      attributes.latest = this.latest[key];
    }
    return attributes;
  }
}
