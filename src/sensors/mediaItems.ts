import type { ImageType, LatestItemType, RawLibraryItem } from '../types/jellyfin.types';

const TICKS_PER_SECOND = 10_000_000;

export type ItemImageUrl = (itemId: string, imageType: ImageType) => string;

/**
 * Entry of the upcoming media list, in the shape upcoming-media cards read.
 */
export interface UpcomingMediaItem {
  id: string;
  title: string;
  series: string;
  season: number | null;
  episode: number | null;
  airdate: string;
  overview: string;
  genres: string[];
  studio: string;
  rating: number | null;
  runtime: number;
  poster: string | null;
  fanart: string | null;
}

export interface LatestMediaItem {
  id: string;
  name: string;
  community_rating: number | null;
  official_rating: string;
  overview: string;
  production_year: number | null;
  date_created: string;
  premiere_date: string;
  runtime: number;
  genres: string[];
  studios: string[];
  image_primary: string | null;
  image_backdrop: string | null;
  image_thumb: string | null;
  image_logo: string | null;
}

export interface LatestEpisodeItem extends LatestMediaItem {
  series_name: string;
  season_name: string;
  season_number: number | null;
  episode_number: number | null;
  /** `S01E02` */
  episode: string;
  image_primary_series: string | null;
  image_backdrop_parent: string | null;
}

function runtimeSeconds(ticks: number | undefined): number {
  return ticks && ticks > 0 ? Math.trunc(ticks / TICKS_PER_SECOND) : 0;
}

function image(imageUrl: ItemImageUrl, itemId: string | undefined, imageType: ImageType): string | null {
  return itemId ? imageUrl(itemId, imageType) : null;
}

function episodeCode(season: number | undefined, episode: number | undefined): string {
  const pad = (value: number | undefined) => String(value ?? 0).padStart(2, '0');
  return `S${pad(season)}E${pad(episode)}`;
}

export function toUpcomingItem(item: RawLibraryItem, imageUrl: ItemImageUrl): UpcomingMediaItem {
  return {
    id: item.Id ?? '',
    title: item.Name ?? '',
    series: item.SeriesName ?? '',
    season: item.ParentIndexNumber ?? null,
    episode: item.IndexNumber ?? null,
    airdate: item.PremiereDate ?? '',
    overview: item.Overview ?? '',
    genres: item.Genres ?? [],
    studio: item.Studios?.[0]?.Name ?? '',
    rating: item.CommunityRating ?? null,
    runtime: runtimeSeconds(item.RunTimeTicks),
    poster: image(imageUrl, item.Id, 'Primary'),
    fanart: image(imageUrl, item.SeriesId, 'Backdrop'),
  };
}

export function toLatestItem(
  item: RawLibraryItem,
  type: LatestItemType,
  imageUrl: ItemImageUrl
): LatestMediaItem | LatestEpisodeItem {
  const latest: LatestMediaItem = {
    id: item.Id ?? '',
    name: item.Name ?? '',
    community_rating: item.CommunityRating ?? null,
    official_rating: item.OfficialRating ?? '',
    overview: item.Overview ?? '',
    production_year: item.ProductionYear ?? null,
    date_created: item.DateCreated ?? '',
    premiere_date: item.PremiereDate ?? '',
    runtime: runtimeSeconds(item.RunTimeTicks),
    genres: item.Genres ?? [],
    studios: (item.Studios ?? []).flatMap((studio) => (studio.Name ? [studio.Name] : [])),
    image_primary: image(imageUrl, item.Id, 'Primary'),
    image_backdrop: image(imageUrl, item.Id, 'Backdrop'),
    image_thumb: image(imageUrl, item.Id, 'Thumb'),
    image_logo: image(imageUrl, item.Id, 'Logo'),
  };

  if (type !== 'Episode') {
    return latest;
  }

  return {
    ...latest,
    series_name: item.SeriesName ?? '',
    season_name: item.SeasonName ?? '',
    season_number: item.ParentIndexNumber ?? null,
    episode_number: item.IndexNumber ?? null,
    episode: episodeCode(item.ParentIndexNumber, item.IndexNumber),
    image_primary_series: image(imageUrl, item.SeriesId, 'Primary'),
    image_backdrop_parent: image(imageUrl, item.SeriesId, 'Backdrop'),
  };
}
