import { SENSOR_DEFINITIONS } from './definitions';
import { toUpcomingItem } from './mediaItems';
import type { ItemImageUrl, UpcomingMediaItem } from './mediaItems';
import type { RawLibraryItem } from '../types/jellyfin.types';
import type { SensorAdapter, SensorState } from '../types/sensor.types';

/**
 * Upcoming TV episodes; the value is the list length.
 */
export class UpcomingMediaSensor implements SensorAdapter {
  readonly name = 'UpcomingMedia';

  private items: UpcomingMediaItem[] = [];
  private updatedAt: Date | null = null;

  update(items: readonly RawLibraryItem[], imageUrl: ItemImageUrl): void {
    this.items = items.map((item) => toUpcomingItem(item, imageUrl));
    this.updatedAt = new Date();
  }

  getItems(): UpcomingMediaItem[] {
    return [...this.items];
  }

  getStates(): SensorState[] {
    return [
      {
        ...SENSOR_DEFINITIONS.upcoming_media,
        value: this.updatedAt ? this.items.length : null,
        attributes: { data: this.items },
        updatedAt: this.updatedAt,
      },
    ];
  }
}
