import { createLogger } from '../core/Logger';
import { LATEST_ITEM_TYPES } from './LibraryCountsSensor';
import type { JellyfinApi } from '../jellyfin/JellyfinClient';
import type { ServerStatusSensor } from './ServerStatusSensor';
import type { LatestSensorKey, LibraryCountsSensor } from './LibraryCountsSensor';
import type { UpcomingMediaSensor } from './UpcomingMediaSensor';
import type { ItemImageUrl } from './mediaItems';

export { ServerStatusSensor, toServerAttributes, toServerStatus } from './ServerStatusSensor';
export { ActiveSessionsSensor, toSessionSummary } from './ActiveSessionsSensor';
export { LibraryCountsSensor, LATEST_ITEM_TYPES, toLibraryCounts } from './LibraryCountsSensor';
export { UpcomingMediaSensor } from './UpcomingMediaSensor';
export { toLatestItem, toUpcomingItem } from './mediaItems';
export { SENSOR_DEFINITIONS } from './definitions';

const logger = createLogger('Sensors');

const LATEST_SENSOR_KEYS: readonly LatestSensorKey[] = ['movies', 'episodes', 'music'];

/**
 * Refresh the server-info and library sensors.
 * A failure of system info or item counts is recorded on the server status
 * sensor and rethrown for the scheduler. A failed media list is logged and
 * keeps its previous items.
 */
export async function refreshServerSensors(
  client: JellyfinApi,
  serverStatus: ServerStatusSensor,
  libraryCounts: LibraryCountsSensor,
  upcomingMedia: UpcomingMediaSensor
): Promise<void> {
  try {
    serverStatus.recordSystemInfo(await client.getSystemInfo());
    libraryCounts.update(await client.getItemCounts());
  } catch (error) {
    serverStatus.recordFailure(error);
    throw error;
  }

  const imageUrl: ItemImageUrl = (itemId, imageType) => client.getImageUrl(itemId, undefined, imageType);
  const lists: [string, () => Promise<void>][] = [
    ['upcoming media', async () => upcomingMedia.update(await client.getUpcoming(), imageUrl)],
    ...LATEST_SENSOR_KEYS.map((key): [string, () => Promise<void>] => [
      `latest ${key}`,
      async () => libraryCounts.updateLatest(key, await client.getLatestItems(LATEST_ITEM_TYPES[key]), imageUrl),
    ]),
  ];

  await Promise.all(
    lists.map(async ([label, refresh]) => {
      try {
        await refresh();
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.warn(`Failed to refresh ${label}: ${message}`);
      }
    })
  );
}
