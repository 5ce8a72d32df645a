import type { SensorDefinition, SensorKey } from '../types/sensor.types';

export const SENSOR_DEFINITIONS: Record<SensorKey, SensorDefinition> = {
  server_status: { key: 'server_status', name: 'Server Status', icon: 'mdi:server', unit: null },
  active_sessions: {
    key: 'active_sessions',
    name: 'Active Sessions',
    icon: 'mdi:play-circle-outline',
    unit: 'sessions',
  },
  upcoming_media: {
    key: 'upcoming_media',
    name: 'Upcoming Media',
    icon: 'mdi:calendar-clock',
    unit: 'items',
  },
  movies: { key: 'movies', name: 'Movies', icon: 'mdi:movie-roll', unit: 'items' },
  shows: { key: 'shows', name: 'TV Shows', icon: 'mdi:television-classic', unit: 'items' },
  episodes: { key: 'episodes', name: 'Episodes', icon: 'mdi:television', unit: 'items' },
  music: { key: 'music', name: 'Music', icon: 'mdi:music-note', unit: 'items' },
};
