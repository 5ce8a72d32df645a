import { describe, it, expect } from 'vitest';
import {
  hasNowPlaying,
  normalize,
  secondsToTicks,
  ticksToSeconds,
} from '../../src/engine/SessionNormalizer';
import { SessionListSchema } from '../../src/jellyfin/schemas';
import { playbackState, rawSession } from '../helpers/fixtures';

describe('SessionNormalizer', () => {
  describe('ticksToSeconds', () => {
    it('should truncate to whole seconds', () => {
      expect(ticksToSeconds(15_999_999)).toBe(1);
      expect(ticksToSeconds(10_000_000)).toBe(1);
    });

    it('should map missing, negative and non-finite ticks to 0', () => {
      expect(ticksToSeconds(undefined)).toBe(0);
      expect(ticksToSeconds(-50_000_000)).toBe(0);
      expect(ticksToSeconds(Number.NaN)).toBe(0);
    });
  });

  describe('secondsToTicks', () => {
    it('should convert and truncate fractional ticks', () => {
      expect(secondsToTicks(90)).toBe(900_000_000);
      expect(secondsToTicks(1.23456789)).toBe(12_345_678);
    });

    it('should clamp negative seconds to 0', () => {
      expect(secondsToTicks(-5)).toBe(0);
    });
  });

  describe('normalize', () => {
    it('should flatten a playing movie session', () => {
      expect(normalize(rawSession())).toEqual(playbackState());
    });

    it('should report a paused session as not playing', () => {
      const state = normalize(rawSession({ PlayState: { IsPaused: true, PositionTicks: 0 } }));
      expect(state.isPlaying).toBe(false);
      expect(state.positionSeconds).toBe(0);
    });

    it('should be total over an empty record', () => {
      const state = normalize({});
      expect(state).toEqual(
        playbackState({
          entityKey: '',
          sessionId: '',
          userName: '',
          client: '',
          deviceName: '',
          deviceId: '',
          isPlaying: false,
          positionSeconds: 0,
          durationSeconds: 0,
          volumePercent: 0,
          mediaType: null,
          title: '',
          productionYear: null,
          capabilityMask: 0,
        })
      );
    });

    it('should round and clamp the volume into 0-100', () => {
      expect(normalize(rawSession({ PlayState: { VolumeLevel: 150 } })).volumePercent).toBe(100);
      expect(normalize(rawSession({ PlayState: { VolumeLevel: -3 } })).volumePercent).toBe(0);
      expect(normalize(rawSession({ PlayState: { VolumeLevel: 42.6 } })).volumePercent).toBe(43);
    });

    it('should fill series fields for episodes only', () => {
      const state = normalize(
        rawSession({
          NowPlayingItem: {
            Name: 'Pilot',
            Type: 'Episode',
            SeriesName: 'Test Show',
            ParentIndexNumber: 1,
            IndexNumber: 2,
          },
        })
      );
      expect(state.mediaType).toBe('Episode');
      expect(state.seriesName).toBe('Test Show');
      expect(state.seasonNumber).toBe(1);
      expect(state.episodeNumber).toBe(2);

      const movie = normalize(
        rawSession({ NowPlayingItem: { Type: 'Movie', SeriesName: 'Ignored', IndexNumber: 3 } })
      );
      expect(movie.seriesName).toBeNull();
      expect(movie.episodeNumber).toBeNull();
    });

    it('should join artists for audio and fall back to the album artist', () => {
      const song = normalize(
        rawSession({
          NowPlayingItem: { Type: 'Audio', Name: 'Song', Artists: ['A', 'B'], Album: 'Record' },
        })
      );
      expect(song.artist).toBe('A, B');
      expect(song.albumName).toBe('Record');

      const single = normalize(
        rawSession({ NowPlayingItem: { Type: 'Audio', Artists: [], AlbumArtist: 'Solo' } })
      );
      expect(single.artist).toBe('Solo');
    });

    it('should map unknown item types to Other', () => {
      expect(normalize(rawSession({ NowPlayingItem: { Type: 'TvChannel' } })).mediaType).toBe('Other');
    });

    it('should union both supported command lists into the mask', () => {
      const state = normalize(
        rawSession({
          SupportedCommands: ['Seek'],
          Capabilities: { SupportedCommands: ['Mute', 'DisplayMessage'] },
        })
      );
      // CanSeek | CanMute
      expect(state.capabilityMask).toBe(65);
    });

    it('should build the artwork url from the item id and primary tag', () => {
      const state = normalize(rawSession(), {
        imageUrl: (itemId, tag) => `http://img/${itemId}/${tag}`,
      });
      expect(state.artworkUrl).toBe('http://img/item-1/tag-1');
    });

    it('should leave the artwork url empty without a primary tag', () => {
      const state = normalize(rawSession({ NowPlayingItem: { Id: 'item-1', Type: 'Movie' } }), {
        imageUrl: (itemId, tag) => `http://img/${itemId}/${tag}`,
      });
      expect(state.artworkUrl).toBeNull();
    });

    it('should read wrongly-typed wire fields as absent', () => {
      const [session] = SessionListSchema.parse([
        { Id: 'session-9', UserId: 42, PlayState: { VolumeLevel: 'loud', IsPaused: true } },
      ]);
      const state = normalize(session);
      expect(state.sessionId).toBe('session-9');
      expect(state.entityKey).toBe('');
      expect(state.volumePercent).toBe(0);
    });
  });

  describe('hasNowPlaying', () => {
    it('should require a now-playing item', () => {
      expect(hasNowPlaying(rawSession())).toBe(true);
      expect(hasNowPlaying(rawSession({ NowPlayingItem: undefined }))).toBe(false);
    });
  });
});
