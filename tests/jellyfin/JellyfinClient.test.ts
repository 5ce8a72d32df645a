import { describe, it, expect, vi } from 'vitest';
import { JellyfinClient, buildBaseUrl } from '../../src/jellyfin/JellyfinClient';
import { AuthError, MalformedResponseError, TransportError } from '../../src/utils/errors';
import { createFakeAxios } from '../helpers/axios';
import type { RecordedRequest, Reply } from '../helpers/axios';
import type { JellyfinClientConfig } from '../../src/types/jellyfin.types';

// Mock the logger
vi.mock('../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const config: JellyfinClientConfig = {
  host: 'jellyfin.local',
  port: 8096,
  useSsl: false,
  verifySsl: true,
  apiKey: 'test-secret',
  timeoutMs: 5000,
};

function createClient(handler: (request: RecordedRequest) => Reply) {
  const { client: httpClient, requests } = createFakeAxios(handler);
  return { client: new JellyfinClient(config, httpClient), requests };
}

describe('buildBaseUrl', () => {
  it('should build the url from host, port and scheme', () => {
    expect(buildBaseUrl({ host: 'jellyfin.local', port: 8096, useSsl: false })).toBe(
      'http://jellyfin.local:8096'
    );
    expect(buildBaseUrl({ host: 'jellyfin.local', port: 8920, useSsl: true })).toBe(
      'https://jellyfin.local:8920'
    );
  });

  it('should use a host that carries a scheme as-is', () => {
    expect(buildBaseUrl({ host: ' https://media.example.com/jellyfin/ ', port: 8096, useSsl: false })).toBe(
      'https://media.example.com/jellyfin'
    );
  });
});

describe('JellyfinClient', () => {
  describe('reads', () => {
    it('should parse the session list', async () => {
      const { client, requests } = createClient(() => ({
        status: 200,
        data: [{ Id: 'session-1', UserId: 'user-1', PlayState: { PositionTicks: 10 } }, 'junk'],
      }));

      const sessions = await client.getSessions();

      expect(requests[0]).toMatchObject({ method: 'GET', url: '/Sessions' });
      expect(sessions).toEqual([
        { Id: 'session-1', UserId: 'user-1', PlayState: { PositionTicks: 10 } },
        {},
      ]);
    });

    it('should reject a session body that is not a list', async () => {
      const { client } = createClient(() => ({ status: 200, data: { Items: [] } }));

      await expect(client.getSessions()).rejects.toBeInstanceOf(MalformedResponseError);
    });

    it('should default missing system info fields', async () => {
      const { client } = createClient(() => ({ status: 200, data: { Version: '10.9.0' } }));

      const info = await client.getSystemInfo();

      expect(info.ServerName).toBe('Unknown');
      expect(info.Version).toBe('10.9.0');
      expect(info.Id).toBe('');
    });

    it('should read item counts, zeroing bad values', async () => {
      const { client, requests } = createClient(() => ({
        status: 200,
        data: { MovieCount: 12, SeriesCount: -1, SongCount: 'many' },
      }));

      const counts = await client.getItemCounts();

      expect(requests[0].url).toBe('/Items/Counts');
      expect(counts.MovieCount).toBe(12);
      expect(counts.SeriesCount).toBe(0);
      expect(counts.SongCount).toBe(0);
    });

    it('should list upcoming episodes', async () => {
      const { client, requests } = createClient(() => ({
        status: 200,
        data: { Items: [{ Id: 'episode-1', Name: 'Pilot', Studios: [{ Name: 'Studio A' }] }, 'junk'], TotalRecordCount: 2 },
      }));

      const items = await client.getUpcoming();

      expect(requests[0]).toMatchObject({
        method: 'GET',
        url: '/Shows/Upcoming',
        params: { Limit: 50, Fields: expect.stringContaining('SeriesId') },
      });
      expect(items).toEqual([{ Id: 'episode-1', Name: 'Pilot', Studios: [{ Name: 'Studio A' }] }, {}]);
    });

    it('should read a listing without items as empty', async () => {
      const { client } = createClient(() => ({ status: 200, data: {} }));

      await expect(client.getUpcoming()).resolves.toEqual([]);
    });

    it('should reject a listing that is not an object', async () => {
      const { client } = createClient(() => ({ status: 200, data: 'nope' }));

      await expect(client.getUpcoming()).rejects.toBeInstanceOf(MalformedResponseError);
    });

    it('should list the newest items of a type', async () => {
      const { client, requests } = createClient(() => ({
        status: 200,
        data: { Items: [{ Id: 'movie-1', Name: 'Film', Type: 'Movie' }] },
      }));

      const items = await client.getLatestItems('Movie', 5);

      expect(requests[0]).toMatchObject({
        method: 'GET',
        url: '/Items',
        params: {
          IncludeItemTypes: 'Movie',
          Recursive: 'true',
          SortBy: 'DateCreated',
          SortOrder: 'Descending',
          Limit: 5,
        },
      });
      expect(items).toEqual([{ Id: 'movie-1', Name: 'Film', Type: 'Movie' }]);
    });

    it('should default the latest limit', async () => {
      const { client, requests } = createClient(() => ({ status: 200, data: { Items: [] } }));

      await client.getLatestItems('Audio');

      expect(requests[0].params).toMatchObject({ IncludeItemTypes: 'Audio', Limit: 30 });
    });
  });

  describe('commands', () => {
    it('should post playstate commands to the session', async () => {
      const { client, requests } = createClient(() => ({ status: 204 }));

      await client.sendPlaystateCommand('session-1', 'PlayPause');

      expect(requests).toHaveLength(1);
      expect(requests[0]).toMatchObject({
        method: 'POST',
        url: '/Sessions/session-1/Playing/PlayPause',
      });
      expect(requests[0].params).toBeUndefined();
    });

    it('should pass the seek position as a query parameter', async () => {
      const { client, requests } = createClient(() => ({ status: 204 }));

      await client.sendPlaystateCommand('session-1', 'Seek', { seekPositionTicks: 900_000_000 });

      expect(requests[0].url).toBe('/Sessions/session-1/Playing/Seek');
      expect(requests[0].params).toEqual({ seekPositionTicks: 900_000_000 });
    });

    it('should encode session ids in the path', async () => {
      const { client, requests } = createClient(() => ({ status: 204 }));

      await client.sendPlaystateCommand('a/b', 'Stop');

      expect(requests[0].url).toBe('/Sessions/a%2Fb/Playing/Stop');
    });

    it('should post general commands as JSON', async () => {
      const { client, requests } = createClient(() => ({ status: 204 }));

      await client.sendGeneralCommand('session-1', { Name: 'SetVolume', Arguments: { Volume: '40' } });

      expect(requests[0].url).toBe('/Sessions/session-1/Command');
      expect(requests[0].data).toEqual({ Name: 'SetVolume', Arguments: { Volume: '40' } });
    });

    it('should post messages with the server field names', async () => {
      const { client, requests } = createClient(() => ({ status: 204 }));

      await client.sendMessage('session-1', { text: 'Dinner', header: 'Home', timeoutMs: 4000 });

      expect(requests[0].url).toBe('/Sessions/session-1/Message');
      expect(requests[0].data).toEqual({ Text: 'Dinner', Header: 'Home', TimeoutMs: 4000 });
    });

    it('should post server actions', async () => {
      const { client, requests } = createClient(() => ({ status: 204 }));

      await client.refreshLibrary();
      await client.restartServer();
      await client.shutdownServer();

      expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
        'POST /Library/Refresh',
        'POST /System/Restart',
        'POST /System/Shutdown',
      ]);
    });
  });

  describe('errors', () => {
    it('should classify 401 as AuthError', async () => {
      const { client } = createClient(() => ({ status: 401 }));

      const error = await client.getSessions().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof Error ? error.message : '').toBe('GET /Sessions: HTTP 401 Error for /Sessions');
    });

    it('should classify 403 on a command as AuthError', async () => {
      const { client } = createClient(() => ({ status: 403 }));

      await expect(client.sendPlaystateCommand('session-1', 'Pause')).rejects.toBeInstanceOf(AuthError);
    });

    it('should classify server errors as TransportError', async () => {
      const { client } = createClient(() => ({ status: 500, data: { message: 'boom' } }));

      const error = await client.refreshLibrary().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error instanceof Error ? error.message : '').toBe(
        'POST /Library/Refresh: HTTP 500 Error for /Library/Refresh: boom'
      );
    });

    it('should classify an unreachable server as TransportError', async () => {
      const { client } = createClient(() => ({ networkError: 'ECONNREFUSED' }));

      const error = await client.getSystemInfo().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error instanceof Error ? error.message : '').toBe(
        'GET /System/Info: Connection refused to /System/Info'
      );
    });
  });

  describe('getImageUrl', () => {
    it('should build a primary image url without credentials', () => {
      const { client } = createClient(() => ({ status: 200 }));

      expect(client.getImageUrl('item-1', 'tag-1')).toBe(
        'http://jellyfin.local:8096/Items/item-1/Images/Primary?maxWidth=300&tag=tag-1'
      );
    });

    it('should take the image type and width', () => {
      const { client } = createClient(() => ({ status: 200 }));

      expect(client.getImageUrl('item-1', undefined, 'Backdrop', 1280)).toBe(
        'http://jellyfin.local:8096/Items/item-1/Images/Backdrop?maxWidth=1280'
      );
    });
  });
});
