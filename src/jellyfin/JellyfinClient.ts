import type { AxiosInstance } from 'axios';
import type { z } from 'zod';
import { createLogger } from '../core/Logger';
import { createHttpClient } from '../utils/http';
import { MalformedResponseError, toClientError } from '../utils/errors';
import {
  ItemCountsSchema,
  ItemListSchema,
  SessionListSchema,
  SystemInfoSchema,
} from './schemas';
import type {
  GeneralCommand,
  ImageType,
  ItemCounts,
  JellyfinClientConfig,
  LatestItemType,
  PlaystateCommand,
  RawLibraryItem,
  RawSession,
  SessionMessage,
  SystemInfo,
} from '../types/jellyfin.types';

const CLIENT_NAME = 'Finbridge';
const CLIENT_VERSION = '1.0.0';
const DEVICE_NAME = 'Finbridge';
const DEVICE_ID = 'finbridge-session-bridge';

export const DEFAULT_UPCOMING_LIMIT = 50;
export const DEFAULT_LATEST_LIMIT = 30;

const ITEM_FIELDS = [
  'Overview',
  'Genres',
  'Studios',
  'CommunityRating',
  'OfficialRating',
  'ProductionYear',
  'PremiereDate',
  'DateCreated',
  'RunTimeTicks',
  'SeriesName',
  'ParentIndexNumber',
  'IndexNumber',
  'SeriesId',
].join(',');

/**
 * Calls the session engine makes against a Jellyfin server.
 * Every method rejects with a TransportError, AuthError or MalformedResponseError.
 */
export interface JellyfinApi {
  getSessions(): Promise<RawSession[]>;
  getSystemInfo(): Promise<SystemInfo>;
  getItemCounts(): Promise<ItemCounts>;
  getUpcoming(limit?: number): Promise<RawLibraryItem[]>;
  getLatestItems(type: LatestItemType, limit?: number): Promise<RawLibraryItem[]>;
  sendPlaystateCommand(
    sessionId: string,
    command: PlaystateCommand,
    options?: { seekPositionTicks?: number }
  ): Promise<void>;
  sendGeneralCommand(sessionId: string, command: GeneralCommand): Promise<void>;
  sendMessage(sessionId: string, message: SessionMessage): Promise<void>;
  refreshLibrary(): Promise<void>;
  restartServer(): Promise<void>;
  shutdownServer(): Promise<void>;
  getImageUrl(itemId: string, tag?: string, imageType?: ImageType, maxWidth?: number): string;
}

/**
 * Build the server base URL from host/port/useSsl.
 * A host that already carries a scheme is used as-is.
 */
export function buildBaseUrl(config: Pick<JellyfinClientConfig, 'host' | 'port' | 'useSsl'>): string {
  const host = config.host.trim().replace(/\/+$/, '');
  if (/^https?:\/\//i.test(host)) {
    return host;
  }
  const protocol = config.useSsl ? 'https' : 'http';
  return `${protocol}://${host}:${config.port}`;
}

/**
 * HTTP client for the Jellyfin REST API, authenticated with a static API key.
 */
export class JellyfinClient implements JellyfinApi {
  readonly baseUrl: string;
  private readonly httpClient: AxiosInstance;
  private readonly logger = createLogger('JellyfinClient');

  constructor(config: JellyfinClientConfig, httpClient?: AxiosInstance) {
    this.baseUrl = buildBaseUrl(config);
    this.httpClient =
      httpClient ??
      createHttpClient({
        baseURL: this.baseUrl,
        timeout: config.timeoutMs,
        verifySsl: config.verifySsl,
        headers: {
          'X-Emby-Token': config.apiKey,
          'X-Emby-Authorization': `MediaBrowser Client="${CLIENT_NAME}", Device="${DEVICE_NAME}", DeviceId="${DEVICE_ID}", Version="${CLIENT_VERSION}"`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
      });
  }

  async getSessions(): Promise<RawSession[]> {
    return this.get('/Sessions', SessionListSchema);
  }

  async getSystemInfo(): Promise<SystemInfo> {
    return this.get('/System/Info', SystemInfoSchema);
  }

  async getItemCounts(): Promise<ItemCounts> {
    return this.get('/Items/Counts', ItemCountsSchema);
  }

  /**
   * Upcoming TV episodes, server-wide.
   */
  async getUpcoming(limit = DEFAULT_UPCOMING_LIMIT): Promise<RawLibraryItem[]> {
    const body = await this.get('/Shows/Upcoming', ItemListSchema, { Limit: limit, Fields: ITEM_FIELDS });
    return body.Items;
  }

  /**
   * Most recently added items of one type, newest first.
   */
  async getLatestItems(type: LatestItemType, limit = DEFAULT_LATEST_LIMIT): Promise<RawLibraryItem[]> {
    const body = await this.get('/Items', ItemListSchema, {
      IncludeItemTypes: type,
      Recursive: 'true',
      SortBy: 'DateCreated',
      SortOrder: 'Descending',
      Limit: limit,
      Fields: ITEM_FIELDS,
    });
    return body.Items;
  }

  async sendPlaystateCommand(
    sessionId: string,
    command: PlaystateCommand,
    options: { seekPositionTicks?: number } = {}
  ): Promise<void> {
    const params =
      command === 'Seek' && options.seekPositionTicks !== undefined
        ? { seekPositionTicks: options.seekPositionTicks }
        : undefined;
    await this.post(`/Sessions/${encodeURIComponent(sessionId)}/Playing/${command}`, undefined, params);
  }

  async sendGeneralCommand(sessionId: string, command: GeneralCommand): Promise<void> {
    await this.post(`/Sessions/${encodeURIComponent(sessionId)}/Command`, command);
  }

  async sendMessage(sessionId: string, message: SessionMessage): Promise<void> {
    await this.post(`/Sessions/${encodeURIComponent(sessionId)}/Message`, {
      Text: message.text,
      Header: message.header,
      TimeoutMs: message.timeoutMs,
    });
  }

  async refreshLibrary(): Promise<void> {
    await this.post('/Library/Refresh');
  }

  async restartServer(): Promise<void> {
    await this.post('/System/Restart');
  }

  async shutdownServer(): Promise<void> {
    await this.post('/System/Shutdown');
  }

  getImageUrl(itemId: string, tag?: string, imageType: ImageType = 'Primary', maxWidth = 300): string {
    const url = new URL(`${this.baseUrl}/Items/${encodeURIComponent(itemId)}/Images/${imageType}`);
    url.searchParams.set('maxWidth', String(maxWidth));
    if (tag) {
      url.searchParams.set('tag', tag);
    }
    return url.toString();
  }

  private async get<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    params?: Record<string, string | number>
  ): Promise<z.output<S>> {
    let body: unknown;
    try {
      const response = await this.httpClient.get<unknown>(path, { params });
      body = response.data;
    } catch (error) {
      throw toClientError(error, `GET ${path}`);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.errors[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid body';
      this.logger.warn(`Unexpected response shape for GET ${path}: ${where}`);
      throw new MalformedResponseError(`GET ${path} returned an unexpected body (${where})`);
    }
    return result.data;
  }

  private async post(path: string, data?: unknown, params?: Record<string, string | number>): Promise<void> {
    try {
      await this.httpClient.post(path, data, { params });
    } catch (error) {
      throw toClientError(error, `POST ${path}`);
    }
  }
}
