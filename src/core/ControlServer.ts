import http from 'node:http';
import { z } from 'zod';
import { createLogger } from './Logger';
import { toMediaPlayerView } from '../entities/mediaPlayer';
import { isIdle } from '../types/playback.types';
import type { CommandDispatcher } from '../engine/CommandDispatcher';
import type { EntityReconciler } from '../engine/EntityReconciler';
import type { ServerActions } from '../engine/ServerActions';
import type { PollingCoordinator } from './PollingCoordinator';
import type { Scheduler } from './Scheduler';
import type { ServerStatusSensor } from '../sensors/ServerStatusSensor';
import type { CommandErrorCode, ServerAction } from '../types/command.types';
import type { HealthResponse, HealthStatus, StatusResponse } from '../types/health.types';
import type { SensorAdapter, ServerStatus } from '../types/sensor.types';

const logger = createLogger('ControlServer');

const MAX_BODY_BYTES = 64 * 1024;

export const EntityCommandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('play') }),
  z.object({ type: z.literal('pause') }),
  z.object({ type: z.literal('playPause') }),
  z.object({ type: z.literal('stop') }),
  z.object({ type: z.literal('next') }),
  z.object({ type: z.literal('previous') }),
  z.object({ type: z.literal('seek'), seconds: z.number() }),
  z.object({ type: z.literal('setVolume'), percent: z.number() }),
  z.object({ type: z.literal('mute'), muted: z.boolean() }),
]);

export const BroadcastSchema = z.object({
  text: z.string().min(1),
  header: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

const SERVER_ACTIONS: readonly ServerAction[] = ['rescan', 'restart', 'shutdown'];

const ERROR_STATUS: Record<CommandErrorCode, number> = {
  UnknownEntity: 404,
  NoActiveSession: 409,
  Unsupported: 422,
  InvalidArgument: 400,
  StaleSession: 200,
  TransportError: 502,
  AuthError: 502,
};

export function commandStatusCode(code: CommandErrorCode): number {
  return ERROR_STATUS[code];
}

export function toHealthStatus(server: ServerStatus): HealthStatus {
  switch (server) {
    case 'online':
      return 'healthy';
    case 'offline':
      return 'degraded';
    default:
      return 'unhealthy';
  }
}

/**
 * Configuration for the control server
 */
export interface ControlServerConfig {
  port: number;
  version: string;
}

export interface ControlServerDependencies {
  reconciler: Pick<EntityReconciler, 'get' | 'list'>;
  dispatcher: Pick<CommandDispatcher, 'dispatch'>;
  actions: Pick<ServerActions, 'run' | 'broadcast'>;
  polling: Pick<PollingCoordinator, 'getStatus'>;
  scheduler: Pick<Scheduler, 'getStatuses'>;
  serverStatus: Pick<ServerStatusSensor, 'getStatus'>;
  sensors: SensorAdapter[];
  /** Called after every command the server accepted */
  onCommandSent?: () => void;
}

class RequestError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

/**
 * ControlServer exposes entity views, sensors and commands over HTTP.
 *
 * Endpoints:
 * - GET /health - healthy/degraded/unhealthy from server reachability
 * - GET /status - Polling, entity and scheduler status
 * - GET /entities, GET /entities/{key} - Media player views
 * - GET /sensors - Sensor states
 * - POST /entities/{key}/commands - Playback commands
 * - POST /server/{rescan|restart|shutdown} - Server actions
 * - POST /broadcast - Message every active session
 */
export class ControlServer {
  private server: http.Server | null = null;
  private config: ControlServerConfig;
  private deps: ControlServerDependencies;
  private startTime: Date;

  constructor(config: ControlServerConfig, deps: ControlServerDependencies) {
    this.config = config;
    this.deps = deps;
    this.startTime = new Date();
  }

  /**
   * Start the control server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          const message = error instanceof Error ? error.message : 'Unknown error';
          logger.error(`Request ${req.method} ${req.url} failed: ${message}`);
          if (!res.headersSent) {
            this.sendError(res, 500, 'Internal Server Error');
          }
        });
      });

      this.server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          logger.error(`Port ${this.config.port} is already in use`);
        } else {
          logger.error(`Control server error: ${error.message}`);
        }
        reject(error);
      });

      this.server.listen(this.config.port, () => {
        logger.info(`Control server listening on port ${this.port}`);
        resolve();
      });
    });
  }

  /**
   * Stop the control server
   */
  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close(() => {
        logger.info('Control server stopped');
        this.server = null;
        resolve();
      });
    });
  }

  /**
   * Bound port, which differs from the configured one when that is 0
   */
  get port(): number {
    const address = this.server?.address();
    return typeof address === 'object' && address !== null ? address.port : this.config.port;
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method || 'GET';
    const { pathname } = new URL(req.url || '/', 'http://localhost');
    const segments = pathname.split('/').filter((segment) => segment.length > 0);

    res.setHeader('Content-Type', 'application/json');
    res.setHeader('Access-Control-Allow-Origin', '*');

    try {
      await this.route(method, segments, req, res);
    } catch (error) {
      if (error instanceof RequestError) {
        this.sendError(res, error.statusCode, error.message);
        return;
      }
      throw error;
    }
  }

  private async route(
    method: string,
    segments: string[],
    req: http.IncomingMessage,
    res: http.ServerResponse
  ): Promise<void> {
    const [root, key, sub, ...rest] = segments;
    const expect = (allowed: string): void => {
      if (method !== allowed) {
        throw new RequestError(405, 'Method Not Allowed');
      }
    };

    if (root === 'health' && segments.length === 1) {
      expect('GET');
      return this.handleHealth(res);
    }
    if (root === 'status' && segments.length === 1) {
      expect('GET');
      return this.handleStatus(res);
    }
    if (root === 'sensors' && segments.length === 1) {
      expect('GET');
      return this.sendJson(res, 200, this.deps.sensors.flatMap((sensor) => sensor.getStates()));
    }
    if (root === 'entities' && key === undefined) {
      expect('GET');
      return this.sendJson(res, 200, this.deps.reconciler.list().map(toMediaPlayerView));
    }
    if (root === 'entities' && sub === undefined) {
      expect('GET');
      return this.handleEntity(res, decodeSegment(key));
    }
    if (root === 'entities' && sub === 'commands' && rest.length === 0) {
      expect('POST');
      return this.handleCommand(req, res, decodeSegment(key));
    }
    if (root === 'server' && key !== undefined && sub === undefined) {
      expect('POST');
      return this.handleServerAction(res, key);
    }
    if (root === 'broadcast' && segments.length === 1) {
      expect('POST');
      return this.handleBroadcast(req, res);
    }

    throw new RequestError(404, 'Not Found');
  }

  /**
   * GET /health - Overall health status
   */
  private handleHealth(res: http.ServerResponse): void {
    const server = this.deps.serverStatus.getStatus();
    const status = toHealthStatus(server);
    const response: HealthResponse = {
      status,
      server,
      version: this.config.version,
      uptime: this.getUptimeSeconds(),
      timestamp: new Date(),
    };

    this.sendJson(res, status === 'unhealthy' ? 503 : 200, response);
  }

  /**
   * GET /status - Detailed status with polling and scheduler information
   */
  private handleStatus(res: http.ServerResponse): void {
    const records = this.deps.reconciler.list();
    const response: StatusResponse = {
      status: toHealthStatus(this.deps.serverStatus.getStatus()),
      version: this.config.version,
      uptime: this.getUptimeSeconds(),
      timestamp: new Date(),
      polling: this.deps.polling.getStatus(),
      stats: {
        entities: records.length,
        activeEntities: records.filter((record) => !isIdle(record.currentState)).length,
      },
      schedulers: this.deps.scheduler.getStatuses(),
    };

    this.sendJson(res, 200, response);
  }

  private handleEntity(res: http.ServerResponse, entityKey: string): void {
    const record = this.deps.reconciler.get(entityKey);
    if (!record) {
      throw new RequestError(404, `No media player for user ${entityKey}`);
    }
    this.sendJson(res, 200, toMediaPlayerView(record));
  }

  /**
   * POST /entities/{key}/commands
   */
  private async handleCommand(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    entityKey: string
  ): Promise<void> {
    const parsed = EntityCommandSchema.safeParse(await readJsonBody(req));
    if (!parsed.success) {
      this.sendJson(res, 400, {
        ok: false,
        error: { code: 'InvalidArgument', message: formatIssues(parsed.error) },
      });
      return;
    }

    const result = await this.deps.dispatcher.dispatch(entityKey, parsed.data);
    if (!result.ok) {
      this.sendJson(res, commandStatusCode(result.error.code), result);
      return;
    }

    this.deps.onCommandSent?.();
    this.sendJson(res, 200, result);
  }

  /**
   * POST /server/{action}
   */
  private async handleServerAction(res: http.ServerResponse, name: string): Promise<void> {
    const action = SERVER_ACTIONS.find((candidate) => candidate === name);
    if (!action) {
      throw new RequestError(404, `Unknown server action: ${name}`);
    }

    const result = await this.deps.actions.run(action);
    this.sendJson(res, result.ok ? 200 : commandStatusCode(result.error.code), result);
  }

  /**
   * POST /broadcast
   */
  private async handleBroadcast(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const parsed = BroadcastSchema.safeParse(await readJsonBody(req));
    if (!parsed.success) {
      throw new RequestError(400, formatIssues(parsed.error));
    }

    const result = await this.deps.actions.broadcast(parsed.data);
    this.sendJson(res, 200, result);
  }

  /**
   * Get uptime in seconds
   */
  private getUptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime.getTime()) / 1000);
  }

  private sendJson(res: http.ServerResponse, statusCode: number, data: unknown): void {
    res.statusCode = statusCode;
    res.end(JSON.stringify(data, null, 2));
  }

  private sendError(res: http.ServerResponse, statusCode: number, message: string): void {
    res.statusCode = statusCode;
    res.end(JSON.stringify({ error: message }));
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new RequestError(400, 'Malformed path');
  }
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; ');
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  // Oversized bodies are drained before answering 413
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size <= MAX_BODY_BYTES) {
      chunks.push(buffer);
    }
  }
  if (size > MAX_BODY_BYTES) {
    throw new RequestError(413, 'Payload Too Large');
  }

  const text = Buffer.concat(chunks).toString('utf-8').trim();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new RequestError(400, 'Request body is not valid JSON');
  }
}
