import { createLogger } from './Logger';
import { hasNowPlaying, normalize } from '../engine/SessionNormalizer';
import type { NormalizeOptions } from '../engine/SessionNormalizer';
import type { EntityReconciler } from '../engine/EntityReconciler';
import type { JellyfinApi } from '../jellyfin/JellyfinClient';
import type { ActiveSessionsSensor } from '../sensors/ActiveSessionsSensor';
import type { ServerStatusSensor } from '../sensors/ServerStatusSensor';
import { AuthError } from '../utils/errors';
import type { PollingStatus } from '../types/health.types';
import type { RawSession } from '../types/jellyfin.types';
import type { ReconcileResult } from '../types/playback.types';

const logger = createLogger('PollingCoordinator');

export interface PollingOptions {
  intervalSeconds: number;
  /** Consecutive failures after which the interval starts doubling */
  failureThreshold: number;
  maxBackoffSeconds: number;
}

export interface PollingDependencies {
  client: JellyfinApi;
  reconciler: EntityReconciler;
  serverStatus: ServerStatusSensor;
  activeSessions: ActiveSessionsSensor;
  normalizeOptions?: NormalizeOptions;
}

export type EntityUpdateListener = (result: ReconcileResult) => void;

/**
 * Delay before the next poll: the base interval until `threshold` consecutive
 * failures, then doubling per further failure, capped at `maxMs`.
 */
export function computeBackoffDelay(
  baseMs: number,
  failures: number,
  threshold: number,
  maxMs: number
): number {
  if (failures < threshold) {
    return baseMs;
  }
  const widened = baseMs * Math.pow(2, failures - threshold + 1);
  return Math.min(Math.max(maxMs, baseMs), widened);
}

/**
 * Drives the /Sessions poll loop and feeds the reconciler.
 *
 * A failed fetch never touches entity state: it is recorded on the server
 * status sensor and widens the retry interval. Stopping invalidates the cycle
 * in flight, whose result is then dropped before reconciliation.
 */
export class PollingCoordinator {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private generation = 0;
  private running = false;
  private tick = 0;
  private consecutiveFailures = 0;
  private lastSuccessAt?: Date;
  private lastError?: string;
  private listeners: Set<EntityUpdateListener> = new Set();

  constructor(
    private readonly deps: PollingDependencies,
    private readonly options: PollingOptions
  ) {}

  /**
   * Start polling; the first cycle runs immediately.
   */
  start(): void {
    if (this.running) {
      logger.warn('Polling coordinator is already running');
      return;
    }
    this.running = true;
    this.generation++;
    logger.info(`Polling sessions every ${this.options.intervalSeconds}s`);
    this.runAndSchedule();
  }

  /**
   * Stop polling and wait for the cycle in flight to settle.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    logger.info('Polling coordinator stopped');
  }

  /**
   * Run a cycle now (e.g. right after a command) and restart the interval.
   * Does nothing while another cycle is in flight.
   */
  async refresh(): Promise<void> {
    if (!this.running || this.inFlight) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.runAndSchedule();
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Subscribe to reconcile results that carry at least one entity update.
   */
  subscribe(listener: EntityUpdateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getCurrentTick(): number {
    return this.tick;
  }

  get nextDelayMs(): number {
    return computeBackoffDelay(
      this.options.intervalSeconds * 1000,
      this.consecutiveFailures,
      this.options.failureThreshold,
      this.options.maxBackoffSeconds * 1000
    );
  }

  getStatus(): PollingStatus {
    return {
      isRunning: this.running,
      tick: this.tick,
      consecutiveFailures: this.consecutiveFailures,
      nextDelayMs: this.nextDelayMs,
      lastSuccessAt: this.lastSuccessAt,
      lastError: this.lastError,
    };
  }

  /**
   * Run one poll cycle. Never rejects.
   */
  async runCycle(generation: number = this.generation): Promise<void> {
    const tick = ++this.tick;
    const { client, reconciler, serverStatus, activeSessions } = this.deps;

    let sessions: RawSession[];
    try {
      sessions = await client.getSessions();
    } catch (error) {
      if (generation !== this.generation) {
        return;
      }
      this.recordFailure(error);
      return;
    }

    if (generation !== this.generation) {
      logger.debug(`Discarding poll ${tick}: superseded`);
      return;
    }

    this.consecutiveFailures = 0;
    this.lastError = undefined;
    this.lastSuccessAt = new Date();
    serverStatus.recordSuccess();

    const active = sessions.filter(hasNowPlaying);
    const states = active.map((session) => normalize(session, this.deps.normalizeOptions));
    const result = reconciler.reconcile(states, tick);
    activeSessions.update(active);

    if (result.updates.length > 0) {
      logger.debug(`Poll ${tick}: ${result.updates.length} entity update(s), ${active.length} active session(s)`);
      this.publish(result);
    }
  }

  private runAndSchedule(): void {
    const generation = this.generation;
    const run: Promise<void> = this.runCycle(generation).finally(() => {
      // A restart may already have replaced this cycle
      if (this.inFlight === run) {
        this.inFlight = null;
      }
      if (this.running && generation === this.generation) {
        this.scheduleNext();
      }
    });
    this.inFlight = run;
  }

  private scheduleNext(): void {
    const delay = this.nextDelayMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runAndSchedule();
    }, delay);
  }

  private recordFailure(error: unknown): void {
    this.consecutiveFailures++;
    const message = error instanceof Error ? error.message : 'Unknown error';
    this.lastError = message;
    this.deps.serverStatus.recordFailure(error);

    if (error instanceof AuthError) {
      logger.error(`Jellyfin rejected the API key: ${message}`);
    } else if (this.consecutiveFailures >= this.options.failureThreshold) {
      logger.warn(
        `Session poll failed ${this.consecutiveFailures} times in a row, retrying in ${this.nextDelayMs}ms: ${message}`
      );
    } else {
      logger.warn(`Session poll failed: ${message}`);
    }
  }

  private publish(result: ReconcileResult): void {
    for (const listener of this.listeners) {
      try {
        listener(result);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.error(`Entity update listener failed: ${message}`);
      }
    }
  }
}
