import { createLogger } from './Logger';
import { ControlServer } from './ControlServer';
import { PollingCoordinator } from './PollingCoordinator';
import { Scheduler } from './Scheduler';
import { CommandDispatcher } from '../engine/CommandDispatcher';
import { EntityReconciler } from '../engine/EntityReconciler';
import { ServerActions } from '../engine/ServerActions';
import { JellyfinClient } from '../jellyfin/JellyfinClient';
import type { JellyfinApi } from '../jellyfin/JellyfinClient';
import {
  ActiveSessionsSensor,
  LibraryCountsSensor,
  ServerStatusSensor,
  UpcomingMediaSensor,
  refreshServerSensors,
} from '../sensors';
import type { FinbridgeConfig } from '../config/schemas/config.schema';
import type { ReconcileResult } from '../types/playback.types';

const logger = createLogger('Orchestrator');

export const SENSOR_SCHEDULE_NAME = 'server_sensors';

export interface OrchestratorOptions {
  version: string;
  /** Replaces the HTTP client built from the config */
  client?: JellyfinApi;
  /** Install SIGTERM/SIGINT and crash handlers (default true) */
  handleSignals?: boolean;
}

/**
 * Orchestrator is the main coordinator that ties everything together.
 * It manages the lifecycle of the application and handles graceful shutdown.
 */
export class Orchestrator {
  readonly client: JellyfinApi;
  readonly reconciler: EntityReconciler;
  readonly dispatcher: CommandDispatcher;
  readonly coordinator: PollingCoordinator;
  readonly scheduler: Scheduler;
  readonly actions: ServerActions;
  readonly serverStatus: ServerStatusSensor;
  readonly activeSessions: ActiveSessionsSensor;
  readonly libraryCounts: LibraryCountsSensor;
  readonly upcomingMedia: UpcomingMediaSensor;
  readonly controlServer: ControlServer | null;

  private config: FinbridgeConfig;
  private options: OrchestratorOptions;
  private isRunning = false;
  private shutdownPromise: Promise<void> | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(config: FinbridgeConfig, options: OrchestratorOptions) {
    this.config = config;
    this.options = options;

    const client = options.client ?? new JellyfinClient(config.jellyfin);
    this.client = client;
    this.reconciler = new EntityReconciler();
    this.serverStatus = new ServerStatusSensor();
    this.activeSessions = new ActiveSessionsSensor();
    this.libraryCounts = new LibraryCountsSensor();
    this.upcomingMedia = new UpcomingMediaSensor();
    this.scheduler = new Scheduler();

    this.coordinator = new PollingCoordinator(
      {
        client,
        reconciler: this.reconciler,
        serverStatus: this.serverStatus,
        activeSessions: this.activeSessions,
        normalizeOptions: {
          imageUrl: (itemId, tag) => client.getImageUrl(itemId, tag),
        },
      },
      config.polling
    );

    this.dispatcher = new CommandDispatcher(this.reconciler, client, {
      staleTolerancePolls: config.polling.staleTolerancePolls,
      currentTick: () => this.coordinator.getCurrentTick(),
    });

    this.actions = new ServerActions(client, () => this.activeSessions.getSessionIds());

    this.controlServer = config.server.enabled
      ? new ControlServer(
          { port: config.server.port, version: options.version },
          {
            reconciler: this.reconciler,
            dispatcher: this.dispatcher,
            actions: this.actions,
            polling: this.coordinator,
            scheduler: this.scheduler,
            serverStatus: this.serverStatus,
            sensors: [this.serverStatus, this.activeSessions, this.libraryCounts, this.upcomingMedia],
            onCommandSent: () => this.scheduleRefresh(),
          }
        )
      : null;
  }

  /**
   * Start polling, the sensor schedule and the control server
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Orchestrator is already running');
      return;
    }

    logger.info('Starting session bridge...');

    if (this.options.handleSignals !== false) {
      this.setupSignalHandlers();
    }

    try {
      await this.checkReachability();

      this.unsubscribe = this.coordinator.subscribe((result) => this.logUpdates(result));
      this.coordinator.start();

      this.scheduler.start({
        name: SENSOR_SCHEDULE_NAME,
        intervalSeconds: this.config.sensors.intervalSeconds,
        enabled: this.config.sensors.enabled,
        task: () =>
          refreshServerSensors(this.client, this.serverStatus, this.libraryCounts, this.upcomingMedia),
      });

      if (this.controlServer) {
        await this.controlServer.start();
      }

      this.isRunning = true;
      logger.info('Session bridge started successfully');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Failed to start session bridge: ${message}`);
      await this.teardown();
      throw error;
    }
  }

  /**
   * Stop the orchestrator gracefully
   */
  async stop(): Promise<void> {
    // If already shutting down, wait for that to complete
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    if (!this.isRunning) {
      return;
    }

    this.shutdownPromise = this.performShutdown();
    return this.shutdownPromise;
  }

  isActive(): boolean {
    return this.isRunning;
  }

  private async performShutdown(): Promise<void> {
    logger.info('Stopping session bridge...');
    this.isRunning = false;

    try {
      await this.teardown();
      logger.info('Session bridge stopped successfully');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Error during shutdown: ${message}`);
      throw error;
    }
  }

  private async teardown(): Promise<void> {
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
      this.refreshTimer = null;
    }
    this.unsubscribe?.();
    this.unsubscribe = null;

    if (this.controlServer) {
      await this.controlServer.stop();
    }
    await this.scheduler.stopAll();
    await this.coordinator.stop();
  }

  /**
   * A failed check is logged; polling keeps retrying on its own.
   */
  private async checkReachability(): Promise<void> {
    try {
      const info = await this.client.getSystemInfo();
      this.serverStatus.recordSystemInfo(info);
      logger.info(`Connected to Jellyfin server ${info.ServerName} (version ${info.Version || 'unknown'})`);
    } catch (error) {
      this.serverStatus.recordFailure(error);
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.warn(`Jellyfin server is not reachable yet: ${message}`);
    }
  }

  /**
   * Re-poll sessions shortly after a command so entities reflect it.
   * Commands arriving within the delay share one refresh.
   */
  private scheduleRefresh(): void {
    if (this.refreshTimer) {
      return;
    }
    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = null;
      this.coordinator.refresh().catch((error: unknown) => {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.error(`Post-command refresh failed: ${message}`);
      });
    }, this.config.commands.refreshDelayMs);
  }

  private logUpdates(result: ReconcileResult): void {
    for (const update of result.updates) {
      if (update.type === 'create') {
        logger.info(`New media player for user ${update.record.userName || update.entityKey}`);
      }
    }
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  private setupSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

    for (const signal of signals) {
      process.on(signal, async () => {
        logger.info(`Received ${signal}, initiating graceful shutdown...`);

        try {
          await this.stop();
          process.exit(0);
        } catch (error) {
          const message = error instanceof Error ? error.message : 'Unknown error';
          logger.error(`Shutdown failed: ${message}`);
          process.exit(1);
        }
      });
    }

    process.on('uncaughtException', async (error) => {
      logger.error(`Uncaught exception: ${error.message}`);
      logger.error(error.stack || '');
      await this.stopBeforeExit();
      process.exit(1);
    });

    process.on('unhandledRejection', async (reason) => {
      const message = reason instanceof Error ? reason.message : String(reason);
      logger.error(`Unhandled rejection: ${message}`);
      await this.stopBeforeExit();
      process.exit(1);
    });
  }

  private async stopBeforeExit(): Promise<void> {
    try {
      await this.stop();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Shutdown after crash failed: ${message}`);
    }
  }
}
