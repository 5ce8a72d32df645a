import { createLogger } from './Logger';
import type { SchedulerStatus } from '../types/health.types';

const logger = createLogger('Scheduler');

export interface ScheduleConfig {
  name: string;
  intervalSeconds: number;
  enabled: boolean;
  task: () => Promise<void>;
}

interface ActiveSchedule {
  schedule: ScheduleConfig;
  timer: NodeJS.Timeout;
  isRunning: boolean;
  lastRunAt?: Date;
  lastError?: string;
  consecutiveErrors: number;
}

/**
 * Runs fixed-interval background tasks: once on start, then every interval.
 * A run that is still in flight when the next one is due is skipped.
 */
export class Scheduler {
  private schedules: Map<string, ActiveSchedule> = new Map();
  private running: Map<string, Promise<void>> = new Map();

  /**
   * Start a schedule. Disabled or already-started schedules are ignored.
   */
  start(schedule: ScheduleConfig): void {
    if (!schedule.enabled) {
      logger.debug(`Schedule ${schedule.name} is disabled, skipping`);
      return;
    }
    if (this.schedules.has(schedule.name)) {
      logger.warn(`Schedule ${schedule.name} is already running`);
      return;
    }

    const timer = setInterval(() => {
      this.trigger(schedule.name);
    }, schedule.intervalSeconds * 1000);

    this.schedules.set(schedule.name, {
      schedule,
      timer,
      isRunning: false,
      consecutiveErrors: 0,
    });
    logger.info(`Started scheduler: ${schedule.name} (every ${schedule.intervalSeconds}s)`);

    // Run immediately on start
    this.trigger(schedule.name);
  }

  /**
   * Run a schedule now unless it is already running.
   */
  trigger(name: string): void {
    const active = this.schedules.get(name);
    if (!active) {
      return;
    }
    if (active.isRunning) {
      logger.debug(`Schedule ${name} is already running, skipping`);
      return;
    }

    const run = this.execute(active).finally(() => {
      this.running.delete(name);
    });
    this.running.set(name, run);
  }

  private async execute(active: ActiveSchedule): Promise<void> {
    active.isRunning = true;
    const startTime = Date.now();
    try {
      await active.schedule.task();
      active.consecutiveErrors = 0;
      active.lastError = undefined;
      logger.debug(`Schedule ${active.schedule.name} finished in ${Date.now() - startTime}ms`);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      active.consecutiveErrors++;
      active.lastError = message;
      logger.error(`Schedule ${active.schedule.name} failed: ${message}`);
    } finally {
      active.lastRunAt = new Date();
      active.isRunning = false;
    }
  }

  /**
   * Stop every schedule and wait for in-flight runs to settle.
   */
  async stopAll(): Promise<void> {
    for (const [name, active] of this.schedules) {
      clearInterval(active.timer);
      logger.debug(`Stopped scheduler: ${name}`);
    }

    if (this.running.size > 0) {
      logger.info(`Waiting for ${this.running.size} running schedules to complete...`);
      await Promise.all(this.running.values());
    }

    this.schedules.clear();
  }

  getStatuses(): SchedulerStatus[] {
    return [...this.schedules.values()].map((active) => ({
      name: active.schedule.name,
      intervalSeconds: active.schedule.intervalSeconds,
      isRunning: active.isRunning,
      lastRunAt: active.lastRunAt,
      lastError: active.lastError,
      consecutiveErrors: active.consecutiveErrors,
    }));
  }
}
