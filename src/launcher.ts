/**
 * Monitor Launcher
 *
 * Registry of named monitors and their schedules
 */

import type { ScheduledJob, Task } from './scheduler.js';
import { logger } from './utils/logger.js';
import { sleep } from './utils/rate-limiter.js';

export type MonitorStatus = 'running' | 'stopped';

/**
 * Anything that can perform one monitoring pass
 */
export interface RunnableMonitor {
  runOnce(): Promise<unknown>;
}

export type ScheduleFactory = (task: Task) => ScheduledJob;

export interface StartOptions {
  /** Run a single pass instead of starting the schedule */
  runOnce?: boolean;
}

interface Registration {
  monitor: RunnableMonitor;
  createSchedule: ScheduleFactory;
}

export class MonitorLauncher {
  private readonly registrations = new Map<string, Registration>();
  private readonly schedules = new Map<string, ScheduledJob>();
  /** Stopped schedules whose last run has not finished yet */
  private readonly draining = new Set<ScheduledJob>();
  private activePasses = 0;

  register(name: string, monitor: RunnableMonitor, createSchedule: ScheduleFactory): void {
    if (this.registrations.has(name)) {
      throw new Error(`Monitor already registered: ${name}`);
    }
    this.registrations.set(name, { monitor, createSchedule });
    logger.info({ monitor: name }, 'Monitor registered');
  }

  /**
   * Resolves false when the monitor is unknown, already running or its
   * single pass failed
   */
  async start(name: string, options: StartOptions = {}): Promise<boolean> {
    const registration = this.registrations.get(name);
    if (!registration) {
      logger.error({ monitor: name }, 'Monitor not registered');
      return false;
    }

    if (options.runOnce) {
      logger.info({ monitor: name }, 'Running single pass');
      this.activePasses++;
      try {
        await registration.monitor.runOnce();
        logger.info({ monitor: name }, 'Single pass complete');
        return true;
      } catch (error) {
        logger.error({ error, monitor: name }, 'Single pass failed');
        return false;
      } finally {
        this.activePasses--;
      }
    }

    if (this.schedules.has(name)) {
      logger.warn({ monitor: name }, 'Monitor already running');
      return false;
    }

    const schedule = registration.createSchedule(() => registration.monitor.runOnce());
    schedule.start();
    this.schedules.set(name, schedule);
    logger.info({ monitor: name }, 'Monitor schedule started');
    return true;
  }

  stop(name: string): boolean {
    const schedule = this.schedules.get(name);
    if (!schedule) {
      logger.warn({ monitor: name }, 'Monitor is not running');
      return false;
    }

    schedule.stop();
    this.schedules.delete(name);
    if (schedule.isExecuting()) {
      this.draining.add(schedule);
    }
    logger.info({ monitor: name }, 'Monitor stopped');
    return true;
  }

  stopAll(): void {
    for (const name of [...this.schedules.keys()]) {
      this.stop(name);
    }
  }

  /**
   * True while any scheduled run or single pass is still in progress,
   * including runs of schedules that were already stopped
   */
  isBusy(): boolean {
    for (const job of this.draining) {
      if (!job.isExecuting()) {
        this.draining.delete(job);
      }
    }
    return (
      this.activePasses > 0 ||
      this.draining.size > 0 ||
      [...this.schedules.values()].some((job) => job.isExecuting())
    );
  }

  /**
   * Resolves once no run is in progress
   */
  async waitForIdle(pollMs = 100, wait: (ms: number) => Promise<void> = sleep): Promise<void> {
    while (this.isBusy()) {
      await wait(pollMs);
    }
  }

  status(): Record<string, MonitorStatus> {
    return Object.fromEntries(
      [...this.registrations.keys()].map((name): [string, MonitorStatus] => [
        name,
        this.schedules.has(name) ? 'running' : 'stopped',
      ])
    );
  }

  list(): string[] {
    return [...this.registrations.keys()];
  }
}
