/**
 * Scheduler
 *
 * Runs a task on a fixed interval or a cron expression. Each task carries its
 * own lock so an invocation never overlaps the previous one, and a failing
 * invocation never stops the schedule.
 */

import cron from 'node-cron';
import { logger } from './utils/logger.js';

export type Task = () => Promise<unknown>;

/** Longest delay a Node.js timer honours; larger values fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface ScheduledJob {
  readonly name: string;
  start(): void;
  /** Cancels future invocations; an in-flight one runs to completion */
  stop(): void;
  isScheduled(): boolean;
  isExecuting(): boolean;
}

abstract class LockedJob implements ScheduledJob {
  private executing = false;

  constructor(
    readonly name: string,
    private readonly task: Task
  ) {}

  abstract start(): void;
  abstract stop(): void;
  abstract isScheduled(): boolean;

  isExecuting(): boolean {
    return this.executing;
  }

  /**
   * Execute the task with the overlap lock. Never rejects.
   */
  protected async invoke(): Promise<void> {
    if (this.executing) {
      logger.warn({ task: this.name }, 'Previous run still in progress, skipping this execution');
      return;
    }

    this.executing = true;
    const startTime = new Date();
    logger.info({ task: this.name, startTime: startTime.toISOString() }, 'Scheduled run starting');

    try {
      await this.task();
      logger.info(
        { task: this.name, durationMs: Date.now() - startTime.getTime() },
        'Scheduled run completed'
      );
    } catch (error) {
      logger.error({ error, task: this.name }, 'Scheduled run failed');
    } finally {
      this.executing = false;
    }
  }
}

/**
 * Runs immediately on start, then every `intervalMs` counted from the
 * previous start
 */
export class PeriodicTask extends LockedJob {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    name: string,
    task: Task,
    private readonly intervalMs: number
  ) {
    super(name, task);
    if (!Number.isFinite(intervalMs) || intervalMs <= 0 || intervalMs > MAX_TIMER_DELAY_MS) {
      throw new Error(`Invalid interval for ${name}: ${intervalMs}`);
    }
  }

  start(): void {
    if (this.timer) {
      logger.warn({ task: this.name }, 'Task already scheduled');
      return;
    }

    logger.info({ task: this.name, intervalMs: this.intervalMs }, 'Starting periodic task');
    this.timer = setInterval(() => void this.invoke(), this.intervalMs);
    void this.invoke();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info({ task: this.name }, 'Periodic task stopped');
    }
  }

  isScheduled(): boolean {
    return this.timer !== null;
  }
}

/**
 * Runs immediately on start, then on a cron expression in the given timezone
 */
export class CronTask extends LockedJob {
  private scheduledTask: cron.ScheduledTask | null = null;

  constructor(
    name: string,
    task: Task,
    private readonly expression: string,
    private readonly timezone: string
  ) {
    super(name, task);
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression: ${expression}`);
    }
  }

  start(): void {
    if (this.scheduledTask) {
      logger.warn({ task: this.name }, 'Task already scheduled');
      return;
    }

    logger.info(
      { task: this.name, cronExpression: this.expression, timezone: this.timezone },
      'Starting cron task'
    );
    this.scheduledTask = cron.schedule(this.expression, () => void this.invoke(), {
      timezone: this.timezone,
    });
    void this.invoke();
  }

  stop(): void {
    if (this.scheduledTask) {
      this.scheduledTask.stop();
      this.scheduledTask = null;
      logger.info({ task: this.name }, 'Cron task stopped');
    }
  }

  isScheduled(): boolean {
    return this.scheduledTask !== null;
  }
}

export interface ScheduleSettings {
  intervalMs: number;
  cronExpression?: string;
  timezone: string;
}

/**
 * Cron when an expression is configured, otherwise a fixed interval
 */
export function createSchedule(name: string, task: Task, settings: ScheduleSettings): ScheduledJob {
  if (settings.cronExpression) {
    return new CronTask(name, task, settings.cronExpression, settings.timezone);
  }
  return new PeriodicTask(name, task, settings.intervalMs);
}
