/**
 * Interval Scheduler
 *
 * In-process recurring tasks on setInterval. Ticks are fixed-period:
 * a task still running when the next period starts does not delay it.
 */

import { getErrorMessage, getLogger, type Logger } from "@llm-cost-monitor/core";

export interface IScheduler {
  schedule(name: string, intervalMs: number, task: () => Promise<void>): void;
  cancel(name: string): void;
  cancelAll(): void;
}

interface ScheduledTask {
  intervalId: NodeJS.Timeout;
  intervalMs: number;
  inFlight: number;
}

export class IntervalScheduler implements IScheduler {
  private tasks: Map<string, ScheduledTask>;
  private logger: Logger;

  constructor(logger: Logger = getLogger().child("scheduler")) {
    this.tasks = new Map();
    this.logger = logger;
  }

  /**
   * Schedule a recurring task
   * Runs immediately on first call, then on interval
   */
  schedule(name: string, intervalMs: number, task: () => Promise<void>): void {
    // Cancel existing task if present
    if (this.tasks.has(name)) {
      this.cancel(name);
    }

    const scheduled: ScheduledTask = {
      intervalId: setInterval(() => this.run(name, scheduled, task), intervalMs),
      intervalMs,
      inFlight: 0,
    };
    this.tasks.set(name, scheduled);

    this.logger.info(`Scheduled task "${name}" every ${intervalMs}ms`);

    // Run immediately
    this.run(name, scheduled, task);
  }

  /**
   * Cancel a scheduled task
   * Runs already in flight finish on their own.
   */
  cancel(name: string): void {
    const task = this.tasks.get(name);
    if (task) {
      clearInterval(task.intervalId);
      this.tasks.delete(name);
      this.logger.info(`Cancelled task "${name}"`);
    }
  }

  /**
   * Cancel all scheduled tasks
   */
  cancelAll(): void {
    for (const name of this.tasks.keys()) {
      this.cancel(name);
    }
  }

  /**
   * Get list of scheduled task names (for monitoring)
   */
  getScheduledTasks(): string[] {
    return Array.from(this.tasks.keys());
  }

  /**
   * Number of runs of a task currently in flight
   */
  getInFlight(name: string): number {
    return this.tasks.get(name)?.inFlight ?? 0;
  }

  private run(name: string, scheduled: ScheduledTask, task: () => Promise<void>): void {
    scheduled.inFlight++;
    if (scheduled.inFlight > 1) {
      this.logger.warn(`Task "${name}" overran its period`, { inFlight: scheduled.inFlight });
    }

    void task()
      .catch((error: unknown) => {
        this.logger.error(`Scheduled task "${name}" failed`, { error: getErrorMessage(error) });
      })
      .finally(() => {
        scheduled.inFlight--;
      });
  }
}
