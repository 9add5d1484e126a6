// ===========================================
// SCHEDULER
// One self-rescheduling timer per task; a task never overlaps itself
// ===========================================

import { logger } from '../../utils/logger.js';

export interface ScheduledTask {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  // Overrides the next delay, e.g. while a source is backing off
  nextDelayMs?: () => number | null;
}

export class Scheduler {
  private timers: Map<string, NodeJS.Timeout> = new Map();
  private running: Map<string, Promise<void>> = new Map();
  private isRunning = false;

  start(tasks: ScheduledTask[]): void {
    if (this.isRunning) {
      logger.warn('Scheduler already running');
      return;
    }
    this.isRunning = true;

    for (const task of tasks) {
      this.schedule(task, 0);
    }
    logger.info({ tasks: tasks.map(t => ({ name: t.name, intervalMs: t.intervalMs })) }, 'Scheduler started');
  }

  /**
   * Cancel pending runs. In-flight runs are left to finish; await idle() for them.
   */
  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    logger.info('Scheduler stopped');
  }

  async idle(): Promise<void> {
    await Promise.all(this.running.values());
  }

  get active(): boolean {
    return this.isRunning;
  }

  private schedule(task: ScheduledTask, delayMs: number): void {
    if (!this.isRunning) return;
    const timer = setTimeout(() => {
      this.timers.delete(task.name);
      const run = this.tick(task).finally(() => this.running.delete(task.name));
      this.running.set(task.name, run);
    }, delayMs);
    this.timers.set(task.name, timer);
  }

  private async tick(task: ScheduledTask): Promise<void> {
    try {
      await task.run();
    } catch (error) {
      logger.error({ err: error, task: task.name }, 'Scheduled task failed');
    }
    const override = task.nextDelayMs?.() ?? null;
    this.schedule(task, override !== null ? Math.max(override, task.intervalMs) : task.intervalMs);
  }
}
