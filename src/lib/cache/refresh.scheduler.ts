/**
 * Refresh Scheduler
 * One periodic task that invalidates and re-warms datasets at their
 * configured intervals
 */

import { DatasetCacheManager } from './cache.manager';

export interface RefreshSchedulerOptions {
  tickMs: number;
  now?: () => number;
}

interface Schedule {
  intervalMs: number;
  lastRunAt: number | null;
}

export class RefreshScheduler {
  private readonly schedules = new Map<string, Schedule>();
  private readonly tickMs: number;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private ticking: Promise<void> | null = null;

  constructor(private readonly manager: DatasetCacheManager, options: RefreshSchedulerOptions) {
    this.tickMs = options.tickMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Refresh a registered dataset every intervalMs
   */
  schedule(name: string, intervalMs: number): this {
    if (!this.manager.has(name)) {
      throw new Error(`Cannot schedule unknown dataset "${name}"`);
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Refresh interval for "${name}" must be positive`);
    }
    this.schedules.set(name, { intervalMs, lastRunAt: null });
    return this;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.tickMs);
    console.log(`Scheduler: started (${this.schedules.size} dataset(s), tick ${this.tickMs}ms)`);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    console.log('Scheduler: stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Refresh every scheduled dataset now, regardless of interval
   */
  async runNow(): Promise<void> {
    await Promise.all(Array.from(this.schedules.keys(), (name) => this.run(name)));
  }

  /**
   * Refresh the datasets whose interval has elapsed. A tick that starts while
   * the previous one is still running joins it.
   */
  tick(): Promise<void> {
    if (!this.ticking) {
      this.ticking = this.runDue().finally(() => {
        this.ticking = null;
      });
    }
    return this.ticking;
  }

  private async runDue(): Promise<void> {
    const now = this.now();
    const due = Array.from(this.schedules.entries())
      .filter(([, schedule]) => schedule.lastRunAt === null || now - schedule.lastRunAt >= schedule.intervalMs)
      .map(([name]) => name);

    await Promise.all(due.map((name) => this.run(name)));
  }

  private async run(name: string): Promise<void> {
    const schedule = this.schedules.get(name);
    if (!schedule) {
      return;
    }
    schedule.lastRunAt = this.now();

    try {
      this.manager.invalidate(name);
      const result = await this.manager.get(name);
      if (result.stale) {
        console.warn(`Scheduler: "${name}" kept its previous value`);
      } else {
        console.log(`Scheduler: refreshed "${name}"`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Scheduler: refresh of "${name}" failed: ${message}`);
    }
  }
}
