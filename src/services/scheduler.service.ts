/**
 * Scheduler Service
 *
 * Timer-based job runner:
 * - Interval jobs fire every N ms
 * - Daily jobs fire once per local date at a fixed local HH:MM
 *
 * A job still running when its timer fires again is skipped, so runs never overlap.
 * Job errors are logged and the timers keep going.
 */

import { LoggerService } from '../types';
import { DAILY_JOB_CHECK_MS } from '../constants';
import { SessionWindow, parseClock } from '../utils/session-window';
import { extractErrorMessage, extractErrorStack } from '../utils/error-helper';

export type JobHandler = () => Promise<void>;

interface IntervalJob {
  name: string;
  intervalMs: number;
  handler: JobHandler;
}

interface DailyJob {
  name: string;
  clock: string;
  handler: JobHandler;
  lastRunDate: string | null;
}

export class SchedulerService {
  private readonly intervalJobs: IntervalJob[] = [];
  private readonly dailyJobs: DailyJob[] = [];
  private readonly running = new Set<string>();
  private timers: NodeJS.Timeout[] = [];

  constructor(
    private readonly session: SessionWindow,
    private readonly logger: LoggerService,
    private readonly now: () => number = Date.now,
  ) {}

  every(name: string, intervalMs: number, handler: JobHandler): this {
    this.intervalJobs.push({ name, intervalMs, handler });
    return this;
  }

  dailyAt(name: string, clock: string, handler: JobHandler): this {
    parseClock(clock); // validates HH:MM
    this.dailyJobs.push({ name, clock, handler, lastRunDate: null });
    return this;
  }

  start(): void {
    if (this.timers.length > 0) {
      return;
    }

    for (const job of this.intervalJobs) {
      this.timers.push(setInterval(() => {
        void this.runJob(job.name, job.handler);
      }, job.intervalMs));
    }

    if (this.dailyJobs.length > 0) {
      this.timers.push(setInterval(() => {
        void this.checkDailyJobs();
      }, DAILY_JOB_CHECK_MS));
    }

    this.logger.info('⏰ Scheduler started', {
      intervalJobs: this.intervalJobs.map(j => `${j.name} every ${j.intervalMs}ms`),
      dailyJobs: this.dailyJobs.map(j => `${j.name} at ${j.clock} local`),
    });
  }

  stop(): void {
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];
    this.logger.info('🛑 Scheduler stopped');
  }

  /**
   * Run every daily job whose local clock time is now and that has not run today
   */
  async checkDailyJobs(): Promise<void> {
    const now = this.now();
    const clock = this.session.localClock(now);
    const date = this.session.localDateKey(now);

    for (const job of this.dailyJobs) {
      if (job.clock === clock && job.lastRunDate !== date) {
        job.lastRunDate = date;
        await this.runJob(job.name, job.handler);
      }
    }
  }

  /**
   * Never rejects
   * @returns false when the job was skipped because a previous run is in flight
   */
  async runJob(name: string, handler: JobHandler): Promise<boolean> {
    if (this.running.has(name)) {
      this.logger.warn('⏭️ Job still running, tick skipped', { job: name });
      return false;
    }

    this.running.add(name);
    try {
      await handler();
    } catch (error) {
      this.logger.error('❌ Job failed', {
        job: name,
        error: extractErrorMessage(error),
        stack: extractErrorStack(error),
      });
    } finally {
      this.running.delete(name);
    }
    return true;
  }
}
