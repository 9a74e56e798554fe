/**
 * LiquiditySweepBot
 *
 * Wires the two jobs into the scheduler:
 * - monitoring cycle every `session.monitorIntervalMinutes`
 * - pre-session snapshot daily at `session.preSessionAlert` (local)
 *
 * The bot owns the MonitorContext; the jobs only receive it.
 */

import { Config } from './types';
import { TIME_UNITS } from './constants';
import { BotServices } from './services/bot-services';
import { CycleReport } from './services/liquidity-monitor.service';

export const MONITOR_JOB = 'monitoring-cycle';
export const PRE_SESSION_JOB = 'pre-session-snapshot';

export class LiquiditySweepBot {
  private started = false;

  constructor(
    private readonly services: BotServices,
    private readonly config: Config,
  ) {}

  async start(): Promise<void> {
    if (this.started) {
      this.services.logger.warn('⚠️ Bot already started');
      return;
    }
    this.started = true;

    const { logger, scheduler, session } = this.services;

    logger.info('🚀 Starting liquidity sweep bot', {
      instruments: this.config.instruments.map(i => i.symbol),
      session: session.describe(),
      preSessionAlert: this.config.session.preSessionAlert,
      monitorIntervalMinutes: this.config.session.monitorIntervalMinutes,
    });

    scheduler
      .every(MONITOR_JOB, this.config.session.monitorIntervalMinutes * TIME_UNITS.MINUTE, async () => {
        await this.runMonitoringCycle();
      })
      .dailyAt(PRE_SESSION_JOB, this.config.session.preSessionAlert, async () => {
        await this.runPreSession();
      });

    scheduler.start();

    // First tick right away instead of waiting a full interval
    await scheduler.runJob(MONITOR_JOB, async () => {
      await this.runMonitoringCycle();
    });
  }

  stop(): void {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.services.scheduler.stop();
    this.services.logger.info('🛑 Bot stopped');
  }

  async runMonitoringCycle(): Promise<CycleReport> {
    const { monitor, context, logger, now } = this.services;
    const report = await monitor.runMonitoringCycle(context, now());

    if (report.inSession) {
      logger.info('📋 Cycle complete', {
        sessionDate: report.sessionDate,
        expired: report.expired.map(p => p.symbol),
        instruments: report.instruments.map(i => ({
          symbol: i.symbol,
          skipped: i.skipped,
          sweep: i.sweep,
          arm: i.arm,
          priceCheck: i.priceCheck,
        })),
        alertsLeft: context.budget.remaining(this.services.session.localDateKey(now())),
      });
    }

    return report;
  }

  async runPreSession(): Promise<void> {
    await this.services.monitor.runPreSession(this.services.now());
  }
}
