/**
 * Liquidity Monitor Service
 *
 * The two scheduled jobs of the bot:
 * - Pre-session snapshot: liquidity zone of every instrument, sent once a day
 * - Monitoring cycle: scan for sweeps, build and arm plans, alert when price reaches an entry.
 *   Arming is silent; only the entry alert counts against the daily cap
 *
 * All mutable state lives in the MonitorContext passed in by the owner of the loop.
 * Feed failures skip the instrument for the cycle; nothing here is fatal.
 */

import {
  ArmOutcome,
  CandleFeed,
  CandleInterval,
  Config,
  FeedErrorKind,
  InstrumentConfig,
  LoggerService,
  Notifier,
  PriceCheckOutcome,
  SweepBias,
  TradePlan,
} from '../types';
import { calculateLiquidityZone } from '../analyzers/liquidity-zone.calculator';
import { SweepDetector } from '../analyzers/sweep.detector';
import { RetailClusterDetector } from '../analyzers/retail-cluster.detector';
import { VolumeFootprintDetector } from '../analyzers/volume-footprint.detector';
import { TradePlanBuilderService } from './trade-plan-builder.service';
import { SetupTrackerService } from './setup-tracker.service';
import { AlertBudgetService } from './alert-budget.service';
import {
  formatEntryAlert,
  formatErrorAlert,
  formatLiquiditySnapshot,
  formatPreSession,
} from './telegram.service';
import { SessionWindow } from '../utils/session-window';
import { extractErrorMessage } from '../utils/error-helper';

// ============================================================================
// TYPES
// ============================================================================

/**
 * State owned by the scheduling loop and handed to every monitoring run
 */
export interface MonitorContext {
  readonly tracker: SetupTrackerService;
  readonly budget: AlertBudgetService;
}

export interface InstrumentCycleReport {
  symbol: string;
  skipped: FeedErrorKind | 'ERROR' | null;
  sweep: boolean;
  arm: ArmOutcome | null;
  priceCheck: PriceCheckOutcome | null;
}

export interface CycleReport {
  inSession: boolean;
  sessionDate: string | null;
  expired: TradePlan[];
  instruments: InstrumentCycleReport[];
}

export interface LiquidityMonitorDeps {
  config: Config;
  feed: CandleFeed;
  notifier: Notifier;
  session: SessionWindow;
  logger: LoggerService;
}

export function createMonitorContext(config: Config, logger: LoggerService): MonitorContext {
  const budget = new AlertBudgetService(config.strategy.maxAlertsPerDay, logger);
  const tracker = new SetupTrackerService(budget, logger, {
    triggerTolerance: config.strategy.triggerTolerance,
  });
  return { tracker, budget };
}

// ============================================================================
// LIQUIDITY MONITOR
// ============================================================================

export class LiquidityMonitorService {
  private readonly config: Config;
  private readonly feed: CandleFeed;
  private readonly notifier: Notifier;
  private readonly session: SessionWindow;
  private readonly logger: LoggerService;
  private readonly sweepDetector: SweepDetector;
  private readonly clusterDetector: RetailClusterDetector;
  private readonly footprintDetector: VolumeFootprintDetector;
  private readonly planBuilder: TradePlanBuilderService;

  constructor(deps: LiquidityMonitorDeps) {
    this.config = deps.config;
    this.feed = deps.feed;
    this.notifier = deps.notifier;
    this.session = deps.session;
    this.logger = deps.logger;

    const { strategy } = deps.config;
    this.sweepDetector = new SweepDetector(this.logger, {
      lookbackCandles: strategy.sweepLookbackCandles,
      minWickRatio: strategy.minWickRatio,
    });
    this.clusterDetector = new RetailClusterDetector(this.logger, {
      minClusterCount: strategy.minClusterCount,
      minClusterFraction: strategy.minClusterFraction,
    });
    this.footprintDetector = new VolumeFootprintDetector(this.logger, {
      lookbackCandles: strategy.footprintLookbackCandles,
      minCandles: strategy.footprintMinCandles,
      spikeRatio: strategy.volumeSpikeRatio,
    });
    this.planBuilder = new TradePlanBuilderService(this.logger, {
      rewardRisk: strategy.rewardRisk,
    });
  }

  /**
   * Daily snapshot before the session opens
   */
  async runPreSession(now: number = Date.now()): Promise<void> {
    await this.deliver(formatPreSession(this.session.localClock(now)), 'pre-session header');

    for (const instrument of this.config.instruments) {
      const result = await this.feed.fetchSeries(
        instrument.symbol,
        CandleInterval.FIFTEEN_MINUTES,
        this.config.feed.preSessionOutputSize,
      );

      if (!result.ok) {
        await this.deliver(formatErrorAlert('Pre-alert', result.error.message), 'pre-session error');
        continue;
      }

      const zone = calculateLiquidityZone(result.candles);
      if (!zone) {
        this.logger.warn('Pre-session: empty series', { symbol: instrument.symbol });
        continue;
      }

      await this.deliver(formatLiquiditySnapshot(instrument.symbol, zone), 'liquidity snapshot');
    }
  }

  /**
   * One monitoring tick across all instruments
   */
  async runMonitoringCycle(ctx: MonitorContext, now: number = Date.now()): Promise<CycleReport> {
    if (!this.session.isInSession(now)) {
      this.logger.debug('💤 Outside session hours', {
        localTime: this.session.localClock(now),
        session: this.session.describe(),
      });
      return { inSession: false, sessionDate: null, expired: [], instruments: [] };
    }

    const sessionDate = this.session.sessionDateKey(now);
    this.logger.info('🕒 Monitoring', { localTime: this.session.localClock(now), sessionDate });

    const expired = ctx.tracker.expireStale(sessionDate);
    const instruments: InstrumentCycleReport[] = [];

    for (const instrument of this.config.instruments) {
      try {
        instruments.push(await this.processInstrument(ctx, instrument, now, sessionDate));
      } catch (error) {
        this.logger.error('❌ Instrument cycle failed', {
          symbol: instrument.symbol,
          error: extractErrorMessage(error),
        });
        instruments.push({ ...emptyReport(instrument.symbol), skipped: 'ERROR' });
      }
    }

    return { inSession: true, sessionDate, expired, instruments };
  }

  private async processInstrument(
    ctx: MonitorContext,
    instrument: InstrumentConfig,
    now: number,
    sessionDate: string,
  ): Promise<InstrumentCycleReport> {
    const report = emptyReport(instrument.symbol);
    const { symbol } = instrument;

    // 1. Scan 15m for a sweep
    const series15m = await this.feed.fetchSeries(
      symbol,
      CandleInterval.FIFTEEN_MINUTES,
      this.config.feed.outputSize15m,
    );
    if (!series15m.ok) {
      return { ...report, skipped: series15m.error.kind };
    }

    const zone = calculateLiquidityZone(series15m.candles);
    const detection = this.sweepDetector.detect(series15m.candles, SweepBias.BOTH);
    report.sweep = detection.signal;

    this.logger.debug('Scan result', {
      symbol,
      zone,
      signal: detection.signal,
      reason: detection.signal ? detection.type : detection.reason,
    });

    // 2. Enrich from 5m and arm a plan
    if (detection.signal) {
      const series5m = await this.feed.fetchSeries(
        symbol,
        CandleInterval.FIVE_MINUTES,
        this.config.feed.outputSize5m,
      );
      if (!series5m.ok) {
        return { ...report, skipped: series5m.error.kind };
      }

      const cluster = this.clusterDetector.detect(
        series5m.candles,
        instrument.clusterBand,
        this.config.strategy.clusterLookbackMinutes,
      );
      const footprint = this.footprintDetector.detect(series5m.candles);

      const plan = this.planBuilder.build({
        instrument,
        sweep: detection,
        zone,
        cluster,
        footprint,
        createdAt: now,
      });

      report.arm = ctx.tracker.arm(plan, sessionDate).outcome;
    }

    // 3. Check live price against the armed plan
    if (ctx.tracker.getArmedPlan(symbol)) {
      const price = await this.feed.fetchLatestPrice(symbol);
      if (!price.ok) {
        return { ...report, skipped: price.error.kind };
      }

      const check = ctx.tracker.evaluatePrice(symbol, price.price, this.session.localDateKey(now));
      report.priceCheck = check.outcome;

      if (check.outcome === PriceCheckOutcome.TRIGGERED) {
        await this.deliver(formatEntryAlert(check.plan, check.price), 'entry alert');
        ctx.tracker.completeTrigger(symbol);
      } else if (check.outcome === PriceCheckOutcome.SUPPRESSED) {
        this.logger.info('🔕 Entry reached but daily alert cap hit', { symbol, price: check.price });
      }
    }

    return report;
  }

  /**
   * Notifier failures are logged; lifecycle state is never rolled back
   */
  private async deliver(message: string, label: string): Promise<void> {
    const delivered = await this.notifier.send(message);
    if (!delivered) {
      this.logger.warn('📪 Notification not delivered', { label });
    }
  }
}

function emptyReport(symbol: string): InstrumentCycleReport {
  return { symbol, skipped: null, sweep: false, arm: null, priceCheck: null };
}
