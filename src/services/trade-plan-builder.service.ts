/**
 * Trade Plan Builder Service
 *
 * Turns a confirmed sweep plus secondary evidence into an advisory plan:
 * - Entry: midpoint of confirm close and sweep extreme, never worse than the confirm open
 * - Anti-cluster nudge: entries inside a same-side retail cluster move one band beyond it
 * - Stop: fixed instrument distance beyond the sweep extreme
 * - Targets: RR multiple of the risk, TP1 halfway
 * - Confidence: fixed additive score capped at 0.95
 *
 * Only called after a sweep fired, so it has no error states of its own.
 */

import {
  ClusterSide,
  FootprintSignal,
  InstrumentConfig,
  LiquidityZone,
  LoggerService,
  PlanSide,
  RetailCluster,
  SweepSignal,
  TradePlan,
} from '../types';
import { CONFIDENCE_BOUNDS, CONFIDENCE_WEIGHTS } from '../constants';

// ============================================================================
// TYPES
// ============================================================================

export interface TradePlanBuilderConfig {
  rewardRisk: number;
}

export interface TradePlanInput {
  instrument: InstrumentConfig;
  sweep: SweepSignal;
  zone: LiquidityZone | null;
  cluster: RetailCluster;
  footprint: FootprintSignal;
  createdAt: number;
}

interface EntryDecision {
  entry: number;
  nudged: boolean;
}

const DEFAULT_CONFIG: TradePlanBuilderConfig = {
  rewardRisk: 4,
};

const CONFIDENCE_DECIMALS = 2;

// ============================================================================
// TRADE PLAN BUILDER
// ============================================================================

export class TradePlanBuilderService {
  private config: TradePlanBuilderConfig;

  constructor(
    private readonly logger: LoggerService,
    config?: Partial<TradePlanBuilderConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  build(input: TradePlanInput): TradePlan {
    const { instrument, sweep, cluster, footprint } = input;
    const { sweepCandle, confirmCandle } = sweep;

    const side = confirmCandle.close > confirmCandle.open ? PlanSide.LONG : PlanSide.SHORT;
    const isLong = side === PlanSide.LONG;
    const sweepExtreme = isLong ? sweepCandle.low : sweepCandle.high;

    const candidate = this.calculateEntryCandidate(side, sweepExtreme, input);
    const { entry, nudged } = this.applyClusterNudge(side, candidate, cluster, instrument.tickSize);

    // A nudge can carry the entry past the sweep extreme; the stop then hangs off the entry
    const stopAnchor = isLong ? Math.min(sweepExtreme, entry) : Math.max(sweepExtreme, entry);
    const stopLoss = isLong
      ? stopAnchor - instrument.stopDistance
      : stopAnchor + instrument.stopDistance;

    const risk = Math.abs(entry - stopLoss);
    const takeProfit = isLong
      ? entry + risk * this.config.rewardRisk
      : entry - risk * this.config.rewardRisk;
    const takeProfit1 = (entry + takeProfit) / 2;

    const confidence = this.calculateConfidence(side, cluster, footprint);

    const plan: TradePlan = {
      symbol: instrument.symbol,
      side,
      entry: roundTo(entry, instrument.precision),
      stopLoss: roundTo(stopLoss, instrument.precision),
      takeProfit: roundTo(takeProfit, instrument.precision),
      takeProfit1: roundTo(takeProfit1, instrument.precision),
      confidence,
      logic: this.describeLogic(side, input, nudged),
      sweepTimestamp: sweepCandle.timestamp,
      createdAt: input.createdAt,
    };

    this.logger.info('📐 Trade plan built', {
      symbol: plan.symbol,
      side: plan.side,
      entry: plan.entry,
      stopLoss: plan.stopLoss,
      takeProfit: plan.takeProfit,
      confidence: plan.confidence,
      nudged,
    });

    return plan;
  }

  /**
   * Midpoint of confirm close and sweep extreme, capped by a buffer beyond the confirm open,
   * and never beyond the sweep extreme itself
   */
  calculateEntryCandidate(side: PlanSide, sweepExtreme: number, input: TradePlanInput): number {
    const { confirmCandle } = input.sweep;
    const buffer = input.instrument.entryBuffer;
    const midpoint = (confirmCandle.close + sweepExtreme) / 2;

    if (side === PlanSide.LONG) {
      return Math.max(Math.min(midpoint, confirmCandle.open - buffer), sweepExtreme);
    }
    return Math.min(Math.max(midpoint, confirmCandle.open + buffer), sweepExtreme);
  }

  /**
   * Same-side cluster within one band of the entry: move one full band beyond it plus one tick
   */
  applyClusterNudge(
    side: PlanSide,
    entry: number,
    cluster: RetailCluster,
    tickSize: number,
  ): EntryDecision {
    if (cluster.side === ClusterSide.NONE || cluster.side !== entrySideOf(side)) {
      return { entry, nudged: false };
    }

    if (Math.abs(entry - cluster.clusterPrice) > cluster.band) {
      return { entry, nudged: false };
    }

    const nudgedEntry = side === PlanSide.LONG
      ? cluster.clusterPrice - cluster.band - tickSize
      : cluster.clusterPrice + cluster.band + tickSize;

    this.logger.debug('↪️ Entry nudged out of retail cluster', {
      side,
      from: entry,
      to: nudgedEntry,
      clusterPrice: cluster.clusterPrice,
      band: cluster.band,
    });

    return { entry: nudgedEntry, nudged: true };
  }

  calculateConfidence(side: PlanSide, cluster: RetailCluster, footprint: FootprintSignal): number {
    let score = CONFIDENCE_WEIGHTS.BASE + CONFIDENCE_WEIGHTS.PATTERN;

    if (footprint.footprint) {
      score += CONFIDENCE_WEIGHTS.FOOTPRINT;
    }
    if (cluster.side !== entrySideOf(side)) {
      score += CONFIDENCE_WEIGHTS.NO_CLUSTER;
    }

    const clamped = Math.min(Math.max(score, CONFIDENCE_BOUNDS.MIN), CONFIDENCE_BOUNDS.MAX);
    return roundTo(clamped, CONFIDENCE_DECIMALS);
  }

  private describeLogic(side: PlanSide, input: TradePlanInput, nudged: boolean): string {
    const parts = [
      side === PlanSide.LONG ? 'Sweep below prior lows + green confirmation' : 'Sweep above prior highs + red confirmation',
    ];

    if (input.zone) {
      parts.push(`range ${input.zone.recentLow}-${input.zone.recentHigh}`);
    }
    if (input.footprint.footprint) {
      parts.push('volume footprint');
    }
    if (input.cluster.side !== ClusterSide.NONE) {
      parts.push(`${input.cluster.side} cluster @ ${input.cluster.clusterPrice} (${input.cluster.count})`);
    }
    if (nudged) {
      parts.push('entry moved beyond cluster');
    }

    return parts.join(' | ');
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Cluster side whose stops sit on the entry side of a plan
 */
export function entrySideOf(side: PlanSide): ClusterSide.BUY | ClusterSide.SELL {
  return side === PlanSide.LONG ? ClusterSide.BUY : ClusterSide.SELL;
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
