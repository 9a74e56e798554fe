/**
 * Shared types for the liquidity sweep bot
 */

import {
  CandleInterval,
  ClusterSide,
  NoSignalReason,
  PlanSide,
  SetupState,
  SweepType,
} from './types/enums';
import { FeedError } from './utils/feed-error';

export * from './types/enums';
export { LoggerService } from './services/logger.service';
export { FeedError } from './utils/feed-error';

// ============================================================================
// MARKET DATA
// ============================================================================

/**
 * OHLCV sample. Series are ordered oldest first.
 */
export interface Candle {
  readonly timestamp: number; // ms, UTC
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export type FeedResult =
  | { ok: true; candles: Candle[] }
  | { ok: false; error: FeedError };

export type PriceResult =
  | { ok: true; price: number }
  | { ok: false; error: FeedError };

/**
 * Source of candle series
 */
export interface CandleFeed {
  fetchSeries(symbol: string, interval: CandleInterval, count: number): Promise<FeedResult>;
  fetchLatestPrice(symbol: string): Promise<PriceResult>;
}

/**
 * Outbound alert channel
 */
export interface Notifier {
  send(text: string): Promise<boolean>;
}

// ============================================================================
// ANALYSIS RESULTS
// ============================================================================

export interface LiquidityZone {
  recentLow: number;
  recentHigh: number;
  lastClose: number;
}

export interface NoSweepSignal {
  signal: false;
  reason: NoSignalReason;
}

export interface SweepSignal {
  signal: true;
  type: SweepType;
  sweepCandle: Candle;
  confirmCandle: Candle;
}

export type SweepDetection = NoSweepSignal | SweepSignal;

export type RetailCluster =
  | { side: ClusterSide.NONE; band: number }
  | {
      side: ClusterSide.BUY | ClusterSide.SELL;
      clusterPrice: number;
      count: number;
      band: number;
    };

export interface FootprintSignal {
  footprint: boolean;
  volume: number;
  meanVolume: number;
  directionAgreement: boolean;
}

// ============================================================================
// PLANS & LIFECYCLE
// ============================================================================

export interface TradePlan {
  readonly symbol: string;
  readonly side: PlanSide;
  readonly entry: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
  readonly takeProfit1: number;
  readonly confidence: number;
  readonly logic: string;
  readonly sweepTimestamp: number; // Timestamp of the sweep candle the plan came from
  readonly createdAt: number;
}

export interface Setup {
  symbol: string;
  state: SetupState;
  plan: TradePlan | null;
  sessionDate: string | null; // local YYYY-MM-DD the plan was armed on
}

export interface DailyAlertBudget {
  count: number;
  date: string | null;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface InstrumentConfig {
  symbol: string;          // Feed symbol, e.g. "XAU/USD"
  stopDistance: number;    // Absolute price distance beyond the sweep extreme (XAU: 20 pips = 2.0)
  clusterBand: number;     // Retail cluster band width (absolute price)
  tickSize: number;        // Minimal price offset used by the anti-cluster nudge
  entryBuffer: number;     // Buffer beyond the confirm candle's open
  precision: number;       // Decimal places for plan prices
}

export interface TelegramConfig {
  botToken?: string;
  chatId?: string;
  enabled: boolean;
  timeoutMs: number;
}

export interface FeedConfig {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  outputSize15m: number;
  outputSize5m: number;
  preSessionOutputSize: number;
}

export interface SessionConfig {
  utcOffsetMinutes: number; // Local zone of the session times
  start: string;            // "HH:MM" local
  end: string;              // "HH:MM" local
  preSessionAlert: string;  // "HH:MM" local
  monitorIntervalMinutes: number;
}

export interface StrategyConfig {
  sweepLookbackCandles: number;
  minWickRatio: number;
  clusterLookbackMinutes: number;
  minClusterCount: number;
  minClusterFraction: number;
  footprintLookbackCandles: number;
  footprintMinCandles: number;
  volumeSpikeRatio: number;
  rewardRisk: number;
  triggerTolerance: number;
  maxAlertsPerDay: number;
}

export interface LoggingConfig {
  level: LogLevelName;
  logDir: string;
  writeToFile: boolean;
}

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface Config {
  telegram: TelegramConfig;
  feed: FeedConfig;
  session: SessionConfig;
  strategy: StrategyConfig;
  instruments: InstrumentConfig[];
  logging: LoggingConfig;
}
