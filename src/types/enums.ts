/**
 * Liquidity Sweep Bot - All Enums
 * Centralized enum definitions for type safety
 */

// ============================================================================
// DIRECTION ENUMS
// ============================================================================

/**
 * Side of an advisory trade plan
 */
export enum PlanSide {
  LONG = 'LONG',
  SHORT = 'SHORT',
}

/**
 * Which sweep shapes the detector looks for
 */
export enum SweepBias {
  LONG = 'LONG',
  SHORT = 'SHORT',
  BOTH = 'BOTH',
}

// ============================================================================
// PATTERN ENUMS
// ============================================================================

/**
 * Sweep type
 * BULLISH_SWEEP: low pierced both neighbours, then a green confirmation
 * BEARISH_SWEEP: high pierced both neighbours, then a red confirmation
 */
export enum SweepType {
  BULLISH_SWEEP = 'BULLISH_SWEEP',
  BEARISH_SWEEP = 'BEARISH_SWEEP',
}

/**
 * Why the sweep detector returned no signal
 */
export enum NoSignalReason {
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',
  NO_PATTERN = 'NO_PATTERN',
}

/**
 * Side of a retail stop cluster
 * SELL: highs concentrate (stops likely above)
 * BUY: lows concentrate (stops likely below)
 */
export enum ClusterSide {
  BUY = 'BUY',
  SELL = 'SELL',
  NONE = 'NONE',
}

// ============================================================================
// LIFECYCLE ENUMS
// ============================================================================

/**
 * Setup slot state per instrument
 */
export enum SetupState {
  EMPTY = 'EMPTY',
  ARMED = 'ARMED',
  TRIGGERED = 'TRIGGERED',
}

/**
 * Outcome of arming a new plan
 */
export enum ArmOutcome {
  ARMED = 'ARMED',
  REJECTED = 'REJECTED',
  REPLACED = 'REPLACED',
  DUPLICATE = 'DUPLICATE',
}

/**
 * Outcome of checking live price against an armed plan
 */
export enum PriceCheckOutcome {
  IDLE = 'IDLE',
  WAITING = 'WAITING',
  TRIGGERED = 'TRIGGERED',
  SUPPRESSED = 'SUPPRESSED',
}

// ============================================================================
// FEED & LOGGING ENUMS
// ============================================================================

/**
 * Candle feed failure kinds
 */
export enum FeedErrorKind {
  TRANSPORT = 'TRANSPORT',
  TIMEOUT = 'TIMEOUT',
  MALFORMED = 'MALFORMED',
}

/**
 * Candle intervals requested from the feed
 */
export enum CandleInterval {
  ONE_MINUTE = '1min',
  FIVE_MINUTES = '5min',
  FIFTEEN_MINUTES = '15min',
}

/**
 * Log level
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}
