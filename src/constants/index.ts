/**
 * Technical Constants
 *
 * IMPORTANT: This file contains ONLY technical/mathematical constants that NEVER change.
 * - Time units (milliseconds)
 * - Decimal precision for log/message output
 * - Fixed confidence weights of the plan score
 *
 * DO NOT add configurable parameters here! Use config.json instead.
 * Configurable: lookbacks, band widths, volume ratio, RR, stop distances, alert cap, session.
 */

// ============================================================================
// BASIC MATH & PERCENT
// ============================================================================

export const PERCENT_MULTIPLIER = 100;

export const DECIMAL_PLACES = {
  PRICE: 4,
} as const;

// ============================================================================
// TIME UNITS (in milliseconds) - NEVER CHANGE
// ============================================================================

export const TIME_UNITS = {
  /** 1 second = 1000 ms */
  SECOND: 1000,
  /** 1 minute = 60000 ms */
  MINUTE: 60 * 1000,
  /** 1 hour = 3600000 ms */
  HOUR: 60 * 60 * 1000,
  /** 1 day = 86400000 ms */
  DAY: 24 * 60 * 60 * 1000,
} as const;

export const MINUTES_PER_DAY = 24 * 60;

/** Interval of the daily-job clock check */
export const DAILY_JOB_CHECK_MS = 30 * TIME_UNITS.SECOND;

// ============================================================================
// CONFIDENCE SCORE (fixed additive weights)
// ============================================================================

export const CONFIDENCE_WEIGHTS = {
  /** Starting score of every plan */
  BASE: 0.5,
  /** A qualifying sweep + confirmation exists */
  PATTERN: 0.2,
  /** Volume spike on the newest 5m candle */
  FOOTPRINT: 0.15,
  /** No retail cluster competing on the entry side */
  NO_CLUSTER: 0.1,
} as const;

export const CONFIDENCE_BOUNDS = {
  MIN: 0,
  MAX: 0.95,
} as const;

// ============================================================================
// DETECTOR MINIMUMS
// ============================================================================

/** Candles around each sweep candidate: previous + next */
export const SWEEP_NEIGHBOUR_CANDLES = 2;

/** Minutes per candle of the cluster series */
export const CLUSTER_CANDLE_MINUTES = 5;
