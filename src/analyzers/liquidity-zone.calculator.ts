/**
 * Liquidity Zone Calculator
 *
 * Reduces a candle window to the recent extremes and the last close.
 * Used by the pre-session snapshot and logged on every monitoring cycle.
 */

import { Candle, LiquidityZone } from '../types';

/**
 * @returns null for an empty window
 */
export function calculateLiquidityZone(candles: readonly Candle[]): LiquidityZone | null {
  if (candles.length === 0) {
    return null;
  }

  let recentLow = candles[0].low;
  let recentHigh = candles[0].high;

  for (const candle of candles) {
    if (candle.low < recentLow) recentLow = candle.low;
    if (candle.high > recentHigh) recentHigh = candle.high;
  }

  return {
    recentLow,
    recentHigh,
    lastClose: candles[candles.length - 1].close,
  };
}
