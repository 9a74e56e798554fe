/**
 * Sweep Detector (Liquidity Grab Detection)
 *
 * Detects a false breakout followed by a reversal confirmation.
 *
 * BULLISH_SWEEP: candle low pierces both neighbouring lows, then price reverses
 * - Lower wick dominates the candle range (sharp rejection)
 * - Next candle closes green (confirmation)
 *
 * BEARISH_SWEEP: candle high pierces both neighbouring highs, then price drops
 * - Upper wick dominates the candle range
 * - Next candle closes red (confirmation)
 *
 * Scan order is oldest -> newest inside the window and the FIRST match wins,
 * so the oldest qualifying sweep is reported.
 */

import {
  Candle,
  LoggerService,
  NoSignalReason,
  SweepBias,
  SweepDetection,
  SweepType,
} from '../types';
import { DECIMAL_PLACES, SWEEP_NEIGHBOUR_CANDLES } from '../constants';

export interface SweepDetectorConfig {
  lookbackCandles: number; // Window = newest lookback + 1 candles
  minWickRatio: number;    // Sweep-side wick / candle range must exceed this
}

// Default configuration
const DEFAULT_CONFIG: SweepDetectorConfig = {
  lookbackCandles: 12,
  minWickRatio: 0.4,
};

export class SweepDetector {
  private config: SweepDetectorConfig;

  constructor(
    private logger: LoggerService,
    config?: Partial<SweepDetectorConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Scan the newest window for a sweep + confirmation pair
   * @param candles 15m series (oldest first)
   * @param bias Which sweep shapes to look for
   */
  detect(candles: readonly Candle[], bias: SweepBias = SweepBias.BOTH): SweepDetection {
    const { lookbackCandles } = this.config;

    if (candles.length < lookbackCandles + SWEEP_NEIGHBOUR_CANDLES) {
      return { signal: false, reason: NoSignalReason.INSUFFICIENT_DATA };
    }

    const window = candles.slice(-(lookbackCandles + 1));

    for (let i = 1; i < window.length - 1; i++) {
      const prev = window[i - 1];
      const candle = window[i];
      const next = window[i + 1];

      if (bias !== SweepBias.SHORT && this.isBullishSweep(prev, candle, next)) {
        this.logSweep(SweepType.BULLISH_SWEEP, candle, next);
        return { signal: true, type: SweepType.BULLISH_SWEEP, sweepCandle: candle, confirmCandle: next };
      }

      if (bias !== SweepBias.LONG && this.isBearishSweep(prev, candle, next)) {
        this.logSweep(SweepType.BEARISH_SWEEP, candle, next);
        return { signal: true, type: SweepType.BEARISH_SWEEP, sweepCandle: candle, confirmCandle: next };
      }
    }

    return { signal: false, reason: NoSignalReason.NO_PATTERN };
  }

  /**
   * Local minimum + dominant lower wick + green confirmation
   */
  private isBullishSweep(prev: Candle, candle: Candle, next: Candle): boolean {
    if (!(candle.low < prev.low && candle.low < next.low)) {
      return false;
    }

    const range = candle.high - candle.low;
    if (range <= 0) {
      return false;
    }

    const lowerWick = Math.min(candle.open, candle.close) - candle.low;
    return lowerWick / range > this.config.minWickRatio && next.close > next.open;
  }

  /**
   * Local maximum + dominant upper wick + red confirmation
   */
  private isBearishSweep(prev: Candle, candle: Candle, next: Candle): boolean {
    if (!(candle.high > prev.high && candle.high > next.high)) {
      return false;
    }

    const range = candle.high - candle.low;
    if (range <= 0) {
      return false;
    }

    const upperWick = candle.high - Math.max(candle.open, candle.close);
    return upperWick / range > this.config.minWickRatio && next.close < next.open;
  }

  private logSweep(type: SweepType, sweepCandle: Candle, confirmCandle: Candle): void {
    this.logger.debug('🎯 Sweep detected', {
      type,
      sweepTime: new Date(sweepCandle.timestamp).toISOString(),
      sweepPrice: (type === SweepType.BULLISH_SWEEP ? sweepCandle.low : sweepCandle.high)
        .toFixed(DECIMAL_PLACES.PRICE),
      confirmClose: confirmCandle.close.toFixed(DECIMAL_PLACES.PRICE),
    });
  }
}
