/**
 * Retail Cluster Detector
 *
 * Approximates where retail stop-losses sit by finding the price band in which
 * the most recent highs (SELL side) or lows (BUY side) concentrate.
 * The plan builder uses it to keep entries out of the band.
 *
 * Density scan is O(n^2) over a window of a few dozen candles.
 */

import { Candle, ClusterSide, LoggerService, RetailCluster } from '../types';
import { CLUSTER_CANDLE_MINUTES, DECIMAL_PLACES } from '../constants';

export interface RetailClusterDetectorConfig {
  minClusterCount: number;    // Absolute floor of the qualifying count
  minClusterFraction: number; // Fraction of the sample size (0.08 = 8%)
  candleMinutes: number;      // Interval of the input series
}

const DEFAULT_CONFIG: RetailClusterDetectorConfig = {
  minClusterCount: 3,
  minClusterFraction: 0.08,
  candleMinutes: CLUSTER_CANDLE_MINUTES,
};

interface DensityPeak {
  center: number;
  count: number;
}

export class RetailClusterDetector {
  private config: RetailClusterDetectorConfig;

  constructor(
    private logger: LoggerService,
    config?: Partial<RetailClusterDetectorConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * @param candles 5m series (oldest first)
   * @param band Band width in absolute price
   * @param lookbackMinutes How far back to sample
   */
  detect(candles: readonly Candle[], band: number, lookbackMinutes: number): RetailCluster {
    const sampleSize = Math.floor(lookbackMinutes / this.config.candleMinutes);
    const sample = sampleSize > 0 ? candles.slice(-sampleSize) : [];

    if (sample.length === 0) {
      return { side: ClusterSide.NONE, band };
    }

    const threshold = this.getThreshold(sample.length);
    const highPeak = this.findDensityPeak(sample.map(c => c.high), band);
    const lowPeak = this.findDensityPeak(sample.map(c => c.low), band);

    // Highs take priority when both sides qualify
    if (highPeak.count >= threshold) {
      return this.report(ClusterSide.SELL, highPeak, band, threshold);
    }

    if (lowPeak.count >= threshold) {
      return this.report(ClusterSide.BUY, lowPeak, band, threshold);
    }

    this.logger.debug('No retail cluster', {
      sample: sample.length,
      threshold,
      bestHighCount: highPeak.count,
      bestLowCount: lowPeak.count,
    });

    return { side: ClusterSide.NONE, band };
  }

  /**
   * max(minClusterCount, floor(fraction * n))
   */
  getThreshold(sampleSize: number): number {
    return Math.max(
      this.config.minClusterCount,
      Math.floor(this.config.minClusterFraction * sampleSize),
    );
  }

  /**
   * First value with the highest neighbour count inside +-band/2
   */
  private findDensityPeak(values: number[], band: number): DensityPeak {
    const halfBand = band / 2;
    let best: DensityPeak = { center: values[0], count: 0 };

    for (const center of values) {
      let count = 0;
      for (const value of values) {
        if (Math.abs(value - center) <= halfBand) {
          count++;
        }
      }
      if (count > best.count) {
        best = { center, count };
      }
    }

    return best;
  }

  private report(
    side: ClusterSide.BUY | ClusterSide.SELL,
    peak: DensityPeak,
    band: number,
    threshold: number,
  ): RetailCluster {
    this.logger.debug('🧲 Retail cluster found', {
      side,
      clusterPrice: peak.center.toFixed(DECIMAL_PLACES.PRICE),
      count: peak.count,
      threshold,
    });

    return { side, clusterPrice: peak.center, count: peak.count, band };
  }
}
