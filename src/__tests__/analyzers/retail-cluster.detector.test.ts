import { RetailClusterDetector } from '../../analyzers/retail-cluster.detector';
import { Candle, ClusterSide } from '../../types';
import { BASE_TIMESTAMP, createMockLogger, createTestCandle } from '../helpers/test-data.helper';

const FIVE_MINUTES_MS = 5 * 60 * 1000;

/**
 * Candles whose highs and lows are all at least 1.0 apart (no natural clusters)
 */
function createSpreadCandles(count: number, lowBase: number, highBase: number): Candle[] {
  const candles: Candle[] = [];
  for (let i = 0; i < count; i++) {
    const high = highBase + i;
    const low = lowBase + i;
    candles.push(createTestCandle(BASE_TIMESTAMP + i * FIVE_MINUTES_MS, low + 0.5, high, low, low + 0.5));
  }
  return candles;
}

function withHigh(candle: Candle, high: number, low: number): Candle {
  return createTestCandle(candle.timestamp, low + 0.5, high, low, low + 0.5);
}

describe('RetailClusterDetector', () => {
  let detector: RetailClusterDetector;

  beforeEach(() => {
    detector = new RetailClusterDetector(createMockLogger());
  });

  describe('getThreshold', () => {
    it('should use max(minClusterCount, floor(fraction * n))', () => {
      expect(detector.getThreshold(10)).toBe(3);
      expect(detector.getThreshold(40)).toBe(3);
      expect(detector.getThreshold(100)).toBe(8);
    });
  });

  describe('SELL cluster (highs)', () => {
    // 40 candles, 5 highs within a 0.15 band around 1950.0
    const buildSellWindow = (): Candle[] => {
      const candles = createSpreadCandles(40, 1898, 1900);
      const clusterHighs: Array<[number, number, number]> = [
        [5, 1950.0, 1944],
        [12, 1950.05, 1945],
        [20, 1949.95, 1946],
        [27, 1950.07, 1947],
        [33, 1949.93, 1948],
      ];
      for (const [index, high, low] of clusterHighs) {
        candles[index] = withHigh(candles[index], high, low);
      }
      return candles;
    };

    it('should report the band where highs concentrate', () => {
      const result = detector.detect(buildSellWindow(), 0.15, 200);

      expect(result).toEqual({ side: ClusterSide.SELL, clusterPrice: 1950.0, count: 5, band: 0.15 });
    });

    it('should only sample the lookback window', () => {
      // 35 minutes = newest 7 candles, one clustered high among them
      const result = detector.detect(buildSellWindow(), 0.15, 35);

      expect(result).toEqual({ side: ClusterSide.NONE, band: 0.15 });
    });
  });

  describe('BUY cluster (lows)', () => {
    it('should report the band where lows concentrate', () => {
      const candles = createSpreadCandles(20, 1900, 1920);
      candles[3] = createTestCandle(candles[3].timestamp, 1895, 1923, 1890.0, 1895);
      candles[9] = createTestCandle(candles[9].timestamp, 1895, 1929, 1890.02, 1895);
      candles[15] = createTestCandle(candles[15].timestamp, 1895, 1935, 1889.98, 1895);

      const result = detector.detect(candles, 0.15, 100);

      expect(result).toEqual({ side: ClusterSide.BUY, clusterPrice: 1890.0, count: 3, band: 0.15 });
    });
  });

  it('should prefer the SELL side when both sides qualify', () => {
    const candles = createSpreadCandles(20, 1900, 1920);
    for (const index of [2, 8, 14]) {
      candles[index] = createTestCandle(candles[index].timestamp, 1885, 1960, 1880, 1885);
    }

    const result = detector.detect(candles, 0.15, 100);

    expect(result).toEqual({ side: ClusterSide.SELL, clusterPrice: 1960, count: 3, band: 0.15 });
  });

  it('should report NONE when no band reaches the threshold', () => {
    const result = detector.detect(createSpreadCandles(20, 1900, 1920), 0.15, 100);

    expect(result).toEqual({ side: ClusterSide.NONE, band: 0.15 });
  });

  it('should report NONE for an empty series', () => {
    expect(detector.detect([], 0.15, 200)).toEqual({ side: ClusterSide.NONE, band: 0.15 });
  });

  it('should report NONE when the lookback is shorter than one candle', () => {
    const candles = createSpreadCandles(20, 1900, 1920);

    expect(detector.detect(candles, 0.15, 4)).toEqual({ side: ClusterSide.NONE, band: 0.15 });
  });

  it('should honour a custom minimum count', () => {
    const strict = new RetailClusterDetector(createMockLogger(), { minClusterCount: 4 });
    const candles = createSpreadCandles(20, 1900, 1920);
    for (const index of [2, 8, 14]) {
      candles[index] = withHigh(candles[index], 1960, 1900 + index);
    }

    expect(strict.detect(candles, 0.15, 100)).toEqual({ side: ClusterSide.NONE, band: 0.15 });
    expect(detector.detect(candles, 0.15, 100).side).toBe(ClusterSide.SELL);
  });
});
