/**
 * Test Data Helpers
 *
 * Common helper functions for creating test data
 */

import {
  Candle,
  CandleFeed,
  CandleInterval,
  Config,
  FeedError,
  FeedErrorKind,
  FeedResult,
  InstrumentConfig,
  LoggerService,
  LogLevel,
  Notifier,
  PlanSide,
  PriceResult,
  TradePlan,
} from '../../types';

export const BASE_TIMESTAMP = Date.UTC(2024, 0, 15, 10, 0, 0);
export const FIFTEEN_MINUTES_MS = 15 * 60 * 1000;

/**
 * Create a mock logger for tests
 */
export function createMockLogger(): LoggerService {
  return new LoggerService(LogLevel.ERROR, './logs', false);
}

/**
 * Create a simple test candle
 */
export function createTestCandle(
  timestamp: number,
  open: number,
  high: number,
  low: number,
  close: number,
  volume: number = 1000,
): Candle {
  return { timestamp, open, high, low, close, volume };
}

/**
 * Flat candles with no sweeps: every candle has the same range and a doji body
 */
export function createFlatCandles(
  count: number,
  basePrice: number = 1900,
  stepMs: number = FIFTEEN_MINUTES_MS,
): Candle[] {
  const candles: Candle[] = [];
  for (let i = 0; i < count; i++) {
    candles.push(createTestCandle(
      BASE_TIMESTAMP + i * stepMs,
      basePrice,
      basePrice + 1,
      basePrice - 1,
      basePrice,
    ));
  }
  return candles;
}

export function createTestInstrument(overrides: Partial<InstrumentConfig> = {}): InstrumentConfig {
  return {
    symbol: 'XAU/USD',
    stopDistance: 2,
    clusterBand: 0.5,
    tickSize: 0.01,
    entryBuffer: 0.1,
    precision: 3,
    ...overrides,
  };
}

export function createTestPlan(overrides: Partial<TradePlan> = {}): TradePlan {
  return {
    symbol: 'XAU/USD',
    side: PlanSide.LONG,
    entry: 1900,
    stopLoss: 1898,
    takeProfit: 1908,
    takeProfit1: 1904,
    confidence: 0.8,
    logic: 'Sweep below prior lows + green confirmation',
    sweepTimestamp: BASE_TIMESTAMP,
    createdAt: BASE_TIMESTAMP,
    ...overrides,
  };
}

export function createTestConfig(): Config {
  return {
    telegram: { enabled: false, timeoutMs: 10000 },
    feed: {
      apiKey: 'test-key',
      baseUrl: 'https://feed.test',
      timeoutMs: 12000,
      outputSize15m: 100,
      outputSize5m: 60,
      preSessionOutputSize: 96,
    },
    session: {
      utcOffsetMinutes: 300,
      start: '17:00',
      end: '22:00',
      preSessionAlert: '16:55',
      monitorIntervalMinutes: 5,
    },
    strategy: {
      sweepLookbackCandles: 12,
      minWickRatio: 0.4,
      clusterLookbackMinutes: 200,
      minClusterCount: 3,
      minClusterFraction: 0.08,
      footprintLookbackCandles: 8,
      footprintMinCandles: 6,
      volumeSpikeRatio: 1.5,
      rewardRisk: 4,
      triggerTolerance: 0.001,
      maxAlertsPerDay: 3,
    },
    instruments: [createTestInstrument()],
    logging: { level: 'ERROR', logDir: './logs', writeToFile: false },
  };
}

/**
 * In-memory CandleFeed keyed by symbol and interval
 */
export class FakeCandleFeed implements CandleFeed {
  readonly series = new Map<string, Candle[]>();
  readonly prices = new Map<string, number>();
  readonly failures = new Map<string, FeedErrorKind>();
  readonly calls: string[] = [];

  setSeries(symbol: string, interval: CandleInterval, candles: Candle[]): this {
    this.series.set(`${symbol}|${interval}`, candles);
    return this;
  }

  setPrice(symbol: string, price: number): this {
    this.prices.set(symbol, price);
    return this;
  }

  failWith(symbol: string, interval: CandleInterval, kind: FeedErrorKind): this {
    this.failures.set(`${symbol}|${interval}`, kind);
    return this;
  }

  async fetchSeries(symbol: string, interval: CandleInterval, count: number): Promise<FeedResult> {
    const key = `${symbol}|${interval}`;
    this.calls.push(key);

    const failure = this.failures.get(key);
    if (failure) {
      return { ok: false, error: new FeedError(failure, symbol, 'fake failure') };
    }
    return { ok: true, candles: (this.series.get(key) ?? []).slice(-count) };
  }

  async fetchLatestPrice(symbol: string): Promise<PriceResult> {
    const key = `${symbol}|${CandleInterval.ONE_MINUTE}`;
    this.calls.push(key);

    const failure = this.failures.get(key);
    if (failure) {
      return { ok: false, error: new FeedError(failure, symbol, 'fake failure') };
    }

    const price = this.prices.get(symbol);
    if (price === undefined) {
      return { ok: false, error: new FeedError(FeedErrorKind.MALFORMED, symbol, 'no price') };
    }
    return { ok: true, price };
  }
}

/**
 * Notifier that records every message
 */
export class FakeNotifier implements Notifier {
  readonly messages: string[] = [];

  constructor(private readonly delivered: boolean = true) {}

  async send(text: string): Promise<boolean> {
    this.messages.push(text);
    return this.delivered;
  }
}
