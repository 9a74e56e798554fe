/**
 * Twelve Data Candle Feed
 *
 * REST client for the `time_series` endpoint.
 * - Upstream returns newest first; series are reversed to oldest first
 * - Every call has an explicit timeout
 * - Failures come back as FeedResult errors, never as throws
 */

import axios, { AxiosInstance } from 'axios';
import {
  Candle,
  CandleFeed,
  CandleInterval,
  FeedConfig,
  FeedError,
  FeedErrorKind,
  FeedResult,
  LoggerService,
  PriceResult,
} from '../types';
import { extractErrorMessage } from '../utils/error-helper';

export type HttpClient = Pick<AxiosInstance, 'get'>;

const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class TwelveDataFeedService implements CandleFeed {
  constructor(
    private readonly config: FeedConfig,
    private readonly logger: LoggerService,
    private readonly http: HttpClient = axios.create(),
  ) {}

  async fetchSeries(symbol: string, interval: CandleInterval, count: number): Promise<FeedResult> {
    let data: unknown;

    try {
      const response = await this.http.get<unknown>(`${this.config.baseUrl}/time_series`, {
        params: {
          symbol,
          interval,
          outputsize: count,
          format: 'JSON',
          timezone: 'UTC',
          apikey: this.config.apiKey,
        },
        timeout: this.config.timeoutMs,
      });
      data = response.data;
    } catch (error) {
      return this.fail(this.classifyTransportError(error), symbol, extractErrorMessage(error));
    }

    if (typeof data !== 'object' || data === null || !('values' in data) || !Array.isArray(data.values)) {
      return this.fail(FeedErrorKind.MALFORMED, symbol, `Twelve Data error: ${JSON.stringify(data)}`);
    }

    const candles: Candle[] = [];
    for (const raw of data.values) {
      const candle = parseCandle(raw);
      if (!candle) {
        return this.fail(FeedErrorKind.MALFORMED, symbol, `Unparseable candle: ${JSON.stringify(raw)}`);
      }
      candles.push(candle);
    }

    candles.reverse();

    this.logger.debug('📥 Candles fetched', { symbol, interval, count: candles.length });
    return { ok: true, candles };
  }

  /**
   * Close of the newest 1-minute candle
   */
  async fetchLatestPrice(symbol: string): Promise<PriceResult> {
    const result = await this.fetchSeries(symbol, CandleInterval.ONE_MINUTE, 1);
    if (!result.ok) {
      return result;
    }

    const newest = result.candles[result.candles.length - 1];
    if (!newest) {
      return this.fail(FeedErrorKind.MALFORMED, symbol, 'Empty 1min series');
    }
    return { ok: true, price: newest.close };
  }

  private classifyTransportError(error: unknown): FeedErrorKind {
    if (axios.isAxiosError(error) && error.code !== undefined && TIMEOUT_ERROR_CODES.has(error.code)) {
      return FeedErrorKind.TIMEOUT;
    }
    return FeedErrorKind.TRANSPORT;
  }

  private fail(kind: FeedErrorKind, symbol: string, message: string): { ok: false; error: FeedError } {
    const error = new FeedError(kind, symbol, message);
    this.logger.warn('⚠️ Candle feed failure', { symbol, kind, message });
    return { ok: false, error };
  }
}

/**
 * Twelve Data sends prices as strings and omits volume for most FX symbols
 */
export function parseCandle(raw: unknown): Candle | null {
  if (typeof raw !== 'object' || raw === null) {
    return null;
  }

  const datetime: unknown = Reflect.get(raw, 'datetime');
  const volume: unknown = Reflect.get(raw, 'volume');
  if (typeof datetime !== 'string') {
    return null;
  }

  const timestamp = Date.parse(datetime.includes(' ') ? `${datetime.replace(' ', 'T')}Z` : `${datetime}T00:00:00Z`);
  const candle: Candle = {
    timestamp,
    open: toNumber(Reflect.get(raw, 'open')),
    high: toNumber(Reflect.get(raw, 'high')),
    low: toNumber(Reflect.get(raw, 'low')),
    close: toNumber(Reflect.get(raw, 'close')),
    volume: volume === undefined || volume === null || volume === '' ? 0 : toNumber(volume),
  };

  const values = [candle.timestamp, candle.open, candle.high, candle.low, candle.close, candle.volume];
  if (values.some(v => !Number.isFinite(v)) || candle.volume < 0) {
    return null;
  }

  return candle;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return NaN;
}
