import { FeedErrorKind } from '../types/enums';

/**
 * Candle feed failure. Recoverable: the affected instrument is skipped for the cycle.
 */
export class FeedError extends Error {
  constructor(
    readonly kind: FeedErrorKind,
    readonly symbol: string,
    message: string,
  ) {
    super(`[${kind}] ${symbol}: ${message}`);
    this.name = 'FeedError';
  }
}
