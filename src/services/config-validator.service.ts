/**
 * Config Validator Service
 *
 * Validates that all required configuration sections exist before the bot starts.
 * Fails fast with one error listing every problem instead of silent fallbacks.
 *
 * Checks:
 * - Required fields present with the right type
 * - Ranges (ratios 0-1, positive distances, alert cap >= 1)
 * - HH:MM clock strings
 * - Per-instrument settings that would break the plan ordering
 */

import { Config } from '../types';
import { parseClock } from '../utils/session-window';

const REQUIRED_NUMBERS = [
  'telegram.timeoutMs',
  'feed.timeoutMs',
  'feed.outputSize15m',
  'feed.outputSize5m',
  'feed.preSessionOutputSize',
  'session.utcOffsetMinutes',
  'session.monitorIntervalMinutes',
  'strategy.sweepLookbackCandles',
  'strategy.minWickRatio',
  'strategy.clusterLookbackMinutes',
  'strategy.minClusterCount',
  'strategy.minClusterFraction',
  'strategy.footprintLookbackCandles',
  'strategy.footprintMinCandles',
  'strategy.volumeSpikeRatio',
  'strategy.rewardRisk',
  'strategy.triggerTolerance',
  'strategy.maxAlertsPerDay',
];

const REQUIRED_STRINGS = [
  'feed.baseUrl',
  'session.start',
  'session.end',
  'session.preSessionAlert',
  'logging.level',
  'logging.logDir',
];

const REQUIRED_BOOLEANS = ['telegram.enabled', 'logging.writeToFile'];

const CLOCK_FIELDS = ['session.start', 'session.end', 'session.preSessionAlert'];

const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

const INSTRUMENT_NUMBERS = ['stopDistance', 'clusterBand', 'tickSize', 'entryBuffer', 'precision'];

// Lower bound of the monitoring interval, keeps the data provider's rate limit
const MIN_MONITOR_INTERVAL_MINUTES = 1;

export class ConfigValidatorService {
  /**
   * Static validation for use at startup (before logger is available)
   * Throws on failure with detailed error message
   */
  static validateAtStartup(config: unknown): asserts config is Config {
    const errors = ConfigValidatorService.collectErrors(config);

    if (errors.length > 0) {
      const errorMessage = `
═══════════════════════════════════════════════════════════════
❌ CONFIGURATION ERROR - FAST FAIL AT STARTUP
═══════════════════════════════════════════════════════════════

${errors.map((e, i) => `${i + 1}. ${e}`).join('\n')}

═══════════════════════════════════════════════════════════════
FIX: Update your config.json and restart.
═══════════════════════════════════════════════════════════════
      `;
      throw new Error(errorMessage);
    }
  }

  static collectErrors(config: unknown): string[] {
    const errors: string[] = [];
    const get = (path: string): unknown => ConfigValidatorService.getPathStatic(config, path);

    // 1. Required fields
    for (const field of REQUIRED_NUMBERS) {
      const value = get(field);
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        errors.push(`REQUIRED FIELD MISSING: "${field}" (number)`);
      }
    }
    for (const field of REQUIRED_STRINGS) {
      const value = get(field);
      if (typeof value !== 'string' || value === '') {
        errors.push(`REQUIRED FIELD MISSING: "${field}" (string)`);
      }
    }
    for (const field of REQUIRED_BOOLEANS) {
      if (typeof get(field) !== 'boolean') {
        errors.push(`REQUIRED FIELD MISSING: "${field}" (true/false)`);
      }
    }

    // 2. Formats
    for (const field of CLOCK_FIELDS) {
      const value = get(field);
      if (typeof value === 'string' && value !== '') {
        try {
          parseClock(value);
        } catch (error) {
          errors.push(`INVALID FORMAT: "${field}" = "${value}" (must be HH:MM)`);
        }
      }
    }

    const level = get('logging.level');
    if (typeof level === 'string' && level !== '' && !LOG_LEVELS.includes(level)) {
      errors.push(`INVALID: logging.level = "${level}" (one of ${LOG_LEVELS.join(', ')})`);
    }

    // 3. Ranges
    const check = (path: string, valid: (v: number) => boolean, rule: string): void => {
      const value = get(path);
      if (typeof value === 'number' && !valid(value)) {
        errors.push(`INVALID: ${path} = ${value} (${rule})`);
      }
    };

    check('strategy.minWickRatio', v => v > 0 && v < 1, 'must be between 0 and 1');
    check('strategy.minClusterFraction', v => v >= 0 && v <= 1, 'must be 0-1, not 0-100');
    check('strategy.triggerTolerance', v => v > 0 && v < 1, 'relative distance, e.g. 0.001 = 0.1%');
    check('strategy.rewardRisk', v => v > 0, 'must be > 0');
    check('strategy.volumeSpikeRatio', v => v > 0, 'must be > 0');
    check('strategy.maxAlertsPerDay', v => Number.isInteger(v) && v >= 1, 'integer >= 1');
    check('strategy.sweepLookbackCandles', v => Number.isInteger(v) && v >= 2, 'integer >= 2');
    check('strategy.footprintMinCandles', v => Number.isInteger(v) && v >= 2, 'integer >= 2');
    check('strategy.clusterLookbackMinutes', v => v >= 5, 'at least one 5m candle');
    check('session.monitorIntervalMinutes', v => v >= MIN_MONITOR_INTERVAL_MINUTES, `>= ${MIN_MONITOR_INTERVAL_MINUTES}`);

    const footprintLookback = get('strategy.footprintLookbackCandles');
    const footprintMin = get('strategy.footprintMinCandles');
    if (typeof footprintLookback === 'number' && typeof footprintMin === 'number' && footprintMin > footprintLookback) {
      errors.push('INVALID: strategy.footprintMinCandles must not exceed strategy.footprintLookbackCandles');
    }

    const sweepLookback = get('strategy.sweepLookbackCandles');
    const outputSize15m = get('feed.outputSize15m');
    if (typeof sweepLookback === 'number' && typeof outputSize15m === 'number' && outputSize15m < sweepLookback + 2) {
      errors.push('INVALID: feed.outputSize15m must be at least strategy.sweepLookbackCandles + 2');
    }

    // 4. Instruments
    errors.push(...ConfigValidatorService.collectInstrumentErrors(get('instruments')));

    return errors;
  }

  private static collectInstrumentErrors(instruments: unknown): string[] {
    if (!Array.isArray(instruments) || instruments.length === 0) {
      return ['REQUIRED FIELD MISSING: "instruments" (non-empty array)'];
    }

    const errors: string[] = [];
    instruments.forEach((instrument: unknown, index: number) => {
      const prefix = `instruments[${index}]`;
      const get = (path: string): unknown => ConfigValidatorService.getPathStatic(instrument, path);

      const symbol = get('symbol');
      if (typeof symbol !== 'string' || symbol === '') {
        errors.push(`REQUIRED FIELD MISSING: "${prefix}.symbol" (string)`);
      }

      for (const field of INSTRUMENT_NUMBERS) {
        const value = get(field);
        if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
          errors.push(`REQUIRED FIELD MISSING: "${prefix}.${field}" (number >= 0)`);
        }
      }

      const stopDistance = get('stopDistance');
      const entryBuffer = get('entryBuffer');
      const tickSize = get('tickSize');
      if (typeof stopDistance === 'number' && stopDistance <= 0) {
        errors.push(`INVALID: ${prefix}.stopDistance = ${stopDistance} (must be > 0)`);
      }
      if (typeof stopDistance === 'number' && typeof entryBuffer === 'number' && entryBuffer >= stopDistance) {
        errors.push(`INVALID: ${prefix}.entryBuffer must be smaller than stopDistance`);
      }

      const precision = get('precision');
      if (typeof precision === 'number' && !Number.isInteger(precision)) {
        errors.push(`INVALID: ${prefix}.precision = ${precision} (integer decimals)`);
        return;
      }
      if (typeof precision !== 'number' || precision < 0) return;

      // Smallest price step that survives rounding to `precision` decimals
      const unit = 1 / 10 ** precision;
      if (typeof tickSize === 'number' && tickSize < unit) {
        errors.push(`INVALID: ${prefix}.tickSize = ${tickSize} (must be at least ${unit} at precision ${precision})`);
      }
      if (typeof stopDistance === 'number' && stopDistance > 0 && stopDistance <= unit) {
        errors.push(`INVALID: ${prefix}.stopDistance = ${stopDistance} (must exceed ${unit} at precision ${precision})`);
      }
    });

    return errors;
  }

  private static getPathStatic(obj: unknown, path: string): unknown {
    let current: unknown = obj;
    for (const part of path.split('.')) {
      if (typeof current !== 'object' || current === null) return undefined;
      current = Reflect.get(current, part);
    }
    return current;
  }
}
