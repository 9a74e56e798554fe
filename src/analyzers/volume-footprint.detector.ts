/**
 * Volume Footprint Detector
 * Flags an abnormal volume spike on the newest candle. Supplementary evidence only.
 */

import { Candle, FootprintSignal, LoggerService } from '../types';

export interface VolumeFootprintConfig {
  lookbackCandles: number;
  minCandles: number;
  spikeRatio: number;
}

const DEFAULT_CONFIG: VolumeFootprintConfig = {
  lookbackCandles: 8,
  minCandles: 6,
  spikeRatio: 1.5,
};

const NO_FOOTPRINT: FootprintSignal = {
  footprint: false,
  volume: 0,
  meanVolume: 0,
  directionAgreement: false,
};

export class VolumeFootprintDetector {
  private config: VolumeFootprintConfig;

  constructor(private logger: LoggerService, config: Partial<VolumeFootprintConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  detect(candles: readonly Candle[]): FootprintSignal {
    const window = candles.slice(-this.config.lookbackCandles);
    const newest = window[window.length - 1];

    // FX feeds often report zero volume; such candles carry nothing to measure
    if (window.length === 0 || !(newest.volume > 0)) {
      return { ...NO_FOOTPRINT };
    }

    const withVolume = window.filter(c => c.volume > 0);
    if (withVolume.length < this.config.minCandles) {
      return { ...NO_FOOTPRINT };
    }

    const previous = window[window.length - 2];
    const preceding = withVolume.slice(0, -1);
    const meanVolume = preceding.reduce((sum, c) => sum + c.volume, 0) / preceding.length;

    const footprint = newest.volume > meanVolume * this.config.spikeRatio;
    const newestDirection = Math.sign(newest.close - newest.open);
    const directionAgreement =
      newestDirection !== 0 && newestDirection === Math.sign(previous.close - previous.open);

    if (footprint) {
      this.logger.debug('👣 Volume footprint', {
        volume: newest.volume,
        meanVolume: meanVolume.toFixed(2),
        directionAgreement,
      });
    }

    return { footprint, volume: newest.volume, meanVolume, directionAgreement };
  }
}
