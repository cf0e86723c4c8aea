// ============================================================================
// RFLocate — Log-distance Path Loss Model
// ============================================================================
import type { PathLossConfig } from '@rflocate/shared';
import { DEFAULT_PATH_LOSS_CONFIG } from '@rflocate/shared';
import { InvalidConfigError } from './errors.js';

export function validatePathLossConfig(config: PathLossConfig): PathLossConfig {
  if (!(config.exponent > 0) || !Number.isFinite(config.exponent)) {
    throw new InvalidConfigError(`Path loss exponent must be a positive number, got ${config.exponent}`);
  }
  if (!(config.referenceDistance > 0) || !Number.isFinite(config.referenceDistance)) {
    throw new InvalidConfigError(`Reference distance must be a positive number, got ${config.referenceDistance}`);
  }
  if (!Number.isFinite(config.referenceRssi)) {
    throw new InvalidConfigError(`Reference RSSI must be a finite number, got ${config.referenceRssi}`);
  }
  return config;
}

/**
 * Converts between received power and distance:
 *   RSSI(d) = RSSI0 - 10 * n * log10(d / d0)
 */
export class PathLossModel {
  readonly config: Readonly<PathLossConfig>;

  constructor(config: Partial<PathLossConfig> = {}) {
    this.config = Object.freeze(validatePathLossConfig({ ...DEFAULT_PATH_LOSS_CONFIG, ...config }));
  }

  /** Never reports a distance closer than the calibration point. */
  rssiToDistance(rssi: number): number {
    const { exponent, referenceDistance, referenceRssi } = this.config;
    if (rssi >= referenceRssi) return referenceDistance;
    return referenceDistance * Math.pow(10, (referenceRssi - rssi) / (10 * exponent));
  }

  distanceToRssi(distance: number): number {
    const { exponent, referenceDistance, referenceRssi } = this.config;
    if (distance <= 0) return referenceRssi;
    return referenceRssi - 10 * exponent * Math.log10(distance / referenceDistance);
  }
}
