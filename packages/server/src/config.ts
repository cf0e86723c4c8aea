import * as path from 'path';
import type { PathLossConfig } from '@rflocate/shared';
import { DEFAULT_PATH_LOSS_CONFIG } from '@rflocate/shared';
import { validatePathLossConfig } from './interference/path-loss.js';
import { MAX_HEATMAP_GRID_SIZE } from './interference/heatmap.js';
import { InvalidConfigError } from './interference/errors.js';

export interface ServerConfig {
  port: number;
  dataDir: string;
  pathLoss: PathLossConfig;
  clusterBandwidth: number; // MHz
  heatmapGridSize: number;
}

function envNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** @throws InvalidConfigError when a numeric setting from the environment is out of range */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const clusterBandwidth = envNumber(env.CLUSTER_BANDWIDTH_MHZ, 20);
  if (clusterBandwidth <= 0) {
    throw new InvalidConfigError(`CLUSTER_BANDWIDTH_MHZ must be positive, got ${clusterBandwidth}`);
  }
  const heatmapGridSize = envNumber(env.HEATMAP_GRID_SIZE, 50);
  if (!Number.isInteger(heatmapGridSize) || heatmapGridSize < 1 || heatmapGridSize > MAX_HEATMAP_GRID_SIZE) {
    throw new InvalidConfigError(`HEATMAP_GRID_SIZE must be an integer from 1 to ${MAX_HEATMAP_GRID_SIZE}, got ${heatmapGridSize}`);
  }

  return {
    port: envNumber(env.PORT, 3410),
    dataDir: env.DATA_DIR || path.join(process.cwd(), 'data'),
    pathLoss: validatePathLossConfig({
      exponent: envNumber(env.PATH_LOSS_EXPONENT, DEFAULT_PATH_LOSS_CONFIG.exponent),
      referenceDistance: envNumber(env.REFERENCE_DISTANCE, DEFAULT_PATH_LOSS_CONFIG.referenceDistance),
      referenceRssi: envNumber(env.REFERENCE_RSSI, DEFAULT_PATH_LOSS_CONFIG.referenceRssi),
    }),
    clusterBandwidth,
    heatmapGridSize,
  };
}
