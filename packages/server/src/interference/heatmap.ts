import type { HeatmapBounds, InterferenceHeatmap, InterferenceSource, MeasurementPoint } from '@rflocate/shared';
import { SEVERITY_SCORES } from '@rflocate/shared';
import type { PathLossModel } from './path-loss.js';

const MARGIN_RATIO = 0.1;
const MIN_DISTANCE = 0.1; // meters, avoids log10(0) at the source itself
export const MAX_HEATMAP_GRID_SIZE = 200;
const DEFAULT_BOUNDS: HeatmapBounds = { xMin: 0, xMax: 10, yMin: 0, yMax: 10 };

export function heatmapBounds(points: readonly MeasurementPoint[]): HeatmapBounds {
  if (points.length === 0) return { ...DEFAULT_BOUNDS };
  const xs = points.map(p => p.x);
  const ys = points.map(p => p.y);
  const xMin = Math.min(...xs), xMax = Math.max(...xs);
  const yMin = Math.min(...ys), yMax = Math.max(...ys);
  const mx = (xMax - xMin) * MARGIN_RATIO;
  const my = (yMax - yMin) * MARGIN_RATIO;
  return { xMin: xMin - mx, xMax: xMax + mx, yMin: yMin - my, yMax: yMax + my };
}

function linspace(start: number, end: number, count: number): number[] {
  if (count === 1) return [start];
  const step = (end - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => start + i * step);
}

/**
 * Interference intensity over the surveyed area. Each located source
 * contributes its modelled RSSI at the cell, weighted by location confidence
 * and severity. Cost is O(gridSize² × sources).
 */
export function renderHeatmap(
  sources: readonly InterferenceSource[],
  points: readonly MeasurementPoint[],
  model: PathLossModel,
  gridSize = 50,
): InterferenceHeatmap {
  if (!Number.isInteger(gridSize) || gridSize < 1 || gridSize > MAX_HEATMAP_GRID_SIZE) {
    throw new RangeError(`gridSize must be an integer from 1 to ${MAX_HEATMAP_GRID_SIZE}, got ${gridSize}`);
  }

  const bounds = heatmapBounds(points);
  const located = sources.filter(s => s.location !== null);
  if (located.length === 0) {
    return { grid: Array.from({ length: gridSize }, () => new Array<number>(gridSize).fill(0)), bounds };
  }

  const xs = linspace(bounds.xMin, bounds.xMax, gridSize);
  const ys = linspace(bounds.yMin, bounds.yMax, gridSize);

  const grid = ys.map(y => xs.map(x => {
    let total = 0;
    for (const source of located) {
      if (!source.location) continue;
      const [sx, sy] = source.location;
      const distance = Math.max(MIN_DISTANCE, Math.hypot(x - sx, y - sy));
      const weight = source.locationConfidence * (SEVERITY_SCORES[source.severity] / 100);
      total += model.distanceToRssi(distance) * weight;
    }
    return total;
  }));

  return { grid, bounds };
}
