// ============================================================================
// RFLocate — RSSI Trilateration
// ============================================================================
import type { MeasurementPoint } from '@rflocate/shared';
import type { PathLossModel } from './path-loss.js';

export interface TrilaterationResult {
  x: number;
  y: number;
  confidence: number;
}

const COLLINEAR_EPSILON = 1e-10;
const IDEAL_ANGLE = (2 * Math.PI) / 3;

const clamp = (v: number, min: number, max: number) => Math.max(min, Math.min(max, v));

/**
 * Estimates an emitter position from the three strongest samples of a cluster.
 * Returns null for fewer than three samples or (near-)collinear geometry.
 */
export function trilaterate(points: readonly MeasurementPoint[], model: PathLossModel): TrilaterationResult | null {
  if (points.length < 3) return null;

  // Stable sort: equal RSSI keeps measurement order
  const [p1, p2, p3] = [...points].sort((a, b) => b.rssi - a.rssi);
  const r1 = model.rssiToDistance(p1.rssi);
  const r2 = model.rssiToDistance(p2.rssi);
  const r3 = model.rssiToDistance(p3.rssi);

  // Circle 1 - circle 2 and circle 2 - circle 3 give two linear equations
  const a = 2 * (p2.x - p1.x);
  const b = 2 * (p2.y - p1.y);
  const c = r1 ** 2 - r2 ** 2 - p1.x ** 2 + p2.x ** 2 - p1.y ** 2 + p2.y ** 2;
  const d = 2 * (p3.x - p2.x);
  const e = 2 * (p3.y - p2.y);
  const f = r2 ** 2 - r3 ** 2 - p2.x ** 2 + p3.x ** 2 - p2.y ** 2 + p3.y ** 2;

  const det = a * e - b * d;
  if (Math.abs(det) < COLLINEAR_EPSILON) return null;

  const x = (c * e - f * b) / det;
  const y = (a * f - c * d) / det;

  return { x, y, confidence: locationConfidence([p1, p2, p3], points, x, y) };
}

/**
 * 0.5 * geometric spread of the anchors seen from the estimate (GDOP-like)
 * + 0.3 * cluster signal strength (-80 dBm → 0, -40 dBm → 1)
 * + 0.2 * sample count (5 samples or more → 1)
 */
export function locationConfidence(
  anchors: readonly MeasurementPoint[],
  cluster: readonly MeasurementPoint[],
  x: number,
  y: number,
): number {
  const angles = anchors.map(p => Math.atan2(p.y - y, p.x - x)).sort((m, n) => m - n);
  let angleVariance = 0;
  for (let i = 0; i < angles.length; i++) {
    let gap = angles[(i + 1) % angles.length] - angles[i];
    if (gap < 0) gap += 2 * Math.PI;
    angleVariance += (gap - IDEAL_ANGLE) ** 2;
  }
  const geometricFactor = 1 / (1 + angleVariance / IDEAL_ANGLE ** 2);

  const avgRssi = cluster.reduce((sum, p) => sum + p.rssi, 0) / cluster.length;
  const signalFactor = clamp((avgRssi + 80) / 40, 0, 1);

  const countFactor = Math.min(1, cluster.length / 5);

  return clamp(geometricFactor * 0.5 + signalFactor * 0.3 + countFactor * 0.2, 0, 1);
}
