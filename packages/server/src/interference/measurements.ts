import type { MeasurementPoint } from '@rflocate/shared';

export function distanceBetween(a: Pick<MeasurementPoint, 'x' | 'y'>, b: Pick<MeasurementPoint, 'x' | 'y'>): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/**
 * Ordered collection of hand-collected samples. Points are frozen on insertion;
 * coordinates and duplicates are the caller's business.
 */
export class MeasurementStore {
  private points: MeasurementPoint[] = [];

  constructor(private readonly clock: () => number = Date.now) {}

  add(x: number, y: number, rssi: number, frequency: number): MeasurementPoint {
    const point: MeasurementPoint = Object.freeze({ x, y, rssi, frequency, timestamp: this.clock() });
    this.points.push(point);
    return point;
  }

  clear(): void {
    this.points = [];
  }

  all(): readonly MeasurementPoint[] {
    return this.points;
  }

  get size(): number {
    return this.points.length;
  }
}
