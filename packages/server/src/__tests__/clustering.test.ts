import { describe, it, expect } from 'vitest';
import type { MeasurementPoint } from '@rflocate/shared';
import { clusterByFrequency } from '../interference/clustering.js';

const pt = (x: number, frequency: number, rssi = -50): MeasurementPoint => ({ x, y: 0, rssi, frequency, timestamp: 0 });

describe('clusterByFrequency', () => {
  it('returns no clusters for no points', () => {
    expect(clusterByFrequency([])).toEqual([]);
  });

  it('groups samples by frequency in ascending order', () => {
    const clusters = clusterByFrequency([pt(0, 2450), pt(1, 2437), pt(2, 2437), pt(3, 2450), pt(4, 2437)]);
    expect(clusters.map(c => c.id)).toEqual([0, 1]);
    expect(clusters[0].points.map(p => p.frequency)).toEqual([2437, 2437, 2437]);
    expect(clusters[1].points.map(p => p.frequency)).toEqual([2450, 2450]);
  });

  it('keeps insertion order among equal frequencies', () => {
    const clusters = clusterByFrequency([pt(7, 2437), pt(3, 2437), pt(5, 2437)]);
    expect(clusters[0].points.map(p => p.x)).toEqual([7, 3, 5]);
  });

  it('includes points exactly half a bandwidth from the running mean', () => {
    const clusters = clusterByFrequency([pt(0, 2437), pt(1, 2447), pt(2, 2458)]);
    expect(clusters.map(c => c.points.length)).toEqual([2, 1]);
  });

  it('compares against the running mean, not the first member', () => {
    const clusters = clusterByFrequency([pt(0, 2400), pt(1, 2409), pt(2, 2418)]);
    expect(clusters.map(c => c.points.map(p => p.frequency))).toEqual([[2400, 2409], [2418]]);
  });

  it('treats bandwidth as the clustering resolution', () => {
    const clusters = clusterByFrequency([pt(0, 2400), pt(1, 2409), pt(2, 2418)], 40);
    expect(clusters).toHaveLength(1);
  });
});
