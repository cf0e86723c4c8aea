import type { MeasurementPoint } from '@rflocate/shared';

export interface FrequencyCluster {
  id: number;
  points: MeasurementPoint[];
}

export const DEFAULT_CLUSTER_BANDWIDTH_MHZ = 20;

/**
 * Groups samples that probably come from one emitter.
 *
 * Points are visited in ascending frequency; Array.prototype.sort is stable, so
 * samples with equal frequency keep their insertion order. Each point joins the
 * first cluster (by creation order) whose running mean frequency lies within
 * bandwidth / 2 of it, otherwise it opens a new cluster. The result is therefore
 * deterministic for a given measurement order, and may differ if the same samples
 * are recorded in another order.
 *
 * `bandwidth` is a clustering resolution, not an emission bandwidth; the default
 * matches one 20 MHz WiFi channel.
 */
export function clusterByFrequency(
  points: readonly MeasurementPoint[],
  bandwidth = DEFAULT_CLUSTER_BANDWIDTH_MHZ,
): FrequencyCluster[] {
  const clusters: Array<FrequencyCluster & { frequencySum: number }> = [];
  const sorted = [...points].sort((a, b) => a.frequency - b.frequency);

  for (const point of sorted) {
    const match = clusters.find(c => Math.abs(point.frequency - c.frequencySum / c.points.length) <= bandwidth / 2);
    if (match) {
      match.points.push(point);
      match.frequencySum += point.frequency;
    } else {
      clusters.push({ id: clusters.length, points: [point], frequencySum: point.frequency });
    }
  }

  return clusters.map(({ id, points: members }) => ({ id, points: members }));
}
