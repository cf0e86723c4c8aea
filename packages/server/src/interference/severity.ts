import type { SeverityLevel } from '@rflocate/shared';
import { isIn24GHzBand, isIn5GHzBand } from './classifier.js';

export interface SeverityScore {
  powerScore: number;   // 0-40
  channelScore: number; // 0-40
  bandScore: number;    // 0-20
  total: number;        // 0-100
}

export function computeSeverityScore(rssi: number, frequency: number, channels: readonly number[]): SeverityScore {
  const powerScore = rssi >= -40 ? 40 : rssi >= -50 ? 30 : rssi >= -60 ? 20 : rssi >= -70 ? 10 : 5;
  const channelScore = Math.min(40, channels.length * 10);
  // 2.4 GHz is congested, so the same interferer hurts more there
  const bandScore = isIn24GHzBand(frequency) ? 20 : isIn5GHzBand(frequency) ? 10 : 5;
  return { powerScore, channelScore, bandScore, total: Math.min(100, powerScore + channelScore + bandScore) };
}

export function severityForScore(total: number): SeverityLevel {
  if (total >= 80) return 'CRITICAL';
  if (total >= 60) return 'HIGH';
  if (total >= 40) return 'MEDIUM';
  if (total >= 20) return 'LOW';
  return 'NEGLIGIBLE';
}

export function scoreSeverity(rssi: number, frequency: number, channels: readonly number[]): SeverityLevel {
  return severityForScore(computeSeverityScore(rssi, frequency, channels).total);
}
