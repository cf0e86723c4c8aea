// ============================================================================
// RFLocate — Interference Signature Classifier
// ============================================================================
import type { InterferenceType, SignalPattern } from '@rflocate/shared';

export interface InterferenceSignature {
  type: InterferenceType;
  frequencyRange: [number, number]; // MHz, inclusive
  powerRange: [number, number];     // dBm, inclusive
  pattern: SignalPattern;
  bandwidth: number;                // nominal emission width, MHz
  channels?: number;
  dutyCycle?: number;
}

// Declaration order is the tie-break between equally scored matches
export const INTERFERENCE_SIGNATURES: readonly InterferenceSignature[] = [
  { type: 'MICROWAVE', frequencyRange: [2400, 2500], powerRange: [-40, -20], pattern: 'pulsed', bandwidth: 20, dutyCycle: 0.5 },
  { type: 'BLUETOOTH', frequencyRange: [2402, 2480], powerRange: [-70, -40], pattern: 'hopping', bandwidth: 1, channels: 79 },
  { type: 'WIRELESS_PHONE', frequencyRange: [2400, 2483.5], powerRange: [-50, -30], pattern: 'continuous', bandwidth: 1.728 },
  { type: 'BABY_MONITOR', frequencyRange: [2400, 2483.5], powerRange: [-60, -30], pattern: 'continuous', bandwidth: 2 },
  { type: 'WIRELESS_CAMERA', frequencyRange: [2400, 2500], powerRange: [-50, -20], pattern: 'continuous', bandwidth: 5 },
  { type: 'ZIGBEE', frequencyRange: [2405, 2480], powerRange: [-80, -50], pattern: 'hopping', bandwidth: 2, channels: 16 },
];

const PATTERN_BONUS = 0.5;

export const isIn24GHzBand = (freq: number) => freq >= 2400 && freq <= 2500;
export const isIn5GHzBand = (freq: number) => freq >= 5000 && freq <= 6000;

export function classifyInterference(frequency: number, rssi: number, pattern: SignalPattern = 'unknown'): InterferenceType {
  let best: { type: InterferenceType; score: number } | null = null;

  for (const sig of INTERFERENCE_SIGNATURES) {
    const freqMatch = frequency >= sig.frequencyRange[0] && frequency <= sig.frequencyRange[1];
    const powerMatch = rssi >= sig.powerRange[0] && rssi <= sig.powerRange[1];
    if (!freqMatch || !powerMatch) continue;

    const score = 1 + (pattern === sig.pattern ? PATTERN_BONUS : 0);
    // Strictly greater: an earlier signature keeps a tie
    if (!best || score > best.score) best = { type: sig.type, score };
  }

  if (best) return best.type;
  if (isIn24GHzBand(frequency)) return 'OTHER_24G';
  if (isIn5GHzBand(frequency)) return 'OTHER_5G';
  return 'UNKNOWN';
}
