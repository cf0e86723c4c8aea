// ============================================================================
// RFLocate — Mitigation Advisor
// ============================================================================
import type { InterferenceSource, InterferenceType } from '@rflocate/shared';
import { isIn24GHzBand } from './classifier.js';

type StrategySource = Pick<InterferenceSource, 'type' | 'severity' | 'location' | 'locationConfidence' | 'frequencyRange' | 'affectedChannels'>;

const TYPE_STRATEGIES: Record<InterferenceType, (source: StrategySource) => string[]> = {
  MICROWAVE: () => [
    'Recommendation: keep WiFi access points at least 3 m away from the microwave oven',
    'Optimization: move clients to the 5GHz band to avoid 2.4GHz interference',
    'Adjustment: schedule heavy network use outside microwave operating times',
  ],
  BLUETOOTH: () => [
    'Optimization: enable WiFi 6 BSS coloring to reduce co-channel interference',
    'Recommendation: use the 5GHz band, Bluetooth only operates at 2.4GHz',
  ],
  WIRELESS_PHONE: () => [
    'Recommendation: replace the handset with a 5.8GHz or DECT 6.0 cordless phone',
    'Optimization: move the WiFi router away from the phone base station',
  ],
  BABY_MONITOR: () => [
    'Recommendation: replace the baby monitor with a DECT or 5GHz model',
    'Optimization: keep the monitor base station away from access points',
  ],
  WIRELESS_CAMERA: () => [
    'Recommendation: move wireless cameras to a wired or 5GHz uplink',
    'Optimization: lower the camera transmit power or video bitrate',
  ],
  ZIGBEE: () => [
    'Optimization: move the ZigBee network to channel 25 or 26, outside the busiest WiFi channels',
    'Recommendation: use WiFi channels 1, 6 or 11 that do not overlap the ZigBee channel',
  ],
  NEIGHBORING_WIFI: (source) => [
    `Optimization: avoid channels ${source.affectedChannels.join(', ')} and select a clean channel`,
    'Recommendation: tune AP transmit power to reduce coverage overlap',
    'Consider: enable DFS channels to extend usable spectrum',
  ],
  RADAR: () => [
    'Recommendation: let DFS move the network off the affected channels',
    'Optimization: prefer non-DFS 5GHz channels (36-48, 149-165) near the radar',
  ],
  OTHER_24G: () => [
    'Investigation: survey nearby 2.4GHz devices to identify the emitter',
    'Optimization: switch the WiFi network to a less affected channel',
  ],
  OTHER_5G: () => [
    'Investigation: survey nearby 5GHz devices to identify the emitter',
    'Optimization: switch the WiFi network to a less affected channel',
  ],
  UNKNOWN: () => [
    'Investigation: the signal is outside the WiFi bands, verify the measurement frequency',
    'Recommendation: repeat the survey with additional measurement points',
  ],
};

export function adviseMitigation(source: StrategySource): string[] {
  const strategies = TYPE_STRATEGIES[source.type](source);

  if (source.severity === 'CRITICAL') {
    strategies.unshift('URGENT: identify and remove the interference source immediately');
    strategies.push('Recommendation: consider RF shielding or changing the network topology');
  } else if (source.severity === 'HIGH') {
    strategies.unshift('WARNING: interference impact is significant, address it soon');
  }

  if (source.location && source.locationConfidence > 0.6) {
    const [x, y] = source.location;
    strategies.push(
      `Location: interference source at (${x.toFixed(1)}, ${y.toFixed(1)}) m, confidence ${(source.locationConfidence * 100).toFixed(0)}%`,
    );
    strategies.push('Action: go to that location and inspect nearby devices');
  }

  if (isIn24GHzBand(source.frequencyRange[0]) && !strategies.some(s => s.includes('5GHz'))) {
    strategies.push('Long-term: upgrade to the 5GHz or WiFi 6E (6GHz) band');
  }

  return strategies;
}
