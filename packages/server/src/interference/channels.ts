import { isIn24GHzBand, isIn5GHzBand } from './classifier.js';

export const WIFI_24G_CHANNELS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13] as const;
export const WIFI_5G_CHANNELS = [
  36, 40, 44, 48, 52, 56, 60, 64, 100, 104, 108, 112, 116, 120, 124, 128, 132, 136, 140, 144, 149, 153, 157, 161, 165,
] as const;

export function channelCenterFrequency(channel: number): number {
  return channel <= 14 ? 2412 + (channel - 1) * 5 : 5000 + channel * 5;
}

/** WiFi channels whose centre lies within `bandwidth` MHz of the interferer. */
export function affectedChannels(frequency: number, bandwidth = 20): number[] {
  const candidates: readonly number[] = isIn24GHzBand(frequency)
    ? WIFI_24G_CHANNELS
    : isIn5GHzBand(frequency) ? WIFI_5G_CHANNELS : [];
  return candidates.filter(ch => Math.abs(frequency - channelCenterFrequency(ch)) <= bandwidth);
}
