import { describe, it, expect } from 'vitest';
import { SEVERITY_LEVELS } from '@rflocate/shared';
import { affectedChannels, channelCenterFrequency } from '../interference/channels.js';
import { computeSeverityScore, scoreSeverity, severityForScore } from '../interference/severity.js';

describe('affectedChannels', () => {
  it('maps channel numbers to centre frequencies', () => {
    expect(channelCenterFrequency(1)).toBe(2412);
    expect(channelCenterFrequency(13)).toBe(2472);
    expect(channelCenterFrequency(36)).toBe(5180);
    expect(channelCenterFrequency(165)).toBe(5825);
  });

  it('lists 2.4GHz channels within the bandwidth', () => {
    const channels = affectedChannels(2437, 20);
    expect(channels).toContain(6);
    expect(channels).toEqual([2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(affectedChannels(2412)).toEqual([1, 2, 3, 4, 5]);
    expect(affectedChannels(2484)).toEqual([12, 13]);
    expect(affectedChannels(2437, 5)).toEqual([5, 6, 7]);
  });

  it('lists 5GHz channels within the bandwidth', () => {
    expect(affectedChannels(5180)).toEqual([36, 40]);
    expect(affectedChannels(5500)).toEqual([100, 104]);
  });

  it('returns nothing outside the WiFi bands', () => {
    expect(affectedChannels(900)).toEqual([]);
    expect(affectedChannels(6200)).toEqual([]);
  });
});

describe('severity', () => {
  it('adds power, channel and band scores', () => {
    expect(computeSeverityScore(-50, 2437, [2, 3, 4, 5, 6, 7, 8, 9, 10])).toEqual({
      powerScore: 30, channelScore: 40, bandScore: 20, total: 90,
    });
    expect(computeSeverityScore(-45, 5180, [36, 40])).toEqual({
      powerScore: 30, channelScore: 20, bandScore: 10, total: 60,
    });
    expect(computeSeverityScore(-90, 900, [])).toEqual({
      powerScore: 5, channelScore: 0, bandScore: 5, total: 10,
    });
  });

  it('caps the total at 100', () => {
    expect(computeSeverityScore(-30, 2437, [1, 2, 3, 4, 5]).total).toBe(100);
  });

  it('maps totals onto levels at fixed cut points', () => {
    expect(severityForScore(80)).toBe('CRITICAL');
    expect(severityForScore(79)).toBe('HIGH');
    expect(severityForScore(60)).toBe('HIGH');
    expect(severityForScore(40)).toBe('MEDIUM');
    expect(severityForScore(20)).toBe('LOW');
    expect(severityForScore(19)).toBe('NEGLIGIBLE');
  });

  it('never gets more severe as the signal weakens', () => {
    const rssis = [-35, -45, -55, -65, -75];
    const cases: Array<[number, number[]]> = [[2437, [2, 3, 4, 5, 6, 7, 8, 9, 10]], [900, []]];
    for (const [freq, channels] of cases) {
      const ranks = rssis.map(r => SEVERITY_LEVELS.indexOf(scoreSeverity(r, freq, channels)));
      for (let i = 1; i < ranks.length; i++) expect(ranks[i]).toBeLessThanOrEqual(ranks[i - 1]);
    }
    expect(rssis.map(r => scoreSeverity(r, 2437, [2, 3, 4, 5, 6, 7, 8, 9, 10])))
      .toEqual(['CRITICAL', 'CRITICAL', 'CRITICAL', 'HIGH', 'HIGH']);
    expect(rssis.map(r => scoreSeverity(r, 900, []))).toEqual(['MEDIUM', 'LOW', 'LOW', 'NEGLIGIBLE', 'NEGLIGIBLE']);
  });
});
