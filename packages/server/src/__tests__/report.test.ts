import { describe, it, expect } from 'vitest';
import type { InterferenceReportDocument } from '@rflocate/shared';
import { InterferenceLocator } from '../interference/locator.js';
import { parseInterferenceReport } from '../interference/report.js';
import { ReportFormatError } from '../interference/errors.js';

const NOW = Date.UTC(2026, 0, 15, 9, 30, 0);

function exportedSurvey(): InterferenceReportDocument {
  const locator = new InterferenceLocator({ exponent: 3 }, { clock: () => NOW });
  locator.addMeasurement(0, 0, -45, 2437);
  locator.addMeasurement(5, 0, -55, 2437);
  locator.addMeasurement(2.5, 4, -50, 2437);
  locator.addMeasurement(10, 0, -75, 2450);
  locator.addMeasurement(10, 5, -70, 2450);
  locator.detectInterferenceSources();
  return locator.exportReport();
}

describe('report export', () => {
  const report = exportedSurvey();

  it('uses the documented wire format', () => {
    expect(report.timestamp).toBe('2026-01-15T09:30:00.000Z');
    expect(report.measurement_count).toBe(5);
    expect(report.settings).toEqual({ path_loss_exponent: 3, reference_distance: 1, reference_rssi: -40 });
    expect(Object.keys(report.interference_sources[0]).sort()).toEqual([
      'affected_channels', 'avg_power', 'frequency_range', 'id', 'location', 'location_confidence',
      'mitigation_strategies', 'severity', 'severity_score', 'type',
    ]);
  });

  it('carries severity scores and null locations', () => {
    const [near, far] = report.interference_sources;
    expect(near).toMatchObject({ type: 'BLUETOOTH', severity: 'CRITICAL', severity_score: 90 });
    expect(far).toMatchObject({ type: 'ZIGBEE', severity: 'HIGH', severity_score: 70, location: null, location_confidence: 0 });
  });

  it('round-trips through JSON', () => {
    const imported = parseInterferenceReport(JSON.stringify(report));
    expect(imported).toEqual(report);
    imported.interference_sources.forEach((entry, i) => {
      const original = report.interference_sources[i];
      expect(entry.affected_channels).toHaveLength(original.affected_channels.length);
      expect(entry.mitigation_strategies).toHaveLength(original.mitigation_strategies.length);
    });
  });
});

describe('parseInterferenceReport', () => {
  it('rejects text that is not JSON', () => {
    expect(() => parseInterferenceReport('{not json')).toThrow(ReportFormatError);
  });

  it('rejects documents without settings', () => {
    const { settings: _settings, ...rest } = exportedSurvey();
    expect(() => parseInterferenceReport(rest)).toThrow('report.settings must be an object');
  });

  it('rejects unknown interference types', () => {
    const report = exportedSurvey();
    const broken = { ...report, interference_sources: [{ ...report.interference_sources[0], type: 'TOASTER' }] };
    expect(() => parseInterferenceReport(broken)).toThrow('interference_sources[0].type is not a known interference type: TOASTER');
  });

  it('rejects confidences outside [0, 1]', () => {
    const report = exportedSurvey();
    const broken = { ...report, interference_sources: [{ ...report.interference_sources[0], location_confidence: 1.5 }] };
    expect(() => parseInterferenceReport(broken)).toThrow(ReportFormatError);
  });

  it('rejects malformed locations', () => {
    const report = exportedSurvey();
    const broken = { ...report, interference_sources: [{ ...report.interference_sources[0], location: [1] }] };
    expect(() => parseInterferenceReport(broken)).toThrow('interference_sources[0].location must be a [number, number] pair');
  });

  it('rejects fractional or negative measurement counts', () => {
    expect(() => parseInterferenceReport({ ...exportedSurvey(), measurement_count: 2.5 }))
      .toThrow('report.measurement_count must be an integer');
    expect(() => parseInterferenceReport({ ...exportedSurvey(), measurement_count: -1 }))
      .toThrow('report.measurement_count must not be negative');
  });

  it('rejects severity scores that are fractional or disagree with the severity', () => {
    const report = exportedSurvey();
    const fractional = { ...report, interference_sources: [{ ...report.interference_sources[0], severity_score: 33.7 }] };
    expect(() => parseInterferenceReport(fractional)).toThrow('interference_sources[0].severity_score must be an integer');
    const mismatched = { ...report, interference_sources: [{ ...report.interference_sources[0], severity_score: 50 }] };
    expect(() => parseInterferenceReport(mismatched))
      .toThrow('interference_sources[0].severity_score 50 does not match severity CRITICAL (90)');
  });

  it('rejects path loss settings a locator would refuse', () => {
    const report = exportedSurvey();
    expect(() => parseInterferenceReport({ ...report, settings: { ...report.settings, path_loss_exponent: -1 } }))
      .toThrow('report.settings: Path loss exponent must be a positive number, got -1');
    expect(() => parseInterferenceReport({ ...report, settings: { ...report.settings, reference_distance: 0 } }))
      .toThrow('report.settings: Reference distance must be a positive number, got 0');
  });
});
