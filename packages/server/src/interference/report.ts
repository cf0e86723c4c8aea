// ============================================================================
// RFLocate — Report Export / Import
// ============================================================================
import type {
  InterferenceReportDocument, InterferenceSource, InterferenceType, PathLossConfig, ReportSourceEntry, SeverityLevel,
} from '@rflocate/shared';
import { INTERFERENCE_TYPES, SEVERITY_LEVELS, SEVERITY_SCORES } from '@rflocate/shared';
import { InvalidConfigError, ReportFormatError } from './errors.js';
import { validatePathLossConfig } from './path-loss.js';

export function toReportEntry(source: InterferenceSource): ReportSourceEntry {
  return {
    id: source.sourceId,
    type: source.type,
    severity: source.severity,
    severity_score: SEVERITY_SCORES[source.severity],
    location: source.location ? [source.location[0], source.location[1]] : null,
    location_confidence: source.locationConfidence,
    frequency_range: [source.frequencyRange[0], source.frequencyRange[1]],
    avg_power: source.avgPower,
    affected_channels: [...source.affectedChannels],
    mitigation_strategies: [...source.mitigationStrategies],
  };
}

export function buildReport(
  sources: readonly InterferenceSource[],
  measurementCount: number,
  settings: PathLossConfig,
  now = new Date(),
): InterferenceReportDocument {
  return {
    timestamp: now.toISOString(),
    measurement_count: measurementCount,
    interference_sources: sources.map(toReportEntry),
    settings: {
      path_loss_exponent: settings.exponent,
      reference_distance: settings.referenceDistance,
      reference_rssi: settings.referenceRssi,
    },
  };
}

// ── Import ────────────────────────────────────────────────────────────────

type JsonObject = Record<string, unknown>;

const isObject = (v: unknown): v is JsonObject => typeof v === 'object' && v !== null && !Array.isArray(v);
const isInteger = (v: unknown): v is number => typeof v === 'number' && Number.isInteger(v);

function num(obj: JsonObject, key: string, where: string): number {
  const v = obj[key];
  if (typeof v !== 'number' || !Number.isFinite(v)) throw new ReportFormatError(`${where}.${key} must be a finite number`);
  return v;
}

function int(obj: JsonObject, key: string, where: string): number {
  const v = obj[key];
  if (!isInteger(v)) throw new ReportFormatError(`${where}.${key} must be an integer`);
  return v;
}

function str(obj: JsonObject, key: string, where: string): string {
  const v = obj[key];
  if (typeof v !== 'string') throw new ReportFormatError(`${where}.${key} must be a string`);
  return v;
}

function pair(v: unknown, where: string): [number, number] {
  if (!Array.isArray(v) || v.length !== 2) throw new ReportFormatError(`${where} must be a [number, number] pair`);
  const [a, b]: unknown[] = v;
  if (typeof a !== 'number' || typeof b !== 'number') throw new ReportFormatError(`${where} must be a [number, number] pair`);
  return [a, b];
}

function list<T>(v: unknown, where: string, guard: (item: unknown) => item is T): T[] {
  if (!Array.isArray(v) || !v.every(guard)) throw new ReportFormatError(`${where} has an invalid element`);
  return [...v];
}

const isInterferenceType = (v: unknown): v is InterferenceType => INTERFERENCE_TYPES.some(t => t === v);
const isSeverity = (v: unknown): v is SeverityLevel => SEVERITY_LEVELS.some(s => s === v);
const isString = (v: unknown): v is string => typeof v === 'string';

function parseEntry(raw: unknown, index: number): ReportSourceEntry {
  const where = `interference_sources[${index}]`;
  if (!isObject(raw)) throw new ReportFormatError(`${where} must be an object`);
  const { type, severity } = raw;
  if (!isInterferenceType(type)) throw new ReportFormatError(`${where}.type is not a known interference type: ${String(type)}`);
  if (!isSeverity(severity)) throw new ReportFormatError(`${where}.severity is not a known severity: ${String(severity)}`);
  const confidence = num(raw, 'location_confidence', where);
  if (confidence < 0 || confidence > 1) throw new ReportFormatError(`${where}.location_confidence must be within [0, 1]`);
  const score = int(raw, 'severity_score', where);
  if (score !== SEVERITY_SCORES[severity]) {
    throw new ReportFormatError(`${where}.severity_score ${score} does not match severity ${severity} (${SEVERITY_SCORES[severity]})`);
  }

  return {
    id: str(raw, 'id', where),
    type,
    severity,
    severity_score: score,
    location: raw.location === null ? null : pair(raw.location, `${where}.location`),
    location_confidence: confidence,
    frequency_range: pair(raw.frequency_range, `${where}.frequency_range`),
    avg_power: num(raw, 'avg_power', where),
    affected_channels: list(raw.affected_channels, `${where}.affected_channels`, isInteger),
    mitigation_strategies: list(raw.mitigation_strategies, `${where}.mitigation_strategies`, isString),
  };
}

/** Validates a previously exported document (already JSON-decoded, or as text). */
export function parseInterferenceReport(input: unknown): InterferenceReportDocument {
  let raw = input;
  if (typeof raw === 'string') {
    try {
      raw = JSON.parse(raw);
    } catch (err) {
      throw new ReportFormatError(`Report is not valid JSON: ${(err as Error).message}`);
    }
  }
  if (!isObject(raw)) throw new ReportFormatError('Report must be a JSON object');

  const timestamp = str(raw, 'timestamp', 'report');
  if (Number.isNaN(Date.parse(timestamp))) throw new ReportFormatError('report.timestamp must be an ISO 8601 date');
  const measurementCount = int(raw, 'measurement_count', 'report');
  if (measurementCount < 0) throw new ReportFormatError('report.measurement_count must not be negative');
  const { interference_sources: entries, settings } = raw;
  if (!Array.isArray(entries)) throw new ReportFormatError('report.interference_sources must be an array');
  if (!isObject(settings)) throw new ReportFormatError('report.settings must be an object');

  const pathLoss: PathLossConfig = {
    exponent: num(settings, 'path_loss_exponent', 'settings'),
    referenceDistance: num(settings, 'reference_distance', 'settings'),
    referenceRssi: num(settings, 'reference_rssi', 'settings'),
  };
  try {
    validatePathLossConfig(pathLoss);
  } catch (err) {
    if (err instanceof InvalidConfigError) throw new ReportFormatError(`report.settings: ${err.message}`);
    throw err;
  }

  return {
    timestamp,
    measurement_count: measurementCount,
    interference_sources: entries.map((entry: unknown, i: number) => parseEntry(entry, i)),
    settings: {
      path_loss_exponent: pathLoss.exponent,
      reference_distance: pathLoss.referenceDistance,
      reference_rssi: pathLoss.referenceRssi,
    },
  };
}
