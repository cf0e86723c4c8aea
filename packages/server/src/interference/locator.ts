// ============================================================================
// RFLocate — Interference Locator
// ============================================================================
import { EventEmitter } from 'events';
import type {
  InterferenceHeatmap, InterferenceReportDocument, InterferenceSource, LocatorSummary, MeasurementPoint, PathLossConfig,
} from '@rflocate/shared';
import { PathLossModel } from './path-loss.js';
import { MeasurementStore } from './measurements.js';
import { DEFAULT_CLUSTER_BANDWIDTH_MHZ, clusterByFrequency } from './clustering.js';
import type { FrequencyCluster } from './clustering.js';
import { trilaterate } from './trilateration.js';
import { classifyInterference } from './classifier.js';
import { affectedChannels } from './channels.js';
import { scoreSeverity } from './severity.js';
import { adviseMitigation } from './mitigation.js';
import { renderHeatmap } from './heatmap.js';
import { buildReport } from './report.js';

export interface LocatorOptions {
  clusterBandwidth?: number; // MHz
  clock?: () => number;
}

const MIN_MEASUREMENTS = 3;

function timeTag(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()].map(n => String(n).padStart(2, '0')).join('');
}

/**
 * One localization session: owns its measurements and path-loss settings.
 * Every detection pass recomputes all sources from the current measurements.
 *
 * Events: 'measurement' (point), 'detection' (sources), 'settings' (config), 'cleared'.
 */
export class InterferenceLocator extends EventEmitter {
  private model: PathLossModel;
  private readonly store: MeasurementStore;
  private readonly clusterBandwidth: number;
  private readonly clock: () => number;
  private sources: InterferenceSource[] = [];

  /** @throws InvalidConfigError for a non-positive exponent or reference distance */
  constructor(settings: Partial<PathLossConfig> = {}, options: LocatorOptions = {}) {
    super();
    this.model = new PathLossModel(settings);
    this.clock = options.clock ?? Date.now;
    this.store = new MeasurementStore(this.clock);
    this.clusterBandwidth = options.clusterBandwidth ?? DEFAULT_CLUSTER_BANDWIDTH_MHZ;
  }

  // ── Measurements ─────────────────────────────────────────────────────

  addMeasurement(x: number, y: number, rssi: number, frequency: number): MeasurementPoint {
    const point = this.store.add(x, y, rssi, frequency);
    this.emit('measurement', point);
    return point;
  }

  clearMeasurements(): void {
    this.store.clear();
    this.emit('cleared');
  }

  /** Drops measurements and the last detection result. */
  reset(): void {
    this.sources = [];
    this.clearMeasurements();
  }

  getMeasurements(): readonly MeasurementPoint[] {
    return this.store.all();
  }

  // ── Settings ─────────────────────────────────────────────────────────

  getSettings(): PathLossConfig {
    return { ...this.model.config };
  }

  /**
   * Replaces the path-loss settings; on InvalidConfigError the previous settings stay.
   * Existing measurements are re-analysed with the new model.
   */
  updateSettings(partial: Partial<PathLossConfig>): PathLossConfig {
    this.model = new PathLossModel({ ...this.model.config, ...partial });
    this.emit('settings', this.getSettings());
    if (this.store.size > 0) this.detectInterferenceSources();
    return this.getSettings();
  }

  // ── Detection ────────────────────────────────────────────────────────

  /** Snapshot of the last detection pass. */
  getSources(): InterferenceSource[] {
    return [...this.sources];
  }

  detectInterferenceSources(): InterferenceSource[] {
    const points = this.store.all();
    if (points.length < MIN_MEASUREMENTS) {
      this.sources = [];
    } else {
      const stamp = timeTag(new Date(this.clock()));
      this.sources = clusterByFrequency(points, this.clusterBandwidth).map(cluster => this.analyseCluster(cluster, stamp));
    }
    this.emit('detection', this.getSources());
    return this.getSources();
  }

  private analyseCluster(cluster: FrequencyCluster, stamp: string): InterferenceSource {
    const { points } = cluster;
    const frequencies = points.map(p => p.frequency);
    const timestamps = points.map(p => p.timestamp);
    const avgFrequency = frequencies.reduce((a, b) => a + b, 0) / points.length;
    const avgPower = points.reduce((sum, p) => sum + p.rssi, 0) / points.length;

    const type = classifyInterference(avgFrequency, avgPower);
    const channels = affectedChannels(avgFrequency);
    const severity = scoreSeverity(avgPower, avgFrequency, channels);
    const fix = trilaterate(points, this.model);

    const source: InterferenceSource = {
      sourceId: `INT_${cluster.id}_${stamp}`,
      type,
      severity,
      location: fix ? [fix.x, fix.y] : null,
      locationConfidence: fix ? fix.confidence : 0,
      frequencyRange: [Math.min(...frequencies), Math.max(...frequencies)],
      avgPower,
      detectionCount: points.length,
      firstDetected: new Date(Math.min(...timestamps)).toISOString(),
      lastDetected: new Date(Math.max(...timestamps)).toISOString(),
      affectedChannels: channels,
      mitigationStrategies: [],
    };
    source.mitigationStrategies = adviseMitigation(source);
    return source;
  }

  // ── Outputs ──────────────────────────────────────────────────────────

  getHeatmap(gridSize = 50): InterferenceHeatmap {
    return renderHeatmap(this.sources, this.store.all(), this.model, gridSize);
  }

  exportReport(): InterferenceReportDocument {
    return buildReport(this.sources, this.store.size, this.model.config, new Date(this.clock()));
  }

  getSummary(): LocatorSummary {
    return {
      measurementCount: this.store.size,
      sourceCount: this.sources.length,
      criticalCount: this.sources.filter(s => s.severity === 'CRITICAL').length,
      highCount: this.sources.filter(s => s.severity === 'HIGH').length,
    };
  }
}
