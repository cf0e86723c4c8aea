// ============================================================================
// RFLocate Interference Types
// ============================================================================

export type InterferenceType =
  | 'MICROWAVE'
  | 'BLUETOOTH'
  | 'WIRELESS_PHONE'
  | 'BABY_MONITOR'
  | 'WIRELESS_CAMERA'
  | 'ZIGBEE'
  | 'NEIGHBORING_WIFI'
  | 'RADAR'
  | 'OTHER_24G'
  | 'OTHER_5G'
  | 'UNKNOWN';

export const INTERFERENCE_TYPES: readonly InterferenceType[] = [
  'MICROWAVE', 'BLUETOOTH', 'WIRELESS_PHONE', 'BABY_MONITOR', 'WIRELESS_CAMERA', 'ZIGBEE',
  'NEIGHBORING_WIFI', 'RADAR', 'OTHER_24G', 'OTHER_5G', 'UNKNOWN',
];

export const INTERFERENCE_TYPE_LABELS: Record<InterferenceType, string> = {
  MICROWAVE: 'Microwave oven',
  BLUETOOTH: 'Bluetooth device',
  WIRELESS_PHONE: 'Cordless phone',
  BABY_MONITOR: 'Baby monitor',
  WIRELESS_CAMERA: 'Wireless camera',
  ZIGBEE: 'ZigBee device',
  NEIGHBORING_WIFI: 'Neighboring WiFi',
  RADAR: 'Radar signal',
  OTHER_24G: 'Other 2.4GHz device',
  OTHER_5G: 'Other 5GHz device',
  UNKNOWN: 'Unknown source',
};

/** Ordered from least to most severe. */
export type SeverityLevel = 'NEGLIGIBLE' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export const SEVERITY_LEVELS: readonly SeverityLevel[] = ['NEGLIGIBLE', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];

// Representative score per level, used for heatmap weighting and in exported reports
export const SEVERITY_SCORES: Record<SeverityLevel, number> = {
  CRITICAL: 90,
  HIGH: 70,
  MEDIUM: 50,
  LOW: 30,
  NEGLIGIBLE: 10,
};

export type SignalPattern = 'pulsed' | 'hopping' | 'continuous' | 'unknown';

export interface MeasurementPoint {
  readonly x: number;          // meters, local frame
  readonly y: number;
  readonly rssi: number;       // dBm
  readonly frequency: number;  // MHz
  readonly timestamp: number;  // epoch ms
}

export interface PathLossConfig {
  exponent: number;            // 2 = free space, 3-4 indoors
  referenceDistance: number;   // meters
  referenceRssi: number;       // dBm at referenceDistance
}

export const DEFAULT_PATH_LOSS_CONFIG: PathLossConfig = {
  exponent: 2.0,
  referenceDistance: 1.0,
  referenceRssi: -40.0,
};

export interface InterferenceSource {
  sourceId: string;
  type: InterferenceType;
  severity: SeverityLevel;
  location: [number, number] | null;
  locationConfidence: number;  // 0-1
  frequencyRange: [number, number];
  avgPower: number;            // dBm
  detectionCount: number;
  firstDetected: string;       // ISO timestamp
  lastDetected: string;
  affectedChannels: number[];
  mitigationStrategies: string[];
}

export interface HeatmapBounds {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
}

export interface InterferenceHeatmap {
  grid: number[][];            // rows follow y, columns follow x
  bounds: HeatmapBounds;
}

export interface LocatorSummary {
  measurementCount: number;
  sourceCount: number;
  criticalCount: number;
  highCount: number;
}

export interface LocatorSession {
  id: string;
  name: string;
  createdAt: number;
  summary: LocatorSummary;
  settings: PathLossConfig;
}

// ── Export document (wire format, snake_case) ─────────────────────────────

export interface ReportSourceEntry {
  id: string;
  type: InterferenceType;
  severity: SeverityLevel;
  severity_score: number;
  location: [number, number] | null;
  location_confidence: number;
  frequency_range: [number, number];
  avg_power: number;
  affected_channels: number[];
  mitigation_strategies: string[];
}

export interface InterferenceReportDocument {
  timestamp: string;
  measurement_count: number;
  interference_sources: ReportSourceEntry[];
  settings: {
    path_loss_exponent: number;
    reference_distance: number;
    reference_rssi: number;
  };
}

export interface StoredReport {
  id: string;
  sessionId: string | null;
  createdAt: number;
  measurementCount: number;
  sourceCount: number;
}
