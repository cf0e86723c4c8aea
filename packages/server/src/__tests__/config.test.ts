import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { loadConfig } from '../config.js';
import { InvalidConfigError } from '../interference/errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3410,
      dataDir: path.join(process.cwd(), 'data'),
      pathLoss: { exponent: 2, referenceDistance: 1, referenceRssi: -40 },
      clusterBandwidth: 20,
      heatmapGridSize: 50,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080', DATA_DIR: '/tmp/rflocate', PATH_LOSS_EXPONENT: '3.5', REFERENCE_RSSI: '-42', HEATMAP_GRID_SIZE: '80',
    });
    expect(config.port).toBe(8080);
    expect(config.dataDir).toBe('/tmp/rflocate');
    expect(config.pathLoss).toEqual({ exponent: 3.5, referenceDistance: 1, referenceRssi: -42 });
    expect(config.heatmapGridSize).toBe(80);
  });

  it('ignores unparseable numbers', () => {
    expect(loadConfig({ PORT: 'abc', CLUSTER_BANDWIDTH_MHZ: '' }).port).toBe(3410);
    expect(loadConfig({ CLUSTER_BANDWIDTH_MHZ: ' ' }).clusterBandwidth).toBe(20);
  });

  it('rejects invalid path loss settings', () => {
    expect(() => loadConfig({ PATH_LOSS_EXPONENT: '-1' })).toThrow(InvalidConfigError);
  });

  it('rejects a cluster bandwidth that is not positive', () => {
    expect(() => loadConfig({ CLUSTER_BANDWIDTH_MHZ: '0' })).toThrow('CLUSTER_BANDWIDTH_MHZ must be positive, got 0');
    expect(() => loadConfig({ CLUSTER_BANDWIDTH_MHZ: '-5' })).toThrow(InvalidConfigError);
  });

  it('rejects heatmap grid sizes outside 1..200', () => {
    expect(() => loadConfig({ HEATMAP_GRID_SIZE: '500' })).toThrow('HEATMAP_GRID_SIZE must be an integer from 1 to 200, got 500');
    expect(() => loadConfig({ HEATMAP_GRID_SIZE: '12.5' })).toThrow(InvalidConfigError);
    expect(loadConfig({ HEATMAP_GRID_SIZE: '200' }).heatmapGridSize).toBe(200);
  });
});
