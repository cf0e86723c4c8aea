// ============================================================================
// Interference Locator API Routes
// ============================================================================

import { Router } from 'express';
import type { Response } from 'express';
import type { PathLossConfig } from '@rflocate/shared';
import type { LocatorSessionManager } from './sessions.js';
import type { ReportDatabase } from './db.js';
import { InvalidConfigError, ReportFormatError } from './errors.js';
import { parseInterferenceReport } from './report.js';

interface MeasurementInput {
  x: number;
  y: number;
  rssi: number;
  frequency: number;
}

const isFiniteNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null;

function isMeasurementInput(v: unknown): v is MeasurementInput {
  if (!isRecord(v)) return false;
  const { x, y, rssi, frequency } = v;
  return isFiniteNumber(x) && isFiniteNumber(y) && isFiniteNumber(rssi) && isFiniteNumber(frequency);
}

function settingsFromBody(body: unknown): Partial<PathLossConfig> {
  const settings: Partial<PathLossConfig> = {};
  if (!isRecord(body)) return settings;
  const { exponent, referenceDistance, referenceRssi } = body;
  for (const [key, value] of [['exponent', exponent], ['referenceDistance', referenceDistance], ['referenceRssi', referenceRssi]] as const) {
    if (value === undefined) continue;
    if (typeof value !== 'number') throw new InvalidConfigError(`${key} must be a number`);
    settings[key] = value;
  }
  return settings;
}

function sendError(res: Response, err: unknown) {
  if (err instanceof InvalidConfigError || err instanceof ReportFormatError || err instanceof RangeError) {
    return res.status(400).json({ error: err.message });
  }
  console.error('⚠️ Interference API error:', err);
  return res.status(500).json({ error: String(err) });
}

export function createInterferenceRouter(sessions: LocatorSessionManager, reports: ReportDatabase, heatmapGridSize = 50): Router {
  const router = Router();

  // Sessions
  router.get('/sessions', (_req, res) => {
    res.json(sessions.listSessions());
  });

  router.post('/sessions', (req, res) => {
    try {
      const name = typeof req.body?.name === 'string' ? req.body.name : '';
      res.status(201).json(sessions.createSession(name, settingsFromBody(req.body?.settings)));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/sessions/:id', (req, res) => {
    const session = sessions.getSession(req.params.id);
    if (!session) return res.status(404).json({ error: 'Session not found' });
    res.json(session);
  });

  router.delete('/sessions/:id', (req, res) => {
    if (!sessions.removeSession(req.params.id)) return res.status(404).json({ error: 'Session not found' });
    res.json({ ok: true });
  });

  // Measurements
  router.get('/sessions/:id/measurements', (req, res) => {
    const locator = sessions.getLocator(req.params.id);
    if (!locator) return res.status(404).json({ error: 'Session not found' });
    res.json(locator.getMeasurements());
  });

  router.post('/sessions/:id/measurements', (req, res) => {
    const locator = sessions.getLocator(req.params.id);
    if (!locator) return res.status(404).json({ error: 'Session not found' });
    const batch: unknown[] = Array.isArray(req.body) ? req.body : [req.body];
    if (batch.length === 0 || !batch.every(isMeasurementInput)) {
      return res.status(400).json({ error: 'x, y, rssi and frequency required as numbers' });
    }
    const added = batch.map(m => locator.addMeasurement(m.x, m.y, m.rssi, m.frequency));
    res.status(201).json(added);
  });

  router.delete('/sessions/:id/measurements', (req, res) => {
    const locator = sessions.getLocator(req.params.id);
    if (!locator) return res.status(404).json({ error: 'Session not found' });
    locator.reset();
    res.json({ ok: true });
  });

  // Detection
  router.post('/sessions/:id/detect', (req, res) => {
    const locator = sessions.getLocator(req.params.id);
    if (!locator) return res.status(404).json({ error: 'Session not found' });
    const sources = locator.detectInterferenceSources();
    console.log(`📡 Detection: ${sources.length} interference source(s) from ${locator.getMeasurements().length} measurements`);
    res.json(sources);
  });

  router.get('/sessions/:id/sources', (req, res) => {
    const locator = sessions.getLocator(req.params.id);
    if (!locator) return res.status(404).json({ error: 'Session not found' });
    res.json(locator.getSources());
  });

  router.get('/sessions/:id/heatmap', (req, res) => {
    const locator = sessions.getLocator(req.params.id);
    if (!locator) return res.status(404).json({ error: 'Session not found' });
    const gridSize = req.query.gridSize === undefined ? heatmapGridSize : Number(req.query.gridSize);
    try {
      res.json(locator.getHeatmap(gridSize));
    } catch (e) {
      sendError(res, e);
    }
  });

  // Settings
  router.get('/sessions/:id/settings', (req, res) => {
    const locator = sessions.getLocator(req.params.id);
    if (!locator) return res.status(404).json({ error: 'Session not found' });
    res.json(locator.getSettings());
  });

  router.put('/sessions/:id/settings', (req, res) => {
    const locator = sessions.getLocator(req.params.id);
    if (!locator) return res.status(404).json({ error: 'Session not found' });
    try {
      res.json(locator.updateSettings(settingsFromBody(req.body)));
    } catch (e) {
      sendError(res, e);
    }
  });

  // Reports
  router.get('/sessions/:id/report', (req, res) => {
    const locator = sessions.getLocator(req.params.id);
    if (!locator) return res.status(404).json({ error: 'Session not found' });
    res.json(locator.exportReport());
  });

  router.post('/sessions/:id/reports', (req, res) => {
    const locator = sessions.getLocator(req.params.id);
    if (!locator) return res.status(404).json({ error: 'Session not found' });
    try {
      res.status(201).json(reports.saveReport(locator.exportReport(), req.params.id));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/reports', (req, res) => {
    const limit = Math.max(1, parseInt(String(req.query.limit)) || 50);
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : undefined;
    res.json(reports.listReports(limit, sessionId));
  });

  router.post('/reports/import', (req, res) => {
    try {
      res.status(201).json(reports.saveReport(parseInterferenceReport(req.body)));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/reports/:id', (req, res) => {
    try {
      const report = reports.getReport(req.params.id);
      if (!report) return res.status(404).json({ error: 'Report not found' });
      res.json(report);
    } catch (e) {
      sendError(res, e);
    }
  });

  router.delete('/reports/:id', (req, res) => {
    if (!reports.deleteReport(req.params.id)) return res.status(404).json({ error: 'Report not found' });
    res.json({ ok: true });
  });

  return router;
}
