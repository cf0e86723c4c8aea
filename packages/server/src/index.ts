import express from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import * as path from 'path';
import { loadConfig } from './config.js';
import { LocatorSessionManager } from './interference/sessions.js';
import type { DetectionEvent } from './interference/sessions.js';
import { ReportDatabase } from './interference/db.js';
import { createInterferenceRouter } from './interference/api.js';

const config = loadConfig();
const app = express();
app.use(cors());
app.use(express.json({ limit: '5mb' }));

const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

// Services
const sessions = new LocatorSessionManager(config.pathLoss, { clusterBandwidth: config.clusterBandwidth });
const reports = new ReportDatabase(path.join(config.dataDir, 'reports.db'));
console.log(`💾 Report database: ${path.join(config.dataDir, 'reports.db')}`);

// Broadcast to all WS clients
function broadcast(data: unknown) {
  const msg = JSON.stringify(data);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) client.send(msg);
  });
}

sessions.on('detection', (event: DetectionEvent) => {
  broadcast({ type: 'interference_sources', sessionId: event.sessionId, sources: event.sources });
});

sessions.on('session_removed', (sessionId: string) => {
  broadcast({ type: 'session_removed', sessionId });
});

wss.on('connection', (ws) => {
  ws.send(JSON.stringify({ type: 'sessions', sessions: sessions.listSessions() }));
});

// ============================================================================
// REST endpoints
// ============================================================================

app.get('/api/health', (_req, res) => {
  res.json({
    name: 'RFLocate',
    version: '0.1.0',
    uptime: process.uptime(),
    status: 'operational',
    sessions: sessions.listSessions().length,
  });
});

app.use('/api', createInterferenceRouter(sessions, reports, config.heatmapGridSize));

server.listen(config.port, () => {
  console.log(`📡 RFLocate server listening on http://localhost:${config.port}`);
  console.log(`   Path loss: n=${config.pathLoss.exponent}, d0=${config.pathLoss.referenceDistance} m, RSSI0=${config.pathLoss.referenceRssi} dBm`);
});

function shutdown() {
  console.log('🛑 Shutting down...');
  wss.close();
  server.close(() => {
    reports.close();
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
