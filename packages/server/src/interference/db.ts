// ============================================================================
// RFLocate — Report SQLite Database
// ============================================================================
import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync, existsSync } from 'fs';
import type { InterferenceReportDocument, StoredReport } from '@rflocate/shared';
import { parseInterferenceReport } from './report.js';

interface DbReport {
  id: string;
  session_id: string | null;
  created_at: number;
  measurement_count: number;
  source_count: number;
  document: string;
}

export class ReportDatabase {
  private db: Database.Database;

  /** Pass ':memory:' for a throwaway database. */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.init();
  }

  private init() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS reports (
        id TEXT PRIMARY KEY,
        session_id TEXT,
        created_at INTEGER NOT NULL,
        measurement_count INTEGER NOT NULL,
        source_count INTEGER NOT NULL,
        document TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_reports_created ON reports(created_at);
      CREATE INDEX IF NOT EXISTS idx_reports_session ON reports(session_id);
    `);
  }

  saveReport(document: InterferenceReportDocument, sessionId: string | null = null): StoredReport {
    const stored: StoredReport = {
      id: `rpt-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
      sessionId,
      createdAt: Date.now(),
      measurementCount: document.measurement_count,
      sourceCount: document.interference_sources.length,
    };
    this.db.prepare(`
      INSERT INTO reports (id, session_id, created_at, measurement_count, source_count, document)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(stored.id, sessionId, stored.createdAt, stored.measurementCount, stored.sourceCount, JSON.stringify(document));
    return stored;
  }

  /** Newest first; `limit` is clamped to at least 1. */
  listReports(limit = 50, sessionId?: string): StoredReport[] {
    const capped = Math.max(1, Math.floor(limit));
    const rows = (sessionId
      ? this.db.prepare('SELECT * FROM reports WHERE session_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?').all(sessionId, capped)
      : this.db.prepare('SELECT * FROM reports ORDER BY created_at DESC, rowid DESC LIMIT ?').all(capped)) as DbReport[];
    return rows.map(r => this.toStored(r));
  }

  getReport(id: string): InterferenceReportDocument | undefined {
    const row = this.db.prepare('SELECT * FROM reports WHERE id = ?').get(id) as DbReport | undefined;
    return row ? parseInterferenceReport(row.document) : undefined;
  }

  deleteReport(id: string): boolean {
    return this.db.prepare('DELETE FROM reports WHERE id = ?').run(id).changes > 0;
  }

  close(): void {
    this.db.close();
  }

  private toStored(row: DbReport): StoredReport {
    return {
      id: row.id,
      sessionId: row.session_id,
      createdAt: row.created_at,
      measurementCount: row.measurement_count,
      sourceCount: row.source_count,
    };
  }
}
