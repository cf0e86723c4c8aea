// ============================================================================
// RFLocate — Locator Session Manager
// ============================================================================
import { EventEmitter } from 'events';
import type { InterferenceSource, LocatorSession, PathLossConfig } from '@rflocate/shared';
import { InterferenceLocator } from './locator.js';
import type { LocatorOptions } from './locator.js';

interface SessionEntry {
  id: string;
  name: string;
  createdAt: number;
  locator: InterferenceLocator;
}

export interface DetectionEvent {
  sessionId: string;
  sources: InterferenceSource[];
}

/**
 * Independent survey sessions, each with its own locator.
 * Re-emits every locator 'detection' as 'detection' ({ sessionId, sources }).
 */
export class LocatorSessionManager extends EventEmitter {
  private sessions = new Map<string, SessionEntry>();

  constructor(
    private readonly defaults: Partial<PathLossConfig> = {},
    private readonly locatorOptions: LocatorOptions = {},
  ) {
    super();
  }

  /** @throws InvalidConfigError when the merged settings are invalid */
  createSession(name: string, settings: Partial<PathLossConfig> = {}): LocatorSession {
    const locator = new InterferenceLocator({ ...this.defaults, ...settings }, this.locatorOptions);
    const id = `survey-${Date.now()}-${Math.random().toString(36).slice(2, 6)}`;
    const entry: SessionEntry = { id, name: name || `Survey ${this.sessions.size + 1}`, createdAt: Date.now(), locator };

    locator.on('detection', (sources: InterferenceSource[]) => {
      const event: DetectionEvent = { sessionId: id, sources };
      this.emit('detection', event);
    });

    this.sessions.set(id, entry);
    console.log(`📡 Survey session created: ${entry.name} (${id})`);
    this.emit('session_created', this.describe(entry));
    return this.describe(entry);
  }

  getLocator(id: string): InterferenceLocator | undefined {
    return this.sessions.get(id)?.locator;
  }

  getSession(id: string): LocatorSession | undefined {
    const entry = this.sessions.get(id);
    return entry ? this.describe(entry) : undefined;
  }

  listSessions(): LocatorSession[] {
    return Array.from(this.sessions.values()).map(e => this.describe(e));
  }

  removeSession(id: string): boolean {
    const entry = this.sessions.get(id);
    if (!entry) return false;
    entry.locator.removeAllListeners();
    this.sessions.delete(id);
    console.log(`🗑️ Survey session removed: ${entry.name} (${id})`);
    this.emit('session_removed', id);
    return true;
  }

  private describe(entry: SessionEntry): LocatorSession {
    return {
      id: entry.id,
      name: entry.name,
      createdAt: entry.createdAt,
      summary: entry.locator.getSummary(),
      settings: entry.locator.getSettings(),
    };
  }
}
