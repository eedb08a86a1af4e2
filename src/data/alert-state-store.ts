import BetterSqlite3 from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import logger from '../shared/logger';
import { StateStoreError } from '../shared/errors';
import { ALERT_TYPES, AlertKey, AlertState, AlertType, REGIME_LABELS, RegimeLabel } from '../shared/types';

/**
 * Last-alert state per (symbol, timeframe, alert type).
 *
 * `put` is the only mutation and is atomic per key. `flush` is the durable
 * persistence point at the end of a cycle.
 */
export interface AlertStateStore {
  get(key: AlertKey): Promise<AlertState | undefined>;
  put(state: AlertState): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export function serializeAlertKey(key: AlertKey): string {
  return `${key.symbol.trim().toUpperCase()}|${key.timeframe.trim()}|${key.alertType}`;
}

interface AlertStateRow {
  state_key: string;
  symbol: string;
  timeframe: string;
  alert_type: string;
  last_fired_at: string | null;
  last_score: number | null;
  last_regime: string | null;
  suppression_count: number;
  updated_at: string;
}

export interface AlertStateSnapshotEntry {
  symbol: string;
  timeframe: string;
  alertType: AlertType;
  lastFiredAt: string | null;
  lastScore: number | null;
  lastRegime: RegimeLabel | null;
  suppressionCount: number;
  updatedAt: string;
}

const MEMORY_PATH = ':memory:';

function isAlertType(value: string): value is AlertType {
  return ALERT_TYPES.some((type) => type === value);
}

function isRegimeLabel(value: string): value is RegimeLabel {
  return REGIME_LABELS.some((label) => label === value);
}

function parseDate(value: string | null): Date | null {
  if (value === null) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * SQLite-backed store. The database is a plain file that any SQLite client can
 * open to inspect dedupe decisions; `exportSnapshot` gives the same view as JSON.
 *
 * A missing or corrupt file on startup degrades to an empty store (a corrupt
 * file is moved aside first). Writes that fail twice stay in a pending overlay,
 * so in-process dedupe keeps working, and are retried on the next flush.
 */
export class SqliteAlertStateStore implements AlertStateStore {
  private db: BetterSqlite3.Database | null = null;
  private initialized = false;
  private readonly dbPath: string;
  private pending: Map<string, AlertState> = new Map();
  private degraded = false;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  initialize(): void {
    if (this.initialized) return;

    try {
      this.db = this.open(this.dbPath);
    } catch (error) {
      logger.warn(`[AlertStateStore] Could not open ${this.dbPath}, starting with empty state:`, error);
      this.db = this.recover();
    }

    this.initialized = true;
    logger.info(`[AlertStateStore] Initialized (${this.isDurable() ? this.dbPath : 'in-memory'})`);
  }

  isDurable(): boolean {
    return !this.degraded && this.dbPath !== MEMORY_PATH;
  }

  pendingWrites(): number {
    return this.pending.size;
  }

  async get(key: AlertKey): Promise<AlertState | undefined> {
    const stateKey = serializeAlertKey(key);
    const overlay = this.pending.get(stateKey);
    if (overlay) return { ...overlay };

    const db = this.requireDb();
    try {
      const row = db
        .prepare<[string], AlertStateRow>('SELECT * FROM alert_state WHERE state_key = ?')
        .get(stateKey);
      return row ? this.rowToState(row) : undefined;
    } catch (error) {
      logger.warn(`[AlertStateStore] Read failed for ${stateKey}, treating as absent:`, error);
      return undefined;
    }
  }

  async put(state: AlertState): Promise<void> {
    const stateKey = serializeAlertKey(state);
    const record: AlertState = { ...state, symbol: state.symbol.trim().toUpperCase() };

    try {
      this.writeRow(stateKey, record);
    } catch (firstError) {
      logger.warn(`[AlertStateStore] Write failed for ${stateKey}, retrying once:`, firstError);
      try {
        this.writeRow(stateKey, record);
      } catch (secondError) {
        this.pending.set(stateKey, record);
        throw new StateStoreError(`Could not persist alert state for ${stateKey}`, secondError);
      }
    }

    this.pending.delete(stateKey);
  }

  async flush(): Promise<void> {
    const failed: string[] = [];

    for (const [stateKey, state] of Array.from(this.pending.entries())) {
      try {
        this.writeRow(stateKey, state);
        this.pending.delete(stateKey);
      } catch (error) {
        logger.warn(`[AlertStateStore] Pending write still failing for ${stateKey}:`, error);
        failed.push(stateKey);
      }
    }

    const db = this.requireDb();
    if (this.isDurable()) {
      try {
        db.pragma('wal_checkpoint(PASSIVE)');
      } catch (error) {
        throw new StateStoreError('WAL checkpoint failed', error);
      }
    }

    if (failed.length > 0) {
      throw new StateStoreError(`${failed.length} alert state write(s) still pending: ${failed.join(', ')}`);
    }
  }

  async list(): Promise<AlertState[]> {
    const db = this.requireDb();
    const rows = db
      .prepare<[], AlertStateRow>('SELECT * FROM alert_state ORDER BY state_key')
      .all();

    const byKey = new Map<string, AlertState>();
    for (const row of rows) {
      const state = this.rowToState(row);
      if (state) byKey.set(row.state_key, state);
    }
    for (const [stateKey, state] of this.pending) {
      byKey.set(stateKey, { ...state });
    }

    return Array.from(byKey.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, state]) => state);
  }

  async exportSnapshot(): Promise<Record<string, AlertStateSnapshotEntry>> {
    const snapshot: Record<string, AlertStateSnapshotEntry> = {};
    for (const state of await this.list()) {
      snapshot[serializeAlertKey(state)] = {
        symbol: state.symbol,
        timeframe: state.timeframe,
        alertType: state.alertType,
        lastFiredAt: state.lastFiredAt ? state.lastFiredAt.toISOString() : null,
        lastScore: state.lastScore,
        lastRegime: state.lastRegime,
        suppressionCount: state.suppressionCount,
        updatedAt: state.updatedAt.toISOString(),
      };
    }
    return snapshot;
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.initialized = false;
    }
  }

  protected writeRow(stateKey: string, state: AlertState): void {
    const db = this.requireDb();
    db.prepare(`
      INSERT INTO alert_state (
        state_key, symbol, timeframe, alert_type, last_fired_at,
        last_score, last_regime, suppression_count, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(state_key) DO UPDATE SET
        last_fired_at = excluded.last_fired_at,
        last_score = excluded.last_score,
        last_regime = excluded.last_regime,
        suppression_count = excluded.suppression_count,
        updated_at = excluded.updated_at
    `).run(
      stateKey,
      state.symbol,
      state.timeframe,
      state.alertType,
      state.lastFiredAt ? state.lastFiredAt.toISOString() : null,
      state.lastScore,
      state.lastRegime,
      state.suppressionCount,
      state.updatedAt.toISOString()
    );
  }

  private open(dbPath: string): BetterSqlite3.Database {
    if (dbPath !== MEMORY_PATH) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const db = new BetterSqlite3(dbPath);
    try {
      if (dbPath !== MEMORY_PATH) {
        db.pragma('journal_mode = WAL');
      }

      const check = db.pragma('quick_check', { simple: true });
      if (check !== 'ok') {
        throw new StateStoreError(`Integrity check failed: ${String(check)}`);
      }

      db.exec(`
        CREATE TABLE IF NOT EXISTS alert_state (
          state_key TEXT PRIMARY KEY,
          symbol TEXT NOT NULL,
          timeframe TEXT NOT NULL,
          alert_type TEXT NOT NULL,
          last_fired_at TEXT,
          last_score REAL,
          last_regime TEXT,
          suppression_count INTEGER NOT NULL DEFAULT 0,
          updated_at TEXT NOT NULL
        )
      `);

      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_alert_state_symbol
        ON alert_state(symbol, timeframe)
      `);
    } catch (error) {
      db.close();
      throw error;
    }

    return db;
  }

  private recover(): BetterSqlite3.Database {
    if (this.dbPath !== MEMORY_PATH && fs.existsSync(this.dbPath)) {
      const quarantined = `${this.dbPath}.corrupt-${Date.now()}`;
      try {
        fs.renameSync(this.dbPath, quarantined);
        for (const suffix of ['-wal', '-shm']) {
          if (fs.existsSync(this.dbPath + suffix)) {
            fs.rmSync(this.dbPath + suffix);
          }
        }
        logger.warn(`[AlertStateStore] Moved unreadable state file to ${quarantined}`);
        return this.open(this.dbPath);
      } catch (error) {
        logger.error('[AlertStateStore] Could not recreate state file, falling back to in-memory state:', error);
      }
    } else if (this.dbPath !== MEMORY_PATH) {
      try {
        return this.open(this.dbPath);
      } catch (error) {
        logger.error('[AlertStateStore] Could not create state file, falling back to in-memory state:', error);
      }
    }

    this.degraded = true;
    return this.open(MEMORY_PATH);
  }

  private requireDb(): BetterSqlite3.Database {
    if (!this.db) {
      this.initialize();
    }
    if (!this.db) {
      throw new StateStoreError('Alert state store is not initialized');
    }
    return this.db;
  }

  private rowToState(row: AlertStateRow): AlertState | undefined {
    if (!isAlertType(row.alert_type)) {
      logger.warn(`[AlertStateStore] Ignoring row ${row.state_key} with unknown alert type ${row.alert_type}`);
      return undefined;
    }

    const updatedAt = parseDate(row.updated_at);
    if (!updatedAt) {
      logger.warn(`[AlertStateStore] Ignoring row ${row.state_key} with invalid updated_at`);
      return undefined;
    }

    return {
      symbol: row.symbol,
      timeframe: row.timeframe,
      alertType: row.alert_type,
      lastFiredAt: parseDate(row.last_fired_at),
      lastScore: row.last_score,
      lastRegime: row.last_regime !== null && isRegimeLabel(row.last_regime) ? row.last_regime : null,
      suppressionCount: row.suppression_count,
      updatedAt,
    };
  }
}
