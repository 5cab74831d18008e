/**
 * Signal log — append-only record of every classified signal.
 *
 * The SQLite file is opened, written and closed per call; no connection is
 * held between requests. Two writers on the same file race at file level.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { ExternalCallError, errMsg } from '../lib/errors';
import { logger } from '../lib/logger';
import { isSignalLabel, type SignalRecord } from '../types/signal';

export interface SignalLog {
  /** Persist one record. Throws if the store is unavailable; nothing is retried. */
  append(record: SignalRecord): void;
  /** All records in insertion order. */
  list(): SignalRecord[];
}

const CREATE_TABLE = 'CREATE TABLE IF NOT EXISTS signals (timestamp TEXT, signal TEXT)';

interface SignalRow {
  timestamp: string;
  signal: string;
}

function toRecord(row: SignalRow): SignalRecord | null {
  if (typeof row.timestamp !== 'string' || !isSignalLabel(row.signal)) return null;
  return { timestamp: row.timestamp, signal: row.signal };
}

export class SqliteSignalLog implements SignalLog {
  constructor(private readonly dbPath: string) {}

  get path(): string {
    return this.dbPath;
  }

  private open(): Database.Database {
    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    const db = new Database(this.dbPath);
    db.exec(CREATE_TABLE);
    return db;
  }

  append(record: SignalRecord): void {
    let db: Database.Database | null = null;
    try {
      db = this.open();
      db.prepare<[string, string]>('INSERT INTO signals (timestamp, signal) VALUES (?, ?)').run(record.timestamp, record.signal);
    } catch (e) {
      logger.error('SignalLog', 'append failed', { path: this.dbPath, error: errMsg(e) });
      throw new ExternalCallError('store', `Signal store unavailable: ${errMsg(e)}`, { cause: e });
    } finally {
      db?.close();
    }
  }

  list(): SignalRecord[] {
    if (!fs.existsSync(this.dbPath)) return [];
    let db: Database.Database | null = null;
    try {
      db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
      const hasTable = db.prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'signals'").get();
      if (!hasTable) return [];
      const rows = db.prepare<[], SignalRow>('SELECT timestamp, signal FROM signals ORDER BY rowid').all();
      const out: SignalRecord[] = [];
      for (const row of rows) {
        const rec = toRecord(row);
        if (rec) out.push(rec);
        else logger.warn('SignalLog', 'skipping unreadable row', { timestamp: row.timestamp, signal: row.signal });
      }
      return out;
    } catch (e) {
      throw new ExternalCallError('store', `Signal store unavailable: ${errMsg(e)}`, { cause: e });
    } finally {
      db?.close();
    }
  }
}

/** In-process log with the same contract. */
export class MemorySignalLog implements SignalLog {
  private readonly records: SignalRecord[] = [];

  append(record: SignalRecord): void {
    this.records.push({ ...record });
  }

  list(): SignalRecord[] {
    return this.records.map((r) => ({ ...r }));
  }
}
