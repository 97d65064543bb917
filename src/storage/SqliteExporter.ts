import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import type { PlayerPropRow, PropsSnapshot } from '../config/types';
import { WriteError } from '../errors';
import type { IExporter, StagedExport } from './IExporter';
import { ensureDirectoryExists } from './atomicFile';

export interface SqliteExporterConfig {
  /** Database file, created with its schema when absent */
  filePath: string;
  /** Milliseconds to wait on a locked database (default: 5000) */
  busyTimeout?: number;
}

export interface SnapshotSummary {
  snapshotTime: string;
  rowCount: number;
}

interface PlayerPropRecord {
  event_id: string;
  event_name: string;
  sport_key: string;
  commence_time: string;
  player_name: string;
  market: string;
  bookmaker: string;
  line: number | null;
  over_price: number | null;
  under_price: number | null;
  snapshot_time: string;
}

export const TABLE_NAME = 'player_props';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ${TABLE_NAME} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    event_id TEXT NOT NULL,
    event_name TEXT NOT NULL,
    sport_key TEXT NOT NULL,
    commence_time TEXT NOT NULL,
    player_name TEXT NOT NULL,
    market TEXT NOT NULL,
    bookmaker TEXT NOT NULL,
    line REAL,
    over_price REAL,
    under_price REAL,
    snapshot_time TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_${TABLE_NAME}_snapshot
    ON ${TABLE_NAME} (snapshot_time);
  CREATE INDEX IF NOT EXISTS idx_${TABLE_NAME}_prop
    ON ${TABLE_NAME} (event_id, player_name, market);
`;

/**
 * Append-only SQLite history of every snapshot
 *
 * Each run inserts its rows in a single transaction; earlier snapshots are
 * never updated or deleted.
 */
export class SqliteExporter implements IExporter {
  readonly sink = 'database';
  private filePath: string;
  private busyTimeout: number;

  constructor(config: SqliteExporterConfig) {
    this.filePath = config.filePath;
    this.busyTimeout = config.busyTimeout ?? 5000;
  }

  async stage(snapshot: PropsSnapshot): Promise<StagedExport> {
    let db: Database.Database | undefined;
    let insertAll: (records: PlayerPropRecord[]) => void;
    try {
      ensureDirectoryExists(path.dirname(this.filePath));
      db = this.open();
      insertAll = prepareInsert(db);
    } catch (error) {
      db?.close();
      throw new WriteError(this.sink, this.filePath, error);
    }

    const records = snapshot.rows.map((row) => toRecord(row, snapshot.snapshotTime));

    const connection = db;
    const sink = this.sink;
    const filePath = this.filePath;
    return {
      sink,
      path: filePath,
      async commit() {
        try {
          insertAll(records);
        } catch (error) {
          throw new WriteError(sink, filePath, error);
        } finally {
          connection.close();
        }
      },
      async discard() {
        connection.close();
      },
    };
  }

  /**
   * Total number of stored rows across all snapshots
   */
  countRows(): number {
    return this.withReader((db) => {
      const result = db
        .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${TABLE_NAME}`)
        .get();
      return result?.count ?? 0;
    }, 0);
  }

  /**
   * Stored snapshots, oldest first
   */
  listSnapshots(): SnapshotSummary[] {
    return this.withReader((db) => {
      return db
        .prepare<[], { snapshot_time: string; row_count: number }>(
          `
        SELECT snapshot_time, COUNT(*) AS row_count
        FROM ${TABLE_NAME}
        GROUP BY snapshot_time
        ORDER BY snapshot_time ASC
      `
        )
        .all()
        .map((row) => ({
          snapshotTime: row.snapshot_time,
          rowCount: row.row_count,
        }));
    }, []);
  }

  /**
   * Rows of one snapshot, in insertion order
   */
  getSnapshotRows(snapshotTime: string): PlayerPropRow[] {
    return this.withReader((db) => {
      return db
        .prepare<[string], PlayerPropRecord>(
          `
        SELECT event_id, event_name, sport_key, commence_time, player_name,
               market, bookmaker, line, over_price, under_price, snapshot_time
        FROM ${TABLE_NAME}
        WHERE snapshot_time = ?
        ORDER BY id ASC
      `
        )
        .all(snapshotTime)
        .map(fromRecord);
    }, []);
  }

  /**
   * First stored row of each prop quoted by a bookmaker, limited to the
   * given events. The bookmaker is matched case-insensitively.
   */
  getEarliestRows(bookmaker: string, eventIds: readonly string[]): PlayerPropRow[] {
    if (eventIds.length === 0) {
      return [];
    }

    const placeholders = eventIds.map(() => '?').join(', ');
    return this.withReader((db) => {
      return db
        .prepare<string[], PlayerPropRecord>(
          `
        SELECT p.event_id, p.event_name, p.sport_key, p.commence_time, p.player_name,
               p.market, p.bookmaker, p.line, p.over_price, p.under_price, p.snapshot_time
        FROM ${TABLE_NAME} p
        JOIN (
          SELECT MIN(id) AS first_id
          FROM ${TABLE_NAME}
          WHERE lower(bookmaker) = lower(?) AND event_id IN (${placeholders})
          GROUP BY event_id, player_name, market
        ) earliest ON p.id = earliest.first_id
        ORDER BY p.id ASC
      `
        )
        .all(bookmaker, ...eventIds)
        .map(fromRecord);
    }, []);
  }

  private open(): Database.Database {
    const db = new Database(this.filePath, { timeout: this.busyTimeout });
    db.exec(SCHEMA);
    return db;
  }

  private withReader<T>(read: (db: Database.Database) => T, whenMissing: T): T {
    if (!fs.existsSync(this.filePath)) {
      return whenMissing;
    }

    const db = this.open();
    try {
      return read(db);
    } finally {
      db.close();
    }
  }
}

/**
 * Prepared insert wrapped in a single transaction
 */
function prepareInsert(db: Database.Database): (records: PlayerPropRecord[]) => void {
  const insert = db.prepare<PlayerPropRecord>(`
    INSERT INTO ${TABLE_NAME} (
      event_id, event_name, sport_key, commence_time, player_name, market,
      bookmaker, line, over_price, under_price, snapshot_time
    ) VALUES (
      @event_id, @event_name, @sport_key, @commence_time, @player_name, @market,
      @bookmaker, @line, @over_price, @under_price, @snapshot_time
    )
  `);

  return db.transaction((records: PlayerPropRecord[]) => {
    for (const record of records) {
      insert.run(record);
    }
  });
}

function toRecord(row: PlayerPropRow, snapshotTime: string): PlayerPropRecord {
  return {
    event_id: row.eventId,
    event_name: row.eventName,
    sport_key: row.sportKey,
    commence_time: row.commenceTime,
    player_name: row.playerName,
    market: row.market,
    bookmaker: row.bookmaker,
    line: row.line,
    over_price: row.overPrice,
    under_price: row.underPrice,
    snapshot_time: snapshotTime,
  };
}

function fromRecord(record: PlayerPropRecord): PlayerPropRow {
  return {
    eventId: record.event_id,
    eventName: record.event_name,
    sportKey: record.sport_key,
    commenceTime: record.commence_time,
    playerName: record.player_name,
    market: record.market,
    bookmaker: record.bookmaker,
    line: record.line,
    overPrice: record.over_price,
    underPrice: record.under_price,
    snapshotTime: record.snapshot_time,
  };
}
