import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { getLogger } from './logger';
import { TimeRecordStore } from './store';
import {
  CorruptStoreError,
  RecordStatus,
  SegmentEvent,
  SegmentEventKind,
  Session,
  StoreWriteError,
  TimeRecord,
} from './types';
import { checkSession } from './validation';

function isRecordStatus(value: string): value is RecordStatus {
  return value === 'running' || value === 'paused' || value === 'completed';
}

function isEventKind(value: string): value is SegmentEventKind {
  return value === 'start' || value === 'pause' || value === 'resume' || value === 'end';
}

interface RecordRow {
  id: number;
  position: number;
  task_label: string;
  status: string;
  start_time: string;
  end_time: string | null;
}

interface EventRow {
  record_id: number;
  seq: number;
  kind: string;
  at: string;
}

/**
 * TimeRecordStore backed by a SQLite database
 */
export class SqliteStore implements TimeRecordStore {
  private db: Database.Database;
  private path: string;
  private logger = getLogger('database');

  constructor(database: string | Database.Database = ':memory:') {
    this.path = typeof database === 'string' ? database : database.name;
    try {
      if (typeof database === 'string' && database !== ':memory:') {
        mkdirSync(dirname(database), { recursive: true });
      }
      this.db = typeof database === 'string' ? new Database(database) : database;
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('foreign_keys = ON');
      this.initialize();
    } catch (error) {
      throw new CorruptStoreError(this.path, `failed to open database: ${error}`);
    }
  }

  private initialize(): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
  }

  get location(): string {
    return this.path;
  }

  load(): Session {
    let rows: RecordRow[];
    let eventRows: EventRow[];
    try {
      rows = this.db
        .prepare(
          `SELECT id, position, task_label, status, start_time, end_time
           FROM records
           ORDER BY position ASC, id ASC`
        )
        .all() as RecordRow[];
      eventRows = this.db
        .prepare(`SELECT record_id, seq, kind, at FROM record_events ORDER BY record_id, seq`)
        .all() as EventRow[];
    } catch (error) {
      throw new CorruptStoreError(this.path, `failed to read records: ${error}`);
    }

    const eventsByRecord = new Map<number, SegmentEvent[]>();
    for (const row of eventRows) {
      const events = eventsByRecord.get(row.record_id) ?? [];
      events.push(this.rowToEvent(row));
      eventsByRecord.set(row.record_id, events);
    }

    const records = rows.map((row) => this.rowToRecord(row, eventsByRecord.get(row.id) ?? []));
    const open = records.filter((record) => record.status !== 'completed');
    if (open.length > 1) {
      throw new CorruptStoreError(this.path, `${open.length} open records, at most one allowed`);
    }

    const session: Session = {
      activeRecord: open[0] ?? null,
      history: records.filter((record) => record.status === 'completed'),
    };

    const issues = checkSession(session);
    if (issues.length > 0) {
      throw new CorruptStoreError(this.path, issues.join('; '));
    }

    this.logger.debug({ path: this.path, records: records.length }, 'records loaded');
    return session;
  }

  save(session: Session): void {
    const records = session.activeRecord
      ? [...session.history, session.activeRecord]
      : session.history;

    try {
      const insertRecord = this.db.prepare(`
        INSERT INTO records (position, task_label, status, start_time, end_time)
        VALUES (?, ?, ?, ?, ?)
      `);
      const insertEvent = this.db.prepare(`
        INSERT INTO record_events (record_id, seq, kind, at)
        VALUES (?, ?, ?, ?)
      `);

      const replaceAll = this.db.transaction((records: TimeRecord[]) => {
        this.db.prepare('DELETE FROM record_events').run();
        this.db.prepare('DELETE FROM records').run();

        records.forEach((record, position) => {
          const result = insertRecord.run(
            position,
            record.taskLabel,
            record.status,
            record.startTime.toISOString(),
            record.endTime?.toISOString() ?? null
          );
          const recordId = Number(result.lastInsertRowid);
          record.events.forEach((event, seq) => {
            insertEvent.run(recordId, seq, event.kind, event.at.toISOString());
          });
        });
      });

      replaceAll(records);
    } catch (error) {
      throw new StoreWriteError(this.path, `${error}`);
    }

    this.logger.debug({ path: this.path, records: records.length }, 'records saved');
  }

  // ============ Utility Methods ============

  private rowToRecord(row: RecordRow, events: SegmentEvent[]): TimeRecord {
    const status = row.status;
    if (!isRecordStatus(status)) {
      throw new CorruptStoreError(this.path, `record ${row.id} has unknown status "${status}"`);
    }
    return {
      taskLabel: row.task_label,
      startTime: this.parseTime(row.start_time, `record ${row.id} start`),
      ...(row.end_time ? { endTime: this.parseTime(row.end_time, `record ${row.id} end`) } : {}),
      status,
      events,
    };
  }

  private rowToEvent(row: EventRow): SegmentEvent {
    const kind = row.kind;
    if (!isEventKind(kind)) {
      throw new CorruptStoreError(this.path, `record ${row.record_id} has unknown event "${kind}"`);
    }
    return {
      kind,
      at: this.parseTime(row.at, `record ${row.record_id} event ${row.seq}`),
    };
  }

  private parseTime(value: string, what: string): Date {
    const time = new Date(value);
    if (Number.isNaN(time.getTime())) {
      throw new CorruptStoreError(this.path, `${what} is not a valid timestamp`);
    }
    return time;
  }

  close(): void {
    if (!this.db.memory) {
      this.db.pragma('wal_checkpoint(RESTART)');
    }
    this.db.close();
  }
}
