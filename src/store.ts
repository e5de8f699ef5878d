import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { Document, isMap, parseDocument } from 'yaml';
import { z } from 'zod';
import { getLogger } from './logger';
import {
  CorruptStoreError,
  RecordStatus,
  SegmentEvent,
  Session,
  StoreWriteError,
  TimeRecord,
  emptySession,
} from './types';
import { checkSession } from './validation';

/**
 * Durable home of a Session
 */
export interface TimeRecordStore {
  /** Where the Session lives, for messages */
  readonly location: string;
  load(): Session;
  save(session: Session): void;
}

export const STORE_VERSION = 1;

const timestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'not a valid timestamp' })
  .transform((value) => new Date(value));

const eventSchema = z.object({
  kind: z.enum(['start', 'pause', 'resume', 'end']),
  at: timestamp,
});

const recordSchema = z
  .object({
    task: z
      .string()
      .nullish()
      .transform((value) => value ?? ''),
    status: z.enum(['running', 'paused', 'completed']),
    start: timestamp,
    end: timestamp.nullish(),
    events: z.array(eventSchema).nullish(),
  })
  .transform(
    (raw): TimeRecord => ({
      taskLabel: raw.task,
      startTime: raw.start,
      ...(raw.end ? { endTime: raw.end } : {}),
      status: raw.status,
      events: raw.events ?? impliedEvents(raw.status, raw.start, raw.end ?? undefined),
    })
  );

const sessionSchema = z.object({
  version: z.literal(STORE_VERSION).optional(),
  active: recordSchema.nullish(),
  history: z.array(recordSchema).nullish(),
});

/**
 * Events for a hand-written record that lists none
 */
function impliedEvents(status: RecordStatus, start: Date, end?: Date): SegmentEvent[] {
  const events: SegmentEvent[] = [{ kind: 'start', at: start }];
  if (status === 'paused') {
    events.push({ kind: 'pause', at: start });
  }
  if (status === 'completed' && end) {
    events.push({ kind: 'end', at: end });
  }
  return events;
}

interface SerializedRecord {
  task: string;
  status: RecordStatus;
  start: string;
  end?: string;
  events: { kind: SegmentEvent['kind']; at: string }[];
}

function serializeRecord(record: TimeRecord): SerializedRecord {
  return {
    task: record.taskLabel,
    status: record.status,
    start: record.startTime.toISOString(),
    ...(record.endTime ? { end: record.endTime.toISOString() } : {}),
    events: record.events.map((event) => ({ kind: event.kind, at: event.at.toISOString() })),
  };
}

/**
 * Parse the text of a store file into a Session
 */
export function parseSession(text: string, location: string): Session {
  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    throw new CorruptStoreError(location, doc.errors[0].message);
  }

  const data: unknown = doc.toJS();
  if (data === null || data === undefined) {
    return emptySession();
  }

  const parsed = sessionSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new CorruptStoreError(location, `${where}${issue.message}`);
  }

  const session: Session = {
    activeRecord: parsed.data.active ?? null,
    history: parsed.data.history ?? [],
  };

  const issues = checkSession(session);
  if (issues.length > 0) {
    throw new CorruptStoreError(location, issues.join('; '));
  }

  return session;
}

/**
 * Render a Session as YAML. When the text of an existing store is given,
 * its comments and any keys this module does not own are kept.
 */
export function stringifySession(session: Session, existing?: string): string {
  const values = {
    version: STORE_VERSION,
    active: session.activeRecord ? serializeRecord(session.activeRecord) : null,
    history: session.history.map(serializeRecord),
  };

  if (existing !== undefined) {
    const doc = parseDocument(existing);
    if (doc.errors.length === 0 && isMap(doc.contents)) {
      for (const [key, value] of Object.entries(values)) {
        doc.set(key, value);
      }
      return doc.toString();
    }
  }

  return new Document(values).toString();
}

/**
 * Replace a file's content through a temp file in the same directory, so
 * the target is either the old or the new content, never a mix.
 */
export function writeFileAtomic(path: string, content: string): void {
  const tempPath = `${path}.${process.pid}.tmp`;
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, path);
  } catch (error) {
    if (existsSync(tempPath)) {
      rmSync(tempPath);
    }
    throw new StoreWriteError(path, error instanceof Error ? error.message : String(error));
  }
}

/**
 * TimeRecordStore kept in a hand-editable YAML file
 */
export class YamlFileStore implements TimeRecordStore {
  private logger = getLogger('store');

  constructor(private path: string) {}

  get location(): string {
    return this.path;
  }

  load(): Session {
    if (!existsSync(this.path)) {
      this.logger.debug({ path: this.path }, 'store file not found, starting empty');
      return emptySession();
    }

    let text: string;
    try {
      text = readFileSync(this.path, 'utf-8');
    } catch (error) {
      throw new CorruptStoreError(
        this.path,
        error instanceof Error ? error.message : String(error)
      );
    }

    const session = parseSession(text, this.path);
    this.logger.debug(
      { path: this.path, history: session.history.length, open: session.activeRecord !== null },
      'store loaded'
    );
    return session;
  }

  save(session: Session): void {
    let existing: string | undefined;
    if (existsSync(this.path)) {
      try {
        existing = readFileSync(this.path, 'utf-8');
      } catch (error) {
        this.logger.warn({ path: this.path, err: error }, 'could not read store before saving');
      }
    }

    writeFileAtomic(this.path, stringifySession(session, existing));
    this.logger.debug({ path: this.path, history: session.history.length }, 'store saved');
  }
}
