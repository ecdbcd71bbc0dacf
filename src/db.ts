import Database from 'better-sqlite3';
import config from 'config';
import fs from 'node:fs';
import path from 'node:path';
import type {
  EventRecord,
  EventSeverity,
  PipelineEventKind,
  RecordingOutcome,
  RecordingRecord
} from './types.js';

const IN_MEMORY = ':memory:';

const dbPath = config.get<string>('database.path');
if (dbPath !== IN_MEMORY) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

const db = new Database(dbPath);

export const databasePath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dbPath);

db.exec(`
  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ts INTEGER NOT NULL,
    source TEXT NOT NULL,
    kind TEXT NOT NULL,
    severity TEXT NOT NULL,
    message TEXT NOT NULL,
    meta TEXT
  );

  CREATE TABLE IF NOT EXISTS recordings (
    session_id TEXT PRIMARY KEY,
    device TEXT NOT NULL,
    started_at INTEGER NOT NULL,
    stopped_at INTEGER,
    snapshot_path TEXT,
    clip_path TEXT NOT NULL,
    clip_bytes INTEGER,
    duration_ms INTEGER,
    outcome TEXT,
    stop_reason TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_events_ts ON events (ts);
  CREATE INDEX IF NOT EXISTS idx_events_source_kind ON events (source, kind);
  CREATE INDEX IF NOT EXISTS idx_recordings_device_started ON recordings (device, started_at);
`);

type EventRow = {
  id: number;
  ts: number;
  source: string;
  kind: PipelineEventKind;
  severity: EventSeverity;
  message: string;
  meta: string | null;
};

type EventParams = Omit<EventRow, 'id'>;

type RecordingRow = {
  session_id: string;
  device: string;
  started_at: number;
  stopped_at: number | null;
  snapshot_path: string | null;
  clip_path: string;
  clip_bytes: number | null;
  duration_ms: number | null;
  outcome: RecordingOutcome | null;
  stop_reason: string | null;
};

export type EventRecordWithId = EventRecord & { id: number };

export interface ListEventsOptions {
  source?: string;
  kind?: PipelineEventKind;
  limit?: number;
}

export interface ListRecordingsOptions {
  device?: string;
  limit?: number;
}

/** Write side of the recording catalog, as seen by session managers. */
export interface RecordingCatalog {
  save(record: RecordingRecord): void;
}

const insertEventStatement = db.prepare<EventParams>(
  'INSERT INTO events (ts, source, kind, severity, message, meta) VALUES (@ts, @source, @kind, @severity, @message, @meta)'
);

const upsertRecordingStatement = db.prepare<RecordingRow>(`
  INSERT INTO recordings (
    session_id, device, started_at, stopped_at, snapshot_path, clip_path, clip_bytes, duration_ms, outcome, stop_reason
  ) VALUES (
    @session_id, @device, @started_at, @stopped_at, @snapshot_path, @clip_path, @clip_bytes, @duration_ms, @outcome, @stop_reason
  )
  ON CONFLICT(session_id) DO UPDATE SET
    stopped_at = excluded.stopped_at,
    snapshot_path = excluded.snapshot_path,
    clip_path = excluded.clip_path,
    clip_bytes = excluded.clip_bytes,
    duration_ms = excluded.duration_ms,
    outcome = excluded.outcome,
    stop_reason = excluded.stop_reason
`);

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 1000;

function clampLimit(value: number | undefined) {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return DEFAULT_LIMIT;
  }
  return Math.min(MAX_LIMIT, Math.floor(value));
}

function parseMeta(value: string | null): Record<string, unknown> | undefined {
  if (!value) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    return undefined;
  }
  return undefined;
}

export function storeEvent(event: EventRecord) {
  insertEventStatement.run({
    ts: event.ts,
    source: event.source,
    kind: event.kind,
    severity: event.severity,
    message: event.message,
    meta: event.meta ? JSON.stringify(event.meta) : null
  });
}

export function listEvents(options: ListEventsOptions = {}): EventRecordWithId[] {
  const filters: string[] = [];
  const params: Record<string, string | number> = { limit: clampLimit(options.limit) };

  if (options.source) {
    filters.push('source = @source');
    params.source = options.source;
  }
  if (options.kind) {
    filters.push('kind = @kind');
    params.kind = options.kind;
  }

  const whereClause = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
  const rows = db
    .prepare<Record<string, string | number>, EventRow>(
      `SELECT id, ts, source, kind, severity, message, meta FROM events ${whereClause}
       ORDER BY ts DESC, id DESC LIMIT @limit`
    )
    .all(params);

  return rows.map(row => ({
    id: row.id,
    ts: row.ts,
    source: row.source,
    kind: row.kind,
    severity: row.severity,
    message: row.message,
    meta: parseMeta(row.meta)
  }));
}

export function saveRecording(record: RecordingRecord) {
  upsertRecordingStatement.run({
    session_id: record.sessionId,
    device: record.device,
    started_at: record.startedAt,
    stopped_at: record.stoppedAt,
    snapshot_path: record.snapshotPath,
    clip_path: record.clipPath,
    clip_bytes: record.clipBytes,
    duration_ms: record.durationMs === null ? null : Math.round(record.durationMs),
    outcome: record.outcome,
    stop_reason: record.stopReason
  });
}

export function listRecordings(options: ListRecordingsOptions = {}): RecordingRecord[] {
  const params: Record<string, string | number> = { limit: clampLimit(options.limit) };
  let whereClause = '';
  if (options.device) {
    whereClause = 'WHERE device = @device';
    params.device = options.device;
  }

  const rows = db
    .prepare<Record<string, string | number>, RecordingRow>(
      `SELECT session_id, device, started_at, stopped_at, snapshot_path, clip_path, clip_bytes,
              duration_ms, outcome, stop_reason
       FROM recordings ${whereClause}
       ORDER BY started_at DESC, session_id DESC LIMIT @limit`
    )
    .all(params);

  return rows.map(row => ({
    sessionId: row.session_id,
    device: row.device,
    startedAt: row.started_at,
    stoppedAt: row.stopped_at,
    snapshotPath: row.snapshot_path,
    clipPath: row.clip_path,
    clipBytes: row.clip_bytes,
    durationMs: row.duration_ms,
    outcome: row.outcome,
    stopReason: row.stop_reason
  }));
}

export const recordingCatalog: RecordingCatalog = {
  save: saveRecording
};

export function clearEvents() {
  db.prepare('DELETE FROM events').run();
}

export function clearRecordings() {
  db.prepare('DELETE FROM recordings').run();
}

export function closeDatabase() {
  if (db.open) {
    db.close();
  }
}

export default db;
