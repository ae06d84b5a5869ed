import { access, mkdir, rename, rm } from 'node:fs/promises';
import path from 'node:path';

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';

import {
  SnapshotNotFoundError,
  StorageError,
  errorMessage,
  isErrnoException,
} from '@/lib/errors';
import type { Logger } from '@/lib/log';
import { compareSessions, compareSpecialEvents, slotBounds } from '@/lib/schedule/slot';
import type { ScheduleStore } from '@/lib/schedule/store';
import { snapshotSchema, type Snapshot } from '@/lib/schedule/types';

export const SCHEDULE_DB_FILENAME = 'schedule.db';
export const SCHEDULE_DB_TMP_PREFIX = `${SCHEDULE_DB_FILENAME}.tmp.`;

const SCHEMA_VERSION = '1';

const SCHEMA_SQL = `
CREATE TABLE meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
CREATE TABLE tracks (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL
);
CREATE TABLE speakers (
  slug TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  bio TEXT,
  company TEXT,
  country TEXT,
  photo_url TEXT,
  partial INTEGER NOT NULL CHECK (partial IN (0, 1))
);
CREATE TABLE speaker_links (
  speaker_slug TEXT NOT NULL REFERENCES speakers (slug),
  position INTEGER NOT NULL,
  label TEXT NOT NULL,
  url TEXT NOT NULL,
  PRIMARY KEY (speaker_slug, position)
);
CREATE TABLE sessions (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  abstract TEXT,
  day TEXT NOT NULL,
  start TEXT NOT NULL,
  start_ms INTEGER NOT NULL,
  duration_minutes INTEGER NOT NULL CHECK (duration_minutes > 0),
  timezone TEXT NOT NULL,
  room TEXT NOT NULL,
  language TEXT,
  level TEXT,
  is_keynote INTEGER NOT NULL CHECK (is_keynote IN (0, 1)),
  partial INTEGER NOT NULL CHECK (partial IN (0, 1))
);
CREATE INDEX sessions_by_start ON sessions (day, start_ms);
CREATE TABLE session_speakers (
  session_id TEXT NOT NULL REFERENCES sessions (id),
  speaker_slug TEXT NOT NULL REFERENCES speakers (slug),
  position INTEGER NOT NULL,
  PRIMARY KEY (session_id, speaker_slug)
);
CREATE TABLE session_tracks (
  session_id TEXT NOT NULL REFERENCES sessions (id),
  track_id TEXT NOT NULL REFERENCES tracks (id),
  position INTEGER NOT NULL,
  PRIMARY KEY (session_id, track_id)
);
CREATE TABLE special_events (
  position INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  day TEXT NOT NULL,
  start TEXT NOT NULL,
  start_ms INTEGER NOT NULL,
  duration_minutes INTEGER NOT NULL CHECK (duration_minutes > 0),
  timezone TEXT NOT NULL
);
`;

type MetaRow = { key: string; value: string };
type TrackRow = { id: string; name: string };
type SpeakerRow = {
  slug: string;
  name: string;
  bio: string | null;
  company: string | null;
  country: string | null;
  photo_url: string | null;
  partial: number;
};
type SpeakerLinkRow = { speaker_slug: string; label: string; url: string };
type SessionRow = {
  id: string;
  title: string;
  abstract: string | null;
  day: string;
  start: string;
  duration_minutes: number;
  timezone: string;
  room: string;
  language: string | null;
  level: string | null;
  is_keynote: number;
  partial: number;
};
type SessionRefRow = { session_id: string; ref: string };
type SpecialEventRow = {
  name: string;
  day: string;
  start: string;
  duration_minutes: number;
  timezone: string;
};

export function getScheduleDbPath(dataDir: string): string {
  return path.join(dataDir, SCHEDULE_DB_FILENAME);
}

function flag(value: boolean): number {
  return value ? 1 : 0;
}

function groupBy<T>(rows: readonly T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const group = groups.get(key(row)) ?? [];
    group.push(row);
    groups.set(key(row), group);
  }
  return groups;
}

function writeDatabase(filePath: string, snapshot: Snapshot): void {
  const db = new Database(filePath);
  try {
    db.pragma('journal_mode = DELETE');
    db.pragma('foreign_keys = ON');
    db.exec(SCHEMA_SQL);

    const insertMeta = db.prepare<[string, string]>(
      'INSERT INTO meta (key, value) VALUES (?, ?)',
    );
    const insertTrack = db.prepare<[string, string]>(
      'INSERT INTO tracks (id, name) VALUES (?, ?)',
    );
    const insertSpeaker = db.prepare<SpeakerRow>(
      `INSERT INTO speakers (slug, name, bio, company, country, photo_url, partial)
       VALUES (@slug, @name, @bio, @company, @country, @photo_url, @partial)`,
    );
    const insertLink = db.prepare<[string, number, string, string]>(
      'INSERT INTO speaker_links (speaker_slug, position, label, url) VALUES (?, ?, ?, ?)',
    );
    const insertSession = db.prepare<SessionRow & { start_ms: number }>(
      `INSERT INTO sessions (id, title, abstract, day, start, start_ms, duration_minutes,
         timezone, room, language, level, is_keynote, partial)
       VALUES (@id, @title, @abstract, @day, @start, @start_ms, @duration_minutes,
         @timezone, @room, @language, @level, @is_keynote, @partial)`,
    );
    const insertSessionSpeaker = db.prepare<[string, string, number]>(
      'INSERT INTO session_speakers (session_id, speaker_slug, position) VALUES (?, ?, ?)',
    );
    const insertSessionTrack = db.prepare<[string, string, number]>(
      'INSERT INTO session_tracks (session_id, track_id, position) VALUES (?, ?, ?)',
    );
    const insertSpecialEvent = db.prepare<
      [number, string, string, string, number, number, string]
    >(
      `INSERT INTO special_events (position, name, day, start, start_ms, duration_minutes, timezone)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );

    db.transaction(() => {
      insertMeta.run('schema_version', SCHEMA_VERSION);
      insertMeta.run('snapshot_version', String(snapshot.version));
      insertMeta.run('fetched_at', snapshot.fetchedAt);

      for (const track of snapshot.tracks) insertTrack.run(track.id, track.name);

      for (const speaker of snapshot.speakers) {
        insertSpeaker.run({
          slug: speaker.slug,
          name: speaker.name,
          bio: speaker.bio,
          company: speaker.company,
          country: speaker.country,
          photo_url: speaker.photoUrl,
          partial: flag(speaker.partial),
        });
        speaker.links.forEach((link, position) =>
          insertLink.run(speaker.slug, position, link.label, link.url),
        );
      }

      for (const session of snapshot.sessions) {
        insertSession.run({
          id: session.id,
          title: session.title,
          abstract: session.abstract,
          day: session.slot.day,
          start: session.slot.start,
          start_ms: slotBounds(session.slot).startMs,
          duration_minutes: session.slot.durationMinutes,
          timezone: session.slot.timezone,
          room: session.room,
          language: session.language,
          level: session.level,
          is_keynote: flag(session.isKeynote),
          partial: flag(session.partial),
        });
        session.speakers.forEach((slug, position) =>
          insertSessionSpeaker.run(session.id, slug, position),
        );
        session.tracks.forEach((trackId, position) =>
          insertSessionTrack.run(session.id, trackId, position),
        );
      }

      snapshot.specialEvents.forEach((event, position) =>
        insertSpecialEvent.run(
          position,
          event.name,
          event.slot.day,
          event.slot.start,
          slotBounds(event.slot).startMs,
          event.slot.durationMinutes,
          event.slot.timezone,
        ),
      );
    })();
  } finally {
    db.close();
  }
}

function readMeta(db: DatabaseType): Map<string, string> {
  const rows = db.prepare<[], MetaRow>('SELECT key, value FROM meta').all();
  return new Map(rows.map((row) => [row.key, row.value]));
}

function readDatabase(db: DatabaseType): unknown {
  const meta = readMeta(db);

  const tracks = db
    .prepare<[], TrackRow>('SELECT id, name FROM tracks ORDER BY id')
    .all();

  const links = groupBy(
    db
      .prepare<[], SpeakerLinkRow>(
        'SELECT speaker_slug, label, url FROM speaker_links ORDER BY speaker_slug, position',
      )
      .all(),
    (row) => row.speaker_slug,
  );
  const speakers = db
    .prepare<[], SpeakerRow>(
      'SELECT slug, name, bio, company, country, photo_url, partial FROM speakers ORDER BY slug',
    )
    .all()
    .map((row) => ({
      slug: row.slug,
      name: row.name,
      bio: row.bio,
      company: row.company,
      country: row.country,
      photoUrl: row.photo_url,
      links: (links.get(row.slug) ?? []).map(({ label, url }) => ({ label, url })),
      partial: row.partial === 1,
    }));

  const sessionSpeakers = groupBy(
    db
      .prepare<[], SessionRefRow>(
        'SELECT session_id, speaker_slug AS ref FROM session_speakers ORDER BY session_id, position',
      )
      .all(),
    (row) => row.session_id,
  );
  const sessionTracks = groupBy(
    db
      .prepare<[], SessionRefRow>(
        'SELECT session_id, track_id AS ref FROM session_tracks ORDER BY session_id, position',
      )
      .all(),
    (row) => row.session_id,
  );
  const sessions = db
    .prepare<[], SessionRow>(
      `SELECT id, title, abstract, day, start, duration_minutes, timezone, room,
         language, level, is_keynote, partial
       FROM sessions ORDER BY day, start_ms, id`,
    )
    .all()
    .map((row) => ({
      id: row.id,
      title: row.title,
      abstract: row.abstract,
      slot: {
        day: row.day,
        start: row.start,
        durationMinutes: row.duration_minutes,
        timezone: row.timezone,
      },
      room: row.room,
      language: row.language,
      level: row.level,
      isKeynote: row.is_keynote === 1,
      speakers: (sessionSpeakers.get(row.id) ?? []).map((r) => r.ref),
      tracks: (sessionTracks.get(row.id) ?? []).map((r) => r.ref),
      partial: row.partial === 1,
    }));

  const specialEvents = db
    .prepare<[], SpecialEventRow>(
      'SELECT name, day, start, duration_minutes, timezone FROM special_events ORDER BY position',
    )
    .all()
    .map((row) => ({
      name: row.name,
      slot: {
        day: row.day,
        start: row.start,
        durationMinutes: row.duration_minutes,
        timezone: row.timezone,
      },
    }));

  return {
    version: Number(meta.get('snapshot_version')),
    fetchedAt: meta.get('fetched_at'),
    tracks,
    speakers,
    sessions,
    specialEvents,
  };
}

/**
 * Schedule snapshots in a single SQLite file. Every save builds a fresh
 * database beside the live one and renames it into place, so readers see
 * either the previous snapshot or the new one in full.
 */
export class SqliteScheduleStore implements ScheduleStore {
  private readonly dbPath: string;

  constructor(
    private readonly dataDir: string,
    private readonly logger: Logger,
  ) {
    this.dbPath = getScheduleDbPath(dataDir);
  }

  async saveSnapshot(snapshot: Snapshot): Promise<void> {
    const parsed = snapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new StorageError('Refusing to write an invalid schedule snapshot.', {
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`,
        ),
      });
    }

    const tmpPath = path.join(
      this.dataDir,
      `${SCHEDULE_DB_TMP_PREFIX}${process.pid}.${Date.now()}`,
    );
    try {
      await mkdir(this.dataDir, { recursive: true });
      writeDatabase(tmpPath, parsed.data);
      await rename(tmpPath, this.dbPath);
    } catch (err) {
      await rm(tmpPath, { force: true });
      await rm(`${tmpPath}-journal`, { force: true });
      throw new StorageError(`Could not save schedule: ${errorMessage(err)}`, {
        filePath: this.dbPath,
      });
    }

    this.logger.info('schedule saved', {
      sessions: parsed.data.sessions.length,
      speakers: parsed.data.speakers.length,
      fetchedAt: parsed.data.fetchedAt,
    });
  }

  async loadSnapshot(): Promise<Snapshot> {
    const raw = await this.withReadonlyDb(readDatabase);
    if (raw === null) throw new SnapshotNotFoundError(this.dbPath);

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(`Invalid schedule database at ${this.dbPath}`, {
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`,
        ),
      });
    }
    const snapshot = parsed.data;
    snapshot.sessions.sort(compareSessions);
    snapshot.specialEvents.sort(compareSpecialEvents);
    return snapshot;
  }

  async lastSyncedAt(): Promise<string | null> {
    const meta = await this.withReadonlyDb(readMeta);
    return meta?.get('fetched_at') ?? null;
  }

  private async withReadonlyDb<T>(
    read: (db: DatabaseType) => T,
  ): Promise<T | null> {
    try {
      await access(this.dbPath);
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) return null;
      throw err;
    }

    let db: DatabaseType | null = null;
    try {
      db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
      return read(db);
    } catch (err) {
      throw new StorageError(
        `Could not read schedule database: ${errorMessage(err)}`,
        { filePath: this.dbPath },
      );
    } finally {
      db?.close();
    }
  }
}
