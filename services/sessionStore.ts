import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { PersistenceError, toErrorMessage } from '../errors.ts';
import type { Session, SessionSummary, StoredSession } from '../types.ts';

/**
 * Persistence gateway for finished sessions. Sessions are kept per user and
 * numbered in the order they were saved.
 */
export interface SessionRepository {
  saveSession(session: Session): Promise<string>;
  listSessions(userId: string): Promise<SessionSummary[]>;
  getSession(userId: string, sessionId: string): Promise<StoredSession | undefined>;
  renameSession(userId: string, sessionId: string, name: string): Promise<void>;
  deleteSession(userId: string, sessionId: string): Promise<void>;
}

export const toSummary = (session: StoredSession): SessionSummary => {
  const { samples: _samples, heartRates: _heartRates, ...summary } = session;
  return summary;
};

const newestFirst = (a: SessionSummary, b: SessionSummary) => b.startedAt - a.startedAt;

/**
 * In-memory store. Used by tests and by short-lived runs that do not need
 * sessions to outlive the process.
 */
export class InMemorySessionStore implements SessionRepository {
  private sessions: Map<string, StoredSession> = new Map();
  // Index for quick lookups
  private sessionsByUser: Map<string, string[]> = new Map();

  async saveSession(session: Session): Promise<string> {
    if (this.sessions.has(session.id)) {
      throw new PersistenceError('write-failed', `Session ${session.id} already exists`);
    }
    const userSessions = this.sessionsByUser.get(session.userId) ?? [];
    const stored: StoredSession = Object.freeze({ ...session, sessionNumber: userSessions.length + 1 });
    assertStorable(stored);

    this.sessions.set(session.id, stored);
    userSessions.push(session.id);
    this.sessionsByUser.set(session.userId, userSessions);
    return session.id;
  }

  async listSessions(userId: string): Promise<SessionSummary[]> {
    const ids = this.sessionsByUser.get(userId) ?? [];
    return ids
      .map((id) => this.sessions.get(id))
      .filter((session): session is StoredSession => session !== undefined)
      .map(toSummary)
      .sort(newestFirst);
  }

  async getSession(userId: string, sessionId: string): Promise<StoredSession | undefined> {
    const session = this.sessions.get(sessionId);
    return session && session.userId === userId ? session : undefined;
  }

  async renameSession(userId: string, sessionId: string, name: string): Promise<void> {
    const session = await this.getSession(userId, sessionId);
    if (!session) throw new PersistenceError('not-found', `Session ${sessionId} not found`);
    this.sessions.set(sessionId, Object.freeze({ ...session, name }));
  }

  async deleteSession(userId: string, sessionId: string): Promise<void> {
    const session = await this.getSession(userId, sessionId);
    if (!session) throw new PersistenceError('not-found', `Session ${sessionId} not found`);
    this.sessions.delete(sessionId);
    const remaining = (this.sessionsByUser.get(userId) ?? []).filter((id) => id !== sessionId);
    this.sessionsByUser.set(userId, remaining);
  }
}

const StoredSessionSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  deviceId: z.string(),
  name: z.string(),
  sessionNumber: z.number().int().positive(),
  startedAt: z.number(),
  endedAt: z.number(),
  durationSeconds: z.number().nonnegative(),
  sampleRateHz: z.number().positive(),
  samples: z.array(z.number().finite()),
  sampleCount: z.number().int().nonnegative(),
  heartRates: z.array(z.number().finite()),
  heartRate: z.object({ average: z.number(), min: z.number(), max: z.number() }),
  rhythm: z.enum(['Normal', 'Bradycardia', 'Tachycardia', 'Noise']),
  heartRateVariability: z
    .object({
      meanRrMs: z.number(),
      sdnnMs: z.number(),
      rmssdMs: z.number(),
      irregularityRatio: z.number(),
      rhythmStability: z.number(),
    })
    .nullable()
    .default(null),
  signalQuality: z
    .object({ score: z.number(), snrDb: z.number(), baselineStability: z.number(), artifactScore: z.number() })
    .nullable()
    .default(null),
  status: z.enum(['completed', 'aborted']),
  sealed: z.literal(true),
});

// JSON has no encoding for NaN or Infinity; such a session would reload as corrupt.
const assertStorable = (session: StoredSession): void => {
  const checked = StoredSessionSchema.safeParse(session);
  if (!checked.success) {
    const issue = checked.error.issues[0];
    const field = issue ? issue.path.join('.') : 'session';
    throw new PersistenceError('write-failed', `Session ${session.id} cannot be stored: invalid ${field}`, checked.error);
  }
};

const StoreFileSchema = z.object({
  version: z.literal(1),
  sessions: z.array(StoredSessionSchema),
});

type StoreFile = z.infer<typeof StoreFileSchema>;

const EMPTY_STORE = (): StoreFile => ({ version: 1, sessions: [] });

/**
 * Keeps every session in one JSON document. The file is created on the first
 * write and replaced atomically (write to a temp file, then rename).
 */
export class JsonFileSessionStore implements SessionRepository {
  private readonly file: string;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(file: string) {
    this.file = file;
  }

  async saveSession(session: Session): Promise<string> {
    return this.update((db) => {
      if (db.sessions.some((stored) => stored.id === session.id)) {
        throw new PersistenceError('write-failed', `Session ${session.id} already exists`);
      }
      const sessionNumber = db.sessions.filter((stored) => stored.userId === session.userId).length + 1;
      const stored = { ...session, samples: [...session.samples], heartRates: [...session.heartRates], sessionNumber };
      assertStorable(stored);
      db.sessions.push(stored);
      return session.id;
    });
  }

  async listSessions(userId: string): Promise<SessionSummary[]> {
    const db = await this.read();
    return db.sessions
      .filter((session) => session.userId === userId)
      .map(toSummary)
      .sort(newestFirst);
  }

  async getSession(userId: string, sessionId: string): Promise<StoredSession | undefined> {
    const db = await this.read();
    return db.sessions.find((session) => session.id === sessionId && session.userId === userId);
  }

  async renameSession(userId: string, sessionId: string, name: string): Promise<void> {
    await this.update((db) => {
      const session = db.sessions.find((stored) => stored.id === sessionId && stored.userId === userId);
      if (!session) throw new PersistenceError('not-found', `Session ${sessionId} not found`);
      session.name = name;
    });
  }

  async deleteSession(userId: string, sessionId: string): Promise<void> {
    await this.update((db) => {
      const index = db.sessions.findIndex((stored) => stored.id === sessionId && stored.userId === userId);
      if (index === -1) throw new PersistenceError('not-found', `Session ${sessionId} not found`);
      db.sessions.splice(index, 1);
    });
  }

  private async read(): Promise<StoreFile> {
    let raw: string;
    try {
      raw = await readFile(this.file, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return EMPTY_STORE();
      throw new PersistenceError('read-failed', `Failed to read ${this.file}: ${toErrorMessage(error)}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError('corrupt-store', `${this.file} is not valid JSON`, error);
    }
    const parsed = StoreFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError('corrupt-store', `${this.file} does not hold a session store`, parsed.error);
    }
    return parsed.data;
  }

  private async write(db: StoreFile): Promise<void> {
    const temp = `${this.file}.tmp`;
    try {
      await mkdir(path.dirname(this.file), { recursive: true });
      await writeFile(temp, JSON.stringify(db, null, 2), 'utf-8');
      await rename(temp, this.file);
    } catch (error) {
      throw new PersistenceError('write-failed', `Failed to write ${this.file}: ${toErrorMessage(error)}`, error);
    }
  }

  // Read-modify-write cycles are serialized; a failed cycle does not block the next one.
  private update<T>(mutate: (db: StoreFile) => T): Promise<T> {
    const run = this.pending.then(async () => {
      const db = await this.read();
      const result = mutate(db);
      await this.write(db);
      return result;
    });
    this.pending = run.catch(() => undefined);
    return run;
  }
}
