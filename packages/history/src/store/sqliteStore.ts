import { gunzipSync, gzipSync } from "node:zlib";
import type { Database as DatabaseInstance, Statement } from "better-sqlite3";
import Database from "better-sqlite3";
import { NotFoundError, SerializationError, toStorageIOError } from "../errors";
import { parseAnnotationState } from "../state/annotationSchema";
import type { AnnotationState, ReviewStatus, Snapshot } from "../types";
import { EMPTY_REVIEW_STATUS } from "../types";
import { wallNow } from "../utils/clock";
import { SerialExecutor } from "../utils/serialExecutor";
import type { HistoryRepository, SessionStore, SnapshotStoreOptions } from "./types";
import { assertSessionId, DEFAULT_FIRST_INDEX } from "./types";

export interface SQLiteHistoryRepositoryConfig extends SnapshotStoreOptions {
  databasePath?: string;
  database?: DatabaseInstance;
  compressionThresholdBytes?: number;
}

const DEFAULT_COMPRESSION_THRESHOLD = 64 * 1024;

type StateEncoding = "json" | "gzip";

interface SnapshotRow {
  idx: number;
  created_at: number;
  state: Buffer;
  state_encoding: string;
  size_bytes: number;
}

interface ReviewStatusRow {
  done: number;
  flagged: number;
  updated_at: number;
}

type PreparedStatements = {
  insertSnapshot: Statement<[string, number, number, Buffer, StateEncoding, number]>;
  getSnapshot: Statement<[string, number], SnapshotRow>;
  hasSnapshot: Statement<[string, number], { idx: number }>;
  latestIndex: Statement<[string], { idx: number | null }>;
  listIndices: Statement<[string], { idx: number }>;
  listSessions: Statement<[], { session_id: string }>;
  listBookmarks: Statement<[string], { idx: number }>;
  deleteBookmarks: Statement<[string]>;
  insertBookmark: Statement<[string, number]>;
  getStatus: Statement<[string], ReviewStatusRow>;
  upsertStatus: Statement<[string, number, number, number]>;
};

/**
 * Snapshot, bookmark and review-status tables shared by every session in one
 * database. Rows are namespaced by `session_id`.
 */
export class SQLiteHistoryRepository implements HistoryRepository {
  readonly kind = "sqlite";
  private readonly db: DatabaseInstance;
  private readonly statements: PreparedStatements;
  private readonly sessions = new Map<string, SQLiteSessionStore>();
  readonly compressionThreshold: number;

  constructor(private readonly config: SQLiteHistoryRepositoryConfig) {
    this.db = config.database ?? this.createDatabase(config.databasePath);
    this.compressionThreshold = config.compressionThresholdBytes ?? DEFAULT_COMPRESSION_THRESHOLD;
    this.initSchema();
    this.statements = this.prepareStatements();
  }

  openSession(sessionId: string): SQLiteSessionStore {
    assertSessionId(sessionId);
    let store = this.sessions.get(sessionId);
    if (!store) {
      store = new SQLiteSessionStore(sessionId, this.statements, this.db, {
        firstIndex: this.config.firstIndex ?? DEFAULT_FIRST_INDEX,
        now: this.config.now ?? wallNow,
        compressionThreshold: this.compressionThreshold,
      });
      this.sessions.set(sessionId, store);
    }
    return store;
  }

  async listSessions(): Promise<string[]> {
    return this.statements.listSessions.all().map((row) => row.session_id);
  }

  close(): void {
    this.sessions.clear();
    this.db.close();
  }

  private createDatabase(databasePath?: string): DatabaseInstance {
    if (!databasePath) {
      throw new Error("SQLiteHistoryRepository requires databasePath or database instance");
    }
    return new Database(databasePath);
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        session_id TEXT NOT NULL,
        idx INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        state BLOB NOT NULL,
        state_encoding TEXT NOT NULL,
        size_bytes INTEGER NOT NULL,
        PRIMARY KEY (session_id, idx)
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS bookmarks (
        session_id TEXT NOT NULL,
        idx INTEGER NOT NULL,
        PRIMARY KEY (session_id, idx)
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS review_status (
        session_id TEXT PRIMARY KEY,
        done INTEGER NOT NULL DEFAULT 0,
        flagged INTEGER NOT NULL DEFAULT 0,
        updated_at INTEGER NOT NULL
      )
    `);
  }

  private prepareStatements(): PreparedStatements {
    return {
      insertSnapshot: this.db.prepare<[string, number, number, Buffer, StateEncoding, number]>(`
        INSERT INTO snapshots (
          session_id,
          idx,
          created_at,
          state,
          state_encoding,
          size_bytes
        ) VALUES (?, ?, ?, ?, ?, ?)
      `),
      getSnapshot: this.db.prepare<[string, number], SnapshotRow>(
        "SELECT idx, created_at, state, state_encoding, size_bytes FROM snapshots WHERE session_id = ? AND idx = ?"
      ),
      hasSnapshot: this.db.prepare<[string, number], { idx: number }>(
        "SELECT idx FROM snapshots WHERE session_id = ? AND idx = ?"
      ),
      latestIndex: this.db.prepare<[string], { idx: number | null }>(
        "SELECT MAX(idx) AS idx FROM snapshots WHERE session_id = ?"
      ),
      listIndices: this.db.prepare<[string], { idx: number }>(
        "SELECT idx FROM snapshots WHERE session_id = ? ORDER BY idx ASC"
      ),
      listSessions: this.db.prepare<[], { session_id: string }>(
        "SELECT DISTINCT session_id FROM snapshots ORDER BY session_id ASC"
      ),
      listBookmarks: this.db.prepare<[string], { idx: number }>(
        "SELECT idx FROM bookmarks WHERE session_id = ? ORDER BY idx ASC"
      ),
      deleteBookmarks: this.db.prepare<[string]>("DELETE FROM bookmarks WHERE session_id = ?"),
      insertBookmark: this.db.prepare<[string, number]>(
        "INSERT INTO bookmarks (session_id, idx) VALUES (?, ?)"
      ),
      getStatus: this.db.prepare<[string], ReviewStatusRow>(
        "SELECT done, flagged, updated_at FROM review_status WHERE session_id = ?"
      ),
      upsertStatus: this.db.prepare<[string, number, number, number]>(`
        INSERT INTO review_status (session_id, done, flagged, updated_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(session_id) DO UPDATE SET
          done = excluded.done,
          flagged = excluded.flagged,
          updated_at = excluded.updated_at
      `),
    };
  }
}

interface SQLiteSessionOptions {
  firstIndex: number;
  now: () => number;
  compressionThreshold: number;
}

export class SQLiteSessionStore implements SessionStore {
  private readonly writes = new SerialExecutor();

  constructor(
    readonly sessionId: string,
    private readonly statements: PreparedStatements,
    private readonly db: DatabaseInstance,
    private readonly options: SQLiteSessionOptions
  ) {}

  append(state: AnnotationState): Promise<number> {
    return this.writes.run(() => {
      const latest = this.statements.latestIndex.get(this.sessionId)?.idx ?? null;
      const index = latest === null ? this.options.firstIndex : latest + 1;
      const encoded = encodeState(state, this.options.compressionThreshold);
      try {
        this.statements.insertSnapshot.run(
          this.sessionId,
          index,
          this.options.now(),
          encoded.payload,
          encoded.encoding,
          encoded.sizeBytes
        );
      } catch (error) {
        throw toStorageIOError(error, `Failed to persist snapshot ${index}`);
      }
      return index;
    });
  }

  async read(index: number): Promise<AnnotationState> {
    const snapshot = await this.readSnapshot(index);
    return snapshot.state;
  }

  async readSnapshot(index: number): Promise<Snapshot> {
    const row = this.statements.getSnapshot.get(this.sessionId, index);
    if (!row) {
      throw new NotFoundError(index, { context: { sessionId: this.sessionId } });
    }
    return {
      index: row.idx,
      createdAt: row.created_at,
      state: decodeState(row.state, row.state_encoding, index),
    };
  }

  async listIndices(): Promise<number[]> {
    return this.statements.listIndices.all(this.sessionId).map((row) => row.idx);
  }

  async has(index: number): Promise<boolean> {
    return this.statements.hasSnapshot.get(this.sessionId, index) !== undefined;
  }

  async latestIndex(): Promise<number | undefined> {
    return this.statements.latestIndex.get(this.sessionId)?.idx ?? undefined;
  }

  async loadBookmarks(): Promise<number[]> {
    return this.statements.listBookmarks.all(this.sessionId).map((row) => row.idx);
  }

  saveBookmarks(indices: readonly number[]): Promise<void> {
    const replace = this.db.transaction((values: readonly number[]) => {
      this.statements.deleteBookmarks.run(this.sessionId);
      for (const value of new Set(values)) {
        this.statements.insertBookmark.run(this.sessionId, value);
      }
    });
    return this.writes.run(() => {
      try {
        replace(indices);
      } catch (error) {
        throw toStorageIOError(error, "Failed to write bookmarks");
      }
    });
  }

  async loadStatus(): Promise<ReviewStatus> {
    const row = this.statements.getStatus.get(this.sessionId);
    if (!row) {
      return { ...EMPTY_REVIEW_STATUS };
    }
    return { done: row.done === 1, flagged: row.flagged === 1, updatedAt: row.updated_at };
  }

  saveStatus(status: ReviewStatus): Promise<void> {
    return this.writes.run(() => {
      try {
        this.statements.upsertStatus.run(
          this.sessionId,
          status.done ? 1 : 0,
          status.flagged ? 1 : 0,
          status.updatedAt
        );
      } catch (error) {
        throw toStorageIOError(error, "Failed to write review status");
      }
    });
  }
}

function encodeState(
  state: AnnotationState,
  compressionThreshold: number
): { payload: Buffer; encoding: StateEncoding; sizeBytes: number } {
  const json = JSON.stringify(state);
  const sizeBytes = Buffer.byteLength(json);
  if (sizeBytes >= compressionThreshold) {
    return { payload: gzipSync(json), encoding: "gzip", sizeBytes };
  }
  return { payload: Buffer.from(json), encoding: "json", sizeBytes };
}

function decodeState(buffer: Buffer, encoding: string, index: number): AnnotationState {
  let parsed: unknown;
  try {
    const json =
      encoding === "gzip" ? gunzipSync(buffer).toString("utf8") : buffer.toString("utf8");
    parsed = JSON.parse(json);
  } catch (error) {
    throw new SerializationError(`Snapshot ${index} could not be decoded`, {
      index,
      cause: error,
      context: { encoding },
    });
  }
  return parseAnnotationState(parsed, index);
}
