/**
 * File-System History Backend
 *
 * Layout under the storage root:
 *
 *   <root>/<session>/live/00047.json   one snapshot record per index
 *   <root>/<session>/bookmarks.json    ascending array of indices
 *   <root>/<session>/status.json       review status
 *
 * `<session>` is the session id with every character outside [A-Za-z0-9-]
 * written as `_XX` per UTF-8 byte, so distinct ids never share a directory.
 *
 * Every file is written to a temporary sibling, synced, and renamed into
 * place, so a record is either fully visible or absent.
 */

import type { FileHandle } from "node:fs/promises";
import { mkdir, open, readdir, readFile, rename, rm } from "node:fs/promises";
import * as path from "node:path";
import { isErrnoException, NotFoundError, toStorageIOError } from "../errors";
import {
  decodeBookmarks,
  decodeReviewStatus,
  decodeSnapshotRecord,
  encodeSnapshotRecord,
} from "../state/annotationSchema";
import type { AnnotationState, ReviewStatus, Snapshot } from "../types";
import { EMPTY_REVIEW_STATUS } from "../types";
import { wallNow } from "../utils/clock";
import { SerialExecutor } from "../utils/serialExecutor";
import { containsSorted, normalizeIndices } from "../utils/sortedIndices";
import type { HistoryRepository, SessionStore, SnapshotStoreOptions } from "./types";
import { assertSessionId, DEFAULT_FIRST_INDEX } from "./types";

const LIVE_DIR = "live";
const BOOKMARKS_FILE = "bookmarks.json";
const STATUS_FILE = "status.json";
const INDEX_WIDTH = 5;
const SNAPSHOT_FILE_PATTERN = /^(\d+)\.json$/;
const PLAIN_ID_CHAR = /^[A-Za-z0-9-]$/;
const ENCODED_ID_PATTERN = /^(?:[A-Za-z0-9-]|_[0-9A-F]{2})+$/;
/** Platforms that cannot fsync a directory report one of these. */
const DIRECTORY_SYNC_UNSUPPORTED = ["EISDIR", "EPERM", "EINVAL", "ENOTSUP"];

export interface FileHistoryRepositoryOptions extends SnapshotStoreOptions {
  rootDir: string;
}

/** Maps a session id onto its directory name. Distinct ids never collide. */
export function encodeSessionId(sessionId: string): string {
  assertSessionId(sessionId);
  let encoded = "";
  for (const char of sessionId) {
    if (PLAIN_ID_CHAR.test(char)) {
      encoded += char;
      continue;
    }
    for (const byte of Buffer.from(char, "utf-8")) {
      encoded += `_${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    }
  }
  return encoded;
}

/** Inverse of `encodeSessionId`; undefined for names it never produces. */
export function decodeSessionId(name: string): string | undefined {
  if (!ENCODED_ID_PATTERN.test(name)) {
    return undefined;
  }
  const bytes: number[] = [];
  for (let i = 0; i < name.length; ) {
    if (name[i] === "_") {
      bytes.push(Number.parseInt(name.slice(i + 1, i + 3), 16));
      i += 3;
    } else {
      bytes.push(name.charCodeAt(i));
      i += 1;
    }
  }
  const sessionId = Buffer.from(bytes).toString("utf-8");
  return encodeSessionId(sessionId) === name ? sessionId : undefined;
}

export function snapshotFileName(index: number): string {
  return `${String(index).padStart(INDEX_WIDTH, "0")}.json`;
}

export function parseSnapshotFileName(name: string): number | undefined {
  const match = SNAPSHOT_FILE_PATTERN.exec(name);
  if (!match) {
    return undefined;
  }
  const index = Number(match[1]);
  return Number.isSafeInteger(index) ? index : undefined;
}

async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const directory = path.dirname(filePath);
  const tempPath = path.join(
    directory,
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );
  try {
    const handle = await open(tempPath, "w");
    try {
      await handle.writeFile(contents, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
  await syncDirectory(directory);
}

/** Makes a completed rename durable where the platform allows it. */
async function syncDirectory(directory: string): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await open(directory, "r");
  } catch (error) {
    if (isDirectorySyncUnsupported(error)) {
      return;
    }
    throw error;
  }
  try {
    await handle.sync();
  } catch (error) {
    if (!isDirectorySyncUnsupported(error)) {
      throw error;
    }
  } finally {
    await handle.close();
  }
}

function isDirectorySyncUnsupported(error: unknown): boolean {
  return DIRECTORY_SYNC_UNSUPPORTED.some((code) => isErrnoException(error, code));
}

async function readOptionalFile(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoException(error, "ENOENT")) {
      return undefined;
    }
    throw toStorageIOError(error, `Failed to read ${filePath}`);
  }
}

export class FileSessionStore implements SessionStore {
  readonly sessionId: string;
  readonly sessionDir: string;
  private readonly liveDir: string;
  private readonly firstIndex: number;
  private readonly now: () => number;
  private readonly writes = new SerialExecutor();
  /** Ascending indices on disk; populated lazily and only updated after a write lands. */
  private indexCache: number[] | undefined;

  constructor(sessionId: string, options: FileHistoryRepositoryOptions) {
    this.sessionId = sessionId;
    this.sessionDir = path.join(options.rootDir, encodeSessionId(sessionId));
    this.liveDir = path.join(this.sessionDir, LIVE_DIR);
    this.firstIndex = options.firstIndex ?? DEFAULT_FIRST_INDEX;
    this.now = options.now ?? wallNow;
  }

  append(state: AnnotationState): Promise<number> {
    return this.writes.run(async () => {
      const indices = await this.loadIndices();
      const latest = indices.at(-1);
      const index = latest === undefined ? this.firstIndex : latest + 1;
      const snapshot: Snapshot = { index, state, createdAt: this.now() };

      try {
        await mkdir(this.liveDir, { recursive: true });
        await writeFileAtomic(this.snapshotPath(index), encodeSnapshotRecord(snapshot));
      } catch (error) {
        throw toStorageIOError(error, `Failed to persist snapshot ${index}`);
      }

      indices.push(index);
      return index;
    });
  }

  async read(index: number): Promise<AnnotationState> {
    const snapshot = await this.readSnapshot(index);
    return snapshot.state;
  }

  async readSnapshot(index: number): Promise<Snapshot> {
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new NotFoundError(index, { context: { sessionId: this.sessionId } });
    }
    const raw = await readOptionalFile(this.snapshotPath(index));
    if (raw === undefined) {
      throw new NotFoundError(index, { context: { sessionId: this.sessionId } });
    }
    return decodeSnapshotRecord(raw, index);
  }

  async listIndices(): Promise<number[]> {
    return [...(await this.loadIndices())];
  }

  async has(index: number): Promise<boolean> {
    return containsSorted(await this.loadIndices(), index);
  }

  async latestIndex(): Promise<number | undefined> {
    return (await this.loadIndices()).at(-1);
  }

  async loadBookmarks(): Promise<number[]> {
    const raw = await readOptionalFile(path.join(this.sessionDir, BOOKMARKS_FILE));
    return raw === undefined ? [] : normalizeIndices(decodeBookmarks(raw));
  }

  saveBookmarks(indices: readonly number[]): Promise<void> {
    return this.writeDocument(BOOKMARKS_FILE, JSON.stringify(normalizeIndices(indices)));
  }

  async loadStatus(): Promise<ReviewStatus> {
    const raw = await readOptionalFile(path.join(this.sessionDir, STATUS_FILE));
    return raw === undefined ? { ...EMPTY_REVIEW_STATUS } : decodeReviewStatus(raw);
  }

  saveStatus(status: ReviewStatus): Promise<void> {
    return this.writeDocument(STATUS_FILE, JSON.stringify(status, null, 2));
  }

  private snapshotPath(index: number): string {
    return path.join(this.liveDir, snapshotFileName(index));
  }

  private writeDocument(fileName: string, contents: string): Promise<void> {
    return this.writes.run(async () => {
      try {
        await mkdir(this.sessionDir, { recursive: true });
        await writeFileAtomic(path.join(this.sessionDir, fileName), contents);
      } catch (error) {
        throw toStorageIOError(error, `Failed to write ${fileName}`);
      }
    });
  }

  private async loadIndices(): Promise<number[]> {
    if (this.indexCache) {
      return this.indexCache;
    }

    let entries: string[];
    try {
      entries = await readdir(this.liveDir);
    } catch (error) {
      if (!isErrnoException(error, "ENOENT")) {
        throw toStorageIOError(error, `Failed to list ${this.liveDir}`);
      }
      entries = [];
    }

    const indices: number[] = [];
    for (const entry of entries) {
      const index = parseSnapshotFileName(entry);
      if (index !== undefined) {
        indices.push(index);
      }
    }
    this.indexCache = normalizeIndices(indices);
    return this.indexCache;
  }
}

export class FileHistoryRepository implements HistoryRepository {
  readonly kind = "file";
  private readonly sessions = new Map<string, FileSessionStore>();

  constructor(private readonly options: FileHistoryRepositoryOptions) {}

  openSession(sessionId: string): FileSessionStore {
    const key = encodeSessionId(sessionId);
    let store = this.sessions.get(key);
    if (!store) {
      store = new FileSessionStore(sessionId, this.options);
      this.sessions.set(key, store);
    }
    return store;
  }

  async listSessions(): Promise<string[]> {
    try {
      const entries = await readdir(this.options.rootDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .flatMap((entry) => {
          const sessionId = decodeSessionId(entry.name);
          return sessionId === undefined ? [] : [sessionId];
        })
        .sort();
    } catch (error) {
      if (isErrnoException(error, "ENOENT")) {
        return [];
      }
      throw toStorageIOError(error, `Failed to list sessions in ${this.options.rootDir}`);
    }
  }

  close(): void {
    this.sessions.clear();
  }
}
