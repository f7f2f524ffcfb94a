import type { AnnotationState, ReviewStatus, Snapshot } from "../types";

/**
 * Append-only log of annotation states for one session.
 *
 * Implementations throw `NotFoundError` and `SerializationError` from reads and
 * `StorageIOError` from appends. A failed append never consumes its index.
 */
export interface SnapshotStore {
  append(state: AnnotationState): Promise<number>;
  read(index: number): Promise<AnnotationState>;
  readSnapshot(index: number): Promise<Snapshot>;
  listIndices(): Promise<number[]>;
  has(index: number): Promise<boolean>;
  latestIndex(): Promise<number | undefined>;
}

export interface BookmarkStore {
  loadBookmarks(): Promise<number[]>;
  saveBookmarks(indices: readonly number[]): Promise<void>;
}

export interface ReviewStatusStore {
  loadStatus(): Promise<ReviewStatus>;
  saveStatus(status: ReviewStatus): Promise<void>;
}

/** Everything persisted for one session. */
export interface SessionStore extends SnapshotStore, BookmarkStore, ReviewStatusStore {
  readonly sessionId: string;
}

/** A storage backend holding many sessions in disjoint namespaces. */
export interface HistoryRepository {
  readonly kind: "file" | "sqlite" | "memory";
  openSession(sessionId: string): SessionStore;
  listSessions(): Promise<string[]>;
  close(): void;
}

export interface SnapshotStoreOptions {
  /** Index assigned to the first snapshot of an empty session. */
  firstIndex?: number;
  /** Wall clock for `createdAt`. */
  now?: () => number;
}

export const DEFAULT_FIRST_INDEX = 0;

/** Session ids name a storage namespace and must be non-empty. */
export function assertSessionId(sessionId: string): void {
  if (sessionId.length === 0) {
    throw new RangeError("Session id must not be empty");
  }
}
