import { NotFoundError } from "../errors";
import type { AnnotationState, ReviewStatus, Snapshot } from "../types";
import { EMPTY_REVIEW_STATUS } from "../types";
import { wallNow } from "../utils/clock";
import { containsSorted, normalizeIndices } from "../utils/sortedIndices";
import type { HistoryRepository, SessionStore, SnapshotStoreOptions } from "./types";
import { assertSessionId, DEFAULT_FIRST_INDEX } from "./types";

/**
 * Ephemeral session storage. States are cloned on the way in and out so
 * callers can never mutate a stored snapshot.
 */
export class InMemorySessionStore implements SessionStore {
  readonly sessionId: string;
  private readonly snapshots = new Map<number, Snapshot>();
  private readonly indices: number[] = [];
  private bookmarks: number[] = [];
  private status: ReviewStatus = { ...EMPTY_REVIEW_STATUS };
  private readonly firstIndex: number;
  private readonly now: () => number;

  constructor(sessionId: string, options: SnapshotStoreOptions = {}) {
    this.sessionId = sessionId;
    this.firstIndex = options.firstIndex ?? DEFAULT_FIRST_INDEX;
    this.now = options.now ?? wallNow;
  }

  async append(state: AnnotationState): Promise<number> {
    const latest = this.indices.at(-1);
    const index = latest === undefined ? this.firstIndex : latest + 1;
    this.snapshots.set(index, { index, state: structuredClone(state), createdAt: this.now() });
    this.indices.push(index);
    return index;
  }

  async read(index: number): Promise<AnnotationState> {
    const snapshot = await this.readSnapshot(index);
    return snapshot.state;
  }

  async readSnapshot(index: number): Promise<Snapshot> {
    const snapshot = this.snapshots.get(index);
    if (!snapshot) {
      throw new NotFoundError(index, { context: { sessionId: this.sessionId } });
    }
    return structuredClone(snapshot);
  }

  async listIndices(): Promise<number[]> {
    return [...this.indices];
  }

  async has(index: number): Promise<boolean> {
    return containsSorted(this.indices, index);
  }

  async latestIndex(): Promise<number | undefined> {
    return this.indices.at(-1);
  }

  async loadBookmarks(): Promise<number[]> {
    return [...this.bookmarks];
  }

  async saveBookmarks(indices: readonly number[]): Promise<void> {
    this.bookmarks = normalizeIndices(indices);
  }

  async loadStatus(): Promise<ReviewStatus> {
    return { ...this.status };
  }

  async saveStatus(status: ReviewStatus): Promise<void> {
    this.status = { ...status };
  }
}

export class InMemoryHistoryRepository implements HistoryRepository {
  readonly kind = "memory";
  private readonly sessions = new Map<string, InMemorySessionStore>();

  constructor(private readonly options: SnapshotStoreOptions = {}) {}

  openSession(sessionId: string): InMemorySessionStore {
    assertSessionId(sessionId);
    let store = this.sessions.get(sessionId);
    if (!store) {
      store = new InMemorySessionStore(sessionId, this.options);
      this.sessions.set(sessionId, store);
    }
    return store;
  }

  async listSessions(): Promise<string[]> {
    return Array.from(this.sessions.keys()).sort();
  }

  close(): void {
    this.sessions.clear();
  }
}
