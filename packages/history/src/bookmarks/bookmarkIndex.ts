import { NoSuchTransitionError, NotFoundError } from "../errors";
import type { BookmarkStore, SnapshotStore } from "../store/types";
import {
  containsSorted,
  insertSorted,
  normalizeIndices,
  predecessor,
  successor,
} from "../utils/sortedIndices";

/**
 * Sparse, ordered subset of a session's snapshot indices.
 *
 * Lookups are binary searches over a sorted array. Every successful `mark`
 * is persisted before it becomes visible.
 */
export class BookmarkIndex {
  private indices: number[];

  private constructor(
    private readonly snapshots: Pick<SnapshotStore, "has">,
    private readonly store: BookmarkStore,
    initial: number[]
  ) {
    this.indices = initial;
  }

  /**
   * Loads persisted bookmarks, dropping any that no longer name a snapshot.
   */
  static async load(
    snapshots: Pick<SnapshotStore, "has">,
    store: BookmarkStore
  ): Promise<BookmarkIndex> {
    const persisted = normalizeIndices(await store.loadBookmarks());
    const live: number[] = [];
    for (const index of persisted) {
      if (await snapshots.has(index)) {
        live.push(index);
      }
    }
    return new BookmarkIndex(snapshots, store, live);
  }

  /** Returns true when the bookmark was newly added. */
  async mark(index: number): Promise<boolean> {
    if (containsSorted(this.indices, index)) {
      return false;
    }
    if (!(await this.snapshots.has(index))) {
      throw new NotFoundError(index, { context: { operation: "mark" } });
    }

    const next = [...this.indices];
    if (!insertSorted(next, index)) {
      return false;
    }
    await this.store.saveBookmarks(next);
    this.indices = next;
    return true;
  }

  predecessorOf(index: number): number {
    const found = predecessor(this.indices, index);
    if (found === undefined) {
      throw new NoSuchTransitionError("prev-bookmark", index);
    }
    return found;
  }

  successorOf(index: number): number {
    const found = successor(this.indices, index);
    if (found === undefined) {
      throw new NoSuchTransitionError("next-bookmark", index);
    }
    return found;
  }

  has(index: number): boolean {
    return containsSorted(this.indices, index);
  }

  list(): number[] {
    return [...this.indices];
  }

  get size(): number {
    return this.indices.length;
  }
}
