import { describe, expect, it } from "vitest";
import { BookmarkIndex } from "../bookmarks/bookmarkIndex";
import { NoSuchTransitionError, NotFoundError } from "../errors";
import { InMemorySessionStore } from "../store/inMemoryStore";
import { stateOf } from "./fixtures";

async function storeWith(count: number, firstIndex = 0): Promise<InMemorySessionStore> {
  const store = new InMemorySessionStore("slide-3", { firstIndex });
  for (let i = 0; i < count; i += 1) {
    await store.append(stateOf(i));
  }
  return store;
}

describe("BookmarkIndex", () => {
  it("marks existing snapshots idempotently and persists them", async () => {
    const store = await storeWith(10);
    const bookmarks = await BookmarkIndex.load(store, store);

    expect(await bookmarks.mark(7)).toBe(true);
    expect(await bookmarks.mark(2)).toBe(true);
    expect(await bookmarks.mark(7)).toBe(false);

    expect(bookmarks.list()).toEqual([2, 7]);
    expect(bookmarks.size).toBe(2);
    expect(bookmarks.has(7)).toBe(true);
    expect(await store.loadBookmarks()).toEqual([2, 7]);
  });

  it("refuses indices outside the live sequence", async () => {
    const store = await storeWith(3);
    const bookmarks = await BookmarkIndex.load(store, store);

    await expect(bookmarks.mark(3)).rejects.toBeInstanceOf(NotFoundError);
    expect(bookmarks.list()).toEqual([]);
    expect(await store.loadBookmarks()).toEqual([]);
  });

  it("finds strict neighbours and fails at the ends", async () => {
    const store = await storeWith(20);
    const bookmarks = await BookmarkIndex.load(store, store);
    for (const index of [3, 8, 15]) {
      await bookmarks.mark(index);
    }

    expect(bookmarks.predecessorOf(8)).toBe(3);
    expect(bookmarks.predecessorOf(10)).toBe(8);
    expect(bookmarks.successorOf(8)).toBe(15);
    expect(bookmarks.successorOf(0)).toBe(3);
    expect(() => bookmarks.predecessorOf(3)).toThrow(NoSuchTransitionError);
    expect(() => bookmarks.successorOf(15)).toThrow(NoSuchTransitionError);
  });

  it("drops persisted bookmarks that no longer name a snapshot", async () => {
    const store = await storeWith(5, 10);
    await store.saveBookmarks([11, 3, 14, 99]);

    const bookmarks = await BookmarkIndex.load(store, store);
    expect(bookmarks.list()).toEqual([11, 14]);
  });
});
