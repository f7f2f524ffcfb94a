import { afterEach, describe, expect, it, vi } from "vitest";
import type { TickOutcome } from "../autosave/autoSaveScheduler";
import { AutoSaveScheduler } from "../autosave/autoSaveScheduler";
import { BookmarkIndex } from "../bookmarks/bookmarkIndex";
import { StorageIOError, SurfaceTimeoutError } from "../errors";
import { NavigationController } from "../navigation/navigationController";
import type { SessionPosition } from "../session/surface";
import { InMemorySessionStore } from "../store/inMemoryStore";
import type { SnapshotStore } from "../store/types";
import type { AnnotationState } from "../types";
import { SerialExecutor } from "../utils/serialExecutor";
import { createTestLogger, FakeSurface, ManualClock, stateOf, stroke } from "./fixtures";

async function setup(
  options: {
    count?: number;
    snapshots?: Pick<SnapshotStore, "append">;
    requestTimeoutMs?: number;
  } = {}
) {
  const count = options.count ?? 5;
  const store = new InMemorySessionStore("slide-4", { firstIndex: 45 });
  for (let i = 0; i < count; i += 1) {
    await store.append(stateOf(i));
  }
  const latest = await store.latestIndex();
  const lastSavedState = latest === undefined ? undefined : await store.read(latest);

  const executor = new SerialExecutor();
  const clock = new ManualClock();
  const surface = new FakeSurface(lastSavedState ?? stateOf());
  const position: SessionPosition = { cursor: latest, lastSavedState };
  const { logger, transport } = createTestLogger();
  const outcomes: TickOutcome[] = [];

  const navigation = new NavigationController({
    snapshots: store,
    bookmarks: await BookmarkIndex.load(store, store),
    surface,
    position,
    executor,
    now: clock.now,
    logger,
  });
  const scheduler = new AutoSaveScheduler({
    snapshots: options.snapshots ?? store,
    surface,
    position,
    protection: navigation,
    executor,
    intervalMs: 1000,
    requestTimeoutMs: options.requestTimeoutMs,
    onTick: (outcome) => outcomes.push(outcome),
    logger,
  });

  return { store, surface, clock, position, navigation, scheduler, outcomes, transport };
}

function withExtraStroke(state: AnnotationState): AnnotationState {
  return { strokes: [...state.strokes, stroke(99, "#0000ff")] };
}

describe("AutoSaveScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("skips ticks inside the grace window and saves the next real edit", async () => {
    const { store, surface, clock, position, navigation, scheduler } = await setup();

    await navigation.undo();
    surface.apply();
    expect(await navigation.confirmLoad({ confirmedTarget: 48 })).toMatchObject({
      status: "applied",
    });

    clock.value = 500;
    expect(await scheduler.tick()).toEqual({ status: "skipped", reason: "protected" });
    expect(surface.requests).toBe(0);

    clock.value = 2500;
    expect(await scheduler.tick()).toEqual({ status: "unchanged" });
    expect(surface.requests).toBe(1);
    expect(await store.listIndices()).toEqual([45, 46, 47, 48, 49]);

    const edited = withExtraStroke(stateOf(3));
    surface.current = edited;
    clock.value = 3500;
    expect(await scheduler.tick()).toEqual({ status: "saved", index: 50 });
    expect(position).toEqual({ cursor: 50, lastSavedState: edited });
    expect(await store.read(50)).toEqual(edited);
  });

  it("persists the first observed state of an empty session", async () => {
    const { store, surface, position, scheduler } = await setup({ count: 0 });
    surface.current = stateOf(7);

    expect(await scheduler.tick()).toEqual({ status: "saved", index: 45 });
    expect(position.cursor).toBe(45);
    expect(await store.read(45)).toEqual(stateOf(7));
  });

  it("skips a tick while the previous one is outstanding", async () => {
    const { surface, scheduler } = await setup();
    surface.current = withExtraStroke(stateOf(4));
    surface.hold();

    const first = scheduler.tick();
    expect(await scheduler.tick()).toEqual({ status: "skipped", reason: "busy" });

    await vi.waitFor(() => expect(surface.requests).toBe(1));
    surface.release();
    expect(await first).toEqual({ status: "saved", index: 50 });
  });

  it("discards a response that arrives after navigation started", async () => {
    const { store, surface, navigation, scheduler } = await setup();
    surface.current = withExtraStroke(stateOf(4));
    surface.hold();

    const pending = scheduler.tick();
    await vi.waitFor(() => expect(surface.requests).toBe(1));
    await navigation.undo();
    surface.release();

    expect(await pending).toEqual({ status: "discarded" });
    expect(await store.latestIndex()).toBe(49);
  });

  it("keeps state and retries after a failed append", async () => {
    const store = new InMemorySessionStore("slide-4", { firstIndex: 45 });
    let failing = true;
    const snapshots: Pick<SnapshotStore, "append"> = {
      append: async (state) => {
        if (failing) {
          throw new StorageIOError("disk full");
        }
        return store.append(state);
      },
    };
    const { surface, position, scheduler, transport } = await setup({ count: 0, snapshots });
    surface.current = stateOf(1);

    const failed = await scheduler.tick();
    expect(failed.status).toBe("save-failed");
    expect(scheduler.savePending).toBe(true);
    expect(position).toEqual({ cursor: undefined, lastSavedState: undefined });
    expect(transport.getEntriesByLevel("error").map((entry) => entry.message)).toEqual([
      "Auto-save append failed; will retry",
    ]);

    failing = false;
    expect(await scheduler.tick()).toEqual({ status: "saved", index: 45 });
    expect(scheduler.savePending).toBe(false);
    expect(position.cursor).toBe(45);
  });

  it("reports a surface that cannot answer", async () => {
    const { surface, scheduler } = await setup();
    surface.requestCurrentState = () => Promise.reject(new Error("surface gone"));

    const outcome = await scheduler.tick();
    expect(outcome.status).toBe("request-failed");
    expect(outcome.status === "request-failed" && outcome.error.message).toBe("surface gone");
  });

  it("gives up on a surface that does not answer in time", async () => {
    vi.useFakeTimers();
    const { store, surface, scheduler, transport } = await setup({ requestTimeoutMs: 3000 });
    surface.current = withExtraStroke(stateOf(4));
    surface.hold();

    const first = scheduler.tick();
    expect(await scheduler.tick()).toEqual({ status: "skipped", reason: "busy" });
    await vi.waitFor(() => expect(surface.requests).toBe(1));

    await vi.advanceTimersByTimeAsync(3000);
    const outcome = await first;
    expect(outcome.status).toBe("request-failed");
    expect(outcome.status === "request-failed" && outcome.error).toBeInstanceOf(
      SurfaceTimeoutError
    );
    expect(transport.getEntriesByLevel("warn").map((entry) => entry.message)).toEqual([
      "Surface state request timed out",
    ]);
    expect(vi.getTimerCount()).toBe(0);

    surface.resume();
    expect(await scheduler.tick()).toEqual({ status: "saved", index: 50 });

    surface.release();
    await vi.advanceTimersByTimeAsync(0);
    expect(await store.listIndices()).toEqual([45, 46, 47, 48, 49, 50]);
  });

  it("drops a late answer once closed and refuses to start again", async () => {
    const { store, surface, scheduler } = await setup();
    surface.current = withExtraStroke(stateOf(4));
    surface.hold();

    const pending = scheduler.tick();
    await vi.waitFor(() => expect(surface.requests).toBe(1));
    scheduler.close();
    surface.release();

    expect(await pending).toEqual({ status: "skipped", reason: "closed" });
    expect(await scheduler.tick()).toEqual({ status: "skipped", reason: "closed" });
    expect(await store.latestIndex()).toBe(49);

    scheduler.start();
    expect(scheduler.running).toBe(false);
  });

  it("runs on an interval until stopped", async () => {
    vi.useFakeTimers();
    const { surface, scheduler, outcomes } = await setup();
    surface.current = withExtraStroke(stateOf(4));

    scheduler.start();
    scheduler.start();
    expect(scheduler.running).toBe(true);
    expect(vi.getTimerCount()).toBe(1);

    vi.advanceTimersByTime(1000);
    await vi.waitUntil(() => outcomes.length === 1, { interval: 1, timeout: 100 });
    expect(outcomes).toEqual([{ status: "saved", index: 50 }]);

    scheduler.stop();
    expect(scheduler.running).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});
