/**
 * Annotation Session
 *
 * One editing session over one image: the snapshot log, its bookmarks, the
 * navigation state machine and the auto-save loop, all sharing a single
 * serial executor. Public operations return result objects; only programming
 * errors escape as exceptions.
 */

import type { Logger } from "@inktrail/telemetry/logging";
import { createSubsystemLogger } from "@inktrail/telemetry/logging";
import type { TickOutcome } from "../autosave/autoSaveScheduler";
import { AutoSaveScheduler } from "../autosave/autoSaveScheduler";
import { BookmarkIndex } from "../bookmarks/bookmarkIndex";
import { ChangeDetector } from "../detect/changeDetector";
import type { HistoryError, StorageIOError } from "../errors";
import { NotFoundError, toStorageIOError } from "../errors";
import type {
  ConfirmationResult,
  NavigationAvailability,
  NavigationResult,
} from "../navigation/navigationController";
import { NavigationController } from "../navigation/navigationController";
import type { ProtectionState } from "../navigation/protection";
import type { SessionStore } from "../store/types";
import type { AnnotationState, ReviewStatus } from "../types";
import { wallNow } from "../utils/clock";
import { SerialExecutor } from "../utils/serialExecutor";
import type { LoadConfirmation, RenderingSurface, SessionPosition } from "./surface";

export interface AnnotationSessionConfig {
  store: SessionStore;
  surface: RenderingSurface;
  autoSaveIntervalMs?: number;
  graceWindowMs?: number;
  loadTimeoutMs?: number;
  requestTimeoutMs?: number;
  coordinateTolerance?: number;
  /** Monotonic clock for protection timing */
  now?: () => number;
  /** Wall clock for review-status timestamps */
  wallClock?: () => number;
  logger?: Logger;
}

export type SessionCallbacks = {
  onSaved?: (index: number) => void;
  onSaveFailed?: (error: StorageIOError) => void;
  onNavigation?: (result: NavigationResult) => void;
  onLoadApplied?: (target: number) => void;
};

export type MarkBookmarkResult =
  | { status: "marked" | "already-marked"; index: number; review: ReviewStatus }
  | { status: "unavailable" }
  | { status: "failed"; index: number; error: HistoryError };

export type ReviewStatusResult =
  | { status: "updated"; review: ReviewStatus }
  | { status: "failed"; error: StorageIOError };

export interface SessionStatus {
  sessionId: string;
  cursor: number | undefined;
  protection: ProtectionState["kind"];
  loadTarget?: number;
  savePending: boolean;
  autoSaveRunning: boolean;
  bookmarks: number[];
  review: ReviewStatus;
}

export class AnnotationSession {
  readonly sessionId: string;
  private readonly store: SessionStore;
  private readonly executor = new SerialExecutor();
  private readonly position: SessionPosition;
  private readonly bookmarks: BookmarkIndex;
  private readonly navigation: NavigationController;
  private readonly autoSave: AutoSaveScheduler;
  private readonly wallClock: () => number;
  private readonly logger: Logger;
  private callbacks: SessionCallbacks = {};
  private review: ReviewStatus;

  private constructor(
    config: AnnotationSessionConfig,
    bookmarks: BookmarkIndex,
    position: SessionPosition,
    review: ReviewStatus,
    logger: Logger
  ) {
    this.sessionId = config.store.sessionId;
    this.store = config.store;
    this.bookmarks = bookmarks;
    this.position = position;
    this.review = review;
    this.wallClock = config.wallClock ?? wallNow;
    this.logger = logger;

    this.navigation = new NavigationController({
      snapshots: config.store,
      bookmarks,
      surface: config.surface,
      position,
      executor: this.executor,
      graceWindowMs: config.graceWindowMs,
      loadTimeoutMs: config.loadTimeoutMs,
      now: config.now,
      logger: logger.forComponent("navigation"),
    });

    this.autoSave = new AutoSaveScheduler({
      snapshots: config.store,
      surface: config.surface,
      position,
      protection: this.navigation,
      executor: this.executor,
      detector: new ChangeDetector({ coordinateTolerance: config.coordinateTolerance }),
      intervalMs: config.autoSaveIntervalMs,
      requestTimeoutMs: config.requestTimeoutMs,
      onTick: (outcome) => this.dispatchTick(outcome),
      logger: logger.forComponent("autosave"),
    });
  }

  /**
   * Opens a session positioned at its most recent snapshot.
   */
  static async open(config: AnnotationSessionConfig): Promise<AnnotationSession> {
    const { store } = config;
    const logger = (config.logger ?? createSubsystemLogger("history")).forSession(store.sessionId);

    const bookmarks = await BookmarkIndex.load(store, store);
    const review = await store.loadStatus();
    const cursor = await store.latestIndex();
    let lastSavedState: AnnotationState | undefined;
    if (cursor !== undefined) {
      try {
        lastSavedState = await store.read(cursor);
      } catch (error) {
        // The next tick persists the surface state as a fresh snapshot.
        logger.error("Latest snapshot is unreadable", error, { index: cursor });
      }
    }

    logger.info("Session opened", { cursor, bookmarks: bookmarks.size });
    return new AnnotationSession(config, bookmarks, { cursor, lastSavedState }, review, logger);
  }

  setCallbacks(callbacks: SessionCallbacks): void {
    this.callbacks = callbacks;
  }

  undo(): Promise<NavigationResult> {
    return this.trackNavigation(this.navigation.undo());
  }

  redo(): Promise<NavigationResult> {
    return this.trackNavigation(this.navigation.redo());
  }

  jumpToPrevBookmark(): Promise<NavigationResult> {
    return this.trackNavigation(this.navigation.jumpToPrevBookmark());
  }

  jumpToNextBookmark(): Promise<NavigationResult> {
    return this.trackNavigation(this.navigation.jumpToNextBookmark());
  }

  async confirmLoad(confirmation: LoadConfirmation): Promise<ConfirmationResult> {
    const result = await this.navigation.confirmLoad(confirmation);
    if (result.status === "applied") {
      this.callbacks.onLoadApplied?.(result.target);
    }
    return result;
  }

  /** Read-only; protection is settled by the next tick or navigation. */
  isProtected(): boolean {
    return this.navigation.evaluate().protected;
  }

  availability(): Promise<NavigationAvailability> {
    return this.navigation.availability();
  }

  /** Runs one auto-save cycle immediately. */
  async tick(): Promise<TickOutcome> {
    const outcome = await this.autoSave.tick();
    this.dispatchTick(outcome);
    return outcome;
  }

  startAutoSave(): void {
    this.autoSave.start();
  }

  stopAutoSave(): void {
    this.autoSave.stop();
  }

  /**
   * Bookmarks a snapshot (the cursor by default) and marks the session done
   * and flagged as carrying annotations.
   */
  markBookmark(index?: number): Promise<MarkBookmarkResult> {
    return this.executor.run(async (): Promise<MarkBookmarkResult> => {
      const target = index ?? this.position.cursor;
      if (target === undefined) {
        return { status: "unavailable" };
      }

      let added: boolean;
      try {
        added = await this.bookmarks.mark(target);
      } catch (error) {
        if (error instanceof NotFoundError) {
          this.logger.warn("Cannot bookmark a missing snapshot", { index: target });
          return { status: "failed", index: target, error };
        }
        const failure = toStorageIOError(error, "Failed to persist bookmark");
        this.logger.error("Bookmark write failed", failure, { index: target });
        return { status: "failed", index: target, error: failure };
      }

      const review = await this.writeReview({ done: true, flagged: true });
      if (review.status === "failed") {
        return { status: "failed", index: target, error: review.error };
      }
      this.logger.info(added ? "Bookmark added" : "Bookmark already present", { index: target });
      return { status: added ? "marked" : "already-marked", index: target, review: review.review };
    });
  }

  setReviewStatus(
    patch: Partial<Pick<ReviewStatus, "done" | "flagged">>
  ): Promise<ReviewStatusResult> {
    return this.executor.run(() => this.writeReview(patch));
  }

  get reviewStatus(): ReviewStatus {
    return { ...this.review };
  }

  listBookmarks(): number[] {
    return this.bookmarks.list();
  }

  status(): SessionStatus {
    const protection = this.navigation.evaluate().next;
    return {
      sessionId: this.sessionId,
      cursor: this.position.cursor,
      protection: protection.kind,
      loadTarget: protection.kind === "loading" ? protection.target : undefined,
      savePending: this.autoSave.savePending,
      autoSaveRunning: this.autoSave.running,
      bookmarks: this.bookmarks.list(),
      review: { ...this.review },
    };
  }

  /**
   * Stops auto-save for good and waits for queued work to settle. A surface
   * answer still in flight is dropped.
   */
  async close(): Promise<void> {
    this.autoSave.close();
    await this.executor.drain();
    this.logger.info("Session closed", { cursor: this.position.cursor });
  }

  private async writeReview(
    patch: Partial<Pick<ReviewStatus, "done" | "flagged">>
  ): Promise<ReviewStatusResult> {
    const next: ReviewStatus = {
      done: patch.done ?? this.review.done,
      flagged: patch.flagged ?? this.review.flagged,
      updatedAt: this.wallClock(),
    };
    try {
      await this.store.saveStatus(next);
    } catch (error) {
      const failure = toStorageIOError(error, "Failed to persist review status");
      this.logger.error("Review status write failed", failure);
      return { status: "failed", error: failure };
    }
    this.review = next;
    return { status: "updated", review: { ...next } };
  }

  private async trackNavigation(pending: Promise<NavigationResult>): Promise<NavigationResult> {
    const result = await pending;
    this.callbacks.onNavigation?.(result);
    return result;
  }

  private dispatchTick(outcome: TickOutcome): void {
    if (outcome.status === "saved") {
      this.callbacks.onSaved?.(outcome.index);
    } else if (outcome.status === "save-failed") {
      this.callbacks.onSaveFailed?.(outcome.error);
    }
  }
}
