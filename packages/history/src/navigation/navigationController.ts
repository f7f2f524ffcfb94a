/**
 * Navigation Controller
 *
 * Moves the session cursor through the live sequence (undo/redo) and through
 * bookmarks, and owns the protection state that keeps auto-save from
 * re-persisting a state the session has just loaded.
 *
 * Every operation runs as one task on the session executor. A load is issued
 * to the surface and completes only when `confirmLoad` reports the same
 * target; anything else is a stale confirmation and is dropped.
 */

import type { Logger } from "@inktrail/telemetry/logging";
import { createSubsystemLogger } from "@inktrail/telemetry/logging";
import type { BookmarkIndex } from "../bookmarks/bookmarkIndex";
import { NoSuchTransitionError, NotFoundError, SerializationError } from "../errors";
import type { LoadConfirmation, RenderingSurface, SessionPosition } from "../session/surface";
import type { SnapshotStore } from "../store/types";
import type { NavigationDirection } from "../types";
import { monotonicNow } from "../utils/clock";
import type { SerialExecutor } from "../utils/serialExecutor";
import { predecessor, successor } from "../utils/sortedIndices";
import type { ProtectionEvaluation, ProtectionPolicy, ProtectionState } from "./protection";
import {
  DEFAULT_GRACE_WINDOW_MS,
  DEFAULT_LOAD_TIMEOUT_MS,
  evaluateProtection,
  IDLE,
} from "./protection";

export type NavigationResult =
  | { status: "issued"; direction: NavigationDirection; from: number; target: number }
  | { status: "unavailable"; direction: NavigationDirection; from: number | undefined }
  | { status: "failed"; direction: NavigationDirection; target: number; error: Error };

export type ConfirmationResult =
  | { status: "applied"; target: number }
  | { status: "stale"; confirmedTarget: number; pendingTarget: number | undefined };

export type NavigationAvailability = Record<NavigationDirection, boolean>;

export interface NavigationControllerConfig {
  snapshots: Pick<SnapshotStore, "read" | "listIndices">;
  bookmarks: BookmarkIndex;
  surface: Pick<RenderingSurface, "loadState">;
  position: SessionPosition;
  executor: SerialExecutor;
  graceWindowMs?: number;
  loadTimeoutMs?: number;
  /** Monotonic clock */
  now?: () => number;
  logger?: Logger;
}

export class NavigationController {
  private readonly snapshots: Pick<SnapshotStore, "read" | "listIndices">;
  private readonly bookmarks: BookmarkIndex;
  private readonly surface: Pick<RenderingSurface, "loadState">;
  private readonly position: SessionPosition;
  private readonly executor: SerialExecutor;
  private readonly policy: ProtectionPolicy;
  private readonly now: () => number;
  private readonly logger: Logger;
  private state: ProtectionState = IDLE;

  constructor(config: NavigationControllerConfig) {
    this.snapshots = config.snapshots;
    this.bookmarks = config.bookmarks;
    this.surface = config.surface;
    this.position = config.position;
    this.executor = config.executor;
    this.policy = {
      graceWindowMs: config.graceWindowMs ?? DEFAULT_GRACE_WINDOW_MS,
      loadTimeoutMs: config.loadTimeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS,
    };
    this.now = config.now ?? monotonicNow;
    this.logger = config.logger ?? createSubsystemLogger("history", "navigation");
  }

  undo(): Promise<NavigationResult> {
    return this.navigate("undo");
  }

  redo(): Promise<NavigationResult> {
    return this.navigate("redo");
  }

  jumpToPrevBookmark(): Promise<NavigationResult> {
    return this.navigate("prev-bookmark");
  }

  jumpToNextBookmark(): Promise<NavigationResult> {
    return this.navigate("next-bookmark");
  }

  navigate(direction: NavigationDirection): Promise<NavigationResult> {
    return this.executor.run(() => this.issueLoad(direction));
  }

  confirmLoad(confirmation: LoadConfirmation): Promise<ConfirmationResult> {
    return this.executor.run(() => this.applyConfirmation(confirmation.confirmedTarget));
  }

  /**
   * True while a load is unconfirmed or inside its grace window. Expired
   * states are normalized to idle here.
   */
  isProtected(): boolean {
    const evaluation = evaluateProtection(this.state, this.now(), this.policy);
    if (evaluation.expired === "load-timeout" && this.state.kind === "loading") {
      this.logger.warn("Load confirmation timed out; clearing protection", {
        target: this.state.target,
        timeoutMs: this.policy.loadTimeoutMs,
      });
    }
    this.state = evaluation.next;
    return evaluation.protected;
  }

  /** What `isProtected` would decide now, without settling anything. */
  evaluate(): ProtectionEvaluation {
    return evaluateProtection(this.state, this.now(), this.policy);
  }

  get protection(): ProtectionState {
    return this.state;
  }

  /** Which directions currently have a target. */
  availability(): Promise<NavigationAvailability> {
    return this.executor.run(async () => {
      const base = this.basePosition();
      if (base === undefined) {
        return { undo: false, redo: false, "prev-bookmark": false, "next-bookmark": false };
      }
      const indices = await this.snapshots.listIndices();
      return {
        undo: predecessor(indices, base) !== undefined,
        redo: successor(indices, base) !== undefined,
        "prev-bookmark": this.bookmarks.list().some((index) => index < base),
        "next-bookmark": this.bookmarks.list().some((index) => index > base),
      };
    });
  }

  /** Pending target while a load is outstanding, otherwise the cursor. */
  private basePosition(): number | undefined {
    this.isProtected();
    return this.state.kind === "loading" ? this.state.target : this.position.cursor;
  }

  private async resolveTarget(direction: NavigationDirection, base: number): Promise<number> {
    switch (direction) {
      case "undo": {
        const target = predecessor(await this.snapshots.listIndices(), base);
        if (target === undefined) {
          throw new NoSuchTransitionError(direction, base);
        }
        return target;
      }
      case "redo": {
        const target = successor(await this.snapshots.listIndices(), base);
        if (target === undefined) {
          throw new NoSuchTransitionError(direction, base);
        }
        return target;
      }
      case "prev-bookmark":
        return this.bookmarks.predecessorOf(base);
      case "next-bookmark":
        return this.bookmarks.successorOf(base);
    }
  }

  private async issueLoad(direction: NavigationDirection): Promise<NavigationResult> {
    const from = this.basePosition();
    if (from === undefined) {
      this.logger.debug("Navigation unavailable: history is empty", { direction });
      return { status: "unavailable", direction, from };
    }

    let target: number;
    try {
      target = await this.resolveTarget(direction, from);
    } catch (error) {
      if (error instanceof NoSuchTransitionError) {
        this.logger.debug("Navigation unavailable", { direction, from });
        return { status: "unavailable", direction, from };
      }
      throw error;
    }

    const issuedAt = this.now();
    try {
      const state = await this.snapshots.read(target);
      this.state = { kind: "loading", target, issuedAt, phase: "awaiting-confirmation", state };
      this.surface.loadState({ target, state });
    } catch (error) {
      this.state = IDLE;
      return { status: "failed", direction, target, error: this.reportLoadFailure(error, target) };
    }

    this.logger.debug("Load issued", { direction, from, target });
    return { status: "issued", direction, from, target };
  }

  private applyConfirmation(confirmedTarget: number): ConfirmationResult {
    this.isProtected();
    const pending = this.state;
    if (
      pending.kind !== "loading" ||
      pending.phase !== "awaiting-confirmation" ||
      pending.target !== confirmedTarget
    ) {
      const pendingTarget = pending.kind === "loading" ? pending.target : undefined;
      this.logger.debug("Discarding stale load confirmation", { confirmedTarget, pendingTarget });
      return { status: "stale", confirmedTarget, pendingTarget };
    }

    this.position.cursor = pending.target;
    this.position.lastSavedState = pending.state;
    this.state = { ...pending, phase: "settling", issuedAt: this.now() };
    this.logger.debug("Load confirmed", { target: pending.target });
    return { status: "applied", target: pending.target };
  }

  private reportLoadFailure(error: unknown, target: number): Error {
    if (error instanceof NotFoundError) {
      this.logger.warn("Navigation target not found", { target });
      return error;
    }
    if (error instanceof SerializationError) {
      this.logger.error("Navigation target is corrupt", error, { target });
      return error;
    }
    const failure = error instanceof Error ? error : new Error(String(error));
    this.logger.error("Navigation load failed", failure, { target });
    return failure;
  }
}
