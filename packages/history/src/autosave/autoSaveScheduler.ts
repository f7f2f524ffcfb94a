import type { Logger } from "@inktrail/telemetry/logging";
import { createSubsystemLogger } from "@inktrail/telemetry/logging";
import { ChangeDetector } from "../detect/changeDetector";
import { isHistoryError, SurfaceTimeoutError, toStorageIOError } from "../errors";
import type { StorageIOError } from "../errors";
import type { RenderingSurface, SessionPosition } from "../session/surface";
import { parseAnnotationState } from "../state/annotationSchema";
import type { SnapshotStore } from "../store/types";
import type { AnnotationState } from "../types";
import type { SerialExecutor } from "../utils/serialExecutor";

export const DEFAULT_AUTOSAVE_INTERVAL_MS = 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export type TickOutcome =
  | { status: "skipped"; reason: "protected" | "busy" | "closed" }
  /** Protection became active while the surface was answering. */
  | { status: "discarded" }
  | { status: "unchanged" }
  | { status: "saved"; index: number }
  | { status: "request-failed"; error: Error }
  | { status: "save-failed"; error: StorageIOError };

export interface ProtectionGate {
  isProtected(): boolean;
}

export interface AutoSaveSchedulerConfig {
  snapshots: Pick<SnapshotStore, "append">;
  surface: Pick<RenderingSurface, "requestCurrentState">;
  position: SessionPosition;
  protection: ProtectionGate;
  executor: SerialExecutor;
  detector?: ChangeDetector;
  intervalMs?: number;
  /** How long a tick waits for the surface before giving up on it. */
  requestTimeoutMs?: number;
  /** Receives the outcome of every timer-driven tick. */
  onTick?: (outcome: TickOutcome) => void;
  logger?: Logger;
}

/**
 * Polls the rendering surface and appends the state whenever it differs from
 * the last saved one. At most one tick is outstanding at a time.
 */
export class AutoSaveScheduler {
  private readonly snapshots: Pick<SnapshotStore, "append">;
  private readonly surface: Pick<RenderingSurface, "requestCurrentState">;
  private readonly position: SessionPosition;
  private readonly protection: ProtectionGate;
  private readonly executor: SerialExecutor;
  private readonly detector: ChangeDetector;
  private readonly intervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly onTick?: (outcome: TickOutcome) => void;
  private readonly logger: Logger;
  private timer?: NodeJS.Timeout;
  private inFlight = false;
  private pendingSave = false;
  private closed = false;

  constructor(config: AutoSaveSchedulerConfig) {
    this.snapshots = config.snapshots;
    this.surface = config.surface;
    this.position = config.position;
    this.protection = config.protection;
    this.executor = config.executor;
    this.detector = config.detector ?? new ChangeDetector();
    this.intervalMs = config.intervalMs ?? DEFAULT_AUTOSAVE_INTERVAL_MS;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.onTick = config.onTick;
    this.logger = config.logger ?? createSubsystemLogger("history", "autosave");
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /** Set after a failed append until the next successful one. */
  get savePending(): boolean {
    return this.pendingSave;
  }

  start(): void {
    if (this.timer || this.closed) {
      return;
    }
    this.timer = setInterval(() => {
      this.tick().then(
        (outcome) => this.onTick?.(outcome),
        (error: unknown) => this.logger.error("Auto-save tick crashed", error)
      );
    }, this.intervalMs);
    this.logger.debug("Auto-save started", { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.logger.debug("Auto-save stopped");
    }
  }

  /**
   * Stops the timer for good. A tick still waiting on the surface finishes
   * as `skipped` without touching the store.
   */
  close(): void {
    this.stop();
    this.closed = true;
  }

  async tick(): Promise<TickOutcome> {
    if (this.closed) {
      return { status: "skipped", reason: "closed" };
    }
    if (this.inFlight) {
      return { status: "skipped", reason: "busy" };
    }
    this.inFlight = true;
    try {
      return await this.runTick();
    } finally {
      this.inFlight = false;
    }
  }

  private async runTick(): Promise<TickOutcome> {
    const protectedNow = await this.executor.run(() => this.protection.isProtected());
    if (protectedNow) {
      return { status: "skipped", reason: "protected" };
    }

    let candidate: AnnotationState;
    try {
      candidate = parseAnnotationState(await this.requestState());
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      if (failure instanceof SurfaceTimeoutError) {
        this.logger.warn("Surface state request timed out", { timeoutMs: failure.timeoutMs });
      } else {
        this.logger.warn("Surface did not return a usable state", {
          reason: failure.message,
          code: isHistoryError(failure) ? failure.code : undefined,
        });
      }
      return { status: "request-failed", error: failure };
    }

    return this.executor.run(() => this.handleResponse(candidate));
  }

  /** The surface's answer, or SurfaceTimeoutError once the timeout passes. */
  private requestState(): Promise<AnnotationState> {
    const request = this.surface.requestCurrentState();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new SurfaceTimeoutError(this.requestTimeoutMs)),
        this.requestTimeoutMs
      );
    });
    return Promise.race([request, timeout]).finally(() => clearTimeout(timer));
  }

  private async handleResponse(candidate: AnnotationState): Promise<TickOutcome> {
    if (this.closed) {
      this.logger.debug("Dropping surface state that arrived after close");
      return { status: "skipped", reason: "closed" };
    }
    if (this.protection.isProtected()) {
      this.logger.debug("Discarding surface state captured during a load");
      return { status: "discarded" };
    }
    if (!this.detector.shouldSave(candidate, this.position.lastSavedState)) {
      return { status: "unchanged" };
    }

    const timer = this.logger.startTimer("Snapshot appended");
    try {
      const index = await this.snapshots.append(candidate);
      this.position.cursor = index;
      this.position.lastSavedState = candidate;
      if (this.pendingSave) {
        this.logger.info("Auto-save recovered", { index });
      }
      this.pendingSave = false;
      timer.stop({ index });
      return { status: "saved", index };
    } catch (error) {
      const failure = toStorageIOError(error, "Auto-save append failed");
      this.pendingSave = true;
      this.logger.error("Auto-save append failed; will retry", failure);
      return { status: "save-failed", error: failure };
    }
  }
}
