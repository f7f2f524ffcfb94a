import type { AnnotationState } from "../types";

export type LoadPhase = "awaiting-confirmation" | "settling";

/**
 * Transient guard that keeps auto-save away from a state the session itself
 * just loaded. Timestamps are monotonic milliseconds.
 */
export type ProtectionState =
  | { kind: "idle" }
  | {
      kind: "loading";
      target: number;
      issuedAt: number;
      phase: LoadPhase;
      /** State read for `target`; becomes the last-saved state on confirmation. */
      state: AnnotationState;
    };

export type LoadingProtection = Extract<ProtectionState, { kind: "loading" }>;

export const IDLE: ProtectionState = Object.freeze({ kind: "idle" });

export interface ProtectionPolicy {
  graceWindowMs: number;
  loadTimeoutMs: number;
}

export const DEFAULT_GRACE_WINDOW_MS = 2000;
export const DEFAULT_LOAD_TIMEOUT_MS = 15_000;

export type ProtectionEvaluation = {
  protected: boolean;
  next: ProtectionState;
  /** Set when evaluation moved a loading state back to idle. */
  expired?: "grace-elapsed" | "load-timeout";
};

export function evaluateProtection(
  state: ProtectionState,
  now: number,
  policy: ProtectionPolicy
): ProtectionEvaluation {
  if (state.kind === "idle") {
    return { protected: false, next: state };
  }

  const elapsed = now - state.issuedAt;

  if (state.phase === "settling") {
    return elapsed < policy.graceWindowMs
      ? { protected: true, next: state }
      : { protected: false, next: IDLE, expired: "grace-elapsed" };
  }

  return elapsed < policy.loadTimeoutMs
    ? { protected: true, next: state }
    : { protected: false, next: IDLE, expired: "load-timeout" };
}
