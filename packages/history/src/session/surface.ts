import type { AnnotationState } from "../types";

export interface LoadStateCommand {
  target: number;
  state: AnnotationState;
}

export interface LoadConfirmation {
  /** Index the surface actually finished loading. */
  confirmedTarget: number;
}

/**
 * The component that displays annotations and reports edits.
 *
 * `loadState` is fire-and-forget: the surface answers later through
 * `AnnotationSession.confirmLoad`.
 */
export interface RenderingSurface {
  requestCurrentState(): Promise<AnnotationState>;
  loadState(command: LoadStateCommand): void;
}

/** Cursor and last-saved state shared by navigation and auto-save. */
export interface SessionPosition {
  cursor: number | undefined;
  lastSavedState: AnnotationState | undefined;
}
