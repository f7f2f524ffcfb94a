import type { HistoryConfig } from "../config";
import type { HistoryRepository } from "../store/types";
import type { AnnotationSessionConfig } from "./annotationSession";
import { AnnotationSession } from "./annotationSession";
import type { RenderingSurface } from "./surface";

export interface OpenSessionOptions
  extends Pick<AnnotationSessionConfig, "now" | "wallClock" | "logger" | "coordinateTolerance"> {
  /** Start the auto-save timer once the session is open. */
  autoStart?: boolean;
}

/**
 * Opens `sessionId` in `repository` with the timing taken from `config`.
 */
export async function openSession(
  repository: HistoryRepository,
  sessionId: string,
  surface: RenderingSurface,
  config: Pick<
    HistoryConfig,
    "autoSaveIntervalMs" | "graceWindowMs" | "loadTimeoutMs" | "requestTimeoutMs"
  >,
  options: OpenSessionOptions = {}
): Promise<AnnotationSession> {
  const session = await AnnotationSession.open({
    store: repository.openSession(sessionId),
    surface,
    autoSaveIntervalMs: config.autoSaveIntervalMs,
    graceWindowMs: config.graceWindowMs,
    loadTimeoutMs: config.loadTimeoutMs,
    requestTimeoutMs: config.requestTimeoutMs,
    coordinateTolerance: options.coordinateTolerance,
    now: options.now,
    wallClock: options.wallClock,
    logger: options.logger,
  });
  if (options.autoStart) {
    session.startAutoSave();
  }
  return session;
}
