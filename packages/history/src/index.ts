/**
 * Annotation History
 *
 * Append-only snapshot storage, bookmarks, change detection, auto-save and
 * navigation for annotation editing sessions.
 */

export * from "./autosave/autoSaveScheduler";
export * from "./bookmarks/bookmarkIndex";
export * from "./config";
export * from "./detect/changeDetector";
export * from "./errors";
export * from "./navigation/navigationController";
export * from "./navigation/protection";
export * from "./session/annotationSession";
export * from "./session/openSession";
export * from "./session/surface";
export * from "./state/annotationSchema";
export * from "./store/createRepository";
export * from "./store/fileStore";
export * from "./store/inMemoryStore";
export * from "./store/sqliteStore";
export * from "./store/types";
export * from "./types";
export { SerialExecutor } from "./utils/serialExecutor";
export { monotonicNow, wallNow } from "./utils/clock";
