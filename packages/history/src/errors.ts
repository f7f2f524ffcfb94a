import type { NavigationDirection } from "./types";

export type HistoryErrorCode =
  | "NOT_FOUND"
  | "SERIALIZATION_ERROR"
  | "IO_ERROR"
  | "NO_SUCH_TRANSITION"
  | "SURFACE_TIMEOUT"
  | "INVALID_CONFIG";

type HistoryErrorOptions = {
  context?: Record<string, unknown>;
  cause?: unknown;
};

export class HistoryError extends Error {
  readonly code: HistoryErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: HistoryErrorCode, message: string, options: HistoryErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "HistoryError";
    this.code = code;
    this.context = options.context;
  }
}

/** No snapshot (or session) exists at the requested index. */
export class NotFoundError extends HistoryError {
  readonly index: number;

  constructor(index: number, options: HistoryErrorOptions = {}) {
    super("NOT_FOUND", `No snapshot at index ${index}`, options);
    this.name = "NotFoundError";
    this.index = index;
  }
}

/** A stored record exists but cannot be decoded. Indicates storage corruption. */
export class SerializationError extends HistoryError {
  readonly index?: number;

  constructor(message: string, options: HistoryErrorOptions & { index?: number } = {}) {
    super("SERIALIZATION_ERROR", message, options);
    this.name = "SerializationError";
    this.index = options.index;
  }
}

/** A durable write did not complete. The would-be index stays unconsumed. */
export class StorageIOError extends HistoryError {
  constructor(message: string, options: HistoryErrorOptions = {}) {
    super("IO_ERROR", message, options);
    this.name = "StorageIOError";
  }
}

/** Boundary condition: there is nothing to move to in the requested direction. */
export class NoSuchTransitionError extends HistoryError {
  readonly direction: NavigationDirection;
  readonly from: number | undefined;

  constructor(direction: NavigationDirection, from: number | undefined) {
    super(
      "NO_SUCH_TRANSITION",
      from === undefined
        ? `No ${direction} target: history is empty`
        : `No ${direction} target from index ${from}`,
      { context: { direction, from } }
    );
    this.name = "NoSuchTransitionError";
    this.direction = direction;
    this.from = from;
  }
}

/** The rendering surface did not answer a state request in time. */
export class SurfaceTimeoutError extends HistoryError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("SURFACE_TIMEOUT", `Surface did not answer within ${timeoutMs}ms`, {
      context: { timeoutMs },
    });
    this.name = "SurfaceTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends HistoryError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_CONFIG", `Invalid history configuration: ${issues.join("; ")}`, {
      context: { issues },
    });
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isHistoryError(error: unknown, code?: HistoryErrorCode): error is HistoryError {
  return error instanceof HistoryError && (code === undefined || error.code === code);
}

export function toStorageIOError(error: unknown, message: string): StorageIOError {
  if (error instanceof StorageIOError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new StorageIOError(`${message}: ${detail}`, { cause: error });
}

export function isErrnoException(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
