import { performance } from "node:perf_hooks";

/** Monotonic milliseconds; immune to wall-clock adjustments. */
export const monotonicNow = (): number => performance.now();

/** Wall-clock epoch milliseconds, used only for record timestamps. */
export const wallNow = (): number => Date.now();
