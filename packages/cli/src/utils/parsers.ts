import type { HistoryBackendKind } from "@inktrail/history";
import { InvalidArgumentError } from "commander";

const BACKENDS: readonly HistoryBackendKind[] = ["file", "sqlite", "memory"];

const TRUE_VALUES = new Set(["true", "yes", "1", "on"]);
const FALSE_VALUES = new Set(["false", "no", "0", "off"]);

export function parseBackend(value: string): HistoryBackendKind {
  const backend = BACKENDS.find((candidate) => candidate === value);
  if (!backend) {
    throw new InvalidArgumentError(`Expected one of ${BACKENDS.join(", ")}.`);
  }
  return backend;
}

export function parseIndex(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

export function parseLimit(value: string): number {
  const limit = parseIndex(value);
  if (limit === 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return limit;
}

export function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  throw new InvalidArgumentError("Expected true or false.");
}
