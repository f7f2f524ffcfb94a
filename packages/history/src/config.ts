/**
 * History Configuration
 *
 * Defaults, overridden by INKTRAIL_* environment variables, overridden by
 * explicit values passed by the caller. The merged result is validated once.
 */

import * as path from "node:path";
import type { LogLevel } from "@inktrail/telemetry/logging";
import { isLogLevel, LOG_LEVELS } from "@inktrail/telemetry/logging";
import { z } from "zod";
import { ConfigError } from "./errors";

export type HistoryBackendKind = "file" | "sqlite" | "memory";

const HistoryConfigSchema = z
  .object({
    storageDir: z.string().min(1),
    backend: z.enum(["file", "sqlite", "memory"]),
    databasePath: z.string().min(1).optional(),
    autoSaveIntervalMs: z.number().int().positive(),
    graceWindowMs: z.number().int().nonnegative(),
    loadTimeoutMs: z.number().int().positive(),
    requestTimeoutMs: z.number().int().positive(),
    firstIndex: z.number().int().nonnegative(),
    compressionThresholdBytes: z.number().int().positive(),
    logLevel: z.custom<LogLevel>((value) => isLogLevel(value), {
      message: `Expected one of ${LOG_LEVELS.join(", ")}`,
    }),
  })
  .superRefine((config, ctx) => {
    if (config.loadTimeoutMs <= config.graceWindowMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["loadTimeoutMs"],
        message: "Must be greater than graceWindowMs",
      });
    }
  });

type HistoryConfigInput = z.infer<typeof HistoryConfigSchema>;

export type HistoryConfig = Readonly<
  Omit<HistoryConfigInput, "databasePath"> & { databasePath: string }
>;

export type HistoryConfigOverrides = Partial<HistoryConfigInput>;

export const DEFAULT_HISTORY_CONFIG = {
  storageDir: ".inktrail/sessions",
  backend: "file",
  autoSaveIntervalMs: 1000,
  graceWindowMs: 2000,
  loadTimeoutMs: 15_000,
  requestTimeoutMs: 5000,
  firstIndex: 0,
  compressionThresholdBytes: 64 * 1024,
  logLevel: "info",
} satisfies Omit<HistoryConfigInput, "databasePath">;

export const DATABASE_FILE_NAME = "history.db";

type Env = Record<string, string | undefined>;

function readNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return Number(value);
}

function readString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readEnv(env: Env): Record<string, unknown> {
  return {
    storageDir: readString(env.INKTRAIL_STORAGE_DIR),
    backend: readString(env.INKTRAIL_BACKEND),
    databasePath: readString(env.INKTRAIL_DATABASE_PATH),
    autoSaveIntervalMs: readNumber(env.INKTRAIL_AUTOSAVE_INTERVAL_MS),
    graceWindowMs: readNumber(env.INKTRAIL_GRACE_WINDOW_MS),
    loadTimeoutMs: readNumber(env.INKTRAIL_LOAD_TIMEOUT_MS),
    requestTimeoutMs: readNumber(env.INKTRAIL_REQUEST_TIMEOUT_MS),
    firstIndex: readNumber(env.INKTRAIL_FIRST_INDEX),
    compressionThresholdBytes: readNumber(env.INKTRAIL_COMPRESSION_THRESHOLD_BYTES),
    logLevel: readString(env.INKTRAIL_LOG_LEVEL),
  };
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Resolves the effective configuration. Throws ConfigError listing every
 * invalid field.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: HistoryConfigOverrides = {}
): HistoryConfig {
  const merged = {
    ...DEFAULT_HISTORY_CONFIG,
    ...withoutUndefined(readEnv(env)),
    ...withoutUndefined(overrides),
  };

  const result = HistoryConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }

  const config = result.data;
  return Object.freeze({
    ...config,
    databasePath: config.databasePath ?? path.join(config.storageDir, DATABASE_FILE_NAME),
  });
}
