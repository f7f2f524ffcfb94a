import {
  createHistoryRepository,
  type HistoryBackendKind,
  type HistoryConfig,
  type HistoryRepository,
  loadConfig,
} from "@inktrail/history";
import { configureLogger, createConsoleTransport } from "@inktrail/telemetry/logging";
import type { Command } from "commander";
import { writeStderr, writeStdout } from "./terminal";

export interface CliOutput {
  stdout(message: string): void;
  stderr(message: string): void;
}

export interface CliContext {
  env: Record<string, string | undefined>;
  output: CliOutput;
  /** Wall clock for review status updates */
  now: () => number;
  openRepository: (config: HistoryConfig) => HistoryRepository;
}

export type GlobalOptions = {
  storageDir?: string;
  backend?: HistoryBackendKind;
  database?: string;
};

export function createDefaultContext(): CliContext {
  return {
    env: process.env,
    output: { stdout: writeStdout, stderr: writeStderr },
    now: Date.now,
    openRepository: (config) => createHistoryRepository(config),
  };
}

export function resolveConfig(context: CliContext, command: Command): HistoryConfig {
  const globals = command.optsWithGlobals<GlobalOptions>();
  return loadConfig(context.env, {
    storageDir: globals.storageDir,
    backend: globals.backend,
    databasePath: globals.database,
  });
}

/**
 * Opens the configured repository for the duration of `run` and closes it
 * afterwards, whether or not `run` succeeds.
 */
export async function withRepository<T>(
  context: CliContext,
  command: Command,
  run: (repository: HistoryRepository) => Promise<T>
): Promise<T> {
  const config = resolveConfig(context, command);
  configureLogger({
    level: config.logLevel,
    transports: [createConsoleTransport({ pretty: true, stream: "stderr" })],
  });

  const repository = context.openRepository(config);
  try {
    return await run(repository);
  } finally {
    repository.close();
  }
}
