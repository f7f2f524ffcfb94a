import { mkdirSync } from "node:fs";
import * as path from "node:path";
import type { HistoryConfig } from "../config";
import { FileHistoryRepository } from "./fileStore";
import { InMemoryHistoryRepository } from "./inMemoryStore";
import { SQLiteHistoryRepository } from "./sqliteStore";
import type { HistoryRepository } from "./types";

type RepositoryConfig = Pick<
  HistoryConfig,
  "backend" | "storageDir" | "databasePath" | "firstIndex" | "compressionThresholdBytes"
>;

export function createHistoryRepository(
  config: RepositoryConfig,
  options: { now?: () => number } = {}
): HistoryRepository {
  switch (config.backend) {
    case "file":
      return new FileHistoryRepository({
        rootDir: config.storageDir,
        firstIndex: config.firstIndex,
        now: options.now,
      });
    case "sqlite":
      mkdirSync(path.dirname(config.databasePath), { recursive: true });
      return new SQLiteHistoryRepository({
        databasePath: config.databasePath,
        compressionThresholdBytes: config.compressionThresholdBytes,
        firstIndex: config.firstIndex,
        now: options.now,
      });
    case "memory":
      return new InMemoryHistoryRepository({ firstIndex: config.firstIndex, now: options.now });
  }
}
