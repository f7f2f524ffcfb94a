/**
 * Vitest alias configuration for workspace packages.
 *
 * Aliases are ordered so that subpaths are matched before their parent packages.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

export const aliases: AliasEntry[] = [
  // Subpath exports first
  {
    find: "@inktrail/telemetry/logging",
    replacement: path.resolve(__dirname, "packages/telemetry/src/logging/index.ts"),
  },

  {
    find: "@inktrail/telemetry",
    replacement: path.resolve(__dirname, "packages/telemetry/src/index.ts"),
  },
  {
    find: "@inktrail/history",
    replacement: path.resolve(__dirname, "packages/history/src/index.ts"),
  },
  { find: "@inktrail/cli", replacement: path.resolve(__dirname, "packages/cli/src/program.ts") },
];
