import { countPoints, type SessionStore, SerializationError } from "@inktrail/history";
import { Command } from "commander";
import { type CliContext, withRepository } from "../utils/context";
import { formatHistoryTable, type HistoryEntry } from "../utils/format";
import { parseIndex, parseLimit } from "../utils/parsers";

export function historyCommand(context: CliContext): Command {
  return new Command("history")
    .description("List the snapshots of a session, oldest first")
    .argument("<sessionId>", "Session ID")
    .option("--limit <n>", "Only the most recent n snapshots", parseLimit)
    .option("--json", "Print JSON")
    .action(
      async (sessionId: string, options: { limit?: number; json?: boolean }, command: Command) => {
        const entries = await withRepository(context, command, (repository) =>
          collectEntries(context, repository.openSession(sessionId), options.limit)
        );

        if (options.json) {
          context.output.stdout(JSON.stringify(entries, null, 2));
          return;
        }
        if (entries.length === 0) {
          context.output.stdout("No snapshots found.");
          return;
        }
        for (const line of formatHistoryTable(entries)) {
          context.output.stdout(line);
        }
      }
    );
}

export function showCommand(context: CliContext): Command {
  return new Command("show")
    .description("Print one snapshot as JSON")
    .argument("<sessionId>", "Session ID")
    .argument("<index>", "Snapshot index", parseIndex)
    .action(
      async (sessionId: string, index: number, _options: Record<string, never>, command: Command) => {
        const snapshot = await withRepository(context, command, (repository) =>
          repository.openSession(sessionId).readSnapshot(index)
        );
        context.output.stdout(JSON.stringify(snapshot, null, 2));
      }
    );
}

async function collectEntries(
  context: CliContext,
  store: SessionStore,
  limit: number | undefined
): Promise<HistoryEntry[]> {
  const indices = await store.listIndices();
  const bookmarks = new Set(await store.loadBookmarks());
  const selected = limit === undefined ? indices : indices.slice(-limit);

  const entries: HistoryEntry[] = [];
  for (const index of selected) {
    const bookmarked = bookmarks.has(index);
    try {
      const snapshot = await store.readSnapshot(index);
      entries.push({
        index,
        createdAt: snapshot.createdAt,
        strokes: snapshot.state.strokes.length,
        points: countPoints(snapshot.state),
        bookmarked,
      });
    } catch (error) {
      if (!(error instanceof SerializationError)) {
        throw error;
      }
      context.output.stderr(error.message);
      entries.push({ index, bookmarked, error: error.message });
    }
  }
  return entries;
}
