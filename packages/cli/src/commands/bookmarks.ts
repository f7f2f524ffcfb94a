import { BookmarkIndex } from "@inktrail/history";
import { Command } from "commander";
import { type CliContext, withRepository } from "../utils/context";
import { parseIndex } from "../utils/parsers";

export function bookmarksCommand(context: CliContext): Command {
  return new Command("bookmarks")
    .description("List the bookmarked snapshots of a session")
    .argument("<sessionId>", "Session ID")
    .action(async (sessionId: string, _options: Record<string, never>, command: Command) => {
      const bookmarks = await withRepository(context, command, async (repository) => {
        const store = repository.openSession(sessionId);
        return (await BookmarkIndex.load(store, store)).list();
      });
      if (bookmarks.length === 0) {
        context.output.stdout("No bookmarks.");
        return;
      }
      for (const index of bookmarks) {
        context.output.stdout(String(index));
      }
    });
}

export function markCommand(context: CliContext): Command {
  return new Command("mark")
    .description("Bookmark an existing snapshot")
    .argument("<sessionId>", "Session ID")
    .argument("<index>", "Snapshot index", parseIndex)
    .action(
      async (sessionId: string, index: number, _options: Record<string, never>, command: Command) => {
        const added = await withRepository(context, command, async (repository) => {
          const store = repository.openSession(sessionId);
          const bookmarks = await BookmarkIndex.load(store, store);
          return bookmarks.mark(index);
        });
        context.output.stdout(added ? `Bookmarked ${index}.` : `${index} is already bookmarked.`);
      }
    );
}
