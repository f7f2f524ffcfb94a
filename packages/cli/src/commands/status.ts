import type { ReviewStatus } from "@inktrail/history";
import { Command } from "commander";
import { type CliContext, withRepository } from "../utils/context";
import { formatReviewStatus } from "../utils/format";
import { parseBoolean } from "../utils/parsers";

type StatusOptions = { done?: boolean; flagged?: boolean };

export function statusCommand(context: CliContext): Command {
  return new Command("status")
    .description("Show or update the review status of a session")
    .argument("<sessionId>", "Session ID")
    .option("--done <bool>", "Mark the session done or not done", parseBoolean)
    .option("--flagged <bool>", "Flag or unflag the session", parseBoolean)
    .action(async (sessionId: string, options: StatusOptions, command: Command) => {
      const status = await withRepository(context, command, async (repository) => {
        const store = repository.openSession(sessionId);
        const current = await store.loadStatus();
        if (options.done === undefined && options.flagged === undefined) {
          return current;
        }
        const next: ReviewStatus = {
          done: options.done ?? current.done,
          flagged: options.flagged ?? current.flagged,
          updatedAt: context.now(),
        };
        await store.saveStatus(next);
        return next;
      });

      for (const line of formatReviewStatus(status)) {
        context.output.stdout(line);
      }
    });
}
