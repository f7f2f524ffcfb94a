import { Command } from "commander";
import { type CliContext, withRepository } from "../utils/context";

export function sessionsCommand(context: CliContext): Command {
  return new Command("sessions")
    .description("List stored sessions")
    .action(async (_options: Record<string, never>, command: Command) => {
      const sessions = await withRepository(context, command, (repository) =>
        repository.listSessions()
      );
      if (sessions.length === 0) {
        context.output.stdout("No sessions found.");
        return;
      }
      for (const sessionId of sessions) {
        context.output.stdout(sessionId);
      }
    });
}
