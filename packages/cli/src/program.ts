import { Command } from "commander";
import { bookmarksCommand, markCommand } from "./commands/bookmarks";
import { historyCommand, showCommand } from "./commands/history";
import { sessionsCommand } from "./commands/sessions";
import { statusCommand } from "./commands/status";
import { type CliContext, createDefaultContext } from "./utils/context";
import { parseBackend } from "./utils/parsers";

export function createProgram(context: CliContext = createDefaultContext()): Command {
  const program = new Command();

  program
    .name("inktrail")
    .description("Inspect and curate annotation history")
    .version("0.1.0")
    .option("--storage-dir <dir>", "Storage root (overrides INKTRAIL_STORAGE_DIR)")
    .option("--backend <kind>", "Storage backend: file, sqlite or memory", parseBackend)
    .option("--database <path>", "SQLite database file (overrides INKTRAIL_DATABASE_PATH)")
    .configureOutput({
      writeOut: (text) => context.output.stdout(text.trimEnd()),
      writeErr: (text) => context.output.stderr(text.trimEnd()),
    });

  const commands = [
    sessionsCommand(context),
    historyCommand(context),
    showCommand(context),
    bookmarksCommand(context),
    markCommand(context),
    statusCommand(context),
  ];
  for (const command of commands) {
    program.addCommand(command.copyInheritedSettings(program));
  }

  return program;
}
