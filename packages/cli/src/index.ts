#!/usr/bin/env -S node --import tsx
import { createProgram } from "./program";
import { writeStderr } from "./utils/terminal";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    writeStderr(message);
    process.exit(1);
  });
