#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { EXIT, errorMessage, exit, exitCodeFor } from "./shared/errors.js";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = errorMessage(error);
  const code =
    message.includes("Unknown option") || message.includes("invalid") ? EXIT.INVALID_ARGS : exitCodeFor(error);
  exit(code, message);
});
