#!/usr/bin/env tsx
/**
 * fqview executable entry point
 *
 * Ctrl-C aborts rendering between records, so the open file is closed
 * before the process exits with 130. A closed stdout (piping into `head`)
 * stops rendering quietly.
 */

import { runCli } from "./cli";

const SIGINT_EXIT_CODE = 130;

async function main(): Promise<void> {
  const controller = new AbortController();

  process.once("SIGINT", () => controller.abort("SIGINT"));
  process.stdout.on("error", (error: NodeJS.ErrnoException) => {
    if (error.code !== "EPIPE") {
      console.error(`Error writing output: ${error.message}`);
    }
    controller.abort(error.code ?? "stdout");
  });

  const exitCode = await runCli(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    signal: controller.signal,
  });

  process.exitCode = controller.signal.reason === "SIGINT" ? SIGINT_EXIT_CODE : exitCode;
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? `Unexpected error: ${error.message}` : error);
  process.exitCode = 1;
});
