#!/usr/bin/env node
import { createConsoleLogger } from "../io/logger.js";
import { JSON_COMMANDS, runCli } from "./commands.js";

const args = process.argv.slice(2);
// Progress lines would end up inside JSON printed to stdout.
const printsJson = JSON_COMMANDS.includes(args[0] ?? "") && !args.includes("--output");
const quiet = args.includes("--quiet") || printsJson;
const abortController = new AbortController();

process.on("SIGINT", () => {
  if (!abortController.signal.aborted) {
    console.error("Aborting: received SIGINT.");
    abortController.abort();
  }
});

const run = async (): Promise<void> => {
  process.exitCode = await runCli(
    args.filter((arg) => arg !== "--quiet"),
    {
      logger: createConsoleLogger({ verbose: !quiet }),
      stdout: (text) => console.log(text),
      signal: abortController.signal,
    }
  );
};

void run();
