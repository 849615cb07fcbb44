#!/usr/bin/env node
import "dotenv/config";
import { CommanderError } from "commander";
import { parseCommand } from "./cli";
import { createDispatcher } from "./commands/dispatch";
import { loadConfig } from "./config";
import { createBrowserOpener } from "./utils/browser";
import { BookmarkError } from "./utils/errors";
import { consoleOutput, createConsoleDiagnostics } from "./utils/log";
import { createHttpTransport } from "./utils/transport";

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const diagnostics = createConsoleDiagnostics(config.debug);
  const command = parseCommand(process.argv.slice(2));

  diagnostics.debug(
    `[CLI] ${command.action} urls=${command.urls.length} tags=${command.tags.length}`
  );

  const dispatcher = createDispatcher(config, {
    diagnostics,
    output: consoleOutput,
    transport: createHttpTransport(config.fetchTimeoutMs),
    openBrowser: createBrowserOpener(config.browser, diagnostics),
  });
  await dispatcher.dispatch(command);
}

main().catch((error: unknown) => {
  // Commander already printed help or the usage problem
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  if (error instanceof BookmarkError) {
    console.error(`bookmark: ${error.message}`);
    process.exit(error.exitCode);
  }
  console.error("Unexpected error:", error);
  process.exit(1);
});
