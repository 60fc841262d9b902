#!/usr/bin/env node
/**
 * CLI entry point.
 *
 * Usage:
 *   email-assistant shell
 *   email-assistant shell --provider fixtures
 *   email-assistant serve --port 3000
 */

import { config as loadDotenv } from "dotenv";
import { Command } from "commander";
import { getConfig } from "./config/index.js";
import { createAssistantServices } from "./orchestrator/index.js";
import { runShell } from "./cli/shell.js";
import { SERVICE_VERSION } from "./version.js";

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  loadDotenv();

  const program = new Command()
    .name("email-assistant")
    .description("Draft and refine email replies from the terminal or over HTTP")
    .version(SERVICE_VERSION);

  program
    .command("shell", { isDefault: true })
    .description("Start an interactive drafting session")
    .option("--provider <name>", "Text generation provider (anthropic, openai, fixtures)")
    .action(async (opts: { provider?: string }) => {
      if (opts.provider) process.env.LLM_PROVIDER = opts.provider;
      const services = createAssistantServices(getConfig());
      await runShell({ services, input: process.stdin, output: process.stdout });
    });

  program
    .command("serve")
    .description("Start the HTTP service")
    .option("--port <port>", "Port to listen on")
    .action(async (opts: { port?: string }) => {
      if (opts.port) process.env.PORT = opts.port;
      const { build } = await import("./server.js");
      const app = await build();
      await app.listen({ port: getConfig().server.port, host: "0.0.0.0" });
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
