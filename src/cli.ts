#!/usr/bin/env node
/**
 * toolroute: route natural-language queries to MCP tools.
 *
 * Usage:
 *   toolroute ask <query...>   Answer one query
 *   toolroute chat             Interactive session
 *   toolroute tools            List the merged tool catalog
 *   toolroute resources        List or read MCP resources
 *   toolroute status           Health check for configured servers
 */

import { config } from "dotenv";
import { program } from "commander";
import { registerAskCommand } from "./commands/ask";
import { registerChatCommand } from "./commands/chat";
import { registerToolsCommand } from "./commands/tools";
import { registerResourcesCommand } from "./commands/resources";
import { registerStatusCommand } from "./commands/status";
import { setVerbose } from "./util/logger";
import { errorMessage } from "./util/errors";

config({ path: ".env.local", quiet: true });
config({ path: ".env", quiet: true });

const VERSION = "0.1.0";

async function main(): Promise<void> {
  program
    .name("toolroute")
    .description("Route natural-language queries to tools on MCP servers")
    .version(VERSION)
    .option("--verbose", "Verbose logging to stderr")
    .hook("preAction", thisCommand => {
      if (thisCommand.opts().verbose) {
        setVerbose(true);
      }
    });

  registerAskCommand(program);
  registerChatCommand(program);
  registerToolsCommand(program);
  registerResourcesCommand(program);
  registerStatusCommand(program);

  await program.parseAsync();
}

main().catch(err => {
  console.error(`toolroute: ${errorMessage(err)}`);
  process.exit(1);
});
