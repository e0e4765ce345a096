/**
 * `toolroute ask` command: answer one query and exit.
 */

import type { Command } from "commander";
import { addServerOptions, type ServerOptions, startAssistant } from "./common";
import { formatResponse } from "../shell/formatter";

export function registerAskCommand(program: Command): void {
  addServerOptions(
    program
      .command("ask")
      .description("Answer a single query, using an MCP tool when one fits")
      .argument("<query...>", "The query text"),
  )
    .option("--json", "Output the full response as JSON")
    .action(async (words: string[], options: ServerOptions & { json?: boolean; }) => {
      const { assistant } = await startAssistant(options);
      try {
        const response = await assistant.processQuery(words.join(" "));
        console.log(options.json ? JSON.stringify(response, null, 2) : formatResponse(response));
        if (response.failure) process.exitCode = 1;
      } finally {
        await assistant.close();
      }
    });
}
