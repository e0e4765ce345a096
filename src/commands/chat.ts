/**
 * `toolroute chat` command: interactive session with tool routing.
 */

import type { Command } from "commander";
import { addServerOptions, type ServerOptions, startAssistant } from "./common";
import { startChatRepl } from "../chat/repl";

export function registerChatCommand(program: Command): void {
  addServerOptions(
    program
      .command("chat")
      .description("Interactive chat; each message is routed to a tool or answered directly"),
  ).action(async (options: ServerOptions) => {
    const { assistant, settings } = await startAssistant(options);
    await startChatRepl({
      assistant,
      model: settings.model,
      maxHistory: settings.maxHistory,
    });
  });
}
