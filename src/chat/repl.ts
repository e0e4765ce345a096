/**
 * Interactive chat REPL for `toolroute chat`. One query is processed at a
 * time; lines typed meanwhile are queued by readline and handled in order.
 */

import { createInterface } from "node:readline";
import type { Assistant } from "../assistant";
import type { ConversationMessage } from "./client";
import { handleSlashCommand } from "./slash-commands";
import { bold, dim, formatResponse, yellow } from "../shell/formatter";
import { errorMessage } from "../util/errors";

export interface ChatReplOptions {
  assistant: Assistant;
  model: string;
  maxHistory: number;
}

/** Append a turn and drop the oldest messages beyond `limit`. */
export function appendTurn(
  messages: ConversationMessage[],
  query: string,
  answer: string,
  limit: number,
): void {
  messages.push({ role: "user", content: query }, { role: "assistant", content: answer });
  if (messages.length > limit) {
    messages.splice(0, messages.length - limit);
  }
}

export async function startChatRepl(options: ChatReplOptions): Promise<void> {
  const { assistant, model, maxHistory } = options;
  const messages: ConversationMessage[] = [];

  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
    prompt: `${bold("you")}${dim(">")} `,
    terminal: true,
  });

  const servers = assistant.manager.status();
  const ready = servers.filter(s => s.state === "ready").length;
  console.error(
    `${bold("toolroute chat")} - ${model} with ${assistant.registry.size} tools from ${ready}/${servers.length} servers`,
  );
  console.error(`Type ${dim("/help")} for commands, ${dim("/quit")} to exit\n`);

  const handleLine = async (line: string): Promise<boolean> => {
    const trimmed = line.trim();
    if (!trimmed) return true;

    if (trimmed.startsWith("/")) {
      const outcome = await handleSlashCommand(trimmed, { assistant, messages });
      if (outcome.output) console.error(outcome.output);
      console.error("");
      return !outcome.exit;
    }

    const response = await assistant.processQuery(trimmed, [...messages]);
    console.log(formatResponse(response));
    console.log("");
    if (!response.failure) {
      appendTurn(messages, trimmed, response.answerText, maxHistory);
    }
    return true;
  };

  rl.prompt();
  try {
    for await (const line of rl) {
      let keepGoing: boolean;
      try {
        keepGoing = await handleLine(line);
      } catch (err) {
        console.error(`${yellow("Error:")} ${errorMessage(err)}\n`);
        keepGoing = true;
      }
      if (!keepGoing) break;
      rl.prompt();
    }
  } finally {
    rl.close();
    console.error("\nGoodbye.");
    await assistant.close();
  }
}
