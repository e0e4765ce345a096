/**
 * Slash commands for the chat REPL.
 */

import type { Assistant } from "../assistant";
import type { ConversationMessage } from "./client";
import type { ToolRegistry } from "../registry/tool-registry";
import { isEnabled } from "../config/types";
import {
  bold,
  cyan,
  dim,
  formatCatalog,
  formatError,
  formatResourceContents,
  formatResourceList,
  formatResponse,
  formatServerStatus,
  formatToolList,
} from "../shell/formatter";
import { errorMessage } from "../util/errors";

/** Parsed slash command input. */
export interface ParsedSlashInput {
  command: string;
  argsRaw: string;
}

export interface SlashCommandContext {
  assistant: Assistant;
  messages: ConversationMessage[];
}

export interface SlashCommandResult {
  /** Text to display. Empty string means nothing to print. */
  output: string;
  /** The REPL should exit. */
  exit: boolean;
}

/**
 * "/tools" → { command: "tools", argsRaw: "" }
 * "/tools add" → { command: "tools", argsRaw: "add" }
 */
export function parseSlashInput(input: string): ParsedSlashInput {
  const [command, argsRaw] = splitFirstWord(input.slice(1));
  return { command, argsRaw };
}

function splitFirstWord(text: string): [string, string] {
  const trimmed = text.trim();
  const spaceIndex = trimmed.search(/\s/);
  if (spaceIndex === -1) return [trimmed, ""];
  return [trimmed.slice(0, spaceIndex), trimmed.slice(spaceIndex + 1).trim()];
}

export const HELP_TEXT = `${bold("Commands:")}
  ${cyan("/tools")}${dim(" [filter]")}  List available tools
  ${cyan("/servers")}        Show server connection status
  ${cyan("/resources")}${dim(" [server]")}  List resources the servers expose
  ${cyan("/read")}${dim(" <server> <uri>")}  Print one resource
  ${cyan("/enable")}${dim(" <server>")}  Connect a disabled server
  ${cyan("/disable")}${dim(" <server>")}  Disconnect a server and drop its tools
  ${cyan("/rediscover")}     Reconnect servers and rebuild the tool catalog
  ${cyan("/retry")}          Retry the last failed request
  ${cyan("/clear")}          Clear conversation history
  ${cyan("/help")}           Show this help
  ${cyan("/quit")}           Exit`;

function result(output: string, exit = false): SlashCommandResult {
  return { output, exit };
}

function catalogSummary(assistant: Assistant, registry: ToolRegistry): string {
  const servers = assistant.manager.status();
  const ready = servers.filter(s => s.state === "ready").length;
  return `${registry.size} tools from ${ready}/${servers.length} servers`;
}

export async function handleSlashCommand(
  input: string,
  ctx: SlashCommandContext,
): Promise<SlashCommandResult> {
  const { command, argsRaw } = parseSlashInput(input);
  const { assistant, messages } = ctx;

  switch (command) {
    case "tools": {
      const registry = assistant.registry;
      if (!argsRaw) return result(formatCatalog(registry));

      const needle = argsRaw.toLowerCase();
      const matches = registry
        .list()
        .filter(t =>
          t.name.toLowerCase().includes(needle)
          || t.serverId.toLowerCase().includes(needle)
        );
      if (matches.length === 0) return result(`No tools match "${argsRaw}".`);
      return result(formatToolList(matches));
    }

    case "servers": {
      const report = `${bold("Servers:")}\n${formatServerStatus(assistant.manager.status())}`;
      const disabled = assistant.manager.disabledServers();
      if (disabled.length === 0) return result(report);
      return result(`${report}\n${dim(`  Disabled: ${disabled.join(", ")}`)}`);
    }

    case "resources": {
      const resources = await assistant.manager.listResources(argsRaw || undefined);
      if (resources.length === 0) {
        return result(argsRaw ? `No resources on ${argsRaw}.` : "No resources available.");
      }
      return result(formatResourceList(resources));
    }

    case "read": {
      const [serverId, uri] = splitFirstWord(argsRaw);
      if (!serverId || !uri) return result("Usage: /read <server> <uri>");
      try {
        return result(formatResourceContents(await assistant.manager.readResource(serverId, uri)));
      } catch (err) {
        return result(formatError(errorMessage(err)));
      }
    }

    case "enable":
    case "disable": {
      const serverId = argsRaw;
      if (!serverId) return result(`Usage: /${command} <server>`);
      const config = assistant.manager.serverConfig(serverId);
      if (!config) return result(`Unknown server: ${serverId}`);

      const enable = command === "enable";
      if (isEnabled(config) === enable) return result(`${serverId} is already ${command}d.`);
      const registry = await assistant.manager.setEnabled(serverId, enable);
      return result(
        `${enable ? "Enabled" : "Disabled"} ${serverId}. ${catalogSummary(assistant, registry)}.`,
      );
    }

    case "rediscover": {
      const registry = await assistant.rediscover();
      return result(`Rediscovered ${catalogSummary(assistant, registry)}.`);
    }

    case "retry": {
      const response = await assistant.retryLast();
      if (!response) return result("Nothing to retry.");
      return result(formatResponse(response));
    }

    case "clear":
      messages.length = 0;
      return result("Conversation cleared.");

    case "help":
      return result(HELP_TEXT);

    case "quit":
    case "exit":
      return result("", true);

    default:
      return result(`Unknown command: /${command}. Type /help for commands.`);
  }
}
