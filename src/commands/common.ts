/**
 * Shared option parsing and start-up for toolroute commands.
 */

import type { Command } from "commander";
import { discoverConfig } from "../config/discovery";
import { loadSettings, type Settings } from "../config/settings";
import { ConnectionManager } from "../session/connection-manager";
import { ChatClient } from "../chat/client";
import { type Assistant, createAssistant } from "../assistant";
import { warn } from "../util/logger";

/** Commander collect helper: appends each flag value into an array. */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

function splitAssignment(item: string, flag: string, valueLabel: string): [string, string] {
  const eq = item.indexOf("=");
  if (eq === -1) {
    throw new Error(`Invalid ${flag} format: "${item}". Use name=${valueLabel}`);
  }
  const name = item.slice(0, eq).trim();
  const value = item.slice(eq + 1).trim();
  if (!name) {
    throw new Error(`Invalid ${flag} format: "${item}". Server name must not be empty`);
  }
  if (!value) {
    throw new Error(`Invalid ${flag} format: "${item}". ${valueLabel} must not be empty`);
  }
  return [name, value];
}

/** Parse `--server name=command` inline server definitions. */
export function parseInlineServers(
  items: string[],
): Array<{ name: string; command: string; }> {
  return items.map(item => {
    const [name, command] = splitAssignment(item, "--server", "command");
    return { name, command };
  });
}

/**
 * Parse `--server-url name=url` inline definitions. An explicit port must be
 * in 1-65535; other URL oddities are left for the transport to report.
 */
export function parseInlineUrls(
  items: string[],
): Array<{ name: string; url: string; }> {
  return items.map(item => {
    const [name, url] = splitAssignment(item, "--server-url", "url");
    const port = /^[a-z][a-z0-9+.-]*:\/\/[^/:?#]+:(\d+)/i.exec(url)?.[1];
    if (port !== undefined) {
      const n = parseInt(port, 10);
      if (n < 1 || n > 65535) {
        throw new Error(`Invalid port ${n} in --server-url "${item}". Port must be 1-65535`);
      }
    }
    return { name, url };
  });
}

export interface ServerOptions {
  config?: string;
  server: string[];
  serverUrl: string[];
  model?: string;
}

/** The server-selection flags every command that connects accepts. */
export function addServerOptions(command: Command): Command {
  return command
    .option("--config <path>", "Path to .mcp.json config file")
    .option("--server <name=command>", "Add stdio server inline (repeatable)", collect, [])
    .option("--server-url <name=url>", "Add HTTP/SSE server inline (repeatable)", collect, [])
    .option("--model <model>", "Claude model to use");
}

export interface Runtime {
  settings: Settings;
  manager: ConnectionManager;
}

/** Resolve config and settings; nothing is connected yet. */
export async function createManager(
  options: ServerOptions,
  env: Record<string, string | undefined> = process.env,
): Promise<Runtime> {
  const settings = loadSettings(env, options.model ? { model: options.model } : {});
  const config = await discoverConfig({
    configPath: options.config,
    inlineServers: parseInlineServers(options.server),
    inlineUrls: parseInlineUrls(options.serverUrl),
    env,
  });

  if (Object.keys(config.servers).length === 0) {
    warn("No MCP servers configured. Use --config, --server, or create .mcp.json");
  }

  const manager = new ConnectionManager(config, {
    connectTimeoutMs: settings.connectTimeoutMs,
    callTimeoutMs: settings.callTimeoutMs,
    retry: {
      maxAttempts: settings.maxConnectAttempts,
      initialDelayMs: settings.retryDelayMs,
    },
  });
  return { settings, manager };
}

/** Build the assistant and run initial discovery. */
export async function startAssistant(
  options: ServerOptions,
  env: Record<string, string | undefined> = process.env,
): Promise<{ assistant: Assistant; settings: Settings; }> {
  const { settings, manager } = await createManager(options, env);
  if (!settings.apiKey) {
    throw new Error(
      "ANTHROPIC_API_KEY not set. Export it to use toolroute.\n"
        + "  export ANTHROPIC_API_KEY=your-key",
    );
  }

  const model = new ChatClient({ apiKey: settings.apiKey, model: settings.model });
  const assistant = createAssistant(manager, settings, model);
  await manager.discover();
  return { assistant, settings };
}
