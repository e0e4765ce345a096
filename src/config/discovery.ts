/**
 * Discover and merge .mcp.json config files.
 *
 * Precedence (later wins on conflict):
 * 1. $HOME/.mcp.json (global)
 * 2. .mcp.json in CWD (project-level)
 * 3. --config <path> (explicit, replaces CWD)
 * 4. --server / --server-url flags (additive)
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { validateConfig } from "./schema";
import { isHttpConfig, isStdioConfig } from "./types";
import type { ResolvedConfig, ServerConfig } from "./types";
import { expandEnvRecord } from "../util/env";
import { errorMessage } from "../util/errors";
import { log } from "../util/logger";

async function loadConfigFile(
  path: string,
): Promise<Record<string, ServerConfig>> {
  try {
    const content = await readFile(path, "utf-8");
    const validated = validateConfig(JSON.parse(content));
    log(
      `Loaded config from ${path} (${Object.keys(validated.mcpServers).length} servers)`,
    );
    return validated.mcpServers;
  } catch (err) {
    log(`Skipping config ${path}: ${errorMessage(err)}`);
    return {};
  }
}

export interface DiscoveryOptions {
  configPath?: string;
  inlineServers?: Array<{ name: string; command: string; }>;
  inlineUrls?: Array<{ name: string; url: string; }>;
  env?: Record<string, string | undefined>;
}

export async function discoverConfig(
  options: DiscoveryOptions = {},
): Promise<ResolvedConfig> {
  const servers: Record<string, ServerConfig> = {};
  const configSources: string[] = [];
  const env = options.env ?? process.env;

  const globalPath = join(homedir(), ".mcp.json");
  const projectPath = options.configPath
    ? resolve(process.cwd(), options.configPath)
    : join(process.cwd(), ".mcp.json");

  for (const path of new Set([globalPath, projectPath])) {
    if (!existsSync(path)) continue;
    const loaded = await loadConfigFile(path);
    if (Object.keys(loaded).length > 0) configSources.push(path);
    Object.assign(servers, loaded);
  }

  for (const { name, command } of options.inlineServers ?? []) {
    const parts = command.split(/\s+/).filter(Boolean);
    servers[name] = {
      type: "stdio",
      command: parts[0] ?? "",
      args: parts.slice(1),
    };
  }

  for (const { name, url } of options.inlineUrls ?? []) {
    servers[name] = { type: "url", url };
  }

  for (const config of Object.values(servers)) {
    if (isStdioConfig(config) && config.env) {
      config.env = expandEnvRecord(config.env, env);
    }
    if (isHttpConfig(config) && config.headers) {
      config.headers = expandEnvRecord(config.headers, env);
    }
  }

  log(`Resolved ${Object.keys(servers).length} total servers`);
  return { servers, configSources };
}
