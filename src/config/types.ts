/**
 * Configuration types for MCP server definitions.
 * Follows the `mcpServers` layout of .mcp.json files.
 */

import type { ToolFilterConfig } from "../util/glob";

export type { ToolFilterConfig };

interface BaseServerConfig {
  /** Disabled servers stay in the config but are never connected. */
  enabled?: boolean;
  description?: string;
  tools?: ToolFilterConfig;
}

export interface StdioServerConfig extends BaseServerConfig {
  type?: "stdio";
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface HttpServerConfig extends BaseServerConfig {
  type: "sse" | "url";
  url: string;
  headers?: Record<string, string>;
}

export type ServerConfig = StdioServerConfig | HttpServerConfig;

export interface McpConfigFile {
  mcpServers: Record<string, ServerConfig>;
}

export interface ResolvedConfig {
  /** Insertion order is registry precedence. */
  servers: Record<string, ServerConfig>;
  /** Config file paths that were successfully loaded (for diagnostics). */
  configSources?: string[];
}

export function isStdioConfig(
  config: ServerConfig,
): config is StdioServerConfig {
  return config.type === "stdio" || config.type === undefined;
}

export function isHttpConfig(config: ServerConfig): config is HttpServerConfig {
  return config.type === "sse" || config.type === "url";
}

export function isEnabled(config: ServerConfig): boolean {
  return config.enabled !== false;
}
