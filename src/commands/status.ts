/**
 * `toolroute status` command: connect to every configured server once and
 * report its state and tool count.
 */

import type { Command } from "commander";
import { addServerOptions, createManager, type ServerOptions } from "./common";
import type { ConnectionManager } from "../session/connection-manager";
import type { ServerStatus } from "../session/types";
import type { ToolConflict } from "../registry/tool-registry";
import { STATE_ICONS } from "../shell/formatter";
import { log } from "../util/logger";

const ENV_KEYS = ["ANTHROPIC_API_KEY"] as const;

export interface StatusResult {
  servers: ServerStatus[];
  toolCount: number;
  conflicts: ToolConflict[];
  env: Record<string, boolean>;
  configSources: string[];
}

export async function collectStatus(
  manager: ConnectionManager,
  configSources: string[] = [],
  env: Record<string, string | undefined> = process.env,
): Promise<StatusResult> {
  const registry = await manager.discover();

  const envStatus: Record<string, boolean> = {};
  for (const key of ENV_KEYS) {
    envStatus[key] = !!env[key];
  }

  return {
    servers: manager.status(),
    toolCount: registry.size,
    conflicts: [...registry.conflicts],
    env: envStatus,
    configSources,
  };
}

/** Healthy means at least one server and every one of them ready. */
export function isHealthy(result: StatusResult): boolean {
  return result.servers.length > 0
    && result.servers.every(s => s.state === "ready");
}

export function formatStatus(result: StatusResult): string {
  const lines: string[] = [];

  lines.push("╭─── toolroute status ───╮");
  lines.push("");

  if (result.configSources.length === 0) {
    lines.push("  Config: none (no .mcp.json found)");
  } else {
    lines.push("  Config:");
    for (const src of result.configSources) {
      lines.push(`    ${src}`);
    }
  }
  lines.push("");

  lines.push("  Servers:");
  if (result.servers.length === 0) {
    lines.push("    (none configured)");
  }
  for (const s of result.servers) {
    const detail = s.state === "ready" ? `${s.toolCount} tools` : s.lastError ?? s.state;
    lines.push(`    ${STATE_ICONS[s.state]} ${s.serverId.padEnd(20)} ${detail}`);
  }
  lines.push("");

  if (result.conflicts.length > 0) {
    lines.push("  Shadowed tools:");
    for (const c of result.conflicts) {
      lines.push(`    ${c.name} from ${c.shadowedServer} (kept ${c.keptServer})`);
    }
    lines.push("");
  }

  lines.push("  Environment:");
  for (const [key, set] of Object.entries(result.env)) {
    lines.push(`    ${set ? "✅" : "⬜"} ${key}`);
  }
  lines.push("");

  const readyCount = result.servers.filter(s => s.state === "ready").length;
  lines.push(
    `  Summary: ${readyCount}/${result.servers.length} servers, ${result.toolCount} tools`,
  );
  lines.push("");
  lines.push("╰────────────────────────╯");

  return lines.join("\n");
}

export function registerStatusCommand(program: Command): void {
  addServerOptions(
    program
      .command("status")
      .description("Health check for all configured MCP servers"),
  )
    .option("--json", "Output as JSON")
    .action(async (options: ServerOptions & { json?: boolean; }) => {
      log("Running health check...");
      const { manager } = await createManager(options);
      let result: StatusResult;
      try {
        result = await collectStatus(manager, manager.configSources);
      } finally {
        await manager.closeAll();
      }

      console.log(options.json ? JSON.stringify(result, null, 2) : formatStatus(result));
      process.exitCode = isHealthy(result) ? 0 : 1;
    });
}
