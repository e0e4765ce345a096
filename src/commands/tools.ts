/**
 * `toolroute tools` command: print the merged tool catalog.
 */

import type { Command } from "commander";
import { addServerOptions, createManager, type ServerOptions } from "./common";
import type { ToolRegistry } from "../registry/tool-registry";
import { formatCatalog } from "../shell/formatter";

export interface CatalogEntry {
  name: string;
  serverId: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export function catalogEntries(registry: ToolRegistry): CatalogEntry[] {
  return registry.list().map(t => ({
    name: t.name,
    serverId: t.serverId,
    description: t.description,
    inputSchema: t.inputSchema,
  }));
}

export function registerToolsCommand(program: Command): void {
  addServerOptions(
    program
      .command("tools")
      .description("List every tool the configured servers offer"),
  )
    .option("--json", "Output as JSON")
    .action(async (options: ServerOptions & { json?: boolean; }) => {
      const { manager } = await createManager(options);
      try {
        const registry = await manager.discover();
        console.log(
          options.json
            ? JSON.stringify(catalogEntries(registry), null, 2)
            : formatCatalog(registry),
        );
      } finally {
        await manager.closeAll();
      }
    });
}
