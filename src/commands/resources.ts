/**
 * `toolroute resources` command: list MCP resources, or read one.
 */

import type { Command } from "commander";
import { addServerOptions, createManager, type ServerOptions } from "./common";
import { formatResourceContents, formatResourceList } from "../shell/formatter";

export function registerResourcesCommand(program: Command): void {
  addServerOptions(
    program
      .command("resources")
      .description("List resources the configured servers expose, or read one")
      .argument("[server]", "Only this server")
      .argument("[uri]", "Read this resource from <server>"),
  )
    .option("--json", "Output as JSON")
    .action(
      async (
        serverId: string | undefined,
        uri: string | undefined,
        options: ServerOptions & { json?: boolean; },
      ) => {
        const { manager } = await createManager(options);
        try {
          await manager.discover();
          if (serverId && uri) {
            const contents = await manager.readResource(serverId, uri);
            console.log(
              options.json ? JSON.stringify(contents, null, 2) : formatResourceContents(contents),
            );
            return;
          }
          const resources = await manager.listResources(serverId);
          console.log(
            options.json ? JSON.stringify(resources, null, 2) : formatResourceList(resources),
          );
        } finally {
          await manager.closeAll();
        }
      },
    );
}
