/**
 * ANSI pretty-printing for terminal output.
 */

import type { QueryResponse } from "../dispatch/dispatcher";
import type { ToolRegistry } from "../registry/tool-registry";
import type {
  ResourceContent,
  ServerResource,
  ServerStatus,
  SessionState,
} from "../session/types";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const RED = "\x1b[31m";

export function bold(text: string): string {
  return `${BOLD}${text}${RESET}`;
}

export function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

export function yellow(text: string): string {
  return `${YELLOW}${text}${RESET}`;
}

export function cyan(text: string): string {
  return `${CYAN}${text}${RESET}`;
}

export function red(text: string): string {
  return `${RED}${text}${RESET}`;
}

export function formatToolList(
  tools: Array<{ name: string; description?: string; }>,
): string {
  if (tools.length === 0) return dim("  (no tools)");

  const maxNameLen = Math.max(...tools.map(t => t.name.length));
  return tools
    .map(t => {
      const padded = t.name.padEnd(maxNameLen + 2);
      return `  ${cyan(padded)}${dim(t.description ?? "")}`;
    })
    .join("\n");
}

/** The catalog grouped by owning server, followed by any shadowed names. */
export function formatCatalog(registry: ToolRegistry): string {
  if (registry.isEmpty) return dim("(no tools available)");

  const sections: string[] = [];
  for (const [serverId, tools] of registry.byServer()) {
    sections.push(`${bold(serverId)} ${dim(`(${tools.length})`)}\n${formatToolList(tools)}`);
  }

  if (registry.conflicts.length > 0) {
    const lines = registry.conflicts.map(c =>
      `  ${yellow(c.name)} from ${c.shadowedServer} ${dim(`(kept ${c.keptServer})`)}`
    );
    sections.push(`${yellow("Shadowed tools:")}\n${lines.join("\n")}`);
  }

  return sections.join("\n\n");
}

export function formatResourceList(resources: ServerResource[]): string {
  if (resources.length === 0) return dim("(no resources available)");

  const byServer = new Map<string, ServerResource[]>();
  for (const r of resources) {
    const list = byServer.get(r.serverId) ?? [];
    list.push(r);
    byServer.set(r.serverId, list);
  }

  return [...byServer]
    .map(([serverId, list]) => {
      const lines = list.map(r => {
        const description = r.description ? dim(` - ${r.description}`) : "";
        return `  ${cyan(r.uri)} ${r.name}${description}`;
      });
      return `${bold(serverId)} ${dim(`(${list.length})`)}\n${lines.join("\n")}`;
    })
    .join("\n\n");
}

/** Text contents verbatim; binary contents as a one-line placeholder. */
export function formatResourceContents(contents: ResourceContent[]): string {
  if (contents.length === 0) return dim("(empty resource)");

  return contents
    .map(c =>
      c.text ?? dim(`[binary ${c.mimeType ?? "data"}, ${c.blob?.length ?? 0} base64 chars]`)
    )
    .join("\n");
}

export const STATE_ICONS: Record<SessionState, string> = {
  ready: "✅",
  connecting: "⏳",
  disconnected: "⬜",
  failed: "❌",
};

export function formatServerStatus(servers: ServerStatus[]): string {
  if (servers.length === 0) return dim("  (no servers configured)");

  return servers
    .map(s => {
      const detail = s.state === "ready"
        ? `${s.toolCount} tools`
        : s.lastError ?? s.state;
      return `  ${STATE_ICONS[s.state]} ${s.serverId.padEnd(20)} ${detail}`;
    })
    .join("\n");
}

export function formatResponse(response: QueryResponse): string {
  const header = response.toolUsed
    ? dim(`[${response.toolUsed.serverId}/${response.toolUsed.name}]`) + "\n"
    : "";

  if (response.failure) {
    const hint = response.failure.retryable ? dim("\n(type /retry to try again)") : "";
    return `${header}${formatError(response.answerText)}${hint}`;
  }
  return `${header}${response.answerText}`;
}

export function formatError(message: string): string {
  return `${red("Error:")} ${message}`;
}
