/**
 * Immutable snapshot of every tool offered by the ready sessions.
 *
 * One flat namespace: when two servers offer the same tool name, the server
 * registered first keeps it and the duplicate is recorded as a conflict.
 * Re-discovery builds a new snapshot; nothing mutates an existing one.
 */

import type { ToolDescriptor } from "./descriptor";
import { warn } from "../util/logger";

export interface ToolConflict {
  name: string;
  keptServer: string;
  shadowedServer: string;
}

export interface ServerCatalog {
  serverId: string;
  tools: ToolDescriptor[];
}

export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolDescriptor>;
  readonly conflicts: readonly ToolConflict[];

  private constructor(
    tools: Map<string, ToolDescriptor>,
    conflicts: ToolConflict[],
  ) {
    this.tools = tools;
    this.conflicts = Object.freeze(conflicts);
  }

  static empty(): ToolRegistry {
    return new ToolRegistry(new Map(), []);
  }

  /** Catalogs are taken in order; earlier servers win name collisions. */
  static build(catalogs: ServerCatalog[]): ToolRegistry {
    const tools = new Map<string, ToolDescriptor>();
    const conflicts: ToolConflict[] = [];

    for (const { serverId, tools: descriptors } of catalogs) {
      for (const descriptor of descriptors) {
        const existing = tools.get(descriptor.name);
        if (existing) {
          conflicts.push({
            name: descriptor.name,
            keptServer: existing.serverId,
            shadowedServer: serverId,
          });
          warn(
            `Tool name conflict: "${descriptor.name}" from ${serverId} is shadowed by ${existing.serverId}`,
          );
          continue;
        }
        tools.set(descriptor.name, descriptor);
      }
    }

    return new ToolRegistry(tools, conflicts);
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  byServer(): Map<string, ToolDescriptor[]> {
    const grouped = new Map<string, ToolDescriptor[]>();
    for (const tool of this.tools.values()) {
      const group = grouped.get(tool.serverId);
      if (group) {
        group.push(tool);
      } else {
        grouped.set(tool.serverId, [tool]);
      }
    }
    return grouped;
  }

  get size(): number {
    return this.tools.size;
  }

  get isEmpty(): boolean {
    return this.tools.size === 0;
  }
}
