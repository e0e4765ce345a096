/**
 * Owns one ServerSession per configured server and the registry built from
 * them. Error isolation: a server that cannot be reached only loses its own
 * tools; discovery of the others proceeds concurrently.
 */

import type { ResolvedConfig, ServerConfig } from "../config/types";
import { isEnabled } from "../config/types";
import { ServerSession, type SessionTimeouts } from "./server-session";
import { retryWithBackoff, type RetryOptions } from "./retry";
import type {
  ResourceContent,
  ServerResource,
  ServerStatus,
  ToolInvocation,
  ToolResult,
} from "./types";
import { createToolDescriptor, type ToolDescriptor } from "../registry/descriptor";
import { type ServerCatalog, ToolRegistry } from "../registry/tool-registry";
import { filterTools } from "../util/glob";
import {
  ConnectionError,
  errorMessage,
  ToolExecutionError,
  toToolrouteError,
  ValidationError,
} from "../util/errors";
import { error as logError, log, warn } from "../util/logger";

export interface ConnectionManagerOptions {
  retry?: RetryOptions;
  connectTimeoutMs?: number;
  callTimeoutMs?: number;
}

const DEFAULT_TIMEOUTS: SessionTimeouts = {
  connectTimeoutMs: 10_000,
  callTimeoutMs: 300_000,
};

function textOf(payload: { content: Array<{ text?: string; }>; }): string {
  return payload.content
    .map(c => c.text ?? "")
    .filter(Boolean)
    .join("\n");
}

export class ConnectionManager {
  private config: ResolvedConfig;
  private sessions = new Map<string, ServerSession>();
  private catalogs = new Map<string, ToolDescriptor[]>();
  private _registry: ToolRegistry = ToolRegistry.empty();
  private retry: RetryOptions;
  private timeouts: SessionTimeouts;
  private discovery: Promise<ToolRegistry> | null = null;

  constructor(config: ResolvedConfig, options: ConnectionManagerOptions = {}) {
    this.config = config;
    this.retry = options.retry ?? {};
    this.timeouts = {
      connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_TIMEOUTS.connectTimeoutMs,
      callTimeoutMs: options.callTimeoutMs ?? DEFAULT_TIMEOUTS.callTimeoutMs,
    };
  }

  get configSources(): string[] {
    return this.config.configSources ?? [];
  }

  /** Current snapshot. Replaced, never mutated, by (re)discovery. */
  get registry(): ToolRegistry {
    return this._registry;
  }

  /**
   * Establish a session, retrying Connection/Protocol errors with backoff.
   * Resolves with the session either way; a session that exhausted its
   * attempts is `failed` and carries the last error.
   */
  async connect(serverId: string, serverConfig: ServerConfig): Promise<ServerSession> {
    const existing = this.sessions.get(serverId);
    if (existing) await existing.close();

    const session = new ServerSession(serverId, serverConfig, this.timeouts);
    this.sessions.set(serverId, session);
    await this.establish(session);
    return session;
  }

  private async establish(session: ServerSession): Promise<void> {
    try {
      const tools = await retryWithBackoff(
        `Connecting to ${session.serverId}`,
        async () => {
          await session.open();
          try {
            return await this.listTools(session);
          } catch (err) {
            await session.close();
            throw err;
          }
        },
        this.retry,
      );
      this.catalogs.set(session.serverId, tools);
      log(`${session.serverId}: ready with ${tools.length} tools`);
    } catch (err) {
      const failure = toToolrouteError(err, "connection");
      session.fail(failure);
      this.catalogs.delete(session.serverId);
      logError(`Giving up on ${session.serverId}: ${failure.message}`);
    }
  }

  /** Live catalog of one session, after the server's allowed/blocked filter. */
  async listTools(session: ServerSession): Promise<ToolDescriptor[]> {
    const tools = filterTools(await session.listTools(), session.config.tools);
    if (tools.length === 0) {
      warn(`${session.serverId}: connected but offers no tools`);
    }
    return tools.map(tool => createToolDescriptor(session.serverId, tool));
  }

  /**
   * Invoke a tool. Never throws: every error becomes a Failure outcome.
   * A session that is not ready fails immediately without queueing.
   */
  async invoke(session: ServerSession, invocation: ToolInvocation): Promise<ToolResult> {
    const { correlationId, toolName } = invocation;

    if (!session.ready) {
      return {
        correlationId,
        outcome: {
          ok: false,
          kind: "connection",
          message: `Server ${session.serverId} is ${session.state}`,
        },
      };
    }

    try {
      const payload = await session.callTool(toolName, invocation.arguments);
      if (payload.isError) {
        const err = new ToolExecutionError(
          textOf(payload) || `${toolName} reported an error`,
        );
        return {
          correlationId,
          outcome: { ok: false, kind: err.kind, message: err.message },
        };
      }
      return { correlationId, outcome: { ok: true, payload } };
    } catch (err) {
      const failure = toToolrouteError(err, "connection");
      warn(`${session.serverId}/${toolName} failed: ${failure.message}`);
      return {
        correlationId,
        outcome: { ok: false, kind: failure.kind, message: failure.message },
      };
    }
  }

  async disconnect(session: ServerSession): Promise<void> {
    await session.close();
    if (this.sessions.get(session.serverId) === session) {
      this.sessions.delete(session.serverId);
      this.catalogs.delete(session.serverId);
    }
    log(`Disconnected server: ${session.serverId}`);
  }

  session(serverId: string): ServerSession | undefined {
    return this.sessions.get(serverId);
  }

  /** Initial discovery; same transition as rediscover() with the current config. */
  discover(): Promise<ToolRegistry> {
    return this.rediscover();
  }

  /**
   * Explicit re-discovery. Ready sessions with unchanged config are kept and
   * re-listed; everything else gets a fresh bounded connect. Servers no
   * longer configured (or disabled) are disconnected. The registry is
   * swapped in one assignment at the end. Overlapping calls share one run.
   */
  rediscover(config?: ResolvedConfig): Promise<ToolRegistry> {
    if (this.discovery) {
      if (config) {
        return this.discovery.then(() => this.rediscover(config));
      }
      return this.discovery;
    }

    const run = this.runDiscovery(config ?? this.config).finally(() => {
      this.discovery = null;
    });
    this.discovery = run;
    return run;
  }

  private async runDiscovery(config: ResolvedConfig): Promise<ToolRegistry> {
    const previous = this.config;
    this.config = config;

    const wanted = Object.entries(config.servers).filter(([, c]) => isEnabled(c));
    const wantedIds = new Set(wanted.map(([id]) => id));

    for (const [serverId, session] of [...this.sessions]) {
      if (!wantedIds.has(serverId)) await this.disconnect(session);
    }

    log(`Discovering tools on ${wanted.length} servers...`);
    await Promise.allSettled(
      wanted.map(async ([serverId, serverConfig]) => {
        const session = this.sessions.get(serverId);
        const unchanged = JSON.stringify(previous.servers[serverId]) === JSON.stringify(serverConfig);

        if (session?.ready && unchanged) {
          try {
            this.catalogs.set(serverId, await this.listTools(session));
            return;
          } catch (err) {
            warn(`Re-listing ${serverId} failed, reconnecting: ${errorMessage(err)}`);
          }
        }
        await this.connect(serverId, serverConfig);
      }),
    );

    const catalogs: ServerCatalog[] = [];
    for (const [serverId] of wanted) {
      const session = this.sessions.get(serverId);
      const tools = this.catalogs.get(serverId);
      if (session?.ready && tools) catalogs.push({ serverId, tools });
    }

    const registry = ToolRegistry.build(catalogs);
    this._registry = registry;
    log(
      `Registry: ${registry.size} tools from ${catalogs.length}/${wanted.length} servers`,
    );
    return registry;
  }

  status(): ServerStatus[] {
    return Object.entries(this.config.servers)
      .filter(([, c]) => isEnabled(c))
      .map(([serverId]) => {
        const session = this.sessions.get(serverId);
        const status: ServerStatus = {
          serverId,
          state: session?.state ?? "disconnected",
          toolCount: session?.ready ? this.catalogs.get(serverId)?.length ?? 0 : 0,
        };
        if (session?.lastError) status.lastError = session.lastError.message;
        return status;
      });
  }

  serverConfig(serverId: string): ServerConfig | undefined {
    return this.config.servers[serverId];
  }

  disabledServers(): string[] {
    return Object.entries(this.config.servers)
      .filter(([, c]) => !isEnabled(c))
      .map(([serverId]) => serverId);
  }

  /**
   * Flip one server's `enabled` flag for the rest of this run and rediscover.
   * Config files on disk are left untouched.
   */
  setEnabled(serverId: string, enabled: boolean): Promise<ToolRegistry> {
    const current = this.config.servers[serverId];
    if (!current) {
      return Promise.reject(new ValidationError(`Unknown server: ${serverId}`));
    }
    if (isEnabled(current) === enabled) return Promise.resolve(this._registry);

    log(`${enabled ? "Enabling" : "Disabling"} server: ${serverId}`);
    return this.rediscover({
      ...this.config,
      servers: { ...this.config.servers, [serverId]: { ...current, enabled } },
    });
  }

  /**
   * Resources of every ready session (or of one), in config order. A server
   * whose listing fails is skipped with a warning.
   */
  async listResources(serverId?: string): Promise<ServerResource[]> {
    const sessions = Object.keys(this.config.servers)
      .filter(id => serverId === undefined || id === serverId)
      .map(id => this.sessions.get(id))
      .filter((s): s is ServerSession => s?.ready === true);

    const settled = await Promise.allSettled(
      sessions.map(async session =>
        (await session.listResources()).map(r => ({ serverId: session.serverId, ...r }))
      ),
    );

    const resources: ServerResource[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") {
        resources.push(...outcome.value);
      } else {
        warn(`Listing resources on ${sessions[i]?.serverId}: ${errorMessage(outcome.reason)}`);
      }
    });
    return resources;
  }

  /** Rejects with a ToolrouteError; a session that is not ready fails fast. */
  async readResource(serverId: string, uri: string): Promise<ResourceContent[]> {
    const session = this.sessions.get(serverId);
    if (!session?.ready) {
      throw new ConnectionError(
        session
          ? `Server ${serverId} is ${session.state}`
          : `Server ${serverId} is not connected`,
      );
    }
    return session.readResource(uri);
  }

  async closeAll(): Promise<void> {
    log("Shutting down all server connections...");
    await Promise.allSettled(
      [...this.sessions.values()].map(session => session.close()),
    );
    this.sessions.clear();
    this.catalogs.clear();
    this._registry = ToolRegistry.empty();
  }
}
