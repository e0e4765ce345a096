/**
 * One live connection to a single MCP server, wrapping the SDK Client.
 *
 * Requests on a session are serialized: at most one call is in flight,
 * and a caller whose deadline passes while queued never reaches the wire.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import {
  getDefaultEnvironment,
  StdioClientTransport,
} from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { ServerConfig } from "../config/types";
import { isHttpConfig, isStdioConfig } from "../config/types";
import type {
  CallToolPayload,
  ResourceContent,
  ResourceInfo,
  SessionState,
  ToolInfo,
} from "./types";
import {
  ConnectionError,
  errorMessage,
  ProtocolError,
  TimeoutError,
  ToolExecutionError,
  ToolrouteError,
} from "../util/errors";
import { withTimeout } from "../util/timeout";
import { isVerbose, log, warn } from "../util/logger";

const CLIENT_VERSION = "0.1.0";

const callToolPayloadSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .default([]),
  structuredContent: z.record(z.string(), z.unknown()).optional(),
  isError: z.boolean().optional(),
});

const readResourceSchema = z.object({
  contents: z.array(
    z.object({
      uri: z.string(),
      mimeType: z.string().optional(),
      text: z.string().optional(),
      blob: z.string().optional(),
    }),
  ),
});

export interface SessionTimeouts {
  connectTimeoutMs: number;
  callTimeoutMs: number;
}

/** Map a failed handshake or discovery attempt onto a recoverable error kind. */
export function classifyConnectError(err: unknown): ToolrouteError {
  if (err instanceof ToolrouteError) {
    return err.kind === "timeout"
      ? new ConnectionError(err.message, err)
      : err;
  }
  if (err instanceof McpError) {
    if (
      err.code === ErrorCode.ConnectionClosed
      || err.code === ErrorCode.RequestTimeout
    ) {
      return new ConnectionError(err.message, err);
    }
    return new ProtocolError(err.message, err);
  }
  if (err instanceof z.ZodError) {
    return new ProtocolError(`Malformed server response: ${err.message}`, err);
  }
  const message = errorMessage(err);
  if (/protocol version/i.test(message)) {
    return new ProtocolError(message, err);
  }
  return new ConnectionError(message, err);
}

/** Map a failed tools/call onto an error kind. */
export function classifyCallError(err: unknown): ToolrouteError {
  if (err instanceof ToolrouteError) return err;
  if (err instanceof McpError) {
    if (err.code === ErrorCode.RequestTimeout) {
      return new TimeoutError(err.message);
    }
    if (err.code === ErrorCode.ConnectionClosed) {
      return new ConnectionError(err.message, err);
    }
    return new ToolExecutionError(err.message, err);
  }
  if (err instanceof z.ZodError) {
    return new ProtocolError(`Malformed tool result: ${err.message}`, err);
  }
  return new ConnectionError(errorMessage(err), err);
}

export class ServerSession {
  readonly serverId: string;
  readonly config: ServerConfig;
  private timeouts: SessionTimeouts;
  private client: Client | null = null;
  private _state: SessionState = "disconnected";
  private _lastError?: ToolrouteError;
  private closing = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(serverId: string, config: ServerConfig, timeouts: SessionTimeouts) {
    this.serverId = serverId;
    this.config = config;
    this.timeouts = timeouts;
  }

  get state(): SessionState {
    return this._state;
  }

  get lastError(): ToolrouteError | undefined {
    return this._lastError;
  }

  get ready(): boolean {
    return this._state === "ready";
  }

  /** A single handshake attempt. Retry policy lives in the ConnectionManager. */
  async open(): Promise<void> {
    if (this.client) await this.dispose();

    this._state = "connecting";
    this.closing = false;
    log(`Connecting to server: ${this.serverId}`);

    const client = new Client(
      { name: `toolroute-${this.serverId}`, version: CLIENT_VERSION },
      { capabilities: {} },
    );
    this.client = client;

    try {
      await withTimeout(
        signal => client.connect(this.createTransport(), { signal }),
        this.timeouts.connectTimeoutMs,
        `Connecting to ${this.serverId}`,
      );
    } catch (err) {
      const classified = classifyConnectError(err);
      await this.dispose();
      this.fail(classified);
      throw classified;
    }

    client.onclose = () => {
      if (this.closing || this.client !== client) return;
      warn(`${this.serverId}: transport closed unexpectedly`);
      this.client = null;
      this._state = "disconnected";
      this._lastError = new ConnectionError(`${this.serverId} closed the connection`);
    };

    this._state = "ready";
    this._lastError = undefined;
    log(`Connected to ${this.serverId}`);
  }

  private createTransport():
    | StdioClientTransport
    | StreamableHTTPClientTransport
    | SSEClientTransport
  {
    if (isStdioConfig(this.config)) {
      return new StdioClientTransport({
        command: this.config.command,
        args: this.config.args,
        env: { ...getDefaultEnvironment(), ...this.config.env },
        cwd: this.config.cwd,
        stderr: isVerbose() ? "inherit" : "ignore",
      });
    }

    if (isHttpConfig(this.config)) {
      const url = new URL(this.config.url);
      const requestInit = this.config.headers
        ? { headers: this.config.headers }
        : undefined;

      if (this.config.type === "sse") {
        return new SSEClientTransport(url, { requestInit });
      }

      // "url" speaks Streamable HTTP
      return new StreamableHTTPClientTransport(url, { requestInit });
    }

    throw new ProtocolError(`Unknown server config type for ${this.serverId}`);
  }

  /** Fetch the full tool catalog, following pagination cursors. */
  async listTools(): Promise<ToolInfo[]> {
    const client = this.requireReady();

    return this.serialize(() =>
      withTimeout(
        async signal => {
          const tools: ToolInfo[] = [];
          let cursor: string | undefined;
          do {
            const page = await client.listTools(cursor ? { cursor } : undefined, {
              signal,
              timeout: this.timeouts.connectTimeoutMs,
            });
            for (const t of page.tools) {
              tools.push({
                name: t.name,
                description: t.description,
                inputSchema: { ...t.inputSchema },
              });
            }
            cursor = page.nextCursor;
          } while (cursor);
          return tools;
        },
        this.timeouts.connectTimeoutMs,
        `Listing tools on ${this.serverId}`,
      )
    ).catch(err => {
      throw classifyConnectError(err);
    });
  }

  /** Resources the server advertises; empty when it has no resources capability. */
  async listResources(): Promise<ResourceInfo[]> {
    const client = this.requireReady();
    if (!client.getServerCapabilities()?.resources) return [];

    return this.serialize(() =>
      withTimeout(
        async signal => {
          const resources: ResourceInfo[] = [];
          let cursor: string | undefined;
          do {
            const page = await client.listResources(cursor ? { cursor } : undefined, {
              signal,
              timeout: this.timeouts.connectTimeoutMs,
            });
            for (const r of page.resources) {
              resources.push({
                uri: r.uri,
                name: r.name,
                description: r.description,
                mimeType: r.mimeType,
              });
            }
            cursor = page.nextCursor;
          } while (cursor);
          return resources;
        },
        this.timeouts.connectTimeoutMs,
        `Listing resources on ${this.serverId}`,
      )
    ).catch(err => {
      throw classifyCallError(err);
    });
  }

  async readResource(uri: string): Promise<ResourceContent[]> {
    const client = this.requireReady();
    const timeoutMs = this.timeouts.callTimeoutMs;

    return withTimeout(
      signal =>
        this.serialize(async () => {
          signal.throwIfAborted();
          log(`Reading ${uri} from ${this.serverId}`);
          const raw = await client.readResource({ uri }, { signal, timeout: timeoutMs });
          return readResourceSchema.parse(raw).contents;
        }),
      timeoutMs,
      `Reading ${uri} on ${this.serverId}`,
    ).catch(err => {
      throw classifyCallError(err);
    });
  }

  /**
   * Call one tool. Rejects with a ToolrouteError; a result flagged
   * `isError` by the server is returned as-is for the caller to judge.
   */
  async callTool(
    toolName: string,
    args: Record<string, unknown>,
    timeoutMs: number = this.timeouts.callTimeoutMs,
  ): Promise<CallToolPayload> {
    const client = this.requireReady();

    return withTimeout(
      signal =>
        this.serialize(async () => {
          signal.throwIfAborted();
          if (!this.ready) {
            throw new ConnectionError(`Server ${this.serverId} is ${this._state}`);
          }
          log(`Calling ${this.serverId}/${toolName}`);
          const raw = await client.callTool(
            { name: toolName, arguments: args },
            undefined,
            { signal, timeout: timeoutMs },
          );
          return callToolPayloadSchema.parse(raw);
        }),
      timeoutMs,
      `Tool ${toolName} on ${this.serverId}`,
    ).catch(err => {
      throw classifyCallError(err);
    });
  }

  fail(err: ToolrouteError): void {
    this._state = "failed";
    this._lastError = err;
  }

  async close(): Promise<void> {
    await this.dispose();
    if (this._state !== "failed") this._state = "disconnected";
  }

  private async dispose(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) return;

    this.closing = true;
    try {
      await client.close();
      log(`Closed server: ${this.serverId}`);
    } catch (err) {
      warn(`Error closing ${this.serverId}: ${errorMessage(err)}`);
    }
  }

  private requireReady(): Client {
    if (!this.ready || !this.client) {
      throw new ConnectionError(`Server ${this.serverId} is ${this._state}`);
    }
    return this.client;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The queue only tracks completion; failures reach the caller through `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
