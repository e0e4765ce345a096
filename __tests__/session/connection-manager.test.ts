import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ServerConfig } from "../../src/config/types.js";
import type { SessionTimeouts } from "../../src/session/server-session.js";
import type { ToolrouteError } from "../../src/util/errors.js";

const mockOpen = vi.hoisted(() => vi.fn());
const mockListTools = vi.hoisted(() => vi.fn());
const mockCallTool = vi.hoisted(() => vi.fn());
const mockClose = vi.hoisted(() => vi.fn());
const mockListResources = vi.hoisted(() => vi.fn());
const mockReadResource = vi.hoisted(() => vi.fn());
const created = vi.hoisted((): string[] => []);

vi.mock("../../src/session/server-session.js", async () => {
  const { withTimeout } = await import("../../src/util/timeout.js");
  return {
    ServerSession: class FakeSession {
      serverId: string;
      config: ServerConfig;
      timeouts: SessionTimeouts;
      state = "disconnected";
      lastError?: ToolrouteError;

      constructor(serverId: string, config: ServerConfig, timeouts: SessionTimeouts) {
        this.serverId = serverId;
        this.config = config;
        this.timeouts = timeouts;
        created.push(serverId);
      }

      get ready(): boolean {
        return this.state === "ready";
      }

      async open(): Promise<void> {
        this.state = "connecting";
        try {
          await withTimeout(
            () => mockOpen(this.serverId),
            this.timeouts.connectTimeoutMs,
            `Connecting to ${this.serverId}`,
          );
          this.state = "ready";
        } catch (err) {
          this.state = "failed";
          throw err;
        }
      }

      listTools(): Promise<unknown> {
        return mockListTools(this.serverId);
      }

      callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
        return mockCallTool(this.serverId, name, args);
      }

      listResources(): Promise<unknown> {
        return mockListResources(this.serverId);
      }

      readResource(uri: string): Promise<unknown> {
        return mockReadResource(this.serverId, uri);
      }

      fail(err: ToolrouteError): void {
        this.state = "failed";
        this.lastError = err;
      }

      async close(): Promise<void> {
        mockClose(this.serverId);
        if (this.state !== "failed") this.state = "disconnected";
      }
    },
  };
});

import { ConnectionManager } from "../../src/session/connection-manager.js";
import {
  ConnectionError,
  ProtocolError,
  TimeoutError,
  ValidationError,
} from "../../src/util/errors.js";
import * as logger from "../../src/util/logger.js";

const CATALOGS: Record<string, Array<{ name: string; inputSchema: Record<string, unknown>; }>> = {
  calc: [
    { name: "add", inputSchema: { type: "object" } },
    { name: "subtract", inputSchema: { type: "object" } },
  ],
  backup: [
    { name: "add", inputSchema: { type: "object" } },
    { name: "multiply", inputSchema: { type: "object" } },
  ],
  weather: [{ name: "forecast", inputSchema: { type: "object" } }],
};

const RETRY = { maxAttempts: 2, initialDelayMs: 0 };

function manager(servers: Record<string, ServerConfig>): ConnectionManager {
  return new ConnectionManager({ servers }, { retry: RETRY });
}

describe("ConnectionManager", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    created.length = 0;
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    vi.spyOn(logger, "error").mockImplementation(() => {});
    mockOpen.mockResolvedValue(undefined);
    mockListTools.mockImplementation(async (serverId: string) => CATALOGS[serverId] ?? []);
    mockCallTool.mockResolvedValue({ content: [{ type: "text", text: "42" }] });
    mockListResources.mockResolvedValue([]);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("discover", () => {
    it("builds one registry from every ready server in config order", async () => {
      const m = manager({
        calc: { command: "calc" },
        backup: { command: "backup" },
      });

      const registry = await m.discover();

      expect(registry.names()).toEqual(["add", "subtract", "multiply"]);
      expect(registry.get("add")?.serverId).toBe("calc");
      expect(registry.conflicts).toEqual([
        { name: "add", keptServer: "calc", shadowedServer: "backup" },
      ]);
      expect(m.registry).toBe(registry);
    });

    it("excludes a server that keeps failing and keeps the others", async () => {
      mockOpen.mockImplementation(async (serverId: string) => {
        if (serverId === "weather") throw new ConnectionError("ECONNREFUSED");
      });
      const m = manager({ weather: { type: "url", url: "https://example.com/mcp" }, calc: { command: "calc" } });

      const registry = await m.discover();

      expect(registry.names()).toEqual(["add", "subtract"]);
      expect(mockOpen.mock.calls.filter(([id]) => id === "weather")).toHaveLength(2);
      expect(m.status()).toEqual([
        { serverId: "weather", state: "failed", toolCount: 0, lastError: "ECONNREFUSED" },
        { serverId: "calc", state: "ready", toolCount: 2 },
      ]);
      expect(logger.error).toHaveBeenCalledWith("Giving up on weather: ECONNREFUSED");
    });

    it("does not retry errors that are not retryable", async () => {
      mockOpen.mockRejectedValue(new ValidationError("bad config"));
      const m = manager({ calc: { command: "calc" } });

      await m.discover();

      expect(mockOpen).toHaveBeenCalledTimes(1);
      expect(m.status()[0]?.state).toBe("failed");
    });

    it("retries when listing tools fails after the handshake", async () => {
      mockListTools
        .mockRejectedValueOnce(new ProtocolError("malformed tools/list"))
        .mockImplementation(async (serverId: string) => CATALOGS[serverId] ?? []);
      const m = manager({ calc: { command: "calc" } });

      const registry = await m.discover();

      expect(registry.size).toBe(2);
      expect(mockOpen).toHaveBeenCalledTimes(2);
      expect(mockClose).toHaveBeenCalledWith("calc");
    });

    it("applies per-server tool filters", async () => {
      const m = manager({ calc: { command: "calc", tools: { blocked: ["sub*"] } } });
      expect((await m.discover()).names()).toEqual(["add"]);
    });

    it("skips disabled servers", async () => {
      const m = manager({ calc: { command: "calc", enabled: false }, weather: { command: "w" } });

      const registry = await m.discover();

      expect(registry.names()).toEqual(["forecast"]);
      expect(created).toEqual(["weather"]);
      expect(m.status().map(s => s.serverId)).toEqual(["weather"]);
    });

    it("does not let a server that hangs at the handshake hold up the others", async () => {
      vi.useFakeTimers();
      mockOpen.mockImplementation((serverId: string) =>
        serverId === "slow" ? new Promise(() => {}) : Promise.resolve()
      );
      const m = new ConnectionManager(
        { servers: { slow: { command: "slow" }, calc: { command: "calc" } } },
        { retry: RETRY, connectTimeoutMs: 500 },
      );

      const discovery = m.discover();
      await vi.advanceTimersByTimeAsync(499);

      expect(m.session("calc")?.state).toBe("ready");
      expect(m.session("slow")?.state).toBe("connecting");
      expect(m.registry.isEmpty).toBe(true);

      await vi.advanceTimersByTimeAsync(1000);
      const registry = await discovery;

      expect(registry.names()).toEqual(["add", "subtract"]);
      expect(m.registry).toBe(registry);
      expect(m.status()).toEqual([
        {
          serverId: "slow",
          state: "failed",
          toolCount: 0,
          lastError: "Connecting to slow timed out after 500ms",
        },
        { serverId: "calc", state: "ready", toolCount: 2 },
      ]);
      expect(mockOpen.mock.calls.filter(([id]) => id === "slow")).toHaveLength(2);
    });

    it("resolves with an empty registry when nothing is configured", async () => {
      const registry = await manager({}).discover();
      expect(registry.isEmpty).toBe(true);
    });
  });

  describe("rediscover", () => {
    it("reuses unchanged ready sessions and swaps in a new registry", async () => {
      const m = manager({ calc: { command: "calc" } });
      const first = await m.discover();
      const session = m.session("calc");

      const second = await m.rediscover();

      expect(second).not.toBe(first);
      expect(m.session("calc")).toBe(session);
      expect(created).toEqual(["calc"]);
      expect(first.names()).toEqual(["add", "subtract"]);
    });

    it("reconnects a failed server", async () => {
      mockOpen.mockRejectedValue(new ConnectionError("down"));
      const m = manager({ calc: { command: "calc" } });
      expect((await m.discover()).isEmpty).toBe(true);

      mockOpen.mockResolvedValue(undefined);
      const registry = await m.rediscover();

      expect(registry.names()).toEqual(["add", "subtract"]);
      expect(created).toEqual(["calc", "calc"]);
    });

    it("disconnects servers that left the config", async () => {
      const m = manager({ calc: { command: "calc" }, weather: { command: "w" } });
      await m.discover();

      const registry = await m.rediscover({ servers: { weather: { command: "w" } } });

      expect(registry.names()).toEqual(["forecast"]);
      expect(m.session("calc")).toBeUndefined();
      expect(mockClose).toHaveBeenCalledWith("calc");
    });

    it("keeps serving the complete old snapshot until the new one is ready", async () => {
      const m = manager({ calc: { command: "calc" }, weather: { command: "w" } });
      const before = await m.discover();

      let release: () => void = () => {};
      mockListTools.mockImplementation((serverId: string) =>
        serverId === "weather"
          ? new Promise(resolve => {
            release = () => resolve([{ name: "radar", inputSchema: { type: "object" } }]);
          })
          : Promise.resolve([{ name: "add", inputSchema: { type: "object" } }])
      );

      const running = m.rediscover();
      await new Promise(resolve => setTimeout(resolve, 0));

      expect(mockListTools).toHaveBeenCalledWith("weather");
      expect(m.registry).toBe(before);
      expect(m.registry.names()).toEqual(["add", "subtract", "forecast"]);

      release();
      const after = await running;

      expect(after.names()).toEqual(["add", "radar"]);
      expect(m.registry).toBe(after);
      expect(before.names()).toEqual(["add", "subtract", "forecast"]);
    });

    it("shares one run between overlapping calls", async () => {
      const m = manager({ calc: { command: "calc" } });
      const [a, b] = await Promise.all([m.rediscover(), m.rediscover()]);
      expect(a).toBe(b);
      expect(mockOpen).toHaveBeenCalledTimes(1);
    });
  });

  describe("invoke", () => {
    it("returns the payload on success", async () => {
      const m = manager({ calc: { command: "calc" } });
      await m.discover();
      const session = m.session("calc");
      if (!session) throw new Error("no session");

      const result = await m.invoke(session, {
        toolName: "add",
        arguments: { a: 25, b: 17 },
        correlationId: "req-1",
      });

      expect(result).toEqual({
        correlationId: "req-1",
        outcome: { ok: true, payload: { content: [{ type: "text", text: "42" }] } },
      });
      expect(mockCallTool).toHaveBeenCalledWith("calc", "add", { a: 25, b: 17 });
    });

    it("turns an isError result into a tool_execution failure", async () => {
      mockCallTool.mockResolvedValue({
        content: [{ type: "text", text: "division" }, { type: "text", text: "by zero" }],
        isError: true,
      });
      const m = manager({ calc: { command: "calc" } });
      await m.discover();
      const session = m.session("calc");
      if (!session) throw new Error("no session");

      const result = await m.invoke(session, { toolName: "divide", arguments: {}, correlationId: "req-2" });

      expect(result.outcome).toEqual({
        ok: false,
        kind: "tool_execution",
        message: "division\nby zero",
      });
    });

    it("keeps the kind of a thrown error", async () => {
      mockCallTool.mockRejectedValue(new TimeoutError("Tool add on calc timed out after 50ms"));
      const m = manager({ calc: { command: "calc" } });
      await m.discover();
      const session = m.session("calc");
      if (!session) throw new Error("no session");

      const result = await m.invoke(session, { toolName: "add", arguments: {}, correlationId: "req-3" });

      expect(result).toEqual({
        correlationId: "req-3",
        outcome: { ok: false, kind: "timeout", message: "Tool add on calc timed out after 50ms" },
      });
    });

    it("fails fast on a session that is not ready", async () => {
      mockOpen.mockRejectedValue(new ConnectionError("down"));
      const m = manager({ calc: { command: "calc" } });
      await m.discover();
      const session = m.session("calc");
      if (!session) throw new Error("no session");

      const result = await m.invoke(session, { toolName: "add", arguments: {}, correlationId: "req-4" });

      expect(result.outcome).toEqual({
        ok: false,
        kind: "connection",
        message: "Server calc is failed",
      });
      expect(mockCallTool).not.toHaveBeenCalled();
    });
  });

  describe("setEnabled", () => {
    it("disconnects a disabled server and reconnects it when enabled again", async () => {
      const m = manager({ calc: { command: "calc" }, weather: { command: "w" } });
      await m.discover();

      const disabled = await m.setEnabled("weather", false);

      expect(disabled.names()).toEqual(["add", "subtract"]);
      expect(mockClose).toHaveBeenCalledWith("weather");
      expect(m.disabledServers()).toEqual(["weather"]);
      expect(m.status().map(s => s.serverId)).toEqual(["calc"]);

      const enabled = await m.setEnabled("weather", true);

      expect(enabled.names()).toEqual(["add", "subtract", "forecast"]);
      expect(created).toEqual(["calc", "weather", "weather"]);
      expect(m.serverConfig("weather")).toEqual({ command: "w", enabled: true });
      expect(m.disabledServers()).toEqual([]);
    });

    it("keeps the registry when the flag does not change", async () => {
      const m = manager({ calc: { command: "calc" } });
      const registry = await m.discover();

      expect(await m.setEnabled("calc", true)).toBe(registry);
      expect(created).toEqual(["calc"]);
    });

    it("rejects an unknown server", async () => {
      await expect(manager({}).setEnabled("nope", false)).rejects.toThrow("Unknown server: nope");
    });
  });

  describe("resources", () => {
    it("lists resources of ready servers in config order and skips failures", async () => {
      mockListResources.mockImplementation(async (serverId: string) => {
        if (serverId === "backup") throw new ConnectionError("backup closed the connection");
        return [{ uri: `${serverId}://readme`, name: "readme" }];
      });
      const m = manager({
        weather: { command: "w" },
        backup: { command: "backup" },
        calc: { command: "calc" },
      });
      await m.discover();

      expect(await m.listResources()).toEqual([
        { serverId: "weather", uri: "weather://readme", name: "readme" },
        { serverId: "calc", uri: "calc://readme", name: "readme" },
      ]);
      expect(await m.listResources("calc")).toEqual([
        { serverId: "calc", uri: "calc://readme", name: "readme" },
      ]);
      expect(logger.warn).toHaveBeenCalledWith(
        "Listing resources on backup: backup closed the connection",
      );
    });

    it("reads from a ready server and fails fast otherwise", async () => {
      mockReadResource.mockResolvedValue([{ uri: "calc://readme", text: "hello" }]);
      mockOpen.mockImplementation(async (serverId: string) => {
        if (serverId === "weather") throw new ConnectionError("down");
      });
      const m = manager({ calc: { command: "calc" }, weather: { command: "w" } });
      await m.discover();

      expect(await m.readResource("calc", "calc://readme")).toEqual([
        { uri: "calc://readme", text: "hello" },
      ]);
      expect(mockReadResource).toHaveBeenCalledWith("calc", "calc://readme");
      await expect(m.readResource("weather", "weather://x")).rejects.toThrow("Server weather is failed");
      await expect(m.readResource("nope", "nope://x")).rejects.toThrow("Server nope is not connected");
      expect(mockReadResource).toHaveBeenCalledTimes(1);
    });
  });

  it("closeAll closes every session and empties the registry", async () => {
    const m = manager({ calc: { command: "calc" }, weather: { command: "w" } });
    await m.discover();

    await m.closeAll();

    expect(mockClose).toHaveBeenCalledTimes(2);
    expect(m.session("calc")).toBeUndefined();
    expect(m.status().map(s => s.state)).toEqual(["disconnected", "disconnected"]);
    expect(m.registry.isEmpty).toBe(true);
  });
});
