/**
 * Shared types for the session layer.
 */

import type { ErrorKind } from "../util/errors";

export interface ToolInfo {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

export interface ResourceInfo {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface ServerResource extends ResourceInfo {
  serverId: string;
}

/** One item of a resources/read result; exactly one of text or blob is set. */
export interface ResourceContent {
  uri: string;
  mimeType?: string;
  text?: string;
  blob?: string;
}

export type SessionState = "disconnected" | "connecting" | "ready" | "failed";

export interface ContentItem {
  type: string;
  text?: string;
  [key: string]: unknown;
}

export interface CallToolPayload {
  content: ContentItem[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

export interface ToolInvocation {
  toolName: string;
  arguments: Record<string, unknown>;
  correlationId: string;
}

export type ToolOutcome =
  | { ok: true; payload: CallToolPayload; }
  | { ok: false; kind: ErrorKind; message: string; };

export interface ToolResult {
  correlationId: string;
  outcome: ToolOutcome;
}

/** Read-only view of a session, safe to hand to the CLI. */
export interface ServerStatus {
  serverId: string;
  state: SessionState;
  toolCount: number;
  lastError?: string;
}
