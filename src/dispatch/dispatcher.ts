/**
 * Executes a routing decision: a tool call against its owning session, or
 * a general-knowledge answer. Failures are returned, not thrown, and are
 * never retried here (tool calls may not be idempotent).
 */

import { randomUUID } from "node:crypto";
import type { ConversationMessage } from "../chat/client";
import type { ConnectionManager } from "../session/connection-manager";
import type { CallToolPayload } from "../session/types";
import type { ToolRegistry } from "../registry/tool-registry";
import type { RouteDecision } from "../router/decision";
import type { GeneralKnowledge } from "./fallback";
import { type ErrorKind, errorMessage, toToolrouteError } from "../util/errors";
import { log } from "../util/logger";

export interface ToolUsage {
  name: string;
  serverId: string;
  arguments: Record<string, unknown>;
  correlationId: string;
}

export interface DispatchFailure {
  kind: ErrorKind;
  message: string;
  /** The caller may offer a manual retry. */
  retryable: boolean;
}

export interface QueryResponse {
  answerText: string;
  structuredPayload?: unknown;
  toolUsed?: ToolUsage;
  failure?: DispatchFailure;
}

export interface DispatchContext {
  registry: ToolRegistry;
  conversation?: ConversationMessage[];
}

function parseJsonContainer(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) return undefined;
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

/** Text items joined by newlines; structured data passed through as-is. */
export function formatToolPayload(
  payload: CallToolPayload,
): Pick<QueryResponse, "answerText" | "structuredPayload"> {
  const texts = payload.content
    .filter(item => item.type === "text" && typeof item.text === "string")
    .map(item => item.text ?? "");

  const structuredPayload = payload.structuredContent
    ?? (texts.length === 1 ? parseJsonContainer(texts[0] ?? "") : undefined);

  const answerText = texts.length > 0
    ? texts.join("\n")
    : JSON.stringify(payload.structuredContent ?? payload.content, null, 2);

  return structuredPayload === undefined
    ? { answerText }
    : { answerText, structuredPayload };
}

export function failureResponse(
  kind: ErrorKind,
  message: string,
  toolUsed?: ToolUsage,
  retryable: boolean = kind !== "validation",
): QueryResponse {
  const answerText = toolUsed
    ? `The ${toolUsed.name} tool did not complete (${kind}): ${message}`
    : `I could not process your request (${kind}): ${message}`;
  return {
    answerText,
    ...(toolUsed ? { toolUsed } : {}),
    failure: { kind, message, retryable },
  };
}

export interface DispatcherOptions {
  manager: Pick<ConnectionManager, "session" | "invoke">;
  fallback: GeneralKnowledge;
}

export class Dispatcher {
  private manager: DispatcherOptions["manager"];
  private fallback: GeneralKnowledge;

  constructor(options: DispatcherOptions) {
    this.manager = options.manager;
    this.fallback = options.fallback;
  }

  async dispatch(
    query: string,
    decision: RouteDecision,
    context: DispatchContext,
  ): Promise<QueryResponse> {
    if (decision.kind === "no_tool") {
      log(`No tool: ${decision.reason}`);
      try {
        const answerText = await this.fallback.answer(
          query,
          context.registry,
          context.conversation,
        );
        return { answerText };
      } catch (err) {
        const failure = toToolrouteError(err);
        return failureResponse(failure.kind, errorMessage(err));
      }
    }

    const { tool } = decision;
    const toolUsed: ToolUsage = {
      name: tool.name,
      serverId: tool.serverId,
      arguments: decision.arguments,
      correlationId: randomUUID(),
    };

    const session = this.manager.session(tool.serverId);
    if (!session) {
      return failureResponse(
        "connection",
        `Server ${tool.serverId} is no longer configured`,
        toolUsed,
      );
    }

    const result = await this.manager.invoke(session, {
      toolName: tool.name,
      arguments: decision.arguments,
      correlationId: toolUsed.correlationId,
    });

    if (!result.outcome.ok) {
      return failureResponse(result.outcome.kind, result.outcome.message, toolUsed);
    }

    return { ...formatToolPayload(result.outcome.payload), toolUsed };
  }
}
