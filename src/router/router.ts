/**
 * Tool routing: ask the model to pick at most one tool for a query, then
 * accept the choice only if it names a registered tool with valid arguments.
 * Anything else degrades to no_tool. Stateless across queries.
 */

import {
  type ConversationMessage,
  type LanguageModel,
  recentMessages,
} from "../chat/client";
import type { ToolRegistry } from "../registry/tool-registry";
import { validateArguments } from "../registry/arguments";
import { buildRoutingPrompt, ROUTER_SYSTEM_PROMPT } from "./prompt";
import { parseDecisionReply, type RouteDecision } from "./decision";
import { errorMessage, TimeoutError } from "../util/errors";
import { withTimeout } from "../util/timeout";
import { debug, log, warn } from "../util/logger";

export interface RouterOptions {
  model: LanguageModel;
  timeoutMs?: number;
  /** Prior conversation turns sent with each routing prompt. */
  contextMessages?: number;
}

export class Router {
  private model: LanguageModel;
  private timeoutMs: number;
  private contextMessages: number;

  constructor(options: RouterOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.contextMessages = options.contextMessages ?? 6;
  }

  /**
   * Rejects only with TimeoutError; every other model or parsing problem
   * resolves to no_tool.
   */
  async route(
    query: string,
    registry: ToolRegistry,
    context: ConversationMessage[] = [],
  ): Promise<RouteDecision> {
    if (registry.isEmpty) {
      return { kind: "no_tool", reason: "No tools are available" };
    }

    let reply: string;
    try {
      reply = await withTimeout(
        signal =>
          this.model.complete(
            {
              system: ROUTER_SYSTEM_PROMPT,
              messages: [
                ...recentMessages(context, this.contextMessages),
                { role: "user", content: buildRoutingPrompt(query, registry) },
              ],
              temperature: 0,
              maxTokens: 1024,
            },
            signal,
          ),
        this.timeoutMs,
        "Tool selection",
      );
    } catch (err) {
      if (err instanceof TimeoutError) throw err;
      warn(`Tool selection failed, answering without tools: ${errorMessage(err)}`);
      return { kind: "no_tool", reason: `Tool selection failed: ${errorMessage(err)}` };
    }

    debug("Tool selection reply", reply);
    return this.decide(reply, registry);
  }

  /** Validate a raw model reply against the registry. */
  decide(reply: string, registry: ToolRegistry): RouteDecision {
    const raw = parseDecisionReply(reply);
    if (!raw) {
      warn("Tool selection reply was not a valid decision object");
      return { kind: "no_tool", reason: "Unparseable tool selection reply" };
    }

    if (raw.toolName === null) {
      return { kind: "no_tool", reason: raw.reasoning ?? "No tool fits the request" };
    }

    const tool = registry.get(raw.toolName);
    if (!tool) {
      warn(`Model selected unknown tool "${raw.toolName}"`);
      return { kind: "no_tool", reason: `Unknown tool: ${raw.toolName}` };
    }

    const check = validateArguments(tool, raw.parameters);
    if (!check.success) {
      warn(check.error.message);
      return { kind: "no_tool", reason: check.error.message };
    }

    log(`Selected ${tool.serverId}/${tool.name} with ${JSON.stringify(check.data)}`);
    return {
      kind: "call_tool",
      tool,
      arguments: check.data,
      ...(raw.reasoning ? { reasoning: raw.reasoning } : {}),
    };
  }
}
