/**
 * Caller-facing entry point: query in, QueryResponse out.
 * Routes against one registry snapshot and dispatches with that same snapshot.
 */

import type { ConversationMessage, LanguageModel } from "./chat/client";
import type { ResolvedConfig } from "./config/types";
import type { Settings } from "./config/settings";
import type { ConnectionManager } from "./session/connection-manager";
import { Router } from "./router/router";
import type { RouteDecision } from "./router/decision";
import { GeneralKnowledge } from "./dispatch/fallback";
import { Dispatcher, failureResponse, type QueryResponse } from "./dispatch/dispatcher";
import type { ToolRegistry } from "./registry/tool-registry";
import { errorMessage, toToolrouteError } from "./util/errors";
import { error as logError, log } from "./util/logger";

export interface AssistantParts {
  manager: ConnectionManager;
  router: Router;
  dispatcher: Dispatcher;
}

/**
 * What `/retry` replays. A routing failure re-routes the query; a failed
 * dispatch re-runs the same decision against the same snapshot.
 */
type RetryTarget =
  | { stage: "route"; query: string; conversation: ConversationMessage[]; }
  | {
    stage: "dispatch";
    query: string;
    decision: RouteDecision;
    context: { registry: ToolRegistry; conversation: ConversationMessage[]; };
  };

export class Assistant {
  readonly manager: ConnectionManager;
  private router: Router;
  private dispatcher: Dispatcher;
  private lastFailed: RetryTarget | null = null;

  constructor(parts: AssistantParts) {
    this.manager = parts.manager;
    this.router = parts.router;
    this.dispatcher = parts.dispatcher;
  }

  get registry(): ToolRegistry {
    return this.manager.registry;
  }

  /** Never rejects; problems come back as `failure` on the response. */
  async processQuery(
    text: string,
    conversation: ConversationMessage[] = [],
  ): Promise<QueryResponse> {
    this.lastFailed = null;
    const query = text.trim();
    if (!query) {
      return failureResponse("validation", "Query is empty");
    }

    const registry = this.manager.registry;
    log(`Processing query against ${registry.size} tools`);

    let decision: RouteDecision;
    try {
      decision = await this.router.route(query, registry, conversation);
    } catch (err) {
      const failure = toToolrouteError(err);
      logError(`Routing failed: ${failure.message}`);
      const response = failureResponse(failure.kind, failure.message);
      if (response.failure?.retryable) {
        this.lastFailed = { stage: "route", query, conversation };
      }
      return response;
    }

    const context = { registry, conversation };
    try {
      const response = await this.dispatcher.dispatch(query, decision, context);
      this.lastFailed = response.failure?.retryable
        ? { stage: "dispatch", query, decision, context }
        : null;
      return response;
    } catch (err) {
      logError(`Dispatch failed: ${errorMessage(err)}`);
      return failureResponse("internal", errorMessage(err), undefined, false);
    }
  }

  get canRetry(): boolean {
    return this.lastFailed !== null;
  }

  /**
   * Replay the most recent request if it failed retryably. Only ever
   * triggered by the user; nothing retries tool calls automatically.
   */
  async retryLast(): Promise<QueryResponse | null> {
    const failed = this.lastFailed;
    if (!failed) return null;
    if (failed.stage === "route") {
      return this.processQuery(failed.query, failed.conversation);
    }

    const response = await this.dispatcher.dispatch(failed.query, failed.decision, failed.context);
    this.lastFailed = response.failure?.retryable ? failed : null;
    return response;
  }

  async rediscover(config?: ResolvedConfig): Promise<ToolRegistry> {
    return this.manager.rediscover(config);
  }

  async close(): Promise<void> {
    await this.manager.closeAll();
  }
}

/** Wire the router and dispatcher around an existing connection manager. */
export function createAssistant(
  manager: ConnectionManager,
  settings: Settings,
  model: LanguageModel,
): Assistant {
  const router = new Router({ model, timeoutMs: settings.llmTimeoutMs });
  const fallback = new GeneralKnowledge({
    model,
    timeoutMs: settings.llmTimeoutMs,
    contextMessages: settings.maxHistory,
  });
  const dispatcher = new Dispatcher({ manager, fallback });
  return new Assistant({ manager, router, dispatcher });
}
