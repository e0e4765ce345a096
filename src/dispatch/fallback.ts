/**
 * General-knowledge answers for queries no tool handles.
 */

import {
  type ConversationMessage,
  type LanguageModel,
  recentMessages,
} from "../chat/client";
import type { ToolRegistry } from "../registry/tool-registry";
import { buildFallbackSystemPrompt } from "../router/prompt";
import { withTimeout } from "../util/timeout";

export interface GeneralKnowledgeOptions {
  model: LanguageModel;
  timeoutMs?: number;
  contextMessages?: number;
}

export class GeneralKnowledge {
  private model: LanguageModel;
  private timeoutMs: number;
  private contextMessages: number;

  constructor(options: GeneralKnowledgeOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.contextMessages = options.contextMessages ?? 20;
  }

  /** Rejects with TimeoutError on expiry, or with the model's own error. */
  answer(
    query: string,
    registry: ToolRegistry,
    context: ConversationMessage[] = [],
  ): Promise<string> {
    return withTimeout(
      signal =>
        this.model.complete(
          {
            system: buildFallbackSystemPrompt(registry),
            messages: [
              ...recentMessages(context, this.contextMessages),
              { role: "user", content: query },
            ],
            temperature: 0.7,
          },
          signal,
        ),
      this.timeoutMs,
      "General-knowledge answer",
    );
  }
}
