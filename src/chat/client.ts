/**
 * Anthropic SDK wrapper used for tool selection and general-knowledge answers.
 */

import Anthropic from "@anthropic-ai/sdk";
import { DEFAULT_MODEL } from "../config/settings";
import { log } from "../util/logger";

export interface ChatClientOptions {
  apiKey?: string;
  authToken?: string;
  model?: string;
  maxTokens?: number;
}

export interface ConversationMessage {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  system?: string;
  messages: ConversationMessage[];
  temperature?: number;
  maxTokens?: number;
}

/**
 * The last `limit` messages of a conversation, starting at a user turn as
 * the Messages API requires.
 */
export function recentMessages(
  messages: ConversationMessage[],
  limit: number,
): ConversationMessage[] {
  const recent = messages.slice(-limit);
  const firstUser = recent.findIndex(m => m.role === "user");
  return firstUser === -1 ? [] : recent.slice(firstUser);
}

/** The one capability the router and the fallback path need from a model. */
export interface LanguageModel {
  readonly model: string;
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

export class ChatClient implements LanguageModel {
  private client: Anthropic;
  readonly model: string;
  private maxTokens: number;

  constructor(options: ChatClientOptions) {
    if (!options.apiKey && !options.authToken) {
      throw new Error("ChatClient requires either apiKey or authToken");
    }

    this.client = new Anthropic({
      apiKey: options.apiKey,
      authToken: options.authToken,
    });
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? 4096;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    log(`Sending ${request.messages.length} messages to ${this.model}`);

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: request.maxTokens ?? this.maxTokens,
      messages: request.messages,
    };

    if (request.system) {
      params.system = request.system;
    }

    if (request.temperature !== undefined) {
      params.temperature = request.temperature;
    }

    const response = await this.client.messages.create(params, { signal });

    return response.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map(block => block.text)
      .join("")
      .trim();
  }
}
