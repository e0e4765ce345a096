/**
 * Programmatic API for toolroute.
 */

export { Assistant, createAssistant, type AssistantParts } from "./assistant";
export {
  ConnectionManager,
  type ConnectionManagerOptions,
} from "./session/connection-manager";
export { ServerSession, type SessionTimeouts } from "./session/server-session";
export { calculateBackoff, retryWithBackoff, type RetryOptions } from "./session/retry";
export type {
  CallToolPayload,
  ContentItem,
  ResourceContent,
  ResourceInfo,
  ServerResource,
  ServerStatus,
  SessionState,
  ToolInfo,
  ToolInvocation,
  ToolOutcome,
  ToolResult,
} from "./session/types";
export {
  type ServerCatalog,
  type ToolConflict,
  ToolRegistry,
} from "./registry/tool-registry";
export {
  createToolDescriptor,
  type ParameterSpec,
  type ParameterType,
  type ToolDescriptor,
} from "./registry/descriptor";
export { type ArgumentCheck, validateArguments } from "./registry/arguments";
export { Router, type RouterOptions } from "./router/router";
export type { RouteDecision } from "./router/decision";
export {
  type DispatchFailure,
  Dispatcher,
  type QueryResponse,
  type ToolUsage,
} from "./dispatch/dispatcher";
export { GeneralKnowledge } from "./dispatch/fallback";
export {
  ChatClient,
  type ChatClientOptions,
  type CompletionRequest,
  type ConversationMessage,
  type LanguageModel,
} from "./chat/client";
export { discoverConfig, type DiscoveryOptions } from "./config/discovery";
export { validateConfig } from "./config/schema";
export { DEFAULT_MODEL, loadSettings, type Settings } from "./config/settings";
export type {
  HttpServerConfig,
  McpConfigFile,
  ResolvedConfig,
  ServerConfig,
  StdioServerConfig,
} from "./config/types";
export {
  ConnectionError,
  type ErrorKind,
  ProtocolError,
  TimeoutError,
  ToolExecutionError,
  ToolrouteError,
  ValidationError,
} from "./util/errors";
export { setVerbose } from "./util/logger";
