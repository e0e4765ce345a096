/**
 * Error kinds surfaced by sessions, the router and the dispatcher.
 */

export type ErrorKind =
  | "connection"
  | "protocol"
  | "validation"
  | "timeout"
  | "tool_execution"
  | "internal";

export class ToolrouteError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;

  constructor(
    message: string,
    kind: ErrorKind,
    options: { retryable?: boolean; cause?: unknown; } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ToolrouteError";
    this.kind = kind;
    this.retryable = options.retryable ?? false;
  }
}

/** Transport unreachable, process failed to spawn, or session not ready. */
export class ConnectionError extends ToolrouteError {
  constructor(message: string, cause?: unknown) {
    super(message, "connection", { retryable: true, cause });
    this.name = "ConnectionError";
  }
}

/** Handshake rejected, version mismatch, or a malformed protocol response. */
export class ProtocolError extends ToolrouteError {
  constructor(message: string, cause?: unknown) {
    super(message, "protocol", { retryable: true, cause });
    this.name = "ProtocolError";
  }
}

export class ValidationError extends ToolrouteError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, "validation");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class TimeoutError extends ToolrouteError {
  constructor(message: string) {
    super(message, "timeout", { retryable: true });
    this.name = "TimeoutError";
  }
}

/** The server reported a failure for a well-formed call. */
export class ToolExecutionError extends ToolrouteError {
  constructor(message: string, cause?: unknown) {
    super(message, "tool_execution", { retryable: true, cause });
    this.name = "ToolExecutionError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toToolrouteError(
  err: unknown,
  fallbackKind: ErrorKind = "internal",
): ToolrouteError {
  if (err instanceof ToolrouteError) return err;
  return new ToolrouteError(errorMessage(err), fallbackKind, { cause: err });
}
