/**
 * Parsing of the model's tool-selection reply. The reply is untrusted text:
 * anything that is not a well-formed decision object parses to null.
 */

import { z } from "zod";
import type { ToolDescriptor } from "../registry/descriptor";

export type RouteDecision =
  | { kind: "no_tool"; reason: string; }
  | {
    kind: "call_tool";
    tool: ToolDescriptor;
    arguments: Record<string, unknown>;
    reasoning?: string;
  };

const rawDecisionSchema = z.object({
  tool_name: z.string().nullable().optional(),
  parameters: z.record(z.string(), z.unknown()).nullable().optional(),
  reasoning: z.string().optional(),
});

export interface RawDecision {
  toolName: string | null;
  parameters: Record<string, unknown>;
  reasoning?: string;
}

const FENCE_RE = /```(?:json)?\s*([\s\S]*?)```/i;

/** Pull the JSON object out of a reply that may wrap it in prose or fences. */
export function extractJson(text: string): string {
  const fenced = FENCE_RE.exec(text);
  const body = (fenced?.[1] ?? text).trim();

  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end < start) return body;
  return body.slice(start, end + 1);
}

export function parseDecisionReply(text: string): RawDecision | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(text));
  } catch {
    return null;
  }

  const result = rawDecisionSchema.safeParse(parsed);
  if (!result.success) return null;

  const name = result.data.tool_name?.trim();
  return {
    toolName: name && name.toLowerCase() !== "null" ? name : null,
    parameters: result.data.parameters ?? {},
    reasoning: result.data.reasoning,
  };
}
