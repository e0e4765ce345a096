/**
 * Prompt text for tool selection and for the general-knowledge fallback.
 */

import type { ParameterSpec, ToolDescriptor } from "../registry/descriptor";
import type { ToolRegistry } from "../registry/tool-registry";

export const ROUTER_SYSTEM_PROMPT =
  "You are a precise tool selection assistant. Always respond with valid JSON.";

function describeParameter(name: string, spec: ParameterSpec): string {
  let text = `${name} (${spec.type})`;
  if (spec.required) text += " [required]";
  if (spec.enum) text += ` one of ${spec.enum.map(v => JSON.stringify(v)).join("|")}`;
  if (spec.description) text += `: ${spec.description}`;
  return text;
}

export function describeTool(tool: ToolDescriptor): string {
  const description = tool.description || "No description available";
  const params = Object.entries(tool.parameters).map(([name, spec]) =>
    describeParameter(name, spec)
  );
  let line = `- ${tool.name}: ${description}`;
  if (params.length > 0) {
    line += `\n  Parameters: ${params.join(", ")}`;
  }
  return line;
}

export function describeTools(registry: ToolRegistry): string {
  if (registry.isEmpty) return "No tools available.";
  return ["Available MCP tools:", ...registry.list().map(describeTool)].join("\n");
}

export function buildRoutingPrompt(query: string, registry: ToolRegistry): string {
  return `Analyze the user's request and decide whether one of the available tools can answer it.

${describeTools(registry)}

User request: ${JSON.stringify(query)}

Respond with a JSON object in exactly this format:
{
  "tool_name": "exact_tool_name_or_null",
  "parameters": {"param1": "value1"},
  "reasoning": "brief explanation of the choice"
}

Guidelines:
- Use a tool name exactly as listed above, or null when no tool fits.
- Extract parameter values from the request; use the declared types.
- Supply every [required] parameter.
- General-knowledge questions get tool_name null.
- Respond with the JSON object only.`;
}

export function buildFallbackSystemPrompt(registry: ToolRegistry): string {
  const lines = [
    "You are a helpful AI assistant. Answer the user's question directly and helpfully from your general knowledge.",
  ];

  const groups = registry.byServer();
  if (groups.size > 0) {
    lines.push(
      "",
      "You also have specialized tools, which were not a fit for this request. Mention them only if relevant:",
    );
    for (const [serverId, tools] of groups) {
      lines.push(`- ${serverId}: ${tools.map(t => t.name).join(", ")}`);
    }
  }

  return lines.join("\n");
}
