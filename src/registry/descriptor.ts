/**
 * ToolDescriptor: a server-advertised tool reduced to the parameter table
 * the router prompts with and validates against.
 */

import type { ToolInfo } from "../session/types";

export type ParameterType =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "array"
  | "object"
  | "any";

export interface ParameterSpec {
  type: ParameterType;
  required: boolean;
  description?: string;
  enum?: ReadonlyArray<string | number | boolean>;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly serverId: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
  /** Extra arguments are rejected only when the server says so. */
  readonly allowsExtraArguments: boolean;
  readonly inputSchema: Readonly<Record<string, unknown>>;
}

const KNOWN_TYPES: ReadonlySet<string> = new Set<ParameterType>([
  "string",
  "number",
  "integer",
  "boolean",
  "array",
  "object",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isParameterType(value: string): value is ParameterType {
  return KNOWN_TYPES.has(value);
}

/** JSON Schema `type` may be a string or a list such as ["string", "null"]. */
function parameterType(schema: Record<string, unknown>): ParameterType {
  const declared = Array.isArray(schema.type) ? schema.type : [schema.type];
  for (const t of declared) {
    if (typeof t === "string" && isParameterType(t)) return t;
  }
  return "any";
}

function enumValues(
  schema: Record<string, unknown>,
): Array<string | number | boolean> | undefined {
  if (!Array.isArray(schema.enum)) return undefined;
  const values = schema.enum.filter(
    (v): v is string | number | boolean =>
      typeof v === "string" || typeof v === "number" || typeof v === "boolean",
  );
  return values.length > 0 ? values : undefined;
}

export function parseParameters(
  inputSchema: Record<string, unknown>,
): Record<string, ParameterSpec> {
  const properties = isRecord(inputSchema.properties) ? inputSchema.properties : {};
  const required = new Set(
    Array.isArray(inputSchema.required)
      ? inputSchema.required.filter((r): r is string => typeof r === "string")
      : [],
  );

  const parameters: Record<string, ParameterSpec> = {};
  for (const [name, raw] of Object.entries(properties)) {
    const schema = isRecord(raw) ? raw : {};
    const spec: ParameterSpec = {
      type: parameterType(schema),
      required: required.has(name),
    };
    if (typeof schema.description === "string" && schema.description) {
      spec.description = schema.description;
    }
    const values = enumValues(schema);
    if (values) spec.enum = Object.freeze(values);
    parameters[name] = Object.freeze(spec);
  }

  // Required names the server forgot to declare still have to be supplied.
  for (const name of required) {
    if (!(name in parameters)) {
      parameters[name] = Object.freeze({ type: "any", required: true });
    }
  }

  return parameters;
}

export function createToolDescriptor(
  serverId: string,
  tool: ToolInfo,
): ToolDescriptor {
  return Object.freeze({
    name: tool.name,
    serverId,
    description: tool.description ?? "",
    parameters: Object.freeze(parseParameters(tool.inputSchema)),
    allowsExtraArguments: tool.inputSchema.additionalProperties !== false,
    inputSchema: Object.freeze({ ...tool.inputSchema }),
  });
}
