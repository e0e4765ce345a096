/**
 * Runtime argument validation against a ToolDescriptor's parameter table.
 * Tool schemas arrive over the wire, so validators are built per descriptor
 * and cached for the lifetime of that (immutable) descriptor.
 */

import { z } from "zod";
import type { ParameterSpec, ToolDescriptor } from "./descriptor";
import { ValidationError } from "../util/errors";

const NUMERIC_RE = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

/** Models often quote numbers; accept "25" where a number is declared. */
function coerceNumeric(value: unknown): unknown {
  if (typeof value === "string" && NUMERIC_RE.test(value.trim())) {
    return Number(value.trim());
  }
  return value;
}

function baseSchema(spec: ParameterSpec): z.ZodTypeAny {
  switch (spec.type) {
    case "string":
      return z.string();
    case "number":
      return z.preprocess(coerceNumeric, z.number().finite());
    case "integer":
      return z.preprocess(coerceNumeric, z.number().int());
    case "boolean":
      return z.boolean();
    case "array":
      return z.array(z.unknown());
    case "object":
      return z.record(z.string(), z.unknown());
    case "any":
      return z.unknown();
  }
}

function parameterSchema(spec: ParameterSpec): z.ZodTypeAny {
  let schema = baseSchema(spec);

  const allowed = spec.enum;
  if (allowed) {
    schema = schema.refine(value => allowed.some(option => option === value), {
      message: `must be one of ${allowed.map(v => JSON.stringify(v)).join(", ")}`,
    });
  }

  if (!spec.required) {
    schema = schema.optional();
  } else if (spec.type === "any") {
    // z.unknown() accepts undefined, so presence has to be checked explicitly
    schema = schema.refine(value => value !== undefined, { message: "Required" });
  }
  return schema;
}

const validatorCache = new WeakMap<ToolDescriptor, z.ZodTypeAny>();

export function argumentSchemaFor(descriptor: ToolDescriptor): z.ZodTypeAny {
  const cached = validatorCache.get(descriptor);
  if (cached) return cached;

  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(descriptor.parameters)) {
    shape[name] = parameterSchema(spec);
  }

  const object = z.object(shape);
  const schema = descriptor.allowsExtraArguments ? object.passthrough() : object.strict();
  validatorCache.set(descriptor, schema);
  return schema;
}

export type ArgumentCheck =
  | { success: true; data: Record<string, unknown>; }
  | { success: false; error: ValidationError; };

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(arguments)";
  return `${path}: ${issue.message}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function validateArguments(
  descriptor: ToolDescriptor,
  args: unknown,
): ArgumentCheck {
  const result = argumentSchemaFor(descriptor).safeParse(args ?? {});
  if (result.success && isRecord(result.data)) {
    return { success: true, data: result.data };
  }

  const issues = result.success
    ? ["(arguments): expected an object"]
    : result.error.issues.map(formatIssue);
  return {
    success: false,
    error: new ValidationError(
      `Invalid arguments for ${descriptor.name}: ${issues.join("; ")}`,
      issues,
    ),
  };
}
