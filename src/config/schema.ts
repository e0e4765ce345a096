/**
 * Zod schemas for validating .mcp.json config files.
 */

import { z } from "zod";

const toolFilterSchema = z
  .object({
    allowed: z.array(z.string()).optional(),
    blocked: z.array(z.string()).optional(),
  })
  .optional();

const commonFields = {
  enabled: z.boolean().optional(),
  description: z.string().optional(),
  tools: toolFilterSchema,
};

const stdioServerSchema = z.object({
  type: z.literal("stdio").optional(),
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  env: z.record(z.string(), z.string()).optional(),
  cwd: z.string().min(1).optional(),
  ...commonFields,
});

const httpServerSchema = z.object({
  type: z.enum(["sse", "url"]),
  url: z.string().url(),
  headers: z.record(z.string(), z.string()).optional(),
  ...commonFields,
});

export const serverConfigSchema = z.union([
  stdioServerSchema,
  httpServerSchema,
]);

export const mcpConfigFileSchema = z.object({
  mcpServers: z.record(z.string(), serverConfigSchema),
});

export type ValidatedMcpConfig = z.infer<typeof mcpConfigFileSchema>;

export function validateConfig(data: unknown): ValidatedMcpConfig {
  return mcpConfigFileSchema.parse(data);
}
