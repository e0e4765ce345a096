/**
 * `${VAR}` and `${VAR:-default}` expansion for config values.
 */

import { warn } from "./logger";

const ENV_VAR_RE = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

export function expandEnvVars(
  value: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return value.replace(ENV_VAR_RE, (_, varName: string, fallback: string | undefined) => {
    const current = env[varName];
    if (fallback !== undefined) {
      return current ? current : fallback;
    }
    if (current === undefined) {
      warn(`Environment variable '${varName}' is not set; the server may reject the connection`);
    }
    return current ?? "";
  });
}

export function expandEnvRecord(
  record: Record<string, string>,
  env: Record<string, string | undefined> = process.env,
): Record<string, string> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key, expandEnvVars(value, env)]),
  );
}
