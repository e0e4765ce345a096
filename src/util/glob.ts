/**
 * Wildcard patterns for per-server tool filtering: `*` matches any run of
 * characters, `?` exactly one. Nothing else is special.
 */

export interface ToolFilterConfig {
  allowed?: string[];
  blocked?: string[];
}

export function globToRegExp(pattern: string): RegExp {
  const body = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*")
    .replace(/\?/g, ".");
  return new RegExp(`^${body}$`);
}

export function matchesGlob(name: string, pattern: string): boolean {
  return globToRegExp(pattern).test(name);
}

export function matchesAnyGlob(name: string, patterns: string[]): boolean {
  return patterns.some(pattern => matchesGlob(name, pattern));
}

/**
 * Name predicate for a filter config. An empty or missing `allowed` admits
 * everything; `blocked` always wins over `allowed`.
 */
export function compileToolFilter(config?: ToolFilterConfig): (name: string) => boolean {
  const allowed = (config?.allowed ?? []).map(globToRegExp);
  const blocked = (config?.blocked ?? []).map(globToRegExp);
  return name =>
    (allowed.length === 0 || allowed.some(re => re.test(name)))
    && !blocked.some(re => re.test(name));
}

export function filterTools<T extends { name: string; }>(
  tools: T[],
  config?: ToolFilterConfig,
): T[] {
  if (!config) return tools;
  const admits = compileToolFilter(config);
  return tools.filter(t => admits(t.name));
}
