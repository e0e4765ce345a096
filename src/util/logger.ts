/**
 * Simple stderr logger with verbosity control.
 * stdout is reserved for answers and --json output.
 */

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function isVerbose(): boolean {
  return verbose;
}

export function log(message: string, ...args: unknown[]): void {
  if (verbose) {
    console.error(`[toolroute] ${message}`, ...args);
  }
}

/**
 * Verbose-only dump of a value under a label. Non-string values are
 * pretty-printed as JSON on the lines after the label.
 */
export function debug(label: string, value: unknown): void {
  if (!verbose) return;
  const text = typeof value === "string" ? value : JSON.stringify(value, null, 2);
  console.error(`[toolroute DEBUG] ${label}:\n${text}`);
}

export function warn(message: string, ...args: unknown[]): void {
  console.error(`[toolroute WARN] ${message}`, ...args);
}

export function error(message: string, ...args: unknown[]): void {
  console.error(`[toolroute ERROR] ${message}`, ...args);
}
