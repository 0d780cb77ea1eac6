import type { ProxyLogger } from "./types.js";

/** Type guard for Node.js system errors with an error code. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof (err as Record<string, unknown>).code === "string"
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Logger that writes straight to the console. */
export const consoleLogger: ProxyLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

/**
 * Normalize a Host header / :authority / SNI value: lower-case, no port,
 * no trailing dot, IPv6 brackets removed.
 */
export function normalizeHost(value: string): string {
  let host = value.trim().toLowerCase();
  if (host.startsWith("[")) {
    const end = host.indexOf("]");
    host = end === -1 ? host.slice(1) : host.slice(1, end);
  } else {
    const colon = host.indexOf(":");
    if (colon !== -1) host = host.slice(0, colon);
  }
  return host.endsWith(".") ? host.slice(0, -1) : host;
}

/**
 * Parse a `host:port` backend address. IPv6 hosts must be bracketed
 * (`[::1]:8080`). Throws on anything else.
 */
export function parseAddress(address: string): { host: string; port: number } {
  const match = /^(?:\[([0-9a-fA-F:.]+)\]|([^:[\]\s]+)):(\d{1,5})$/.exec(address.trim());
  if (!match) {
    throw new Error(`Invalid address "${address}": expected host:port`);
  }
  const host = match[1] ?? match[2];
  const port = parseInt(match[3], 10);
  if (port < 1 || port > 65535) {
    throw new Error(`Invalid address "${address}": port must be between 1 and 65535`);
  }
  return { host, port };
}

/**
 * Validate a configured hostname. Accepts exact names and a single leading
 * `*.` wildcard label when `allowWildcard` is set.
 */
export function isValidHostname(hostname: string, allowWildcard = true): boolean {
  const name = allowWildcard && hostname.startsWith("*.") ? hostname.slice(2) : hostname;
  if (!name || name.length > 253 || name.includes("..")) return false;
  return name
    .split(".")
    .every((label) => /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/.test(label));
}

/**
 * Match a host against a pattern: `*` matches any host, `*.example.test`
 * matches exactly one label in front of `example.test`, anything else must be
 * equal. Both sides are expected to be normalized.
 */
export function matchHostPattern(pattern: string, host: string): boolean {
  if (pattern === "*") return true;
  if (pattern.startsWith("*.")) {
    const suffix = pattern.slice(1);
    if (!host.endsWith(suffix)) return false;
    const label = host.slice(0, host.length - suffix.length);
    return label.length > 0 && !label.includes(".");
  }
  return pattern === host;
}

/** Path of a request target without its query string or fragment. */
export function pathOf(url: string): string {
  const end = url.search(/[?#]/);
  return end === -1 ? url : url.slice(0, end);
}

/**
 * Format an https URL. Omits the port when it is the protocol default (443).
 */
export function formatUrl(hostname: string, port: number, pathname = ""): string {
  return port === 443 ? `https://${hostname}${pathname}` : `https://${hostname}:${port}${pathname}`;
}
