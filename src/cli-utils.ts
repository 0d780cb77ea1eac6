import chalk from "chalk";
import * as fs from "node:fs";
import type { RouteTable } from "./routes.js";
import type { ProxyLogger } from "./types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Debounce delay (ms) for reloading the configuration after a file change. */
export const DEBOUNCE_MS = 100;

/** Grace period (ms) for connections to drain before force-exiting the proxy. */
export const EXIT_TIMEOUT_MS = 2000;

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

function timestamp(): string {
  return new Date().toISOString();
}

/** Console logger with timestamps and colored levels. */
export function createCliLogger(): ProxyLogger {
  return {
    info: (message) => console.log(`${chalk.gray(timestamp())} ${message}`),
    warn: (message) => console.warn(`${chalk.gray(timestamp())} ${chalk.yellow(message)}`),
    error: (message) => console.error(`${chalk.gray(timestamp())} ${chalk.red(message)}`),
  };
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/**
 * Read the value of a flag given as `--name value`, `--name=value` or
 * `-x value`. Returns null when absent; throws when the value is missing.
 */
export function readFlag(args: string[], name: string, short?: string): string | null {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith(`--${name}=`)) {
      const value = arg.slice(name.length + 3);
      if (!value) throw new Error(`--${name} requires a value.`);
      return value;
    }
    if (arg === `--${name}` || (short !== undefined && arg === `-${short}`)) {
      const value = args[i + 1];
      if (!value || value.startsWith("-")) throw new Error(`--${name} requires a value.`);
      return value;
    }
  }
  return null;
}

/** Parse a port number flag value. */
export function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (isNaN(port) || String(port) !== value.trim() || port < 1 || port > 65535) {
    throw new Error(`Invalid port "${value}". Must be 1-65535.`);
  }
  return port;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

/** One line per route: host pattern and prefix, target, middlewares. */
export function formatRouteTable(table: RouteTable): string[] {
  return table.routes.map((route) => {
    const middlewares =
      route.middlewareRefs.length > 0 ? `  [${route.middlewareRefs.join(", ")}]` : "";
    return `${route.hostPattern}${route.pathPrefix} -> ${route.target.address}${middlewares}`;
  });
}

/** Read this package's version from its package.json. */
export function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(
      fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8")
    );
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    // Fall through to the placeholder
  }
  return "0.0.0";
}
