import * as fs from "node:fs";
import * as path from "node:path";
import { DEFAULT_HEALTH_OPTIONS } from "./backend.js";
import type { CertificateFileSpec } from "./certs.js";
import { MIDDLEWARE_TYPES } from "./middleware.js";
import type { MiddlewareConfig, MiddlewareType } from "./middleware.js";
import { DEFAULT_IDLE_TIMEOUT_MS } from "./sessions.js";
import type { HealthOptions, RouteDefinition, StreamingOptions } from "./types.js";
import { errorMessage } from "./utils.js";

/** Default config file name, looked up in the working directory. */
export const DEFAULT_CONFIG_FILE = "streamgate.json";

/** Default HTTPS port. */
export const DEFAULT_LISTEN_PORT = 443;

export const DEFAULT_STREAMING_CONTENT_TYPES = ["text/event-stream"];

export interface ProxyConfig {
  listen: { host: string; port: number };
  /** When set, a plain HTTP listener on this port redirects to HTTPS. */
  redirectPort?: number;
  certificates: CertificateFileSpec[];
  middlewares: Record<string, MiddlewareConfig>;
  routes: RouteDefinition[];
  health: HealthOptions;
  streaming: StreamingOptions;
  /** Directory relative certificate paths resolve against. */
  baseDir: string;
}

/** The configuration file is missing, unreadable or invalid. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isObject(value) && Object.values(value).every((item) => typeof item === "string");
}

function isPort(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 65535;
}

function positiveInt(value: unknown, field: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${field} must be a positive integer`);
  }
  return value;
}

function parseListen(value: unknown): ProxyConfig["listen"] {
  if (value === undefined) return { host: "0.0.0.0", port: DEFAULT_LISTEN_PORT };
  if (!isObject(value)) throw new ConfigError("listen must be an object");
  const host = value.host ?? "0.0.0.0";
  const port = value.port ?? DEFAULT_LISTEN_PORT;
  if (typeof host !== "string" || !host) throw new ConfigError("listen.host must be a string");
  if (!isPort(port)) throw new ConfigError("listen.port must be a port number");
  return { host, port };
}

function parseCertificates(value: unknown): CertificateFileSpec[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError("certificates must be a non-empty array");
  }
  return value.map((item, i) => {
    const field = `certificates[${i}]`;
    if (!isObject(item)) throw new ConfigError(`${field} must be an object`);
    const { hostnames, certFile, keyFile } = item;
    if (!isStringArray(hostnames) || hostnames.length === 0) {
      throw new ConfigError(`${field}.hostnames must be a non-empty array of strings`);
    }
    if (typeof certFile !== "string" || !certFile) {
      throw new ConfigError(`${field}.certFile must be a file path`);
    }
    if (typeof keyFile !== "string" || !keyFile) {
      throw new ConfigError(`${field}.keyFile must be a file path`);
    }
    return { hostnames, certFile, keyFile };
  });
}

function isMiddlewareType(value: unknown): value is MiddlewareType {
  return typeof value === "string" && (MIDDLEWARE_TYPES as readonly string[]).includes(value);
}

function parseMiddleware(name: string, value: unknown): MiddlewareConfig {
  const field = `middlewares.${name}`;
  if (!isObject(value)) throw new ConfigError(`${field} must be an object`);
  const type = value.type;
  if (!isMiddlewareType(type)) {
    throw new ConfigError(`${field}.type must be one of: ${MIDDLEWARE_TYPES.join(", ")}`);
  }
  switch (type) {
    case "no-compression":
    case "compress":
      return { type };
    case "headers": {
      const { request, response } = value;
      if (request !== undefined && !isStringRecord(request)) {
        throw new ConfigError(`${field}.request must map header names to strings`);
      }
      if (response !== undefined && !isStringRecord(response)) {
        throw new ConfigError(`${field}.response must map header names to strings`);
      }
      return { type, request, response };
    }
    case "strip-prefix": {
      const prefixes = value.prefixes;
      if (!isStringArray(prefixes) || prefixes.length === 0) {
        throw new ConfigError(`${field}.prefixes must be a non-empty array of strings`);
      }
      if (!prefixes.every((p) => p.startsWith("/"))) {
        throw new ConfigError(`${field}.prefixes must start with "/"`);
      }
      return { type, prefixes };
    }
  }
}

function parseMiddlewares(value: unknown): Record<string, MiddlewareConfig> {
  if (value === undefined) return {};
  if (!isObject(value)) throw new ConfigError("middlewares must be an object");
  const result: Record<string, MiddlewareConfig> = {};
  for (const [name, item] of Object.entries(value)) {
    result[name] = parseMiddleware(name, item);
  }
  return result;
}

function parseRoutes(value: unknown): RouteDefinition[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError("routes must be a non-empty array");
  }
  return value.map((item, i) => {
    const field = `routes[${i}]`;
    if (!isObject(item)) throw new ConfigError(`${field} must be an object`);
    const { host, pathPrefix, middlewares, target } = item;
    if (typeof host !== "string" || !host) throw new ConfigError(`${field}.host must be a string`);
    if (pathPrefix !== undefined && typeof pathPrefix !== "string") {
      throw new ConfigError(`${field}.pathPrefix must be a string`);
    }
    if (middlewares !== undefined && !isStringArray(middlewares)) {
      throw new ConfigError(`${field}.middlewares must be an array of names`);
    }
    if (typeof target !== "string" || !target) {
      throw new ConfigError(`${field}.target must be a host:port string`);
    }
    return { host, pathPrefix, middlewares, target };
  });
}

function parseHealth(value: unknown): HealthOptions {
  if (value === undefined) return { ...DEFAULT_HEALTH_OPTIONS };
  if (!isObject(value)) throw new ConfigError("health must be an object");
  return {
    failureThreshold: positiveInt(
      value.failureThreshold,
      "health.failureThreshold",
      DEFAULT_HEALTH_OPTIONS.failureThreshold
    ),
    cooldownMs: positiveInt(value.cooldownMs, "health.cooldownMs", DEFAULT_HEALTH_OPTIONS.cooldownMs),
    connectTimeoutMs: positiveInt(
      value.connectTimeoutMs,
      "health.connectTimeoutMs",
      DEFAULT_HEALTH_OPTIONS.connectTimeoutMs
    ),
  };
}

function parseStreaming(value: unknown): StreamingOptions {
  if (value === undefined) {
    return {
      idleTimeoutMs: DEFAULT_IDLE_TIMEOUT_MS,
      contentTypes: [...DEFAULT_STREAMING_CONTENT_TYPES],
    };
  }
  if (!isObject(value)) throw new ConfigError("streaming must be an object");
  const contentTypes = value.contentTypes ?? DEFAULT_STREAMING_CONTENT_TYPES;
  if (!isStringArray(contentTypes) || contentTypes.length === 0) {
    throw new ConfigError("streaming.contentTypes must be a non-empty array of media types");
  }
  return {
    idleTimeoutMs: positiveInt(value.idleTimeoutMs, "streaming.idleTimeoutMs", DEFAULT_IDLE_TIMEOUT_MS),
    contentTypes: contentTypes.map((type) => type.toLowerCase()),
  };
}

/** Validate a parsed configuration document. */
export function parseConfig(raw: unknown, baseDir = process.cwd()): ProxyConfig {
  if (!isObject(raw)) throw new ConfigError("Configuration must be a JSON object");
  const redirectPort = raw.redirectPort;
  if (redirectPort !== undefined && !isPort(redirectPort)) {
    throw new ConfigError("redirectPort must be a port number");
  }
  return {
    listen: parseListen(raw.listen),
    redirectPort,
    certificates: parseCertificates(raw.certificates),
    middlewares: parseMiddlewares(raw.middlewares),
    routes: parseRoutes(raw.routes),
    health: parseHealth(raw.health),
    streaming: parseStreaming(raw.streaming),
    baseDir,
  };
}

/** Read and validate a configuration file. */
export function loadConfig(configPath: string): ProxyConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf-8");
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`);
  }
  return parseConfig(raw, path.dirname(path.resolve(configPath)));
}

/**
 * Resolve the config file path: explicit flag, then STREAMGATE_CONFIG, then
 * streamgate.json in the working directory.
 */
export function resolveConfigPath(flag?: string): string {
  return path.resolve(flag || process.env.STREAMGATE_CONFIG || DEFAULT_CONFIG_FILE);
}

/**
 * Return the listen port override from STREAMGATE_PORT, or null when unset
 * or invalid.
 */
export function getPortOverride(): number | null {
  const envPort = process.env.STREAMGATE_PORT;
  if (envPort) {
    const port = parseInt(envPort, 10);
    if (!isNaN(port) && port >= 1 && port <= 65535) return port;
  }
  return null;
}
