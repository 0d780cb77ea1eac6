import type * as http from "node:http";
import type { Writable } from "node:stream";
import type { CertificateStore } from "./certs.js";
import type { BackendConnector } from "./backend.js";
import type { RouteTable } from "./routes.js";
import type { StreamSessionRegistry } from "./sessions.js";

/** Sink for operator-facing messages. Library code never prints on its own. */
export interface ProxyLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** A hostname set with the PEM certificate chain and private key serving it. */
export interface CertificateBinding {
  /** Exact hostnames or single-level wildcards (`*.example.test`), lower-cased. */
  hostnames: string[];
  cert: Buffer;
  key: Buffer;
}

/** A backend address plus its health flag, shared by every route that targets it. */
export interface BackendTarget {
  /** `host:port` as written in the configuration. */
  readonly address: string;
  readonly host: string;
  readonly port: number;
  healthy: boolean;
}

/** A route as declared in configuration. */
export interface RouteDefinition {
  host: string;
  pathPrefix?: string;
  middlewares?: string[];
  target: string;
}

/** A built, immutable route. */
export interface Route {
  /** Declaration order; ties between equal prefixes go to the lower index. */
  readonly index: number;
  readonly hostPattern: string;
  readonly pathPrefix: string;
  readonly middlewareRefs: readonly string[];
  readonly middlewares: readonly Middleware[];
  readonly target: BackendTarget;
}

/** The outgoing request as seen (and edited) by the middleware chain. */
export interface ProxyRequest {
  method: string;
  /** Host the client asked for, without port. */
  host: string;
  /** Path and query string to send to the backend. */
  path: string;
  headers: http.OutgoingHttpHeaders;
  /** The route this request matched. */
  readonly route: Route;
}

export interface ResponseHead {
  statusCode: number;
  headers: http.OutgoingHttpHeaders;
  /**
   * True when the body is an open-ended stream of frames. Decided once from
   * the backend's head, before any middleware sees it.
   */
  streaming: boolean;
}

/**
 * Where a middleware (or the proxy itself) writes a response. Wrapping a
 * writer is how a middleware transforms the response head and body.
 */
export interface ResponseWriter {
  readonly headersSent: boolean;
  /** Commit the response head and return the sink for the body. */
  writeHead(head: ResponseHead): Writable;
}

export type NextFunction = (request: ProxyRequest, writer: ResponseWriter) => Promise<void>;

/**
 * A request/response transformer. Call `next` to continue down the chain, or
 * write to `writer` and return to short-circuit.
 */
export interface Middleware {
  readonly name: string;
  apply(request: ProxyRequest, writer: ResponseWriter, next: NextFunction): Promise<void>;
}

/** One long-lived streaming exchange. */
export interface StreamSession {
  readonly id: string;
  readonly route: Route;
  readonly host: string;
  readonly path: string;
  readonly openedAt: number;
}

export type StreamCloseReason =
  | "client-closed"
  | "backend-closed"
  | "idle-timeout"
  | "error"
  | "shutdown";

export interface HealthOptions {
  /** Consecutive connect failures before a target is marked unhealthy. */
  failureThreshold: number;
  /** How long an unhealthy target is refused before a probe is allowed. */
  cooldownMs: number;
  connectTimeoutMs: number;
}

export interface StreamingOptions {
  /** Close a streaming exchange after this long without bytes in either direction. */
  idleTimeoutMs: number;
  /** Media types that mark a response without Content-Length as streaming. */
  contentTypes: string[];
}

/** Per-request progress through the proxy. */
export type ExchangePhase = "route-match" | "forwarding" | "streaming" | "completed" | "failed";

export interface ExchangeInfo {
  host: string;
  path: string;
  route?: Route;
  /** Set for the `failed` phase. */
  reason?: string;
}

export interface ProxyServerOptions {
  certificates: CertificateStore;
  /** Called on each request to get the current route table snapshot. */
  getRoutes: () => RouteTable;
  connector: BackendConnector;
  sessions: StreamSessionRegistry;
  streaming: StreamingOptions;
  /** The port the proxy is listening on (used for X-Forwarded-Port). */
  proxyPort: number;
  /** Defaults to console output. */
  logger?: ProxyLogger;
  /** Observe phase transitions of each exchange. */
  onPhase?: (phase: ExchangePhase, info: ExchangeInfo) => void;
}
