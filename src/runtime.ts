import type * as http from "node:http";
import { BackendConnector } from "./backend.js";
import type { Dialer } from "./backend.js";
import { CertificateStore, loadCertificateFiles } from "./certs.js";
import type { ProxyConfig } from "./config.js";
import { createMiddlewareRegistry } from "./middleware.js";
import { createProxyServer, createRedirectServer } from "./proxy.js";
import type { ProxyServer } from "./proxy.js";
import { RouteTable } from "./routes.js";
import { StreamSessionRegistry } from "./sessions.js";
import type { ExchangeInfo, ExchangePhase, ProxyLogger } from "./types.js";
import { consoleLogger } from "./utils.js";

export interface ProxyRuntimeOptions {
  logger?: ProxyLogger;
  onPhase?: (phase: ExchangePhase, info: ExchangeInfo) => void;
  /** Override how backend connections are opened. */
  dial?: Dialer;
}

/**
 * Owns the serving state of one proxy process: certificates, route table,
 * backend health and open stream sessions. Listen address, health and
 * streaming settings are fixed at construction; certificates, middlewares
 * and routes can be reloaded.
 */
export class ProxyRuntime {
  readonly certificates: CertificateStore;
  readonly connector: BackendConnector;
  readonly sessions: StreamSessionRegistry;
  readonly config: ProxyConfig;
  private routeTable: RouteTable = RouteTable.empty;
  private readonly logger: ProxyLogger;
  private readonly onPhase: ProxyRuntimeOptions["onPhase"];

  constructor(config: ProxyConfig, options: ProxyRuntimeOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? consoleLogger;
    this.onPhase = options.onPhase;
    const logger = this.logger;

    this.certificates = new CertificateStore({ onWarning: (msg) => logger.warn(msg) });
    this.connector = new BackendConnector({
      ...config.health,
      dial: options.dial,
      onHealthChange: (target, failures) => {
        if (target.healthy) {
          logger.info(`Backend ${target.address} is healthy again`);
        } else {
          logger.warn(
            `Backend ${target.address} marked unhealthy after ${failures} failed connect(s); ` +
              `refusing requests for ${config.health.cooldownMs}ms`
          );
        }
      },
    });
    this.sessions = new StreamSessionRegistry({
      onClosed: (session, reason) => {
        const seconds = ((Date.now() - session.openedAt) / 1000).toFixed(1);
        const message = `Stream ${session.id} (${session.host}${session.path}) closed: ${reason} after ${seconds}s`;
        if (reason === "error") logger.warn(message);
        else logger.info(message);
      },
    });

    this.reload(config);
  }

  get routes(): RouteTable {
    return this.routeTable;
  }

  /**
   * Apply certificates, middlewares and routes from `config`. Everything is
   * built and validated first and swapped in together; on any error the
   * current configuration keeps serving and the error is rethrown. Backends
   * the new routes no longer use are dropped from the connector.
   */
  reload(config: ProxyConfig): void {
    const bindings = loadCertificateFiles(config.certificates, config.baseDir);
    const middleware = createMiddlewareRegistry(config.middlewares, (msg) => this.logger.warn(msg));
    const table = RouteTable.build(config.routes, {
      middleware,
      target: (address) => this.connector.target(address),
    });
    const snapshot = this.certificates.prepare(bindings);

    this.certificates.swap(snapshot);
    this.routeTable = table;
    this.connector.retain(table.routes.map((route) => route.target.address));
  }

  /** Create the TLS proxy server for this runtime. */
  createServer(proxyPort = this.config.listen.port): ProxyServer {
    return createProxyServer({
      certificates: this.certificates,
      getRoutes: () => this.routeTable,
      connector: this.connector,
      sessions: this.sessions,
      streaming: this.config.streaming,
      proxyPort,
      logger: this.logger,
      onPhase: this.onPhase,
    });
  }

  /** Create the HTTP -> HTTPS redirect listener, if configured. */
  createRedirectServer(httpsPort = this.config.listen.port): http.Server | null {
    if (this.config.redirectPort === undefined) return null;
    return createRedirectServer(httpsPort);
  }
}
