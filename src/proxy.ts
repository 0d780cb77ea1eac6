import * as http from "node:http";
import * as http2 from "node:http2";
import type * as net from "node:net";
import type { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { BackendConnectError, UnhealthyTargetError } from "./backend.js";
import type { ForwardedResponse } from "./backend.js";
import { composeMiddlewares, sendResponse } from "./middleware.js";
import { IdleTimer } from "./sessions.js";
import type {
  ExchangeInfo,
  NextFunction,
  ProxyRequest,
  ProxyServerOptions,
  ResponseWriter,
  Route,
  StreamCloseReason,
} from "./types.js";
import { consoleLogger, errorMessage, formatUrl, normalizeHost, pathOf } from "./utils.js";

/** Response header marking responses that passed through streamgate. */
export const PROXY_HEADER = "X-Streamgate";

/**
 * HTTP/1.1 hop-by-hop headers. They describe a single connection, so they are
 * never forwarded, and HTTP/2 forbids them in responses.
 */
const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "upgrade",
  "te",
  "trailer",
]);

/** Server type returned by createProxyServer. */
export type ProxyServer = http2.Http2SecureServer;

/**
 * Get the effective host value from a request.
 * HTTP/2 uses the :authority pseudo-header; HTTP/1.1 uses Host.
 */
function getRequestHost(req: http.IncomingMessage): string {
  const authority = req.headers[":authority"];
  if (typeof authority === "string" && authority) return authority;
  return req.headers.host || "";
}

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Build X-Forwarded-* headers for a proxied request. Values already set by a
 * proxy in front of this one are kept (X-Forwarded-For is appended to).
 */
function buildForwardedHeaders(req: http.IncomingMessage, proxyPort: number): Record<string, string> {
  const headers: Record<string, string> = {};
  const remoteAddress = req.socket.remoteAddress || "127.0.0.1";
  const hostHeader = getRequestHost(req);
  const forwardedFor = firstValue(req.headers["x-forwarded-for"]);

  headers["x-forwarded-for"] = forwardedFor ? `${forwardedFor}, ${remoteAddress}` : remoteAddress;
  headers["x-forwarded-proto"] = firstValue(req.headers["x-forwarded-proto"]) || "https";
  headers["x-forwarded-host"] = firstValue(req.headers["x-forwarded-host"]) || hostHeader;
  headers["x-forwarded-port"] = firstValue(req.headers["x-forwarded-port"]) || String(proxyPort);

  return headers;
}

/**
 * Copy the client's headers for the backend request: pseudo-headers and
 * hop-by-hop headers dropped (kept for upgrades, which need them), forwarding
 * headers added.
 */
function buildProxyRequestHeaders(
  req: http.IncomingMessage,
  proxyPort: number,
  upgrade = false
): http.OutgoingHttpHeaders {
  const connectionTokens = (firstValue(req.headers.connection) || "")
    .split(",")
    .map((token) => token.trim().toLowerCase());
  const headers: http.OutgoingHttpHeaders = {};
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined || key.startsWith(":")) continue;
    if (!upgrade && (HOP_BY_HOP_HEADERS.has(key) || connectionTokens.includes(key))) continue;
    headers[key] = value;
  }
  if (!headers.host) headers.host = getRequestHost(req);
  return { ...headers, ...buildForwardedHeaders(req, proxyPort) };
}

/** Drop hop-by-hop headers from a backend response. */
function buildResponseHeaders(headers: http.IncomingHttpHeaders): http.OutgoingHttpHeaders {
  const result: http.OutgoingHttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || HOP_BY_HOP_HEADERS.has(key)) continue;
    result[key] = value;
  }
  return result;
}

/**
 * A response is streaming when it has a streaming media type and declares no
 * fixed length.
 */
export function isStreamingResponse(
  headers: http.IncomingHttpHeaders,
  contentTypes: readonly string[]
): boolean {
  if (headers["content-length"] !== undefined) return false;
  const mediaType = (headers["content-type"] || "").split(";")[0].trim().toLowerCase();
  return mediaType !== "" && contentTypes.some((type) => type.toLowerCase() === mediaType);
}

/** The writer at the end of the chain: writes to the client response. */
function createClientWriter(res: http.ServerResponse): ResponseWriter {
  return {
    get headersSent() {
      return res.headersSent;
    },
    writeHead(head) {
      const headers = { ...head.headers };
      for (const key of Object.keys(headers)) {
        if (HOP_BY_HOP_HEADERS.has(key.toLowerCase())) delete headers[key];
      }
      if (head.streaming) headers["x-accel-buffering"] = "no";
      res.writeHead(head.statusCode, headers);
      return res;
    },
  };
}

function connectFailureMessage(err: unknown, route: Route): string {
  if (err instanceof UnhealthyTargetError) {
    return `Bad Gateway: backend ${route.target.address} is marked unhealthy.`;
  }
  if (err instanceof BackendConnectError && err.code === "ECONNREFUSED") {
    return `Bad Gateway: backend ${route.target.address} refused the connection.`;
  }
  return `Bad Gateway: backend ${route.target.address} is unreachable.`;
}

/**
 * Answer an upgrade request that cannot be relayed. The handshake is already
 * done, so the client gets a plain 502 rather than a reset.
 */
function rejectUpgrade(socket: net.Socket, message: string): void {
  if (socket.destroyed) return;
  const body = Buffer.from(message);
  socket.end(
    "HTTP/1.1 502 Bad Gateway\r\n" +
      "Content-Type: text/plain\r\n" +
      `Content-Length: ${body.length}\r\n` +
      `${PROXY_HEADER}: 1\r\n` +
      "Connection: close\r\n\r\n" +
      message
  );
}

/**
 * Create the TLS proxy server. Certificates are chosen per handshake by
 * server name; requests are routed by host and path prefix, run through the
 * matched route's middlewares and relayed to its backend.
 *
 * Creates an HTTP/2 secure server with HTTP/1.1 fallback (`allowHTTP1: true`),
 * so browsers get multiplexing while event streams and WebSocket upgrades keep
 * working over HTTP/1.1. There is no default certificate: a handshake whose
 * server name has no binding fails before any HTTP exchange.
 */
export function createProxyServer(options: ProxyServerOptions): ProxyServer {
  const {
    certificates,
    getRoutes,
    connector,
    sessions,
    streaming,
    proxyPort,
    logger = consoleLogger,
    onPhase,
  } = options;

  const failed = (info: ExchangeInfo, reason: string) => {
    onPhase?.("failed", { ...info, reason });
  };

  /** Terminal step of the chain: connect, forward, relay. */
  const forwardTo = (
    req: http.IncomingMessage,
    res: http.ServerResponse,
    info: ExchangeInfo,
    route: Route,
    signal: AbortSignal
  ): NextFunction => {
    return async (request, writer) => {
      onPhase?.("forwarding", info);

      let socket: net.Socket;
      try {
        socket = await connector.connect(route.target, signal);
      } catch (err: unknown) {
        if (signal.aborted) return;
        logger.error(`Proxy error for ${info.host}${pathOf(info.path)}: ${errorMessage(err)}`);
        failed(info, err instanceof UnhealthyTargetError ? "unhealthy-target" : "connect-failed");
        if (!writer.headersSent) {
          sendResponse(writer, 502, { "content-type": "text/plain" }, connectFailureMessage(err, route));
        }
        return;
      }

      let forwarded: ForwardedResponse;
      try {
        forwarded = await connector.forward(socket, request, req, signal);
      } catch (err: unknown) {
        if (signal.aborted) return;
        logger.error(`Proxy error for ${info.host}${pathOf(info.path)}: ${errorMessage(err)}`);
        failed(info, "backend-error");
        if (!writer.headersSent) {
          sendResponse(
            writer,
            502,
            { "content-type": "text/plain" },
            "Bad Gateway: the backend closed the connection."
          );
        }
        return;
      }

      const { request: proxyReq, response: proxyRes } = forwarded;
      const isStreaming = isStreamingResponse(proxyRes.headers, streaming.contentTypes);
      const sink: Writable = writer.writeHead({
        statusCode: proxyRes.statusCode || 502,
        headers: buildResponseHeaders(proxyRes.headers),
        streaming: isStreaming,
      });

      if (!isStreaming) {
        try {
          await pipeline(proxyRes, sink);
          onPhase?.("completed", info);
        } catch (err: unknown) {
          if (signal.aborted) return;
          logger.error(`Relay error for ${info.host}${pathOf(info.path)}: ${errorMessage(err)}`);
          failed(info, "relay-error");
        }
        return;
      }

      onPhase?.("streaming", info);
      const session = sessions.openSession(route, info.host, info.path, (reason) => {
        idle.stop();
        if (reason === "idle-timeout" || reason === "shutdown") {
          proxyReq.destroy();
          res.destroy();
        }
      });
      const idle = new IdleTimer(streaming.idleTimeoutMs, () => {
        sessions.close(session.id, "idle-timeout");
      });
      const touch = () => idle.touch();
      proxyRes.on("data", touch);
      req.on("data", touch);

      let reason: StreamCloseReason = "backend-closed";
      try {
        await pipeline(proxyRes, sink);
      } catch (err: unknown) {
        if (signal.aborted) {
          reason = "client-closed";
        } else if (sessions.get(session.id)) {
          reason = "error";
          logger.error(`Stream error for ${info.host}${pathOf(info.path)}: ${errorMessage(err)}`);
        }
      } finally {
        req.off("data", touch);
        idle.stop();
      }
      const closedHere = sessions.close(session.id, reason);
      if (closedHere && reason === "error") {
        failed(info, "stream-error");
      } else {
        onPhase?.("completed", info);
      }
    };
  };

  const handleRequest = (req: http.IncomingMessage, res: http.ServerResponse) => {
    res.setHeader(PROXY_HEADER, "1");

    const host = normalizeHost(getRequestHost(req));
    const url = req.url || "/";

    if (!host) {
      res.writeHead(400, { "Content-Type": "text/plain" });
      res.end("Missing Host header");
      return;
    }

    const info: ExchangeInfo = { host, path: url };
    onPhase?.("route-match", info);

    const route = getRoutes().match(host, url);
    if (!route) {
      failed(info, "no-route");
      res.writeHead(502, { "Content-Type": "text/plain" });
      res.end(`Bad Gateway: no route for ${host}${pathOf(url)}`);
      return;
    }
    info.route = route;

    if (!connector.canAttempt(route.target)) {
      failed(info, "unhealthy-target");
      res.writeHead(502, { "Content-Type": "text/plain" });
      res.end(`Bad Gateway: backend ${route.target.address} is marked unhealthy.`);
      return;
    }

    // Abort the backend side if the client disconnects
    const abort = new AbortController();
    res.on("close", () => abort.abort());
    req.on("error", () => abort.abort());

    const request: ProxyRequest = {
      method: req.method || "GET",
      host,
      path: url,
      headers: buildProxyRequestHeaders(req, proxyPort),
      route,
    };
    const chain = composeMiddlewares(route.middlewares, forwardTo(req, res, info, route, abort.signal));

    chain(request, createClientWriter(res)).catch((err: unknown) => {
      logger.error(`Proxy error for ${host}${pathOf(url)}: ${errorMessage(err)}`);
      failed(info, "internal-error");
      if (!res.headersSent) {
        res.writeHead(502, { "Content-Type": "text/plain" });
        res.end("Bad Gateway");
      } else {
        res.destroy();
      }
    });
  };

  const handleUpgrade = (req: http.IncomingMessage, socket: net.Socket, head: Buffer) => {
    const host = normalizeHost(getRequestHost(req));
    const url = req.url || "/";
    const info: ExchangeInfo = { host, path: url };
    onPhase?.("route-match", info);

    const route = getRoutes().match(host, url);
    if (!route) {
      failed(info, "no-route");
      rejectUpgrade(socket, `Bad Gateway: no route for ${host}${pathOf(url)}`);
      return;
    }
    info.route = route;

    if (!connector.canAttempt(route.target)) {
      failed(info, "unhealthy-target");
      rejectUpgrade(socket, `Bad Gateway: backend ${route.target.address} is marked unhealthy.`);
      return;
    }

    const abort = new AbortController();
    socket.once("close", () => abort.abort());
    onPhase?.("forwarding", info);

    connector
      .connect(route.target, abort.signal)
      .then((backendSocket) => {
        let answered = false;

        const proxyReq = http.request({
          path: url,
          method: req.method,
          headers: buildProxyRequestHeaders(req, proxyPort, true),
          createConnection: () => backendSocket,
        });

        proxyReq.on("upgrade", (proxyRes, proxySocket, proxyHead) => {
          answered = true;
          // Forward the backend's actual 101 response including Sec-WebSocket-Accept,
          // subprotocol negotiation, and extension headers.
          let response = `HTTP/1.1 101 Switching Protocols\r\n`;
          for (let i = 0; i < proxyRes.rawHeaders.length; i += 2) {
            response += `${proxyRes.rawHeaders[i]}: ${proxyRes.rawHeaders[i + 1]}\r\n`;
          }
          response += "\r\n";
          socket.write(response);

          if (proxyHead.length > 0) {
            socket.write(proxyHead);
          }
          proxySocket.pipe(socket);
          socket.pipe(proxySocket);

          proxySocket.on("error", () => socket.destroy());
          socket.on("error", () => proxySocket.destroy());
          onPhase?.("completed", info);
        });

        proxyReq.on("response", (res) => {
          answered = true;
          // The backend answered with a normal response instead of upgrading.
          if (!socket.destroyed) {
            let response = `HTTP/1.1 ${res.statusCode} ${res.statusMessage}\r\n`;
            for (let i = 0; i < res.rawHeaders.length; i += 2) {
              response += `${res.rawHeaders[i]}: ${res.rawHeaders[i + 1]}\r\n`;
            }
            response += "\r\n";
            socket.write(response);
            res.pipe(socket);
          }
          onPhase?.("completed", info);
        });

        proxyReq.on("error", (err) => {
          if (abort.signal.aborted) return;
          logger.error(`WebSocket proxy error for ${host}: ${err.message}`);
          if (answered) {
            socket.destroy();
            return;
          }
          failed(info, "backend-error");
          rejectUpgrade(socket, "Bad Gateway");
        });

        if (head.length > 0) {
          proxyReq.write(head);
        }
        proxyReq.end();
      })
      .catch((err: unknown) => {
        if (abort.signal.aborted) {
          socket.destroy();
          return;
        }
        logger.error(`WebSocket proxy error for ${host}: ${errorMessage(err)}`);
        failed(info, err instanceof UnhealthyTargetError ? "unhealthy-target" : "connect-failed");
        rejectUpgrade(socket, connectFailureMessage(err, route));
      });
  };

  const server = http2.createSecureServer({
    allowHTTP1: true,
    SNICallback: certificates.createSNICallback(),
  });

  // With allowHTTP1, the 'request' event receives objects compatible with
  // http.IncomingMessage / http.ServerResponse. Cast explicitly to satisfy TypeScript.
  server.on("request", (req: http2.Http2ServerRequest, res: http2.Http2ServerResponse) => {
    handleRequest(req as unknown as http.IncomingMessage, res as unknown as http.ServerResponse);
  });
  // WebSocket upgrades arrive over HTTP/1.1 connections (allowHTTP1)
  server.on("upgrade", (req: http.IncomingMessage, socket: net.Socket, head: Buffer) => {
    handleUpgrade(req, socket, head);
  });

  const sockets = new Set<net.Socket>();
  server.on("secureConnection", (socket: net.Socket) => {
    socket.setNoDelay(true);
    sockets.add(socket);
    socket.once("close", () => sockets.delete(socket));
  });

  server.on("tlsClientError", (err: Error, socket: net.Socket) => {
    logger.warn(`TLS handshake failed from ${socket.remoteAddress ?? "unknown"}: ${err.message}`);
  });

  // Streams never end on their own, so close() ends them and drops open sockets.
  const origClose = server.close.bind(server);
  server.close = function (cb?: (err?: Error) => void) {
    sessions.closeAll("shutdown");
    for (const socket of sockets) socket.destroy();
    return origClose(cb);
  } as typeof server.close;

  return server;
}

/**
 * Plain HTTP listener that redirects every request to the HTTPS origin.
 * It never proxies.
 */
export function createRedirectServer(httpsPort: number): http.Server {
  return http.createServer((req, res) => {
    res.setHeader(PROXY_HEADER, "1");
    const host = normalizeHost(req.headers.host || "");
    if (!host) {
      res.writeHead(400, { "Content-Type": "text/plain" });
      res.end("Missing Host header");
      return;
    }
    res.writeHead(308, { Location: formatUrl(host, httpsPort, req.url || "/"), "Content-Length": "0" });
    res.end();
  });
}
