import type * as http from "node:http";
import type { Writable } from "node:stream";
import * as zlib from "node:zlib";
import type { Middleware, NextFunction, ResponseHead, ResponseWriter } from "./types.js";

/** Middleware settings as they appear in configuration. */
export type MiddlewareConfig =
  | { type: "no-compression" }
  | { type: "compress" }
  | { type: "headers"; request?: Record<string, string>; response?: Record<string, string> }
  | { type: "strip-prefix"; prefixes: string[] };

export type MiddlewareType = MiddlewareConfig["type"];

export const MIDDLEWARE_TYPES: readonly MiddlewareType[] = [
  "no-compression",
  "compress",
  "headers",
  "strip-prefix",
];

/**
 * Compose middlewares around a terminal handler. Requests pass through them in
 * declared order; since each middleware may wrap the writer it hands on,
 * responses pass through the wrappers in reverse order.
 */
export function composeMiddlewares(
  middlewares: readonly Middleware[],
  terminal: NextFunction
): NextFunction {
  return middlewares.reduceRight<NextFunction>(
    (next, middleware) => (request, writer) => middleware.apply(request, writer, next),
    terminal
  );
}

/** Write a complete bounded response, e.g. to short-circuit the chain. */
export function sendResponse(
  writer: ResponseWriter,
  statusCode: number,
  headers: http.OutgoingHttpHeaders,
  body = ""
): void {
  const sink = writer.writeHead({
    statusCode,
    headers: { ...headers, "content-length": Buffer.byteLength(body) },
    streaming: false,
  });
  sink.end(body);
}

/** Wrap a writer, transforming the head (and optionally the body) on the way out. */
function wrapWriter(
  writer: ResponseWriter,
  writeHead: (head: ResponseHead, inner: ResponseWriter) => Writable
): ResponseWriter {
  return {
    get headersSent() {
      return writer.headersSent;
    },
    writeHead: (head) => writeHead(head, writer),
  };
}

function headerValue(value: http.OutgoingHttpHeader | undefined): string {
  if (value === undefined) return "";
  return Array.isArray(value) ? value.join(", ") : String(value);
}

/** Remove every case variant of a header name. */
function deleteHeader(headers: http.OutgoingHttpHeaders, name: string): void {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lower) delete headers[key];
  }
}

function createDecoder(encoding: string): zlib.Gunzip | zlib.Inflate | zlib.BrotliDecompress | null {
  // Flush every decoded chunk so streamed frames are not held back.
  switch (encoding) {
    case "gzip":
    case "x-gzip":
      return zlib.createGunzip({ flush: zlib.constants.Z_SYNC_FLUSH });
    case "deflate":
      return zlib.createInflate({ flush: zlib.constants.Z_SYNC_FLUSH });
    case "br":
      return zlib.createBrotliDecompress({
        flush: zlib.constants.BROTLI_OPERATION_FLUSH,
      });
    default:
      return null;
  }
}

/**
 * Keep compression off a route: ask the backend for the identity encoding
 * and decode anything it compresses anyway, so the client always gets a plain
 * body whatever it advertised.
 */
export function noCompression(
  name = "no-compression",
  onWarning?: (message: string) => void
): Middleware {
  return {
    name,
    apply(request, writer, next) {
      const isHead = request.method.toUpperCase() === "HEAD";
      deleteHeader(request.headers, "accept-encoding");
      request.headers["accept-encoding"] = "identity";

      return next(
        request,
        wrapWriter(writer, (head, inner) => {
          const encoding = headerValue(head.headers["content-encoding"]).trim().toLowerCase();
          if (!encoding || encoding === "identity") return inner.writeHead(head);

          // No body to decode; the encoded length no longer applies either.
          if (isHead || head.statusCode === 204 || head.statusCode === 304) {
            const headers = { ...head.headers };
            deleteHeader(headers, "content-encoding");
            deleteHeader(headers, "content-length");
            return inner.writeHead({ ...head, headers });
          }

          const decoder = createDecoder(encoding);
          if (!decoder) {
            onWarning?.(`Cannot decode content-encoding "${encoding}" from ${request.route.target.address}`);
            return inner.writeHead(head);
          }

          const headers = { ...head.headers };
          deleteHeader(headers, "content-encoding");
          deleteHeader(headers, "content-length");
          const sink = inner.writeHead({ ...head, headers });
          decoder.pipe(sink);
          decoder.on("error", (err) => sink.destroy(err));
          return decoder;
        })
      );
    },
  };
}

function acceptsGzip(acceptEncoding: string): boolean {
  return acceptEncoding
    .split(",")
    .map((part) => part.trim().split(";"))
    .some(([coding, ...params]) => {
      if (coding.trim().toLowerCase() !== "gzip" && coding.trim() !== "*") return false;
      const q = params.map((p) => p.trim()).find((p) => p.startsWith("q="));
      return q === undefined || parseFloat(q.slice(2)) > 0;
    });
}

/**
 * Gzip bounded responses for clients that accept it. Streaming responses
 * pass through untouched. Accept-Encoding is read when the response arrives,
 * so a `no-compression` anywhere in the chain turns this off.
 */
export function compress(name = "compress"): Middleware {
  return {
    name,
    apply(request, writer, next) {
      const isHead = request.method.toUpperCase() === "HEAD";

      return next(
        request,
        wrapWriter(writer, (head, inner) => {
          const acceptEncoding = headerValue(request.headers["accept-encoding"]);
          if (
            head.streaming ||
            isHead ||
            head.statusCode === 204 ||
            head.statusCode === 304 ||
            head.headers["content-encoding"] !== undefined ||
            !acceptsGzip(acceptEncoding)
          ) {
            return inner.writeHead(head);
          }

          const headers = { ...head.headers };
          deleteHeader(headers, "content-length");
          headers["content-encoding"] = "gzip";
          const vary = headerValue(headers["vary"]);
          headers["vary"] = vary ? `${vary}, Accept-Encoding` : "Accept-Encoding";

          const gzip = zlib.createGzip();
          const sink = inner.writeHead({ ...head, headers });
          gzip.pipe(sink);
          gzip.on("error", (err) => sink.destroy(err));
          return gzip;
        })
      );
    },
  };
}

/** Set request and response headers; an empty value removes the header. */
export function setHeaders(
  name: string,
  options: { request?: Record<string, string>; response?: Record<string, string> }
): Middleware {
  const applyChanges = (headers: http.OutgoingHttpHeaders, changes: Record<string, string>) => {
    for (const [key, value] of Object.entries(changes)) {
      deleteHeader(headers, key);
      if (value !== "") headers[key.toLowerCase()] = value;
    }
  };

  return {
    name,
    apply(request, writer, next) {
      if (options.request) applyChanges(request.headers, options.request);
      const responseChanges = options.response;
      if (!responseChanges) return next(request, writer);

      return next(
        request,
        wrapWriter(writer, (head, inner) => {
          const headers = { ...head.headers };
          applyChanges(headers, responseChanges);
          return inner.writeHead({ ...head, headers });
        })
      );
    },
  };
}

/**
 * Remove the first matching prefix from the forwarded path. The removed
 * prefix is passed on in X-Forwarded-Prefix.
 */
export function stripPrefix(name: string, prefixes: string[]): Middleware {
  const sorted = [...prefixes].sort((a, b) => b.length - a.length);
  return {
    name,
    apply(request, writer, next) {
      const prefix = sorted.find((p) => request.path.startsWith(p));
      if (prefix) {
        const rest = request.path.slice(prefix.length);
        request.path = rest.startsWith("/") ? rest : `/${rest}`;
        request.headers["x-forwarded-prefix"] = prefix;
      }
      return next(request, writer);
    },
  };
}

/** Instantiate a configured middleware. */
export function createMiddleware(
  name: string,
  config: MiddlewareConfig,
  onWarning?: (message: string) => void
): Middleware {
  switch (config.type) {
    case "no-compression":
      return noCompression(name, onWarning);
    case "compress":
      return compress(name);
    case "headers":
      return setHeaders(name, config);
    case "strip-prefix":
      return stripPrefix(name, config.prefixes);
  }
}

/**
 * Build the middleware lookup used by the route table: configured middlewares
 * by name, plus `no-compression` and `compress` by their bare type names.
 */
export function createMiddlewareRegistry(
  configs: Record<string, MiddlewareConfig>,
  onWarning?: (message: string) => void
): (ref: string) => Middleware | undefined {
  const registry = new Map<string, Middleware>();
  registry.set("no-compression", noCompression("no-compression", onWarning));
  registry.set("compress", compress("compress"));
  for (const [name, config] of Object.entries(configs)) {
    registry.set(name, createMiddleware(name, config, onWarning));
  }
  return (ref) => registry.get(ref);
}
