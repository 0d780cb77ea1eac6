import type { BackendTarget, Middleware, Route, RouteDefinition } from "./types.js";
import { errorMessage, isValidHostname, matchHostPattern, normalizeHost, pathOf } from "./utils.js";

/** Thrown when a route definition cannot be built. */
export class RouteConfigError extends Error {
  readonly routeIndex: number;

  constructor(routeIndex: number, message: string) {
    super(`Route #${routeIndex + 1}: ${message}`);
    this.name = "RouteConfigError";
    this.routeIndex = routeIndex;
  }
}

/** Lookups the table needs while building routes. */
export interface RouteResolvers {
  /** Return the middleware for a reference, or undefined when unknown. */
  middleware: (ref: string) => Middleware | undefined;
  target: (address: string) => BackendTarget;
}

function buildRoute(def: RouteDefinition, index: number, resolvers: RouteResolvers): Route {
  const hostPattern = def.host === "*" ? "*" : normalizeHost(def.host);
  if (hostPattern !== "*" && !isValidHostname(hostPattern)) {
    throw new RouteConfigError(index, `invalid host pattern "${def.host}"`);
  }

  const pathPrefix = def.pathPrefix ?? "/";
  if (!pathPrefix.startsWith("/")) {
    throw new RouteConfigError(index, `path prefix "${pathPrefix}" must start with "/"`);
  }

  const middlewareRefs = def.middlewares ?? [];
  const middlewares = middlewareRefs.map((ref) => {
    const middleware = resolvers.middleware(ref);
    if (!middleware) {
      throw new RouteConfigError(index, `unknown middleware "${ref}"`);
    }
    return middleware;
  });

  let target: BackendTarget;
  try {
    target = resolvers.target(def.target);
  } catch (err: unknown) {
    throw new RouteConfigError(index, errorMessage(err));
  }

  return Object.freeze({
    index,
    hostPattern,
    pathPrefix,
    middlewareRefs: Object.freeze([...middlewareRefs]),
    middlewares: Object.freeze(middlewares),
    target,
  });
}

/**
 * An immutable, ordered set of routes. Reloading builds a new table and
 * swaps it in; a table is never edited after construction.
 */
export class RouteTable {
  readonly routes: readonly Route[];

  private constructor(routes: Route[]) {
    this.routes = Object.freeze(routes);
  }

  static readonly empty = new RouteTable([]);

  /** Build a table from definitions. Throws `RouteConfigError` on the first bad route. */
  static build(definitions: RouteDefinition[], resolvers: RouteResolvers): RouteTable {
    return new RouteTable(definitions.map((def, i) => buildRoute(def, i, resolvers)));
  }

  /**
   * Pick the route for a request: among routes whose host pattern matches,
   * the longest path prefix wins, and the earlier declaration wins a tie.
   */
  match(host: string, url: string): Route | undefined {
    const normalized = normalizeHost(host);
    const path = pathOf(url);
    let best: Route | undefined;
    for (const route of this.routes) {
      if (!matchHostPattern(route.hostPattern, normalized)) continue;
      if (!path.startsWith(route.pathPrefix)) continue;
      if (!best || route.pathPrefix.length > best.pathPrefix.length) {
        best = route;
      }
    }
    return best;
  }

  get size(): number {
    return this.routes.length;
  }
}
