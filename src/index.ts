export { BackendConnector, BackendConnectError, UnhealthyTargetError } from "./backend.js";
export type { BackendConnectorOptions, Dialer, ForwardedResponse } from "./backend.js";
export {
  CertificateMismatchError,
  CertificateStore,
  InvalidCertificateError,
  NoMatchingCertificateError,
  loadCertificateFiles,
} from "./certs.js";
export type { CertificateFileSpec, CertificateSnapshot } from "./certs.js";
export { ConfigError, loadConfig, parseConfig, resolveConfigPath } from "./config.js";
export type { ProxyConfig } from "./config.js";
export {
  compress,
  composeMiddlewares,
  createMiddleware,
  createMiddlewareRegistry,
  noCompression,
  sendResponse,
  setHeaders,
  stripPrefix,
} from "./middleware.js";
export type { MiddlewareConfig } from "./middleware.js";
export { PROXY_HEADER, createProxyServer, createRedirectServer, isStreamingResponse } from "./proxy.js";
export type { ProxyServer } from "./proxy.js";
export { RouteConfigError, RouteTable } from "./routes.js";
export type { RouteResolvers } from "./routes.js";
export { ProxyRuntime } from "./runtime.js";
export type { ProxyRuntimeOptions } from "./runtime.js";
export { IdleTimer, StreamSessionRegistry } from "./sessions.js";
export type * from "./types.js";
