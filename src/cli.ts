#!/usr/bin/env node

import chalk from "chalk";
import * as fs from "node:fs";
import type * as net from "node:net";
import { ConfigError, getPortOverride, loadConfig, resolveConfigPath } from "./config.js";
import type { ProxyConfig } from "./config.js";
import {
  DEBOUNCE_MS,
  EXIT_TIMEOUT_MS,
  createCliLogger,
  formatRouteTable,
  parsePort,
  readFlag,
  readVersion,
} from "./cli-utils.js";
import { ProxyRuntime } from "./runtime.js";
import { errorMessage, isErrnoException } from "./utils.js";

// ---------------------------------------------------------------------------
// Proxy server lifecycle
// ---------------------------------------------------------------------------

function reportListenError(server: net.Server, port: number): void {
  server.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") {
      console.error(chalk.red(`Port ${port} is already in use.`));
      console.error(chalk.blue("Check what is using the port:"));
      console.error(chalk.cyan(`  lsof -ti tcp:${port}`));
    } else if (err.code === "EACCES") {
      console.error(chalk.red(`Permission denied for port ${port}.`));
      console.error(chalk.blue("Run with elevated privileges, or pick a port above 1023:"));
      console.error(chalk.cyan("  streamgate start --port 8443"));
    } else {
      console.error(chalk.red(`Proxy error: ${err.message}`));
    }
    process.exit(1);
  });
}

function startProxy(configPath: string, config: ProxyConfig, portOverride: number | null): void {
  const logger = createCliLogger();
  const runtime = new ProxyRuntime(config, { logger });
  const { host, port } = config.listen;

  const server = runtime.createServer();
  reportListenError(server, port);
  server.listen(port, host, () => {
    logger.info(chalk.green(`HTTPS proxy listening on ${host}:${port}`));
    for (const line of formatRouteTable(runtime.routes)) {
      logger.info(chalk.gray(`  ${line}`));
    }
  });

  const redirect = runtime.createRedirectServer();
  if (redirect && config.redirectPort !== undefined) {
    const redirectPort = config.redirectPort;
    reportListenError(redirect, redirectPort);
    redirect.listen(redirectPort, host, () => {
      logger.info(chalk.green(`HTTP redirect listening on ${host}:${redirectPort}`));
    });
  }

  // Reload is all-or-nothing: a bad file leaves the running configuration alone
  const reload = (trigger: string) => {
    try {
      const next = loadConfig(configPath);
      const portChanged = portOverride === null && next.listen.port !== config.listen.port;
      if (portChanged || next.listen.host !== config.listen.host) {
        logger.warn("Listen address changes take effect after a restart");
      }
      runtime.reload(next);
      logger.info(chalk.green(`Configuration reloaded (${trigger}): ${runtime.routes.size} routes`));
    } catch (err: unknown) {
      logger.error(`Reload failed (${trigger}), keeping current configuration: ${errorMessage(err)}`);
    }
  };

  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  let watcher: fs.FSWatcher | null = null;
  try {
    watcher = fs.watch(configPath, () => {
      if (debounceTimer) clearTimeout(debounceTimer);
      debounceTimer = setTimeout(() => reload("file change"), DEBOUNCE_MS);
    });
  } catch {
    logger.warn("fs.watch unavailable; send SIGHUP to reload the configuration");
  }

  const onHangup = () => reload("SIGHUP");
  process.on("SIGHUP", onHangup);

  // Cleanup on exit
  let exiting = false;
  const cleanup = () => {
    if (exiting) return;
    exiting = true;
    if (debounceTimer) clearTimeout(debounceTimer);
    watcher?.close();
    process.off("SIGHUP", onHangup);
    const closed = runtime.sessions.size;
    if (closed > 0) logger.info(`Closing ${closed} open stream(s)`);
    redirect?.close();
    server.close(() => process.exit(0));
    // Force exit after a short timeout in case connections don't drain
    setTimeout(() => process.exit(0), EXIT_TIMEOUT_MS).unref();
  };

  process.on("SIGINT", cleanup);
  process.on("SIGTERM", cleanup);

  console.log(chalk.cyan("\nProxy is running. Press Ctrl+C to stop.\n"));
  console.log(chalk.gray(`Config file: ${configPath}`));
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function checkConfig(configPath: string): void {
  const config = loadConfig(configPath);
  const warnings: string[] = [];
  const runtime = new ProxyRuntime(config, {
    logger: {
      info: () => {},
      warn: (msg) => warnings.push(msg),
      error: (msg) => warnings.push(msg),
    },
  });

  console.log(chalk.green(`Configuration OK: ${configPath}`));
  console.log(chalk.blue.bold("\nCertificates:\n"));
  for (const hostname of runtime.certificates.hostnames()) {
    console.log(`  ${chalk.cyan(hostname)}`);
  }
  console.log(chalk.blue.bold("\nRoutes:\n"));
  for (const line of formatRouteTable(runtime.routes)) {
    console.log(`  ${chalk.cyan(line)}`);
  }
  if (warnings.length > 0) {
    console.log(chalk.yellow.bold("\nWarnings:\n"));
    for (const warning of warnings) console.log(chalk.yellow(`  ${warning}`));
  }
  console.log();
}

function printHelp(): void {
  console.log(`
${chalk.bold("streamgate")} - TLS reverse proxy with host/path routing and unbuffered event streams.

${chalk.bold("Usage:")}
  ${chalk.cyan("streamgate start")}                 Run the proxy in the foreground
  ${chalk.cyan("streamgate check")}                 Validate the configuration and certificates

${chalk.bold("Options:")}
  -c, --config <file>   Configuration file (default: ./streamgate.json)
  -p, --port <number>   Override listen.port from the configuration

${chalk.bold("Signals:")}
  SIGHUP                Reload certificates, middlewares and routes

${chalk.bold("Environment variables:")}
  STREAMGATE_CONFIG     Configuration file path
  STREAMGATE_PORT       Listen port override

${chalk.bold("Examples:")}
  streamgate start -c /etc/streamgate/streamgate.json
  streamgate check
`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    printHelp();
    return;
  }

  if (args[0] === "--version" || args[0] === "-v") {
    console.log(readVersion());
    return;
  }

  const command = args[0];
  const configPath = resolveConfigPath(readFlag(args, "config", "c") ?? undefined);

  if (command === "check") {
    checkConfig(configPath);
    return;
  }

  if (command === "start") {
    const config = loadConfig(configPath);
    const portFlag = readFlag(args, "port", "p");
    const port = portFlag !== null ? parsePort(portFlag) : getPortOverride();
    if (port !== null) config.listen.port = port;
    startProxy(configPath, config, port);
    return;
  }

  console.error(chalk.red(`Error: Unknown command "${command}".`));
  console.error(chalk.blue("Run with --help for usage."));
  process.exit(1);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(chalk.red("Configuration error:"), err.message);
  } else if (isErrnoException(err) && err.code === "EACCES") {
    console.error(chalk.red("Permission denied:"), err.message);
  } else {
    console.error(chalk.red("Error:"), errorMessage(err));
  }
  process.exit(1);
});
