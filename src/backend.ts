import * as http from "node:http";
import * as net from "node:net";
import type { Readable } from "node:stream";
import type { BackendTarget, HealthOptions, ProxyRequest } from "./types.js";
import { errorMessage, parseAddress } from "./utils.js";

export const DEFAULT_HEALTH_OPTIONS: HealthOptions = {
  failureThreshold: 3,
  cooldownMs: 30_000,
  connectTimeoutMs: 10_000,
};

/** The target is in its cooldown window; no connect was attempted. */
export class UnhealthyTargetError extends Error {
  readonly address: string;

  constructor(address: string) {
    super(`Backend ${address} is marked unhealthy`);
    this.name = "UnhealthyTargetError";
    this.address = address;
  }
}

/** Dialing the backend failed or timed out. */
export class BackendConnectError extends Error {
  readonly address: string;
  readonly code: string | undefined;

  constructor(address: string, message: string, code?: string) {
    super(`Cannot connect to backend ${address}: ${message}`);
    this.name = "BackendConnectError";
    this.address = address;
    this.code = code;
  }
}

interface HealthRecord {
  consecutiveFailures: number;
  /** Epoch ms until which an unhealthy target is refused outright. */
  cooldownUntil: number;
  probeInFlight: boolean;
}

/** Opens a raw TCP connection; replaceable for tests. */
export type Dialer = (host: string, port: number) => net.Socket;

export interface BackendConnectorOptions extends Partial<HealthOptions> {
  dial?: Dialer;
  now?: () => number;
  /** Called when a target flips between healthy and unhealthy. */
  onHealthChange?: (target: BackendTarget, consecutiveFailures: number) => void;
}

export interface ForwardedResponse {
  request: http.ClientRequest;
  response: http.IncomingMessage;
}

/**
 * Connects to backend targets and keeps their health state. Targets are
 * interned by address so every route pointing at the same backend shares one
 * health flag, across reloads too.
 *
 * No pooling: every exchange dials its own connection.
 */
export class BackendConnector {
  readonly options: HealthOptions;
  private readonly targets = new Map<string, BackendTarget>();
  private readonly health = new Map<string, HealthRecord>();
  private readonly dial: Dialer;
  private readonly now: () => number;
  private readonly onHealthChange:
    | ((target: BackendTarget, consecutiveFailures: number) => void)
    | undefined;

  constructor(options: BackendConnectorOptions = {}) {
    this.options = {
      failureThreshold: options.failureThreshold ?? DEFAULT_HEALTH_OPTIONS.failureThreshold,
      cooldownMs: options.cooldownMs ?? DEFAULT_HEALTH_OPTIONS.cooldownMs,
      connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_HEALTH_OPTIONS.connectTimeoutMs,
    };
    this.dial = options.dial ?? ((host, port) => net.connect({ host, port }));
    this.now = options.now ?? Date.now;
    this.onHealthChange = options.onHealthChange;
  }

  /** Get or create the shared target for `address`. */
  target(address: string): BackendTarget {
    const existing = this.targets.get(address);
    if (existing) return existing;
    const { host, port } = parseAddress(address);
    const target: BackendTarget = { address, host, port, healthy: true };
    this.targets.set(address, target);
    this.health.set(address, { consecutiveFailures: 0, cooldownUntil: 0, probeInFlight: false });
    return target;
  }

  /** Forget every target whose address is not in `addresses`. */
  retain(addresses: Iterable<string>): void {
    const keep = new Set(addresses);
    for (const address of [...this.targets.keys()]) {
      if (keep.has(address)) continue;
      this.targets.delete(address);
      this.health.delete(address);
    }
  }

  /** Addresses of the targets currently tracked. */
  addresses(): string[] {
    return [...this.targets.keys()];
  }

  private record(target: BackendTarget): HealthRecord {
    let record = this.health.get(target.address);
    if (!record) {
      record = { consecutiveFailures: 0, cooldownUntil: 0, probeInFlight: false };
      this.health.set(target.address, record);
    }
    return record;
  }

  /**
   * Whether a request may try this target now. Unhealthy targets are refused
   * until their cooldown ends; after that one probe at a time gets through.
   * Does not claim the probe slot.
   */
  canAttempt(target: BackendTarget): boolean {
    if (target.healthy) return true;
    const record = this.record(target);
    return this.now() >= record.cooldownUntil && !record.probeInFlight;
  }

  /** Like `canAttempt`, but claims the probe slot for an unhealthy target. */
  admit(target: BackendTarget): boolean {
    if (!this.canAttempt(target)) return false;
    if (!target.healthy) this.record(target).probeInFlight = true;
    return true;
  }

  private markSuccess(target: BackendTarget): void {
    const record = this.record(target);
    record.consecutiveFailures = 0;
    record.cooldownUntil = 0;
    record.probeInFlight = false;
    if (!target.healthy) {
      target.healthy = true;
      this.onHealthChange?.(target, 0);
    }
  }

  private markFailure(target: BackendTarget): void {
    const record = this.record(target);
    record.consecutiveFailures++;
    const wasProbe = record.probeInFlight;
    record.probeInFlight = false;
    if (wasProbe || record.consecutiveFailures >= this.options.failureThreshold) {
      record.cooldownUntil = this.now() + this.options.cooldownMs;
      if (target.healthy) {
        target.healthy = false;
        this.onHealthChange?.(target, record.consecutiveFailures);
      }
    }
  }

  /** Release a claimed probe slot without recording an outcome. */
  private release(target: BackendTarget): void {
    this.record(target).probeInFlight = false;
  }

  /**
   * Open a TCP connection to the target. Refuses without dialing while the
   * target is cooling down. Aborting through `signal` (the client went away)
   * does not count as a failure.
   */
  connect(target: BackendTarget, signal?: AbortSignal): Promise<net.Socket> {
    if (!this.admit(target)) {
      return Promise.reject(new UnhealthyTargetError(target.address));
    }

    return new Promise<net.Socket>((resolve, reject) => {
      const socket = this.dial(target.host, target.port);
      let settled = false;

      const settle = () => {
        settled = true;
        clearTimeout(timer);
        socket.off("connect", onConnect);
        socket.off("error", onError);
        signal?.removeEventListener("abort", onAbort);
      };

      const onConnect = () => {
        if (settled) return;
        settle();
        this.markSuccess(target);
        resolve(socket);
      };

      const onError = (err: NodeJS.ErrnoException) => {
        if (settled) return;
        settle();
        socket.destroy();
        this.markFailure(target);
        reject(new BackendConnectError(target.address, err.message, err.code));
      };

      const onAbort = () => {
        if (settled) return;
        settle();
        socket.destroy();
        this.release(target);
        reject(new Error(`Connect to ${target.address} aborted`));
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settle();
        socket.destroy();
        this.markFailure(target);
        reject(
          new BackendConnectError(
            target.address,
            `timed out after ${this.options.connectTimeoutMs}ms`,
            "ETIMEDOUT"
          )
        );
      }, this.options.connectTimeoutMs);

      socket.once("connect", onConnect);
      socket.once("error", onError);
      if (signal) {
        if (signal.aborted) {
          onAbort();
          return;
        }
        signal.addEventListener("abort", onAbort, { once: true });
      }
    });
  }

  /**
   * Send `request` over an already connected socket and resolve with the
   * backend's response head. The body, if any, is piped from `body`; aborting
   * `signal` destroys the backend request.
   */
  forward(
    socket: net.Socket,
    request: ProxyRequest,
    body?: Readable,
    signal?: AbortSignal
  ): Promise<ForwardedResponse> {
    return new Promise<ForwardedResponse>((resolve, reject) => {
      const proxyReq = http.request({
        method: request.method,
        path: request.path,
        headers: request.headers,
        signal,
        createConnection: () => socket,
      });

      proxyReq.once("response", (response) => resolve({ request: proxyReq, response }));
      proxyReq.on("error", (err) => {
        socket.destroy();
        reject(new Error(`Backend ${request.route.target.address} failed: ${errorMessage(err)}`));
      });

      if (body) {
        body.pipe(proxyReq);
      } else {
        proxyReq.end();
      }
    });
  }
}
