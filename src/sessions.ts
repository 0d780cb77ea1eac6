import * as crypto from "node:crypto";
import type { Route, StreamCloseReason, StreamSession } from "./types.js";

/** Default idle timeout for streaming exchanges (30 minutes). */
export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60 * 1000;

/**
 * Fires `onIdle` once after `timeoutMs` without a `touch()`. Timers are
 * unref'd so an idle stream never keeps the process alive on its own.
 */
export class IdleTimer {
  private timer: ReturnType<typeof setTimeout> | null;

  constructor(timeoutMs: number, onIdle: () => void) {
    const timer = setTimeout(() => {
      this.timer = null;
      onIdle();
    }, timeoutMs);
    timer.unref();
    this.timer = timer;
  }

  touch(): void {
    this.timer?.refresh();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get active(): boolean {
    return this.timer !== null;
  }
}

interface OpenSession {
  session: StreamSession;
  onClose: (reason: StreamCloseReason) => void;
}

/** Tracks open streaming exchanges so they can be listed and shut down. */
export class StreamSessionRegistry {
  private readonly open = new Map<string, OpenSession>();
  private readonly onClosed:
    | ((session: StreamSession, reason: StreamCloseReason) => void)
    | undefined;

  constructor(options?: {
    onClosed?: (session: StreamSession, reason: StreamCloseReason) => void;
  }) {
    this.onClosed = options?.onClosed;
  }

  /**
   * Register a new session. `onClose` tears down both sides of the exchange;
   * it runs at most once, whoever closes first.
   */
  openSession(
    route: Route,
    host: string,
    path: string,
    onClose: (reason: StreamCloseReason) => void
  ): StreamSession {
    const session: StreamSession = {
      id: crypto.randomUUID(),
      route,
      host,
      path,
      openedAt: Date.now(),
    };
    this.open.set(session.id, { session, onClose });
    return session;
  }

  close(id: string, reason: StreamCloseReason): boolean {
    const entry = this.open.get(id);
    if (!entry) return false;
    this.open.delete(id);
    entry.onClose(reason);
    this.onClosed?.(entry.session, reason);
    return true;
  }

  closeAll(reason: StreamCloseReason = "shutdown"): number {
    const ids = [...this.open.keys()];
    for (const id of ids) this.close(id, reason);
    return ids.length;
  }

  get(id: string): StreamSession | undefined {
    return this.open.get(id)?.session;
  }

  list(): StreamSession[] {
    return [...this.open.values()].map((entry) => entry.session);
  }

  get size(): number {
    return this.open.size;
  }
}
