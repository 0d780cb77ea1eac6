import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { BackendConnector } from "./backend.js";
import { RouteTable } from "./routes.js";
import { IdleTimer, StreamSessionRegistry } from "./sessions.js";
import type { Route } from "./types.js";

describe("IdleTimer", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires once after the timeout", () => {
    const onIdle = vi.fn();
    const timer = new IdleTimer(1_000, onIdle);

    vi.advanceTimersByTime(999);
    expect(onIdle).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onIdle).toHaveBeenCalledTimes(1);
    expect(timer.active).toBe(false);

    vi.advanceTimersByTime(5_000);
    expect(onIdle).toHaveBeenCalledTimes(1);
  });

  it("restarts the countdown on touch", () => {
    const onIdle = vi.fn();
    const timer = new IdleTimer(1_000, onIdle);

    for (let i = 0; i < 5; i++) {
      vi.advanceTimersByTime(800);
      timer.touch();
    }
    expect(onIdle).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1_000);
    expect(onIdle).toHaveBeenCalledTimes(1);
  });

  it("never fires once stopped", () => {
    const onIdle = vi.fn();
    const timer = new IdleTimer(1_000, onIdle);

    timer.stop();
    vi.advanceTimersByTime(2_000);

    expect(onIdle).not.toHaveBeenCalled();
    expect(timer.active).toBe(false);
  });
});

describe("StreamSessionRegistry", () => {
  let route: Route;

  beforeEach(() => {
    const table = RouteTable.build(
      [{ host: "example.test", pathPrefix: "/events", target: "127.0.0.1:3000" }],
      { middleware: () => undefined, target: (address) => new BackendConnector().target(address) }
    );
    route = table.routes[0];
  });

  it("registers sessions with distinct ids", () => {
    const registry = new StreamSessionRegistry();
    const a = registry.openSession(route, "example.test", "/events", () => {});
    const b = registry.openSession(route, "example.test", "/events?topic=b", () => {});

    expect(a.id).not.toBe(b.id);
    expect(a.route).toBe(route);
    expect(b.path).toBe("/events?topic=b");
    expect(registry.size).toBe(2);
    expect(registry.get(a.id)).toBe(a);
    expect(registry.list()).toEqual([a, b]);
  });

  it("runs the close handlers once with the reason", () => {
    const onClosed = vi.fn();
    const onClose = vi.fn();
    const registry = new StreamSessionRegistry({ onClosed });
    const session = registry.openSession(route, "example.test", "/events", onClose);

    expect(registry.close(session.id, "idle-timeout")).toBe(true);
    expect(registry.close(session.id, "client-closed")).toBe(false);

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith("idle-timeout");
    expect(onClosed).toHaveBeenCalledTimes(1);
    expect(onClosed).toHaveBeenCalledWith(session, "idle-timeout");
    expect(registry.get(session.id)).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it("closes every open session on shutdown", () => {
    const reasons: string[] = [];
    const registry = new StreamSessionRegistry();
    registry.openSession(route, "example.test", "/events", (reason) => reasons.push(`a:${reason}`));
    registry.openSession(route, "example.test", "/events", (reason) => reasons.push(`b:${reason}`));

    expect(registry.closeAll()).toBe(2);
    expect(reasons).toEqual(["a:shutdown", "b:shutdown"]);
    expect(registry.size).toBe(0);
    expect(registry.closeAll()).toBe(0);
  });
});
