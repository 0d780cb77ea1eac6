import { describe, it, expect } from "vitest";
import {
  errorMessage,
  formatUrl,
  isErrnoException,
  isValidHostname,
  matchHostPattern,
  normalizeHost,
  parseAddress,
  pathOf,
} from "./utils.js";

describe("isErrnoException", () => {
  it("returns true for a Node.js system error", () => {
    const err = new Error("fail") as NodeJS.ErrnoException;
    err.code = "ECONNREFUSED";
    expect(isErrnoException(err)).toBe(true);
  });

  it("returns false for a plain Error", () => {
    expect(isErrnoException(new Error("fail"))).toBe(false);
  });

  it("returns false for non-errors", () => {
    expect(isErrnoException({ code: "ENOENT" })).toBe(false);
    expect(isErrnoException("ENOENT")).toBe(false);
  });
});

describe("errorMessage", () => {
  it("uses the message of an Error", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies anything else", () => {
    expect(errorMessage(42)).toBe("42");
  });
});

describe("normalizeHost", () => {
  it("lower-cases and strips the port", () => {
    expect(normalizeHost("API.Example.Test:8443")).toBe("api.example.test");
  });

  it("strips a trailing dot", () => {
    expect(normalizeHost("example.test.")).toBe("example.test");
  });

  it("removes IPv6 brackets and port", () => {
    expect(normalizeHost("[::1]:443")).toBe("::1");
  });

  it("returns empty string for empty input", () => {
    expect(normalizeHost("")).toBe("");
  });
});

describe("parseAddress", () => {
  it("parses host:port", () => {
    expect(parseAddress("127.0.0.1:4000")).toEqual({ host: "127.0.0.1", port: 4000 });
  });

  it("parses a bracketed IPv6 host", () => {
    expect(parseAddress("[::1]:8080")).toEqual({ host: "::1", port: 8080 });
  });

  it("rejects a missing port", () => {
    expect(() => parseAddress("backend.internal")).toThrow(
      'Invalid address "backend.internal": expected host:port'
    );
  });

  it("rejects an out-of-range port", () => {
    expect(() => parseAddress("localhost:70000")).toThrow("port must be between 1 and 65535");
  });

  it("rejects an unbracketed IPv6 host", () => {
    expect(() => parseAddress("::1:8080")).toThrow("expected host:port");
  });
});

describe("isValidHostname", () => {
  it("accepts ordinary names", () => {
    expect(isValidHostname("api.example.test")).toBe(true);
    expect(isValidHostname("localhost")).toBe(true);
  });

  it("accepts a leading wildcard label", () => {
    expect(isValidHostname("*.example.test")).toBe(true);
  });

  it("rejects wildcards when not allowed", () => {
    expect(isValidHostname("*.example.test", false)).toBe(false);
  });

  it("rejects wildcards in the middle", () => {
    expect(isValidHostname("api.*.test")).toBe(false);
  });

  it("rejects empty labels and bad characters", () => {
    expect(isValidHostname("a..b")).toBe(false);
    expect(isValidHostname("-bad.test")).toBe(false);
    expect(isValidHostname("under_score.test")).toBe(false);
    expect(isValidHostname("")).toBe(false);
  });
});

describe("matchHostPattern", () => {
  it("matches exact hosts", () => {
    expect(matchHostPattern("example.test", "example.test")).toBe(true);
    expect(matchHostPattern("example.test", "www.example.test")).toBe(false);
  });

  it("matches exactly one label for a wildcard", () => {
    expect(matchHostPattern("*.example.test", "api.example.test")).toBe(true);
    expect(matchHostPattern("*.example.test", "a.b.example.test")).toBe(false);
    expect(matchHostPattern("*.example.test", "example.test")).toBe(false);
  });

  it("matches any host for a bare *", () => {
    expect(matchHostPattern("*", "anything.test")).toBe(true);
  });
});

describe("pathOf", () => {
  it("drops the query string", () => {
    expect(pathOf("/api/users?page=2")).toBe("/api/users");
  });

  it("drops the fragment", () => {
    expect(pathOf("/docs#intro")).toBe("/docs");
  });

  it("returns plain paths unchanged", () => {
    expect(pathOf("/events")).toBe("/events");
  });
});

describe("formatUrl", () => {
  it("omits port 443", () => {
    expect(formatUrl("example.test", 443, "/a")).toBe("https://example.test/a");
  });

  it("includes other ports", () => {
    expect(formatUrl("example.test", 8443, "/a?b=1")).toBe("https://example.test:8443/a?b=1");
  });
});
