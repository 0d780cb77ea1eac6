import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  CertificateMismatchError,
  CertificateStore,
  InvalidCertificateError,
  NoMatchingCertificateError,
  loadCertificateFiles,
} from "./certs.js";
import { generateCertificate } from "./test-helpers.js";
import type { TestCertificate } from "./test-helpers.js";

describe("CertificateStore", () => {
  let tmpDir: string;
  let apiCert: TestCertificate;
  let wildCert: TestCertificate;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "streamgate-certs-test-"));
    apiCert = generateCertificate(tmpDir, "api", ["api.example.test", "www.example.test"]);
    wildCert = generateCertificate(tmpDir, "wild", ["*.apps.test"]);
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("resolve", () => {
    it("returns the binding for an exact hostname", () => {
      const store = new CertificateStore();
      store.load([{ hostnames: ["api.example.test"], cert: apiCert.cert, key: apiCert.key }]);

      const binding = store.resolve("api.example.test");
      expect(binding?.hostnames).toEqual(["api.example.test"]);
      expect(binding?.cert).toBe(apiCert.cert);
    });

    it("matches case-insensitively and ignores a port", () => {
      const store = new CertificateStore();
      store.load([{ hostnames: ["API.example.test"], cert: apiCert.cert, key: apiCert.key }]);

      expect(store.resolve("Api.Example.Test:443")?.hostnames).toEqual(["api.example.test"]);
    });

    it("falls back to a single-label wildcard", () => {
      const store = new CertificateStore();
      store.load([{ hostnames: ["*.apps.test"], cert: wildCert.cert, key: wildCert.key }]);

      expect(store.resolve("billing.apps.test")?.cert).toBe(wildCert.cert);
      expect(store.resolve("a.b.apps.test")).toBeUndefined();
      expect(store.resolve("apps.test")).toBeUndefined();
    });

    it("prefers an exact binding over a wildcard", () => {
      const store = new CertificateStore();
      store.load([
        { hostnames: ["*.apps.test"], cert: wildCert.cert, key: wildCert.key },
        { hostnames: ["api.apps.test"], cert: apiCert.cert, key: apiCert.key },
      ]);

      expect(store.resolve("api.apps.test")?.cert).toBe(apiCert.cert);
      expect(store.resolve("web.apps.test")?.cert).toBe(wildCert.cert);
    });

    it("returns undefined for an unlisted name", () => {
      const store = new CertificateStore();
      store.load([{ hostnames: ["api.example.test"], cert: apiCert.cert, key: apiCert.key }]);

      expect(store.resolve("other.example.test")).toBeUndefined();
    });
  });

  describe("load", () => {
    it("rejects a key that does not belong to the certificate", () => {
      const store = new CertificateStore();
      const load = () =>
        store.load([{ hostnames: ["api.example.test"], cert: apiCert.cert, key: wildCert.key }]);

      expect(load).toThrow(CertificateMismatchError);
      expect(load).toThrow("Private key does not match certificate for api.example.test");
    });

    it("keeps the previous bindings when a load fails", () => {
      const store = new CertificateStore();
      store.load([{ hostnames: ["api.example.test"], cert: apiCert.cert, key: apiCert.key }]);

      expect(() =>
        store.load([
          { hostnames: ["*.apps.test"], cert: wildCert.cert, key: wildCert.key },
          { hostnames: ["www.example.test"], cert: apiCert.cert, key: wildCert.key },
        ])
      ).toThrow(CertificateMismatchError);

      expect(store.resolve("api.example.test")?.cert).toBe(apiCert.cert);
      expect(store.resolve("web.apps.test")).toBeUndefined();
      expect(store.hostnames()).toEqual(["api.example.test"]);
    });

    it("rejects a binding without hostnames", () => {
      const store = new CertificateStore();
      expect(() => store.load([{ hostnames: [], cert: apiCert.cert, key: apiCert.key }])).toThrow(
        "Certificate binding has no hostnames"
      );
    });

    it("rejects an invalid hostname", () => {
      const store = new CertificateStore();
      expect(() =>
        store.load([{ hostnames: ["bad_host.test"], cert: apiCert.cert, key: apiCert.key }])
      ).toThrow('Invalid certificate hostname "bad_host.test"');
    });

    it("rejects data that is not a certificate", () => {
      const store = new CertificateStore();
      const load = () =>
        store.load([
          { hostnames: ["api.example.test"], cert: Buffer.from("not a cert"), key: apiCert.key },
        ]);

      expect(load).toThrow(InvalidCertificateError);
      expect(load).toThrow("Cannot parse certificate for api.example.test");
    });

    it("warns when the certificate does not list a bound hostname", () => {
      const onWarning = vi.fn();
      const store = new CertificateStore({ onWarning });
      store.load([{ hostnames: ["other.example.test"], cert: apiCert.cert, key: apiCert.key }]);

      expect(onWarning).toHaveBeenCalledWith(
        "Certificate for other.example.test does not list it as a subject name"
      );
      expect(store.resolve("other.example.test")).toBeDefined();
    });

    it("warns about an expired certificate but still loads it", () => {
      const onWarning = vi.fn();
      const inTwoYears = Date.now() + 2 * 365 * 24 * 60 * 60 * 1000;
      const store = new CertificateStore({ onWarning, now: () => inTwoYears });
      store.load([{ hostnames: ["api.example.test"], cert: apiCert.cert, key: apiCert.key }]);

      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning.mock.calls[0][0]).toMatch(/^Certificate for api\.example\.test expired on /);
      expect(store.resolve("api.example.test")).toBeDefined();
    });

    it("keeps the first binding for a duplicated hostname", () => {
      const onWarning = vi.fn();
      const store = new CertificateStore({ onWarning });
      store.load([
        { hostnames: ["api.example.test"], cert: apiCert.cert, key: apiCert.key },
        { hostnames: ["api.example.test"], cert: wildCert.cert, key: wildCert.key },
      ]);

      expect(store.resolve("api.example.test")?.cert).toBe(apiCert.cert);
      expect(onWarning).toHaveBeenCalledWith(
        "Hostname api.example.test is bound to more than one certificate; using the first"
      );
    });
  });

  describe("prepare and swap", () => {
    it("does not activate a prepared snapshot until swapped", () => {
      const store = new CertificateStore();
      const snapshot = store.prepare([
        { hostnames: ["api.example.test"], cert: apiCert.cert, key: apiCert.key },
      ]);

      expect(store.resolve("api.example.test")).toBeUndefined();
      store.swap(snapshot);
      expect(store.resolve("api.example.test")).toBeDefined();
    });
  });

  describe("createSNICallback", () => {
    it("hands back a secure context for a bound name", () => {
      const store = new CertificateStore();
      store.load([{ hostnames: ["api.example.test"], cert: apiCert.cert, key: apiCert.key }]);
      const cb = vi.fn();

      store.createSNICallback()("api.example.test", cb);

      expect(cb).toHaveBeenCalledTimes(1);
      expect(cb.mock.calls[0][0]).toBeNull();
      expect(cb.mock.calls[0][1]).toBeDefined();
    });

    it("fails the handshake for an unbound name", () => {
      const store = new CertificateStore();
      store.load([{ hostnames: ["api.example.test"], cert: apiCert.cert, key: apiCert.key }]);
      const cb = vi.fn();

      store.createSNICallback()("unknown.test", cb);

      const err: unknown = cb.mock.calls[0][0];
      expect(err).toBeInstanceOf(NoMatchingCertificateError);
      expect(err).toHaveProperty("message", 'No certificate configured for "unknown.test"');
    });

    it("sees bindings swapped in after it was created", () => {
      const store = new CertificateStore();
      const sni = store.createSNICallback();
      store.load([{ hostnames: ["*.apps.test"], cert: wildCert.cert, key: wildCert.key }]);
      const cb = vi.fn();

      sni("web.apps.test", cb);

      expect(cb.mock.calls[0][0]).toBeNull();
    });
  });
});

describe("loadCertificateFiles", () => {
  let tmpDir: string;
  let cert: TestCertificate;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "streamgate-certfiles-test-"));
    cert = generateCertificate(tmpDir, "site", ["site.test"]);
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reads PEM files relative to the base directory", () => {
    const [binding] = loadCertificateFiles(
      [{ hostnames: ["site.test"], certFile: "site.pem", keyFile: "site-key.pem" }],
      tmpDir
    );

    expect(binding.hostnames).toEqual(["site.test"]);
    expect(binding.cert.equals(cert.cert)).toBe(true);
    expect(binding.key.equals(cert.key)).toBe(true);
  });

  it("reports a missing file", () => {
    expect(() =>
      loadCertificateFiles(
        [{ hostnames: ["site.test"], certFile: "missing.pem", keyFile: "site-key.pem" }],
        tmpDir
      )
    ).toThrow(/^Error reading certificate files: /);
  });

  it("rejects a certificate file without a PEM certificate", () => {
    const bogus = path.join(tmpDir, "bogus.pem");
    fs.writeFileSync(bogus, "hello");

    expect(() =>
      loadCertificateFiles(
        [{ hostnames: ["site.test"], certFile: bogus, keyFile: cert.keyPath }],
        tmpDir
      )
    ).toThrow(`${bogus} is not a valid PEM certificate`);
  });

  it("rejects a key file without a PEM private key", () => {
    expect(() =>
      loadCertificateFiles(
        [{ hostnames: ["site.test"], certFile: cert.certPath, keyFile: cert.certPath }],
        tmpDir
      )
    ).toThrow(`${cert.certPath} is not a valid PEM private key`);
  });
});
