import * as fs from "node:fs";
import * as path from "node:path";
import * as crypto from "node:crypto";
import * as tls from "node:tls";
import type { CertificateBinding } from "./types.js";
import { errorMessage, isValidHostname, normalizeHost } from "./utils.js";

/** A certificate or key that cannot be used to serve TLS. */
export class InvalidCertificateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCertificateError";
  }
}

/** The private key does not belong to the certificate it is paired with. */
export class CertificateMismatchError extends InvalidCertificateError {
  readonly hostnames: string[];

  constructor(hostnames: string[]) {
    super(`Private key does not match certificate for ${hostnames.join(", ")}`);
    this.name = "CertificateMismatchError";
    this.hostnames = hostnames;
  }
}

/** Raised inside the SNI callback; aborts the handshake. */
export class NoMatchingCertificateError extends Error {
  readonly serverName: string;

  constructor(serverName: string) {
    super(`No certificate configured for "${serverName}"`);
    this.name = "NoMatchingCertificateError";
    this.serverName = serverName;
  }
}

/** Certificate files as named in configuration. */
export interface CertificateFileSpec {
  hostnames: string[];
  certFile: string;
  keyFile: string;
}

interface SnapshotEntry {
  binding: CertificateBinding;
  context: tls.SecureContext;
}

/** An immutable hostname -> certificate lookup, built once and swapped whole. */
export interface CertificateSnapshot {
  readonly entries: ReadonlyMap<string, SnapshotEntry>;
  readonly bindings: readonly CertificateBinding[];
}

const EMPTY_SNAPSHOT: CertificateSnapshot = { entries: new Map(), bindings: [] };

function lookup(snapshot: CertificateSnapshot, serverName: string): SnapshotEntry | undefined {
  const name = normalizeHost(serverName);
  const exact = snapshot.entries.get(name);
  if (exact) return exact;
  const dot = name.indexOf(".");
  if (dot <= 0) return undefined;
  return snapshot.entries.get(`*${name.slice(dot)}`);
}

/**
 * Parse the PEM pair and check the key belongs to the certificate.
 * Returns the leaf certificate for further inspection.
 */
function verifyPair(binding: CertificateBinding): crypto.X509Certificate {
  let cert: crypto.X509Certificate;
  let key: crypto.KeyObject;
  try {
    cert = new crypto.X509Certificate(binding.cert);
  } catch (err: unknown) {
    throw new InvalidCertificateError(
      `Cannot parse certificate for ${binding.hostnames.join(", ")}: ${errorMessage(err)}`
    );
  }
  try {
    key = crypto.createPrivateKey(binding.key);
  } catch (err: unknown) {
    throw new InvalidCertificateError(
      `Cannot parse private key for ${binding.hostnames.join(", ")}: ${errorMessage(err)}`
    );
  }
  if (!cert.checkPrivateKey(key)) {
    throw new CertificateMismatchError(binding.hostnames);
  }
  return cert;
}

/**
 * Holds the active certificate bindings and picks one per TLS handshake by
 * server name. Bindings are replaced as a whole; a failed load keeps the
 * previous set active.
 */
export class CertificateStore {
  private snapshot: CertificateSnapshot = EMPTY_SNAPSHOT;
  private readonly onWarning: ((message: string) => void) | undefined;
  private readonly now: () => number;

  constructor(options?: { onWarning?: (message: string) => void; now?: () => number }) {
    this.onWarning = options?.onWarning;
    this.now = options?.now ?? Date.now;
  }

  /** Validate bindings and build a snapshot without activating it. */
  prepare(bindings: CertificateBinding[]): CertificateSnapshot {
    const entries = new Map<string, SnapshotEntry>();
    const accepted: CertificateBinding[] = [];

    for (const raw of bindings) {
      const hostnames = raw.hostnames.map((h) => normalizeHost(h));
      if (hostnames.length === 0) {
        throw new InvalidCertificateError("Certificate binding has no hostnames");
      }
      for (const hostname of hostnames) {
        if (!isValidHostname(hostname)) {
          throw new InvalidCertificateError(`Invalid certificate hostname "${hostname}"`);
        }
      }
      const binding: CertificateBinding = { hostnames, cert: raw.cert, key: raw.key };
      const leaf = verifyPair(binding);

      if (new Date(leaf.validTo).getTime() < this.now()) {
        this.onWarning?.(`Certificate for ${hostnames.join(", ")} expired on ${leaf.validTo}`);
      }
      for (const hostname of hostnames) {
        if (!hostname.startsWith("*.") && leaf.checkHost(hostname) === undefined) {
          this.onWarning?.(`Certificate for ${hostname} does not list it as a subject name`);
        }
      }

      let context: tls.SecureContext;
      try {
        context = tls.createSecureContext({ cert: binding.cert, key: binding.key });
      } catch (err: unknown) {
        throw new InvalidCertificateError(
          `Cannot use certificate for ${hostnames.join(", ")}: ${errorMessage(err)}`
        );
      }

      for (const hostname of hostnames) {
        if (entries.has(hostname)) {
          this.onWarning?.(`Hostname ${hostname} is bound to more than one certificate; using the first`);
          continue;
        }
        entries.set(hostname, { binding, context });
      }
      accepted.push(binding);
    }

    return { entries, bindings: accepted };
  }

  /** Make a prepared snapshot the active one. */
  swap(snapshot: CertificateSnapshot): void {
    this.snapshot = snapshot;
  }

  /** Validate and activate `bindings` in one step. */
  load(bindings: CertificateBinding[]): void {
    this.swap(this.prepare(bindings));
  }

  resolve(serverName: string): CertificateBinding | undefined {
    return lookup(this.snapshot, serverName)?.binding;
  }

  /** All hostnames (exact and wildcard) currently served. */
  hostnames(): string[] {
    return [...this.snapshot.entries.keys()];
  }

  /**
   * Create an SNI callback for the TLS server. Each handshake resolves
   * against the snapshot active when the callback ran, so a concurrent
   * reload never mixes old and new bindings.
   */
  createSNICallback(): (
    servername: string,
    cb: (err: Error | null, ctx?: tls.SecureContext) => void
  ) => void {
    return (servername, cb) => {
      const snapshot = this.snapshot;
      const entry = lookup(snapshot, servername);
      if (!entry) {
        cb(new NoMatchingCertificateError(servername));
        return;
      }
      cb(null, entry.context);
    };
  }
}

/**
 * Read PEM certificate and key files into bindings. Relative paths resolve
 * against `baseDir`.
 */
export function loadCertificateFiles(
  specs: CertificateFileSpec[],
  baseDir = process.cwd()
): CertificateBinding[] {
  return specs.map((spec) => {
    const certPath = path.resolve(baseDir, spec.certFile);
    const keyPath = path.resolve(baseDir, spec.keyFile);
    let cert: Buffer;
    let key: Buffer;
    try {
      cert = fs.readFileSync(certPath);
      key = fs.readFileSync(keyPath);
    } catch (err: unknown) {
      throw new InvalidCertificateError(`Error reading certificate files: ${errorMessage(err)}`);
    }

    if (!cert.toString("utf-8").includes("-----BEGIN CERTIFICATE-----")) {
      throw new InvalidCertificateError(`${certPath} is not a valid PEM certificate`);
    }
    if (!/-----BEGIN [\w\s]*PRIVATE KEY-----/.test(key.toString("utf-8"))) {
      throw new InvalidCertificateError(`${keyPath} is not a valid PEM private key`);
    }

    return { hostnames: spec.hostnames, cert, key };
  });
}
