import * as fs from "node:fs";
import * as http from "node:http";
import * as https from "node:https";
import type * as net from "node:net";
import * as path from "node:path";
import { execFileSync } from "node:child_process";

/** openssl command timeout (ms). */
const OPENSSL_TIMEOUT_MS = 15_000;

function openssl(args: string[]): void {
  execFileSync("openssl", args, { timeout: OPENSSL_TIMEOUT_MS, stdio: ["pipe", "pipe", "pipe"] });
}

export interface TestCertificate {
  cert: Buffer;
  key: Buffer;
  certPath: string;
  keyPath: string;
}

/**
 * Mint a self-signed EC certificate whose CN is the first hostname and whose
 * subject alternative names list all of them.
 */
export function generateCertificate(dir: string, name: string, hostnames: string[]): TestCertificate {
  const keyPath = path.join(dir, `${name}-key.pem`);
  const certPath = path.join(dir, `${name}.pem`);

  openssl(["ecparam", "-genkey", "-name", "prime256v1", "-noout", "-out", keyPath]);
  openssl([
    "req",
    "-new",
    "-x509",
    "-key",
    keyPath,
    "-out",
    certPath,
    "-days",
    "30",
    "-subj",
    `/CN=${hostnames[0]}`,
    "-addext",
    `subjectAltName=${hostnames.map((h) => `DNS:${h}`).join(",")}`,
  ]);

  return { cert: fs.readFileSync(certPath), key: fs.readFileSync(keyPath), certPath, keyPath };
}

export function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      if (!addr || typeof addr === "string") {
        reject(new Error("Server not listening"));
        return;
      }
      resolve(addr.port);
    });
  });
}

export function close(server: net.Server): Promise<void> {
  if (server instanceof http.Server) server.closeAllConnections();
  return new Promise((resolve) => server.close(() => resolve()));
}

/** Start a plain HTTP backend on a random loopback port. */
export async function startBackend(
  handler: http.RequestListener
): Promise<{ server: http.Server; port: number; address: string }> {
  const server = http.createServer(handler);
  const port = await listen(server);
  return { server, port, address: `127.0.0.1:${port}` };
}

export interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
  text: string;
}

export interface TestRequestOptions {
  /** SNI server name and Host header. */
  host: string;
  path?: string;
  method?: string;
  headers?: http.OutgoingHttpHeaders;
  body?: string;
}

/** Open an HTTPS/1.1 request through the proxy and return the raw response stream. */
export function openRequest(port: number, options: TestRequestOptions): Promise<http.IncomingMessage> {
  return new Promise((resolve, reject) => {
    const req = https.request(
      {
        hostname: "127.0.0.1",
        port,
        servername: options.host,
        path: options.path || "/",
        method: options.method || "GET",
        headers: { host: options.host, ...options.headers },
        rejectUnauthorized: false,
        agent: false,
      },
      resolve
    );
    req.on("error", reject);
    req.end(options.body);
  });
}

/** Make an HTTPS request through the proxy and buffer the whole response. */
export async function request(port: number, options: TestRequestOptions): Promise<TestResponse> {
  const res = await openRequest(port, options);
  const chunks: Buffer[] = [];
  for await (const chunk of res) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const body = Buffer.concat(chunks);
  return { status: res.statusCode ?? 0, headers: res.headers, body, text: body.toString("utf-8") };
}
