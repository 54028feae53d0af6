import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildTlsOptions, createHttpClient } from "./transport.js";
import { ConfigurationError } from "../errors.js";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "scrapeline-tls-"));
  await writeFile(join(dir, "ca.pem"), "test-ca");
  await writeFile(join(dir, "cert.pem"), "test-cert");
  await writeFile(join(dir, "key.pem"), "test-key");
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("buildTlsOptions", () => {
  it("verifies peers unless told otherwise", async () => {
    expect(await buildTlsOptions({ insecureSkipVerify: false })).toEqual({
      rejectUnauthorized: true,
    });
    expect(await buildTlsOptions({ insecureSkipVerify: true })).toEqual({
      rejectUnauthorized: false,
    });
  });

  it("reads CA, certificate and key files", async () => {
    const tls = await buildTlsOptions({
      caPath: join(dir, "ca.pem"),
      certPath: join(dir, "cert.pem"),
      keyPath: join(dir, "key.pem"),
      insecureSkipVerify: false,
    });
    expect(tls).toEqual({
      ca: "test-ca",
      cert: "test-cert",
      key: "test-key",
      rejectUnauthorized: true,
    });
  });

  it("requires certificate and key together", async () => {
    await expect(
      buildTlsOptions({ certPath: join(dir, "cert.pem"), insecureSkipVerify: false }),
    ).rejects.toThrow("TLS certificate and key must be configured together");
  });

  it("fails on a missing file", async () => {
    const caPath = join(dir, "missing.pem");
    const result = buildTlsOptions({ caPath, insecureSkipVerify: false });
    await expect(result).rejects.toBeInstanceOf(ConfigurationError);
    await expect(result).rejects.toThrow(`Could not read TLS CA ${caPath}`);
  });
});

describe("createHttpClient", () => {
  it("builds a client carrying the response timeout", async () => {
    const client = await createHttpClient({
      tls: { insecureSkipVerify: false },
      responseTimeoutMs: 1234,
    });
    expect(client.responseTimeoutMs).toBe(1234);
    await client.close();
  });

  it("rejects unusable TLS settings", async () => {
    await expect(
      createHttpClient({
        tls: { keyPath: join(dir, "key.pem"), insecureSkipVerify: false },
        responseTimeoutMs: 1000,
      }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});
