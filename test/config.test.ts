import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { SecretBuffer } from "../src/auth/secret-buffer";
import { KEY_VAULT_SCOPE, StaticTokenCredential } from "../src/auth/credentials";
import { buildClient, loadConfig, type KvaultConfig } from "../src/config";
import { ConfigError } from "../src/errors";
import { silentLogger } from "../src/logger";
import { FakeVault, TEST_TOKEN } from "./helpers/fake-vault";

let dir: string;
let path: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "kvault-config-"));
  path = join(dir, "kvault.json");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(config: unknown): void {
  writeFileSync(path, JSON.stringify(config));
}

describe("loadConfig", () => {
  test("reads kvault.json and fills in defaults", async () => {
    writeConfig({ vault: "test-vault", tenantId: "tenant-1", clientId: "client-1" });
    const config = await loadConfig(path, { KVAULT_CLIENT_SECRET: "test-secret" });

    expect(config.vault).toBe("test-vault");
    expect(config.backend).toBe("keyvault");
    expect(config.scope).toBe(KEY_VAULT_SCOPE);
    expect(config.logLevel).toBe("warn");
    expect(config.retry).toEqual({});
    expect(config.tokenRefreshMarginMs).toBeUndefined();
    expect(config.auth).toMatchObject({
      kind: "client-secret",
      tenantId: "tenant-1",
      clientId: "client-1",
    });
  });

  test("lets the environment override the file", async () => {
    writeConfig({ vault: "test-vault", logLevel: "error" });
    const config = await loadConfig(path, {
      KVAULT_VAULT: "other-vault",
      KVAULT_ACCESS_TOKEN: TEST_TOKEN,
      KVAULT_LOG_LEVEL: "debug",
    });

    expect(config.vault).toBe("other-vault");
    expect(config.logLevel).toBe("debug");
    expect(config.auth.kind).toBe("static");
  });

  test("converts the refresh margin to milliseconds", async () => {
    writeConfig({ vault: "test-vault", tokenRefreshMarginSeconds: 60, retry: { maxAttempts: 2 } });
    const config = await loadConfig(path, { KVAULT_ACCESS_TOKEN: TEST_TOKEN });

    expect(config.tokenRefreshMarginMs).toBe(60_000);
    expect(config.retry).toEqual({ maxAttempts: 2 });
  });

  test("needs no file when the environment names the vault", async () => {
    const config = await loadConfig(path, {
      KVAULT_VAULT: "test-vault",
      KVAULT_ACCESS_TOKEN: TEST_TOKEN,
    });
    expect(config.vault).toBe("test-vault");
  });

  test("reports a missing file", async () => {
    await expect(loadConfig(path, {})).rejects.toThrow(
      `Cannot read ${path}. Create it or set KVAULT_VAULT.`
    );
  });

  test("reports invalid JSON", async () => {
    writeFileSync(path, "{ not json");
    await expect(loadConfig(path, {})).rejects.toBeInstanceOf(ConfigError);
  });

  test("rejects unknown keys", async () => {
    writeConfig({ vault: "test-vault", extra: true });
    await expect(loadConfig(path, { KVAULT_ACCESS_TOKEN: TEST_TOKEN })).rejects.toThrow(
      `Invalid ${path}: Unrecognized key(s) in object: 'extra'`
    );
  });

  test("names the offending field", async () => {
    writeConfig({ vault: "test-vault", retry: { maxAttempts: 0 } });
    await expect(loadConfig(path, { KVAULT_ACCESS_TOKEN: TEST_TOKEN })).rejects.toThrow(
      `Invalid ${path} at "retry.maxAttempts": Number must be greater than 0`
    );
  });

  test("requires credentials", async () => {
    writeConfig({ vault: "test-vault", tenantId: "tenant-1" });
    await expect(loadConfig(path, {})).rejects.toThrow(
      "No credentials: set KVAULT_ACCESS_TOKEN, or tenantId and clientId with KVAULT_CLIENT_SECRET"
    );
  });

  test("rejects an unknown log level", async () => {
    writeConfig({ vault: "test-vault" });
    await expect(
      loadConfig(path, { KVAULT_ACCESS_TOKEN: TEST_TOKEN, KVAULT_LOG_LEVEL: "loud" })
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("buildClient", () => {
  function staticConfig(overrides: Partial<KvaultConfig> = {}): KvaultConfig {
    return {
      vault: "test-vault",
      backend: "keyvault",
      scope: KEY_VAULT_SCOPE,
      retry: {},
      logLevel: "silent",
      auth: { kind: "static", token: SecretBuffer.from(TEST_TOKEN) },
      ...overrides,
    };
  }

  test("wires the lifecycle through to the transport", async () => {
    const vault = new FakeVault();
    const client = buildClient(staticConfig(), { transport: vault.transport, logger: silentLogger });

    await client.lifecycle.set("db.url", SecretBuffer.from("test-secret"));
    const { value } = await client.lifecycle.get("db.url");

    expect(value.use((v) => v)).toBe("test-secret");
    expect(vault.versionsOf("db-url")).toHaveLength(1);
    client.close();
  });

  test("close zeroes the configured credential", () => {
    const config = staticConfig();
    const client = buildClient(config, {
      credential: new StaticTokenCredential(SecretBuffer.from(TEST_TOKEN)),
    });
    client.close();

    expect(config.auth.kind === "static" && config.auth.token.isZeroed).toBe(true);
  });

  test("rejects an unknown backend", () => {
    expect(() => buildClient(staticConfig({ backend: "nope" }))).toThrow(
      "Unknown backend: nope. Available: keyvault"
    );
  });
});
