import { readFile } from "fs/promises";
import { z } from "zod";
import { SecretBuffer } from "./auth/secret-buffer";
import {
  ClientSecretCredential,
  KEY_VAULT_SCOPE,
  StaticTokenCredential,
  type FetchFn,
  type TokenCredential,
} from "./auth/credentials";
import { AuthTokenProvider } from "./auth/token-provider";
import { DEFAULT_BACKEND, getBackend } from "./backends";
import type { SecretBackend } from "./backends/types";
import { ConfigError, errorMessage } from "./errors";
import { OperationExecutor } from "./executor/executor";
import type { RetryPolicy } from "./executor/retry";
import type { HttpTransport } from "./executor/transport";
import { createLogger, isLogLevel, type Logger, type LogLevel } from "./logger";
import { LifecycleManager } from "./secrets/lifecycle";

export const CONFIG_FILE = "kvault.json";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const FileConfigSchema = z
  .object({
    vault: z.string().min(1).optional(),
    backend: z.string().min(1).optional(),
    tenantId: z.string().min(1).optional(),
    clientId: z.string().min(1).optional(),
    authorityHost: z.string().url().optional(),
    scope: z.string().min(1).optional(),
    retry: z
      .object({
        maxAttempts: z.number().int().positive().optional(),
        baseDelayMs: z.number().int().nonnegative().optional(),
        maxDelayMs: z.number().int().nonnegative().optional(),
        maxElapsedMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    tokenRefreshMarginSeconds: z.number().int().nonnegative().optional(),
    logLevel: LogLevelSchema.optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export type AuthConfig =
  | { kind: "static"; token: SecretBuffer }
  | {
      kind: "client-secret";
      tenantId: string;
      clientId: string;
      clientSecret: SecretBuffer;
      authorityHost?: string;
    };

export interface KvaultConfig {
  vault: string;
  backend: string;
  scope: string;
  retry: Partial<RetryPolicy>;
  tokenRefreshMarginMs?: number;
  logLevel: LogLevel;
  auth: AuthConfig;
}

export type Env = Record<string, string | undefined>;

async function readConfigFile(path: string, optional: boolean): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (optional) return {};
    throw new ConfigError(
      `Cannot read ${path}. Create it or set KVAULT_VAULT.`,
      { cause: err }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new ConfigError(`Invalid ${path}${where}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

function resolveAuth(file: FileConfig, env: Env): AuthConfig {
  const accessToken = env.KVAULT_ACCESS_TOKEN;
  if (accessToken) {
    return { kind: "static", token: SecretBuffer.from(accessToken) };
  }

  const tenantId = env.KVAULT_TENANT_ID ?? file.tenantId;
  const clientId = env.KVAULT_CLIENT_ID ?? file.clientId;
  const clientSecret = env.KVAULT_CLIENT_SECRET;
  if (!tenantId || !clientId || !clientSecret) {
    throw new ConfigError(
      "No credentials: set KVAULT_ACCESS_TOKEN, or tenantId and clientId with KVAULT_CLIENT_SECRET"
    );
  }
  return {
    kind: "client-secret",
    tenantId,
    clientId,
    clientSecret: SecretBuffer.from(clientSecret),
    authorityHost: file.authorityHost,
  };
}

/**
 * Reads `path` and applies environment overrides. The file may be missing
 * when KVAULT_VAULT names the vault. The client secret and static tokens are
 * only ever taken from the environment.
 */
export async function loadConfig(path: string, env: Env = process.env): Promise<KvaultConfig> {
  const file = await readConfigFile(path, env.KVAULT_VAULT !== undefined);

  const vault = env.KVAULT_VAULT ?? file.vault;
  if (!vault) {
    throw new ConfigError(`No vault configured: set "vault" in ${path} or KVAULT_VAULT`);
  }

  let logLevel: LogLevel = file.logLevel ?? "warn";
  const envLevel = env.KVAULT_LOG_LEVEL;
  if (envLevel !== undefined) {
    if (!isLogLevel(envLevel)) {
      throw new ConfigError("KVAULT_LOG_LEVEL must be one of debug, info, warn, error, silent");
    }
    logLevel = envLevel;
  }

  return {
    vault,
    backend: file.backend ?? DEFAULT_BACKEND,
    scope: file.scope ?? KEY_VAULT_SCOPE,
    retry: file.retry ?? {},
    tokenRefreshMarginMs:
      file.tokenRefreshMarginSeconds === undefined
        ? undefined
        : file.tokenRefreshMarginSeconds * 1000,
    logLevel,
    auth: resolveAuth(file, env),
  };
}

export function createCredential(auth: AuthConfig, fetchFn?: FetchFn): TokenCredential {
  switch (auth.kind) {
    case "static":
      return new StaticTokenCredential(auth.token);
    case "client-secret":
      return new ClientSecretCredential({
        tenantId: auth.tenantId,
        clientId: auth.clientId,
        clientSecret: auth.clientSecret,
        authorityHost: auth.authorityHost,
        fetch: fetchFn,
      });
  }
}

export interface ClientOverrides {
  credential?: TokenCredential;
  transport?: HttpTransport;
  logger?: Logger;
}

export interface KvaultClient {
  lifecycle: LifecycleManager;
  backend: SecretBackend;
  tokens: AuthTokenProvider;
  logger: Logger;
  /** Zeroes cached tokens and configured credentials. */
  close(): void;
}

export function buildClient(config: KvaultConfig, overrides: ClientOverrides = {}): KvaultClient {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const tokens = new AuthTokenProvider({
    credential: overrides.credential ?? createCredential(config.auth),
    refreshMarginMs: config.tokenRefreshMarginMs,
    logger,
  });
  const executor = new OperationExecutor({
    tokens,
    scope: config.scope,
    transport: overrides.transport,
    retry: config.retry,
    logger,
  });
  const backend = getBackend(config.backend, { executor });
  const lifecycle = new LifecycleManager({ backend, vault: config.vault, logger });

  return {
    lifecycle,
    backend,
    tokens,
    logger,
    close() {
      tokens.close();
      if (config.auth.kind === "static") {
        config.auth.token.zero();
      } else {
        config.auth.clientSecret.zero();
      }
    },
  };
}
