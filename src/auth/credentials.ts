import { z } from "zod";
import { AuthError, errorMessage } from "../errors";
import { SecretBuffer } from "./secret-buffer";

export const KEY_VAULT_SCOPE = "https://vault.azure.net/.default";

const AUTHORITY_HOST = "https://login.microsoftonline.com";

export interface RawToken {
  token: SecretBuffer;
  /** Epoch milliseconds. */
  expiresOn: number;
}

/** Knows how to obtain a fresh token for a scope. Caching is not its job. */
export interface TokenCredential {
  getToken(scope: string, signal?: AbortSignal): Promise<RawToken>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().int().positive(),
  token_type: z.string().optional(),
});

const TokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export interface ClientSecretCredentialOptions {
  tenantId: string;
  clientId: string;
  clientSecret: SecretBuffer;
  authorityHost?: string;
  fetch?: FetchFn;
  now?: () => number;
}

/** OAuth2 client-credentials grant against the identity endpoint. */
export class ClientSecretCredential implements TokenCredential {
  private readonly options: ClientSecretCredentialOptions;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(options: ClientSecretCredentialOptions) {
    this.options = options;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  tokenUrl(): string {
    const host = this.options.authorityHost ?? AUTHORITY_HOST;
    return `${host}/${encodeURIComponent(this.options.tenantId)}/oauth2/v2.0/token`;
  }

  async getToken(scope: string, signal?: AbortSignal): Promise<RawToken> {
    const requestedAt = this.now();
    const body = this.options.clientSecret.use(
      (secret) =>
        new URLSearchParams({
          grant_type: "client_credentials",
          client_id: this.options.clientId,
          client_secret: secret,
          scope,
        })
    );

    let response: Response;
    try {
      response = await this.fetchFn(this.tokenUrl(), {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body,
        signal,
      });
    } catch (err) {
      throw new AuthError(`Token request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const payload: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const parsed = TokenErrorSchema.safeParse(payload);
      const detail = parsed.success
        ? parsed.data.error_description ?? parsed.data.error
        : `HTTP ${response.status}`;
      throw new AuthError(`Token request rejected: ${detail}`);
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AuthError("Token endpoint returned an unexpected response");
    }
    return {
      token: SecretBuffer.from(parsed.data.access_token),
      expiresOn: requestedAt + parsed.data.expires_in * 1000,
    };
  }
}

/** A fixed token, e.g. one handed over through KVAULT_ACCESS_TOKEN. */
export class StaticTokenCredential implements TokenCredential {
  private readonly token: SecretBuffer;
  private readonly expiresOn: number;

  constructor(token: SecretBuffer, expiresOn = Number.MAX_SAFE_INTEGER) {
    this.token = token;
    this.expiresOn = expiresOn;
  }

  async getToken(): Promise<RawToken> {
    return { token: this.token.copy(), expiresOn: this.expiresOn };
  }
}
