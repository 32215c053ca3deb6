import { z } from "zod";
import { SecretBuffer } from "../auth/secret-buffer";
import { BackendError, ValidationError } from "../errors";
import type { BackendRequest, BackendResponse, OperationExecutor } from "../executor/executor";
import type {
  CallOptions,
  ListedSecret,
  SecretAttributes,
  SecretBackend,
  SecretProperties,
  SetSecretInput,
  StoredSecret,
} from "./types";

export const API_VERSION = "7.4";

const VAULT_NAME = /^[A-Za-z][A-Za-z0-9-]{1,22}[A-Za-z0-9]$/;

const AttributesSchema = z.object({
  enabled: z.boolean().optional(),
  created: z.number().optional(),
  updated: z.number().optional(),
  exp: z.number().optional(),
  nbf: z.number().optional(),
  recoveryLevel: z.string().optional(),
});

const TagsSchema = z.record(z.string()).nullish();

const SecretBundleSchema = z.object({
  id: z.string(),
  value: z.string().optional(),
  contentType: z.string().nullish(),
  attributes: AttributesSchema.optional(),
  tags: TagsSchema,
});

const SecretItemSchema = z.object({
  id: z.string(),
  contentType: z.string().nullish(),
  attributes: AttributesSchema.optional(),
  tags: TagsSchema,
  deletedDate: z.number().optional(),
  scheduledPurgeDate: z.number().optional(),
});

const PageSchema = z.object({
  value: z.array(SecretItemSchema),
  nextLink: z.string().nullish(),
});

type Attributes = z.infer<typeof AttributesSchema>;
type SecretItem = z.infer<typeof SecretItemSchema>;

function fromEpoch(seconds: number | undefined): Date | undefined {
  return seconds === undefined ? undefined : new Date(seconds * 1000);
}

function toEpoch(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function toAttributes(raw: Attributes | undefined): SecretAttributes {
  return {
    enabled: raw?.enabled ?? true,
    createdAt: fromEpoch(raw?.created),
    updatedAt: fromEpoch(raw?.updated),
    expiresOn: fromEpoch(raw?.exp),
    notBefore: fromEpoch(raw?.nbf),
    recoveryLevel: raw?.recoveryLevel,
  };
}

/** Splits `https://{vault}.vault.azure.net/secrets/{name}[/{version}]`. */
export function parseSecretId(id: string): { backendId: string; versionId?: string } {
  const segments = new URL(id).pathname.split("/").filter((s) => s.length > 0);
  const backendId = segments[1];
  if (!backendId) {
    throw new BackendError(`Unrecognised secret identifier: ${id}`);
  }
  return { backendId, versionId: segments[2] };
}

function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  response: BackendResponse,
  operation: string
): z.infer<S> {
  const parsed = schema.safeParse(response.body);
  if (!parsed.success) {
    throw new BackendError(
      `${operation}: unexpected response shape (${parsed.error.issues[0]?.message ?? "invalid"})`,
      response.status
    );
  }
  return parsed.data;
}

export interface KeyVaultBackendOptions {
  executor: OperationExecutor;
  /** Base URL for a vault; defaults to the public cloud endpoint. */
  vaultUrl?: (vault: string) => string;
}

/** Secret store backed by the Key Vault REST API. */
export class KeyVaultBackend implements SecretBackend {
  readonly name = "Azure Key Vault";
  private readonly executor: OperationExecutor;
  private readonly vaultUrl: (vault: string) => string;

  constructor(options: KeyVaultBackendOptions) {
    this.executor = options.executor;
    this.vaultUrl = options.vaultUrl ?? ((vault) => `https://${vault}.vault.azure.net`);
  }

  buildUrl(vault: string, path: string): string {
    if (!VAULT_NAME.test(vault)) {
      throw new ValidationError(
        `Vault name "${vault}" must be 3-24 characters of letters, digits and hyphens, starting with a letter`
      );
    }
    return `${this.vaultUrl(vault)}${path}?api-version=${API_VERSION}`;
  }

  async setSecret(
    vault: string,
    backendId: string,
    input: SetSecretInput,
    options: CallOptions = {}
  ): Promise<SecretProperties> {
    const operation = `set secret ${backendId}`;
    const response = await input.value.use((value) =>
      this.call(
        {
          operation,
          method: "PUT",
          url: this.buildUrl(vault, `/secrets/${encodeURIComponent(backendId)}`),
          body: {
            value,
            tags: input.tags,
            ...(input.contentType ? { contentType: input.contentType } : {}),
            ...(input.notBefore ? { attributes: { nbf: toEpoch(input.notBefore) } } : {}),
          },
          idempotent: false,
        },
        options
      )
    );
    return this.toProperties(parseBody(SecretBundleSchema, response, operation));
  }

  async getSecret(
    vault: string,
    backendId: string,
    options: CallOptions & { version?: string } = {}
  ): Promise<StoredSecret> {
    const path = options.version
      ? `/secrets/${encodeURIComponent(backendId)}/${encodeURIComponent(options.version)}`
      : `/secrets/${encodeURIComponent(backendId)}`;
    const operation = `get secret ${backendId}`;
    const response = await this.call(
      { operation, method: "GET", url: this.buildUrl(vault, path), idempotent: true },
      options
    );
    const bundle = parseBody(SecretBundleSchema, response, operation);
    return {
      ...this.toProperties(bundle),
      value: SecretBuffer.from(bundle.value ?? ""),
    };
  }

  async *listSecrets(
    vault: string,
    options: CallOptions & { includeDeleted?: boolean } = {}
  ): AsyncIterable<ListedSecret[]> {
    for await (const page of this.pages(vault, "/secrets", "list secrets", options)) {
      yield page.map((item) => this.toListed(item, false));
    }
    if (!options.includeDeleted) return;
    for await (const page of this.pages(vault, "/deletedsecrets", "list deleted secrets", options)) {
      yield page.map((item) => this.toListed(item, true));
    }
  }

  async *listVersions(
    vault: string,
    backendId: string,
    options: CallOptions = {}
  ): AsyncIterable<SecretProperties[]> {
    const path = `/secrets/${encodeURIComponent(backendId)}/versions`;
    for await (const page of this.pages(vault, path, `list versions of ${backendId}`, options)) {
      yield page.map((item) => {
        const { versionId } = parseSecretId(item.id);
        return {
          backendId,
          versionId: versionId ?? "",
          tags: item.tags ?? {},
          attributes: toAttributes(item.attributes),
          contentType: item.contentType ?? undefined,
        };
      });
    }
  }

  async deleteSecret(
    vault: string,
    backendId: string,
    options: CallOptions = {}
  ): Promise<ListedSecret> {
    const operation = `delete secret ${backendId}`;
    const response = await this.call(
      {
        operation,
        method: "DELETE",
        url: this.buildUrl(vault, `/secrets/${encodeURIComponent(backendId)}`),
        idempotent: true,
      },
      options
    );
    return this.toListed(parseBody(SecretItemSchema, response, operation), true);
  }

  async recoverSecret(
    vault: string,
    backendId: string,
    options: CallOptions = {}
  ): Promise<SecretProperties> {
    const operation = `recover secret ${backendId}`;
    const response = await this.call(
      {
        operation,
        method: "POST",
        url: this.buildUrl(vault, `/deletedsecrets/${encodeURIComponent(backendId)}/recover`),
        idempotent: true,
      },
      options
    );
    return this.toProperties(parseBody(SecretBundleSchema, response, operation));
  }

  async purgeSecret(vault: string, backendId: string, options: CallOptions = {}): Promise<void> {
    await this.call(
      {
        operation: `purge secret ${backendId}`,
        method: "DELETE",
        url: this.buildUrl(vault, `/deletedsecrets/${encodeURIComponent(backendId)}`),
        idempotent: true,
      },
      options
    );
  }

  /** Follows nextLink until the last page. Links must stay on the vault's host. */
  private async *pages(
    vault: string,
    path: string,
    operation: string,
    options: CallOptions
  ): AsyncIterable<SecretItem[]> {
    const first = this.buildUrl(vault, path);
    const host = new URL(first).host;
    let url: string | undefined = first;
    let page = 0;
    while (url) {
      page++;
      const response = await this.call(
        { operation: `${operation} (page ${page})`, method: "GET", url, idempotent: true },
        options
      );
      const body = parseBody(PageSchema, response, operation);
      yield body.value;
      if (body.nextLink && new URL(body.nextLink).host !== host) {
        throw new BackendError(`${operation}: refusing to follow a page link to another host`);
      }
      url = body.nextLink ?? undefined;
    }
  }

  private call(request: BackendRequest, options: CallOptions): Promise<BackendResponse> {
    return this.executor.execute(request, { signal: options.signal });
  }

  private toProperties(bundle: z.infer<typeof SecretBundleSchema>): SecretProperties {
    const { backendId, versionId } = parseSecretId(bundle.id);
    return {
      backendId,
      versionId: versionId ?? "",
      tags: bundle.tags ?? {},
      attributes: toAttributes(bundle.attributes),
      contentType: bundle.contentType ?? undefined,
    };
  }

  private toListed(item: SecretItem, deleted: boolean): ListedSecret {
    return {
      backendId: parseSecretId(item.id).backendId,
      tags: item.tags ?? {},
      attributes: toAttributes(item.attributes),
      contentType: item.contentType ?? undefined,
      deleted,
      deletedAt: fromEpoch(item.deletedDate),
      scheduledPurgeAt: fromEpoch(item.scheduledPurgeDate),
    };
  }
}
