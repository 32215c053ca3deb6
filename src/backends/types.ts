import type { SecretBuffer } from "../auth/secret-buffer";
import type { TagSet } from "../secrets/metadata";

export interface SecretAttributes {
  enabled: boolean;
  createdAt?: Date;
  updatedAt?: Date;
  expiresOn?: Date;
  notBefore?: Date;
  recoveryLevel?: string;
}

export interface SecretProperties {
  backendId: string;
  versionId: string;
  tags: TagSet;
  attributes: SecretAttributes;
  contentType?: string;
}

/** A secret read with its value. The caller owns `value` and must zero it. */
export interface StoredSecret extends SecretProperties {
  value: SecretBuffer;
}

export interface ListedSecret {
  backendId: string;
  tags: TagSet;
  attributes: SecretAttributes;
  contentType?: string;
  deleted: boolean;
  deletedAt?: Date;
  scheduledPurgeAt?: Date;
}

export interface SetSecretInput {
  value: SecretBuffer;
  tags: TagSet;
  contentType?: string;
  /** The version is not usable before this time. */
  notBefore?: Date;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * What the lifecycle engine needs from a secret store. Listing methods yield
 * one array per backend page, in the backend's page order.
 */
export interface SecretBackend {
  readonly name: string;
  /** Creates a new version and makes it current. */
  setSecret(
    vault: string,
    backendId: string,
    input: SetSecretInput,
    options?: CallOptions
  ): Promise<SecretProperties>;
  getSecret(
    vault: string,
    backendId: string,
    options?: CallOptions & { version?: string }
  ): Promise<StoredSecret>;
  listSecrets(
    vault: string,
    options?: CallOptions & { includeDeleted?: boolean }
  ): AsyncIterable<ListedSecret[]>;
  listVersions(
    vault: string,
    backendId: string,
    options?: CallOptions
  ): AsyncIterable<SecretProperties[]>;
  /** Soft delete. */
  deleteSecret(vault: string, backendId: string, options?: CallOptions): Promise<ListedSecret>;
  recoverSecret(
    vault: string,
    backendId: string,
    options?: CallOptions
  ): Promise<SecretProperties>;
  /** Permanently removes a soft-deleted secret. */
  purgeSecret(vault: string, backendId: string, options?: CallOptions): Promise<void>;
}
