import { SecretBuffer } from "../auth/secret-buffer";
import type {
  ListedSecret,
  SecretBackend,
  SecretProperties,
  StoredSecret,
} from "../backends/types";
import { ConflictError, NotFoundError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { generateValue, type Charset, type ValueGenerator } from "./generator";
import {
  decode,
  encode,
  mergeMetadata,
  storedOriginalName,
  type MetadataInput,
  type MetadataUpdate,
  type SecretMetadata,
} from "./metadata";
import { assertSameIdentity, sanitize, type SecretIdentity } from "./sanitizer";

export const NO_GROUP = "(no groups)";

export interface SecretVersion {
  identity: SecretIdentity;
  versionId: string;
  createdAt?: Date;
  updatedAt?: Date;
  enabled: boolean;
  notBefore?: Date;
  contentType?: string;
  metadata: SecretMetadata;
}

/** A version read with its value. The caller owns `value` and must zero it. */
export interface SecretValue {
  version: SecretVersion;
  value: SecretBuffer;
}

export interface SecretListing {
  identity: SecretIdentity;
  metadata: SecretMetadata;
  enabled: boolean;
  deleted: boolean;
  updatedAt?: Date;
  deletedAt?: Date;
  scheduledPurgeAt?: Date;
  contentType?: string;
}

export interface RollbackResult {
  version: SecretVersion;
  restoredFrom: string;
}

export interface OperationOptions {
  signal?: AbortSignal;
  /** Overrides the manager's default vault. */
  vault?: string;
}

export interface SetOptions extends OperationOptions, MetadataUpdate {
  contentType?: string;
  /** `null` clears it; left out, the current version's value is kept. */
  notBefore?: Date | null;
}

export interface SecretUpdate extends MetadataUpdate {
  /** Moves the secret to this name in the same vault. */
  rename?: string;
  notBefore?: Date | null;
}

/** Where a copy or move lands. Each field defaults to the source's. */
export interface TransferTarget {
  vault?: string;
  name?: string;
}

export interface GetOptions extends OperationOptions {
  version?: string;
}

export interface ListOptions {
  includeDeleted?: boolean;
  group?: string;
  signal?: AbortSignal;
}

/** A literal value, a generator, or the parameters of a random value. */
export type RotationSource = SecretBuffer | ValueGenerator | { length?: number; charset?: Charset };

export interface LifecycleManagerOptions {
  backend: SecretBackend;
  vault: string;
  logger?: Logger;
}

interface WriteOptions {
  contentType?: string;
  notBefore?: Date;
  signal?: AbortSignal;
}

interface TransferOptions {
  changes: SecretUpdate;
  /** Requires the target to be vacant. */
  relocate: boolean;
  removeSource: boolean;
  signal?: AbortSignal;
}

interface CurrentState {
  properties: SecretProperties;
  metadata: SecretMetadata;
  storedName: string | undefined;
}

function restartable<T>(factory: () => AsyncIterator<T>): AsyncIterable<T> {
  return { [Symbol.asyncIterator]: factory };
}

function toVersion(identity: SecretIdentity, properties: SecretProperties): SecretVersion {
  return {
    identity,
    versionId: properties.versionId,
    createdAt: properties.attributes.createdAt,
    updatedAt: properties.attributes.updatedAt,
    enabled: properties.attributes.enabled,
    notBefore: properties.attributes.notBefore,
    contentType: properties.contentType,
    metadata: decode(properties.tags, properties.backendId),
  };
}

function pickNotBefore(requested: Date | null | undefined, stored: Date | undefined): Date | undefined {
  return requested === null ? undefined : requested ?? stored;
}

function sameLocation(a: SecretIdentity, b: SecretIdentity): boolean {
  return a.namespace === b.namespace && a.backendId === b.backendId;
}

function toListing(namespace: string, item: ListedSecret): SecretListing {
  const metadata = decode(item.tags, item.backendId);
  return {
    identity: { userName: metadata.originalName, backendId: item.backendId, namespace },
    metadata,
    enabled: item.attributes.enabled,
    deleted: item.deleted,
    updatedAt: item.attributes.updatedAt,
    deletedAt: item.deletedAt,
    scheduledPurgeAt: item.scheduledPurgeAt,
    contentType: item.contentType,
  };
}

/**
 * Versioned secret operations on top of a {@link SecretBackend}.
 *
 * Every write creates a new version; the backend's newest version is the
 * current one. Rollback therefore also appends a version, carrying the old
 * value, rather than moving a pointer. Values passed in are zeroed once the
 * write completes or fails.
 *
 * The manager keeps no state between calls: the backend is the authority on
 * what is current, and concurrent writes to one name are ordered by it.
 */
export class LifecycleManager {
  private readonly backend: SecretBackend;
  private readonly vault: string;
  private readonly logger: Logger;

  constructor(options: LifecycleManagerOptions) {
    this.backend = options.backend;
    this.vault = options.vault;
    this.logger = options.logger ?? silentLogger;
  }

  async set(name: string, value: SecretBuffer, options: SetOptions = {}): Promise<SecretVersion> {
    try {
      const identity = sanitize(name, options.vault ?? this.vault);
      const current = await this.readCurrent(identity, options.signal);
      assertSameIdentity(identity, current?.storedName);
      const input = mergeMetadata(current?.metadata, options, name);
      return await this.write(identity, value, input, {
        contentType: options.contentType ?? current?.properties.contentType,
        notBefore: pickNotBefore(options.notBefore, current?.properties.attributes.notBefore),
        signal: options.signal,
      });
    } finally {
      value.zero();
    }
  }

  async get(name: string, options: GetOptions = {}): Promise<SecretValue> {
    const identity = sanitize(name, options.vault ?? this.vault);
    const stored = await this.backend.getSecret(identity.namespace, identity.backendId, {
      version: options.version,
      signal: options.signal,
    });
    try {
      assertSameIdentity(identity, storedOriginalName(stored.tags));
    } catch (err) {
      stored.value.zero();
      throw err;
    }
    return { version: toVersion(identity, stored), value: stored.value };
  }

  /** Writes a new value for an existing secret, keeping its metadata. */
  async rotate(
    name: string,
    source: RotationSource = {},
    options: OperationOptions = {}
  ): Promise<SecretVersion> {
    let value: SecretBuffer | undefined = source instanceof SecretBuffer ? source : undefined;
    try {
      const identity = sanitize(name, options.vault ?? this.vault);
      const current = await this.readCurrent(identity, options.signal);
      if (!current) {
        throw new NotFoundError(`Secret "${name}" not found in ${identity.namespace}`);
      }
      assertSameIdentity(identity, current.storedName);

      value = await this.produce(source);
      const version = await this.write(identity, value, mergeMetadata(current.metadata, {}, name), {
        contentType: current.properties.contentType,
        notBefore: current.properties.attributes.notBefore,
        signal: options.signal,
      });
      this.logger.info("Rotated secret", {
        secret: identity.backendId,
        from: current.properties.versionId,
        to: version.versionId,
      });
      return version;
    } finally {
      value?.zero();
    }
  }

  /**
   * Every version of a secret, oldest first. Each iteration walks all pages
   * afresh, so the result can be iterated more than once.
   */
  getVersions(name: string, options: OperationOptions = {}): AsyncIterable<SecretVersion> {
    const identity = sanitize(name, options.vault ?? this.vault);
    return restartable(() => this.versions(identity, options.signal));
  }

  /**
   * Makes `targetVersionId`'s value current again by writing it as a new
   * version. The metadata of the current version is kept.
   */
  async rollback(
    name: string,
    targetVersionId: string,
    options: OperationOptions = {}
  ): Promise<RollbackResult> {
    const identity = sanitize(name, options.vault ?? this.vault);
    const target = await this.backend.getSecret(identity.namespace, identity.backendId, {
      version: targetVersionId,
      signal: options.signal,
    });
    try {
      assertSameIdentity(identity, storedOriginalName(target.tags));
      const current = await this.readCurrent(identity, options.signal);
      const metadata = current?.metadata ?? decode(target.tags, identity.backendId);
      const version = await this.write(identity, target.value, mergeMetadata(metadata, {}, name), {
        contentType: current?.properties.contentType ?? target.contentType,
        notBefore: current?.properties.attributes.notBefore,
        signal: options.signal,
      });
      this.logger.info("Rolled back secret", {
        secret: identity.backendId,
        restoredFrom: targetVersionId,
        to: version.versionId,
      });
      return { version, restoredFrom: targetVersionId };
    } finally {
      target.value.zero();
    }
  }

  /**
   * Secrets in a vault, in backend page order. Pages are fetched as the
   * caller iterates; a failing page ends the iteration with its error.
   */
  listSecrets(namespace: string = this.vault, options: ListOptions = {}): AsyncIterable<SecretListing> {
    return restartable(() => this.listings(namespace, options));
  }

  /** The whole listing, or the error of the first failing page and nothing else. */
  async listAll(namespace: string = this.vault, options: ListOptions = {}): Promise<SecretListing[]> {
    const all: SecretListing[] = [];
    for await (const listing of this.listings(namespace, options)) {
      all.push(listing);
    }
    return all;
  }

  /** Soft delete; the secret can be recovered until it is purged. */
  async delete(name: string, options: OperationOptions = {}): Promise<SecretListing> {
    const identity = sanitize(name, options.vault ?? this.vault);
    const current = await this.readCurrent(identity, options.signal);
    assertSameIdentity(identity, current?.storedName);
    const deleted = await this.backend.deleteSecret(identity.namespace, identity.backendId, {
      signal: options.signal,
    });
    this.logger.info("Deleted secret", { secret: identity.backendId });
    return toListing(identity.namespace, deleted);
  }

  async recover(name: string, options: OperationOptions = {}): Promise<SecretVersion> {
    const identity = sanitize(name, options.vault ?? this.vault);
    const recovered = await this.backend.recoverSecret(identity.namespace, identity.backendId, {
      signal: options.signal,
    });
    this.logger.info("Recovered secret", { secret: identity.backendId });
    return toVersion(identity, recovered);
  }

  /** Permanent. Only soft-deleted secrets can be purged. */
  async purge(name: string, options: OperationOptions = {}): Promise<void> {
    const identity = sanitize(name, options.vault ?? this.vault);
    await this.backend.purgeSecret(identity.namespace, identity.backendId, {
      signal: options.signal,
    });
    this.logger.info("Purged secret", { secret: identity.backendId });
  }

  /**
   * Changes metadata, and with `rename` the name. Tags are written as a whole
   * set alongside a value, so this creates a new version holding the current
   * value. A rename writes the new name first, then soft-deletes the old one.
   */
  async update(name: string, update: SecretUpdate, options: OperationOptions = {}): Promise<SecretVersion> {
    const namespace = options.vault ?? this.vault;
    const source = sanitize(name, namespace);
    if (update.rename === undefined || update.rename === name) {
      return this.transfer(source, source, {
        changes: update,
        relocate: false,
        removeSource: false,
        signal: options.signal,
      });
    }
    const version = await this.transfer(source, sanitize(update.rename, namespace), {
      changes: update,
      relocate: true,
      removeSource: true,
      signal: options.signal,
    });
    this.logger.info("Renamed secret", { from: source.backendId, to: version.identity.backendId });
    return version;
  }

  /** Copies the current value and metadata to a name or vault that holds no secret yet. */
  async copy(name: string, target: TransferTarget, options: OperationOptions = {}): Promise<SecretVersion> {
    const source = sanitize(name, options.vault ?? this.vault);
    const destination = sanitize(target.name ?? name, target.vault ?? source.namespace);
    const version = await this.transfer(source, destination, {
      changes: {},
      relocate: true,
      removeSource: false,
      signal: options.signal,
    });
    this.logger.info("Copied secret", {
      secret: source.backendId,
      to: `${destination.namespace}/${destination.backendId}`,
    });
    return version;
  }

  /** {@link copy}, then a soft delete of the source. */
  async move(name: string, target: TransferTarget, options: OperationOptions = {}): Promise<SecretVersion> {
    const source = sanitize(name, options.vault ?? this.vault);
    const destination = sanitize(target.name ?? name, target.vault ?? source.namespace);
    const version = await this.transfer(source, destination, {
      changes: {},
      relocate: true,
      removeSource: true,
      signal: options.signal,
    });
    this.logger.info("Moved secret", {
      secret: source.backendId,
      to: `${destination.namespace}/${destination.backendId}`,
    });
    return version;
  }

  /** Active secrets by group name, sorted, with ungrouped ones under {@link NO_GROUP}. */
  async groupSecrets(
    namespace: string = this.vault,
    options: { signal?: AbortSignal } = {}
  ): Promise<Map<string, SecretListing[]>> {
    const groups = new Map<string, SecretListing[]>();
    const add = (group: string, listing: SecretListing) => {
      const members = groups.get(group) ?? [];
      members.push(listing);
      groups.set(group, members);
    };
    for await (const listing of this.listSecrets(namespace, { signal: options.signal })) {
      if (listing.metadata.groups.length === 0) {
        add(NO_GROUP, listing);
      }
      for (const group of listing.metadata.groups) {
        add(group, listing);
      }
    }

    const names = [...groups.keys()].filter((g) => g !== NO_GROUP).sort();
    if (groups.has(NO_GROUP)) names.push(NO_GROUP);
    const sorted = new Map<string, SecretListing[]>();
    for (const group of names) {
      sorted.set(group, groups.get(group) ?? []);
    }
    return sorted;
  }

  private async readCurrent(
    identity: SecretIdentity,
    signal: AbortSignal | undefined
  ): Promise<CurrentState | undefined> {
    let stored: StoredSecret;
    try {
      stored = await this.backend.getSecret(identity.namespace, identity.backendId, { signal });
    } catch (err) {
      if (err instanceof NotFoundError) return undefined;
      throw err;
    }
    stored.value.zero();
    return {
      properties: stored,
      metadata: decode(stored.tags, identity.backendId),
      storedName: storedOriginalName(stored.tags),
    };
  }

  /** Writes the current value of `source` to `target` with `changes` applied. */
  private async transfer(
    source: SecretIdentity,
    target: SecretIdentity,
    options: TransferOptions
  ): Promise<SecretVersion> {
    const { signal } = options;
    const stored = await this.backend.getSecret(source.namespace, source.backendId, { signal });
    try {
      assertSameIdentity(source, storedOriginalName(stored.tags));
      if (options.relocate) await this.assertVacant(target, signal);

      const input = mergeMetadata(
        decode(stored.tags, source.backendId),
        options.changes,
        target.userName
      );
      const version = await this.write(target, stored.value, input, {
        contentType: stored.contentType,
        notBefore: pickNotBefore(options.changes.notBefore, stored.attributes.notBefore),
        signal,
      });
      if (options.removeSource && !sameLocation(source, target)) {
        await this.backend.deleteSecret(source.namespace, source.backendId, { signal });
      }
      return version;
    } finally {
      stored.value.zero();
    }
  }

  private async assertVacant(target: SecretIdentity, signal: AbortSignal | undefined): Promise<void> {
    const existing = await this.readCurrent(target, signal);
    if (!existing) return;
    assertSameIdentity(target, existing.storedName);
    throw new ConflictError(`Secret "${target.userName}" already exists in ${target.namespace}`);
  }

  private async write(
    identity: SecretIdentity,
    value: SecretBuffer,
    input: MetadataInput,
    options: WriteOptions
  ): Promise<SecretVersion> {
    const tags = encode(input);
    const properties = await this.backend.setSecret(
      identity.namespace,
      identity.backendId,
      { value, tags, contentType: options.contentType, notBefore: options.notBefore },
      { signal: options.signal }
    );
    this.logger.debug("Wrote secret version", {
      secret: identity.backendId,
      version: properties.versionId,
    });
    return toVersion(identity, properties);
  }

  private async produce(source: RotationSource): Promise<SecretBuffer> {
    if (source instanceof SecretBuffer) return source;
    if (typeof source === "function") return source();
    return generateValue(source.length, source.charset);
  }

  private async *versions(
    identity: SecretIdentity,
    signal: AbortSignal | undefined
  ): AsyncGenerator<SecretVersion> {
    const all: SecretProperties[] = [];
    for await (const page of this.backend.listVersions(identity.namespace, identity.backendId, {
      signal,
    })) {
      all.push(...page);
    }
    // Array.prototype.sort is stable, so ties keep backend order. Creation
    // times have one-second resolution: versions written within the same
    // second come out in whatever order the backend listed them.
    all.sort((a, b) => (a.attributes.createdAt?.getTime() ?? 0) - (b.attributes.createdAt?.getTime() ?? 0));

    const newest = all[all.length - 1];
    if (newest) {
      assertSameIdentity(identity, storedOriginalName(newest.tags));
    }
    for (const properties of all) {
      yield toVersion(identity, properties);
    }
  }

  private async *listings(namespace: string, options: ListOptions): AsyncGenerator<SecretListing> {
    for await (const page of this.backend.listSecrets(namespace, {
      includeDeleted: options.includeDeleted,
      signal: options.signal,
    })) {
      for (const item of page) {
        if (item.deleted && !options.includeDeleted) continue;
        const listing = toListing(namespace, item);
        if (options.group !== undefined && !listing.metadata.groups.includes(options.group)) {
          continue;
        }
        yield listing;
      }
    }
  }
}
