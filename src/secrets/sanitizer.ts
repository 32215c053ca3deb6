import { createHash } from "crypto";
import { NamingCollisionError, ValidationError } from "../errors";

export const MAX_NAME_LENGTH = 127;
export const HASH_PREFIX = "h-";
/** Bytes of the SHA-256 digest kept for hashed names (32 hex characters). */
const HASH_BYTES = 16;

const VALID_NAME = /^[A-Za-z0-9-]+$/;

export interface SecretIdentity {
  userName: string;
  backendId: string;
  namespace: string;
}

export interface SecretNameInfo {
  originalName: string;
  sanitizedName: string;
  wasModified: boolean;
  isHashed: boolean;
  isValid: boolean;
}

export function isValidBackendName(name: string): boolean {
  return name.length > 0 && name.length <= MAX_NAME_LENGTH && VALID_NAME.test(name);
}

export function hashName(userName: string): string {
  const digest = createHash("sha256").update(userName, "utf8").digest();
  return `${HASH_PREFIX}${digest.subarray(0, HASH_BYTES).toString("hex")}`;
}

function toBackendId(userName: string): string {
  if (isValidBackendName(userName)) return userName;

  const replaced = userName
    .replace(/[^A-Za-z0-9-]/gu, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");

  if (replaced.length === 0 || replaced.length > MAX_NAME_LENGTH) {
    return hashName(userName);
  }
  return replaced;
}

/**
 * Maps a user-chosen name onto the backend alphabet (alphanumerics and `-`,
 * at most 127 characters). Deterministic; names that are already valid pass
 * through unchanged. Never inverted: the original name is recovered from the
 * `original_name` tag.
 */
export function sanitize(userName: string, namespace: string): SecretIdentity {
  if (userName.length === 0) {
    throw new ValidationError("Secret name cannot be empty");
  }
  return { userName, backendId: toBackendId(userName), namespace };
}

export function restore(
  originalNameAttribute: string | undefined,
  backendId: string
): string {
  return originalNameAttribute ?? backendId;
}

/**
 * Fails when the item at `identity.backendId` was written for a different
 * user name, e.g. `db_url` after `db.url`.
 */
export function assertSameIdentity(
  identity: SecretIdentity,
  storedOriginalName: string | undefined
): void {
  if (storedOriginalName !== undefined && storedOriginalName !== identity.userName) {
    throw new NamingCollisionError(identity.userName, storedOriginalName, identity.backendId);
  }
}

export function describeName(userName: string): SecretNameInfo {
  const { backendId } = sanitize(userName, "");
  return {
    originalName: userName,
    sanitizedName: backendId,
    wasModified: backendId !== userName,
    isHashed: backendId !== userName && backendId === hashName(userName),
    isValid: isValidBackendName(backendId),
  };
}
