import { TagBudgetExceededError, ValidationError } from "../errors";
import { restore } from "./sanitizer";

/**
 * Tag layout:
 *
 *   groups         comma-joined, sorted, de-duplicated group names
 *   original_name  the user's name, verbatim
 *   expires        ISO-8601 UTC
 *   note, folder   optional, one slot each when present
 *   anything else  caller-supplied custom attributes
 *
 * Groups share a single tag because the backend only allows 15 per secret.
 * Readers must accept tags written by older versions or by other tools.
 */
export const TAG_SLOT_LIMIT = 15;

export const GROUPS_TAG = "groups";
export const ORIGINAL_NAME_TAG = "original_name";
export const EXPIRES_TAG = "expires";
export const NOTE_TAG = "note";
export const FOLDER_TAG = "folder";
/** Written by earlier tools in place of original_name. */
const LEGACY_NAME_TAG = "name";

export const RESERVED_TAGS: readonly string[] = [GROUPS_TAG, ORIGINAL_NAME_TAG, EXPIRES_TAG];
const NAMED_TAGS: readonly string[] = [...RESERVED_TAGS, NOTE_TAG, FOLDER_TAG];

export const GROUP_DELIMITER = ",";
const MAX_TAG_KEY_LENGTH = 512;
const MAX_TAG_VALUE_LENGTH = 256;
const MAX_FOLDER_SEGMENT_LENGTH = 50;
const MAX_FOLDER_DEPTH = 10;

export type TagSet = Record<string, string>;

export interface SecretMetadata {
  /** Sorted, unique. */
  groups: string[];
  originalName: string;
  expiresAt?: Date;
  note?: string;
  folder?: string;
  custom: Record<string, string>;
}

export interface MetadataInput {
  groups?: Iterable<string>;
  originalName: string;
  expiresAt?: Date;
  note?: string;
  folder?: string;
  custom?: Record<string, string>;
}

export interface MetadataUpdate {
  groups?: string[];
  /** Replace the stored groups instead of adding to them. */
  replaceGroups?: boolean;
  /** `null` clears the expiry. */
  expiresAt?: Date | null;
  note?: string;
  /** Validated here; a folder already stored is carried over as written. */
  folder?: string;
  custom?: Record<string, string>;
  /** Replace the stored custom tags instead of merging into them. */
  replaceCustom?: boolean;
}

export function validateGroupName(group: string): void {
  if (group.trim().length === 0) {
    throw new ValidationError("Group names cannot be empty");
  }
  if (group.includes(GROUP_DELIMITER)) {
    throw new ValidationError(
      `Group name "${group}" cannot contain "${GROUP_DELIMITER}"`
    );
  }
  if (group !== group.trim()) {
    throw new ValidationError(
      `Group name "${group}" cannot start or end with whitespace`
    );
  }
}

export function validateFolderPath(folder: string): void {
  if (folder.length === 0) {
    throw new ValidationError("Folder path cannot be empty");
  }
  if (folder.startsWith("/") || folder.endsWith("/")) {
    throw new ValidationError("Folder path cannot start or end with '/'");
  }
  const segments = folder.split("/");
  if (segments.length > MAX_FOLDER_DEPTH) {
    throw new ValidationError(
      `Folder path cannot be deeper than ${MAX_FOLDER_DEPTH} levels`
    );
  }
  for (const segment of segments) {
    if (segment.length === 0) {
      throw new ValidationError("Folder path cannot contain empty segments");
    }
    if (segment.trim().length === 0) {
      throw new ValidationError("Folder names cannot be only whitespace");
    }
    if (segment.length > MAX_FOLDER_SEGMENT_LENGTH) {
      throw new ValidationError(
        `Folder names cannot exceed ${MAX_FOLDER_SEGMENT_LENGTH} characters`
      );
    }
  }
}

function checkTag(key: string, value: string): void {
  if (key.length === 0 || key.length > MAX_TAG_KEY_LENGTH) {
    throw new ValidationError(
      `Tag name must be 1-${MAX_TAG_KEY_LENGTH} characters, got ${key.length}`
    );
  }
  if (value.length > MAX_TAG_VALUE_LENGTH) {
    throw new ValidationError(
      `Tag "${key}" is ${value.length} characters; the limit is ${MAX_TAG_VALUE_LENGTH}`
    );
  }
}

/** Slots an encoded input would take, reserved slots included. */
export function slotCount(input: MetadataInput): number {
  const custom = Object.keys(input.custom ?? {}).length;
  const optional = (input.note !== undefined ? 1 : 0) + (input.folder !== undefined ? 1 : 0);
  return RESERVED_TAGS.length + custom + optional;
}

export function encode(input: MetadataInput): TagSet {
  const slots = slotCount(input);
  if (slots > TAG_SLOT_LIMIT) {
    throw new TagBudgetExceededError(slots, TAG_SLOT_LIMIT);
  }

  const tags: TagSet = {};
  for (const [key, value] of Object.entries(input.custom ?? {})) {
    if (NAMED_TAGS.includes(key)) {
      throw new ValidationError(`Tag "${key}" is reserved`);
    }
    checkTag(key, value);
    tags[key] = value;
  }

  const groups = new Set<string>();
  for (const group of input.groups ?? []) {
    validateGroupName(group);
    groups.add(group);
  }
  if (groups.size > 0) {
    tags[GROUPS_TAG] = [...groups].sort().join(GROUP_DELIMITER);
  }

  tags[ORIGINAL_NAME_TAG] = input.originalName;

  if (input.expiresAt !== undefined) {
    if (Number.isNaN(input.expiresAt.getTime())) {
      throw new ValidationError("Expiry is not a valid date");
    }
    tags[EXPIRES_TAG] = input.expiresAt.toISOString();
  }
  if (input.note !== undefined) {
    tags[NOTE_TAG] = input.note;
  }
  if (input.folder !== undefined) {
    tags[FOLDER_TAG] = input.folder;
  }

  for (const key of NAMED_TAGS) {
    const value = tags[key];
    if (value !== undefined) checkTag(key, value);
  }
  return tags;
}

export function parseGroups(value: string | undefined): string[] {
  if (!value) return [];
  const groups = value
    .split(GROUP_DELIMITER)
    .map((g) => g.trim())
    .filter((g) => g.length > 0);
  return [...new Set(groups)].sort();
}

/** The name a stored item was written for, if any tool recorded one. */
export function storedOriginalName(tags: TagSet | undefined): string | undefined {
  return tags?.[ORIGINAL_NAME_TAG] ?? tags?.[LEGACY_NAME_TAG];
}

/** Never throws: unreadable or missing tags fall back to defaults. */
export function decode(tags: TagSet | undefined, backendId: string): SecretMetadata {
  const source = tags ?? {};
  const custom: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (NAMED_TAGS.includes(key)) continue;
    if (key === LEGACY_NAME_TAG && source[ORIGINAL_NAME_TAG] === undefined) continue;
    custom[key] = value;
  }

  const metadata: SecretMetadata = {
    groups: parseGroups(source[GROUPS_TAG]),
    originalName: restore(storedOriginalName(source), backendId),
    custom,
  };

  const expires = source[EXPIRES_TAG];
  if (expires !== undefined) {
    const time = Date.parse(expires);
    if (!Number.isNaN(time)) metadata.expiresAt = new Date(time);
  }
  if (source[NOTE_TAG] !== undefined) metadata.note = source[NOTE_TAG];
  if (source[FOLDER_TAG] !== undefined) metadata.folder = source[FOLDER_TAG];
  return metadata;
}

/** Read-modify-write: the stored state overlaid with the caller's changes. */
export function mergeMetadata(
  current: SecretMetadata | undefined,
  update: MetadataUpdate,
  originalName: string
): MetadataInput {
  const stored = current?.groups ?? [];
  let groups: string[];
  if (update.groups === undefined) {
    groups = stored;
  } else if (update.replaceGroups) {
    groups = update.groups;
  } else {
    groups = [...stored, ...update.groups];
  }

  const expiresAt =
    update.expiresAt === null ? undefined : update.expiresAt ?? current?.expiresAt;
  if (update.folder !== undefined) validateFolderPath(update.folder);

  return {
    groups,
    originalName,
    expiresAt,
    note: update.note ?? current?.note,
    folder: update.folder ?? current?.folder,
    custom: update.replaceCustom
      ? { ...update.custom }
      : { ...current?.custom, ...update.custom },
  };
}
