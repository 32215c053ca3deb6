import { describe, test, expect } from "vitest";
import {
  MAX_NAME_LENGTH,
  assertSameIdentity,
  describeName,
  hashName,
  isValidBackendName,
  restore,
  sanitize,
} from "../../src/secrets/sanitizer";
import { NamingCollisionError, ValidationError } from "../../src/errors";

describe("sanitize", () => {
  test("passes valid names through unchanged", () => {
    expect(sanitize("db-url", "prod")).toEqual({
      userName: "db-url",
      backendId: "db-url",
      namespace: "prod",
    });
  });

  test("replaces disallowed characters with hyphens", () => {
    expect(sanitize("db.url", "prod").backendId).toBe("db-url");
    expect(sanitize("api_key/v2", "prod").backendId).toBe("api-key-v2");
  });

  test("collapses runs of hyphens and trims them at the ends", () => {
    expect(sanitize("my secret!!", "prod").backendId).toBe("my-secret");
    expect(sanitize("--a..b--", "prod").backendId).toBe("a-b");
  });

  test("treats each non-ASCII code point as one character", () => {
    expect(sanitize("pässwort", "prod").backendId).toBe("p-sswort");
    expect(sanitize("key🔑", "prod").backendId).toBe("key");
  });

  test("hashes names with nothing usable left", () => {
    expect(sanitize("___", "prod").backendId).toBe("h-bda251550bf0478f4172a8aeb291d654");
  });

  test("hashes names longer than the backend limit", () => {
    const { backendId } = sanitize("a".repeat(200), "prod");
    expect(backendId).toBe("h-c2a908d98f5df987ade41b5fce213067");
    expect(backendId.length).toBe(34);
    expect(backendId.length).toBeLessThanOrEqual(MAX_NAME_LENGTH);
  });

  test("keeps a name of exactly the maximum length", () => {
    const name = "b".repeat(MAX_NAME_LENGTH);
    expect(sanitize(name, "prod").backendId).toBe(name);
  });

  test("is deterministic", () => {
    expect(sanitize("Some Name", "a").backendId).toBe(sanitize("Some Name", "b").backendId);
  });

  test("rejects an empty name", () => {
    expect(() => sanitize("", "prod")).toThrow(ValidationError);
  });
});

describe("hashName", () => {
  test("prefixes a 32 hex character digest", () => {
    expect(hashName("___")).toMatch(/^h-[0-9a-f]{32}$/);
  });
});

describe("isValidBackendName", () => {
  test("accepts alphanumerics and hyphens only", () => {
    expect(isValidBackendName("abc-123")).toBe(true);
    expect(isValidBackendName("abc_123")).toBe(false);
    expect(isValidBackendName("")).toBe(false);
    expect(isValidBackendName("x".repeat(128))).toBe(false);
  });
});

describe("restore", () => {
  test("returns the stored original name", () => {
    expect(restore("db.url", "db-url")).toBe("db.url");
  });

  test("falls back to the backend id", () => {
    expect(restore(undefined, "db-url")).toBe("db-url");
  });
});

describe("assertSameIdentity", () => {
  const identity = sanitize("db_url", "prod");

  test("allows a slot with no recorded name", () => {
    expect(() => assertSameIdentity(identity, undefined)).not.toThrow();
  });

  test("allows the same name", () => {
    expect(() => assertSameIdentity(identity, "db_url")).not.toThrow();
  });

  test("rejects a slot written for another name", () => {
    expect(() => assertSameIdentity(identity, "db.url")).toThrow(NamingCollisionError);
    expect(() => assertSameIdentity(identity, "db.url")).toThrow(
      'Secret "db_url" maps to "db-url", which already holds "db.url"'
    );
  });
});

describe("describeName", () => {
  test("reports a modified name", () => {
    expect(describeName("db.url")).toEqual({
      originalName: "db.url",
      sanitizedName: "db-url",
      wasModified: true,
      isHashed: false,
      isValid: true,
    });
  });

  test("reports a hashed name", () => {
    const info = describeName("___");
    expect(info.isHashed).toBe(true);
    expect(info.isValid).toBe(true);
  });

  test("reports an unchanged name", () => {
    const info = describeName("plain");
    expect(info.wasModified).toBe(false);
    expect(info.isHashed).toBe(false);
  });
});
