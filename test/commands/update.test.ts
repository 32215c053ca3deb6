import { describe, test, expect } from "vitest";
import { toSecretUpdate, type UpdateFlags } from "../../src/commands/update";

function flags(overrides: Partial<UpdateFlags> = {}): UpdateFlags {
  return {
    group: [],
    replaceGroups: false,
    tag: [],
    replaceTags: false,
    clearExpires: false,
    clearNotBefore: false,
    ...overrides,
  };
}

describe("toSecretUpdate", () => {
  test("leaves untouched fields undefined", () => {
    expect(toSecretUpdate(flags({ note: "n" }))).toEqual({
      replaceGroups: false,
      replaceCustom: false,
      note: "n",
    });
  });

  test("parses tags, dates and the new name", () => {
    const update = toSecretUpdate(
      flags({
        tag: ["env=prod"],
        group: ["ops"],
        expires: "2030-01-01T00:00:00Z",
        notBefore: "2029-01-01T00:00:00Z",
        rename: "api-key-2",
      })
    );
    expect(update.custom).toEqual({ env: "prod" });
    expect(update.groups).toEqual(["ops"]);
    expect(update.expiresAt).toEqual(new Date("2030-01-01T00:00:00Z"));
    expect(update.notBefore).toEqual(new Date("2029-01-01T00:00:00Z"));
    expect(update.rename).toBe("api-key-2");
  });

  test("clears dates with null", () => {
    const update = toSecretUpdate(flags({ clearExpires: true, clearNotBefore: true }));
    expect(update.expiresAt).toBeNull();
    expect(update.notBefore).toBeNull();
  });

  test("replace flags without values clear the stored set", () => {
    const update = toSecretUpdate(flags({ replaceTags: true, replaceGroups: true }));
    expect(update.custom).toEqual({});
    expect(update.groups).toEqual([]);
  });

  test("rejects a date together with its clear flag", () => {
    expect(() => toSecretUpdate(flags({ expires: "2030-01-01", clearExpires: true }))).toThrow(
      "--expires and --clear-expires cannot be used together"
    );
  });
});
