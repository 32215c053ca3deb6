import { describe, test, expect, vi, afterEach } from "vitest";
import { SecretBuffer } from "../../src/auth/secret-buffer";
import { printListing } from "../../src/commands/list";
import { ForbiddenError } from "../../src/errors";
import { createTestClient } from "../helpers/client";

afterEach(() => {
  vi.restoreAllMocks();
});

async function seeded() {
  const client = createTestClient();
  client.vault.pageSize = 1;
  for (const name of ["a", "b", "c"]) {
    await client.lifecycle.set(name, SecretBuffer.from("test-secret"));
  }
  return client;
}

describe("printListing", () => {
  test("prints every secret once all pages are in", async () => {
    const { lifecycle } = await seeded();
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await printListing(lifecycle, { deleted: false });

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      "Secrets:\n",
      "    · a",
      "    · b",
      "    · c",
      "\n3 secrets.",
    ]);
  });

  test("prints no rows when a later page fails", async () => {
    const { lifecycle, vault } = await seeded();
    vault.fail({ status: 403 }, (request) => request.url.includes("skiptoken=2"));
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await expect(printListing(lifecycle, { deleted: false })).rejects.toBeInstanceOf(
      ForbiddenError
    );
    expect(log).not.toHaveBeenCalled();
  });

  test("says so when the vault is empty", async () => {
    const { lifecycle } = createTestClient();
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await printListing(lifecycle, { deleted: false });

    expect(log).toHaveBeenCalledWith("No secrets found.");
  });
});
