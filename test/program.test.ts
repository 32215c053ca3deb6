import { describe, test, expect, vi, afterEach } from "vitest";
import { SecretBuffer } from "../src/auth/secret-buffer";
import { createProgram, VERSION } from "../src/program";
import { LifecycleManager } from "../src/secrets/lifecycle";

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  process.exitCode = undefined;
});

describe("createProgram", () => {
  test("hands --version after a sub-command to that sub-command", async () => {
    vi.stubEnv("KVAULT_VAULT", "test-vault");
    vi.stubEnv("KVAULT_ACCESS_TOKEN", "test-token");
    const get = vi.spyOn(LifecycleManager.prototype, "get").mockResolvedValue({
      version: {
        identity: { userName: "api-key", backendId: "api-key", namespace: "test-vault" },
        versionId: "abc123",
        enabled: true,
        metadata: { groups: [], originalName: "api-key", custom: {} },
      },
      value: SecretBuffer.from("test-secret"),
    });
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    await createProgram()
      .exitOverride()
      .parseAsync(["get", "api-key", "--version", "abc123", "--config", "absent.json"], {
        from: "user",
      });

    expect(get).toHaveBeenCalledWith("api-key", {
      version: "abc123",
      signal: expect.any(AbortSignal),
    });
    expect(write).toHaveBeenCalledWith("test-secret\n");
    expect(process.exitCode).toBeUndefined();
  });

  test("prints the program version for a leading --version", async () => {
    const out: string[] = [];
    const program = createProgram()
      .exitOverride()
      .configureOutput({ writeOut: (str) => out.push(str) });

    await expect(program.parseAsync(["--version"], { from: "user" })).rejects.toMatchObject({
      code: "commander.version",
    });
    expect(out).toEqual([`${VERSION}\n`]);
  });

  test("registers every sub-command", () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual([
      "set",
      "get",
      "list",
      "update",
      "copy",
      "move",
      "delete",
      "recover",
      "purge",
      "history",
      "rotate",
      "rollback",
      "name",
    ]);
  });
});
