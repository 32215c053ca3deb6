import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Readable } from "stream";
import { ValidationError } from "../../src/errors";
import { collect, parseDate, parseTags, readStdin, runWithClient } from "../../src/commands/shared";

describe("parseTags", () => {
  test("splits key=value pairs on the first equals sign", () => {
    expect(parseTags(["env=prod", "url=a=b"])).toEqual({ env: "prod", url: "a=b" });
  });

  test("rejects pairs without a key", () => {
    expect(() => parseTags(["=x"])).toThrow(ValidationError);
    expect(() => parseTags(["novalue"])).toThrow('Expected key=value, got "novalue"');
  });
});

describe("parseDate", () => {
  test("parses ISO dates", () => {
    expect(parseDate("2030-01-01T00:00:00Z")).toEqual(new Date("2030-01-01T00:00:00Z"));
  });

  test("rejects garbage", () => {
    expect(() => parseDate("someday")).toThrow("Invalid date: someday");
  });
});

describe("collect", () => {
  test("accumulates repeated options", () => {
    expect(collect("b", collect("a", []))).toEqual(["a", "b"]);
  });
});

describe("readStdin", () => {
  test("joins chunks and drops one trailing newline", async () => {
    const value = await readStdin(Readable.from(["test-", "secret\n"]));
    expect(value.use((v) => v)).toBe("test-secret");
  });

  test("drops a trailing CRLF", async () => {
    const value = await readStdin(Readable.from([Buffer.from("test-secret\r\n")]));
    expect(value.use((v) => v)).toBe("test-secret");
  });

  test("keeps inner newlines", async () => {
    const value = await readStdin(Readable.from(["line1\nline2\n\n"]));
    expect(value.use((v) => v)).toBe("line1\nline2\n");
  });
});

describe("runWithClient", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "kvault-cli-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  test("prints configuration errors and sets the exit code", async () => {
    const path = join(dir, "kvault.json");
    writeFileSync(path, "{ not json");
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const action = vi.fn(async () => {});
    const listeners = process.listenerCount("SIGINT");

    await runWithClient({ config: path }, action);

    expect(action).not.toHaveBeenCalled();
    expect(spy).toHaveBeenCalledWith(expect.stringMatching(/^Error: .* is not valid JSON: /));
    expect(process.exitCode).toBe(1);
    expect(process.listenerCount("SIGINT")).toBe(listeners);
  });

  test("runs the action with a client", async () => {
    const path = join(dir, "kvault.json");
    writeFileSync(path, JSON.stringify({ vault: "test-vault", logLevel: "silent" }));
    vi.stubEnv("KVAULT_ACCESS_TOKEN", "test-token");
    const seen: string[] = [];

    await runWithClient({ config: path }, async (client, signal) => {
      seen.push(client.backend.name, String(signal.aborted));
    });

    expect(seen).toEqual(["Azure Key Vault", "false"]);
    expect(process.exitCode).toBeUndefined();
  });
});
