import { describe, test, expect } from "vitest";
import { SecretBuffer, withSecret } from "../../src/auth/secret-buffer";

describe("SecretBuffer", () => {
  test("exposes the value only inside use()", () => {
    const secret = SecretBuffer.from("test-secret");
    expect(secret.use((v) => v.length)).toBe(11);
    expect(String(secret)).toBe("[SecretBuffer]");
    expect(JSON.stringify({ secret })).toBe('{"secret":"[SecretBuffer]"}');
  });

  test("zero() clears the bytes and blocks further use", () => {
    const bytes = Buffer.from("test-secret");
    const secret = SecretBuffer.adopt(bytes);
    secret.zero();

    expect(secret.isZeroed).toBe(true);
    expect(secret.byteLength).toBe(0);
    expect(bytes.every((b) => b === 0)).toBe(true);
    expect(() => secret.use((v) => v)).toThrow("Secret buffer has already been cleared");
  });

  test("copies are independent", () => {
    const original = SecretBuffer.from("test-secret");
    const copy = original.copy();
    original.zero();

    expect(copy.use((v) => v)).toBe("test-secret");
  });

  test("compares contents", () => {
    expect(SecretBuffer.from("a").equals(SecretBuffer.from("a"))).toBe(true);
    expect(SecretBuffer.from("a").equals(SecretBuffer.from("b"))).toBe(false);
  });
});

describe("withSecret", () => {
  test("zeroes the secret after the callback", async () => {
    const secret = SecretBuffer.from("test-secret");
    await expect(withSecret(secret, async (s) => s.use((v) => v))).resolves.toBe("test-secret");
    expect(secret.isZeroed).toBe(true);
  });

  test("zeroes the secret when the callback throws", async () => {
    const secret = SecretBuffer.from("test-secret");
    await expect(
      withSecret(secret, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(secret.isZeroed).toBe(true);
  });
});
