import { describe, test, expect } from "vitest";
import type { FetchFn } from "../../src/auth/credentials";
import { CancelledError, TransientBackendError } from "../../src/errors";
import { classifyTransportError, createFetchTransport } from "../../src/executor/transport";

const URL_ = "https://test-vault.vault.azure.net/secrets/db-url?api-version=7.4";

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

/** A fetch that never answers and rejects once its signal fires. */
const hangingFetch: FetchFn = (_input, init) =>
  new Promise((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });

describe("createFetchTransport", () => {
  test("parses JSON bodies and lower-cases headers", async () => {
    const transport = createFetchTransport({
      fetch: async () =>
        new Response(JSON.stringify({ value: "x" }), {
          status: 200,
          headers: { "Content-Type": "application/json", "Retry-After": "1" },
        }),
    });
    const response = await transport({ method: "GET", url: URL_, headers: {} });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ value: "x" });
    expect(response.headers["retry-after"]).toBe("1");
  });

  test("keeps non-JSON bodies as text and empty bodies as null", async () => {
    const text = createFetchTransport({ fetch: async () => new Response("oops", { status: 502 }) });
    expect((await text({ method: "GET", url: URL_, headers: {} })).body).toBe("oops");

    const empty = createFetchTransport({ fetch: async () => new Response(null, { status: 204 }) });
    expect((await empty({ method: "DELETE", url: URL_, headers: {} })).body).toBeNull();
  });

  test("reports a caller abort as cancellation", async () => {
    const transport = createFetchTransport({ fetch: hangingFetch });
    const controller = new AbortController();
    const pending = transport({ method: "GET", url: URL_, headers: {}, signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  test("reports a timeout as a transient failure of unknown outcome", async () => {
    const transport = createFetchTransport({ fetch: hangingFetch, timeoutMs: 5 });
    const err = await transport({ method: "GET", url: URL_, headers: {} }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientBackendError);
    expect(err).toMatchObject({
      message: "Request to test-vault.vault.azure.net timed out after 5ms",
      outcomeUnknown: true,
    });
  });
});

describe("classifyTransportError", () => {
  test("treats connection refusal as not sent", () => {
    const err = classifyTransportError(withCode("connect failed", "ECONNREFUSED"), URL_);
    expect(err.outcomeUnknown).toBe(false);
    expect(err.message).toBe(
      "Request to test-vault.vault.azure.net failed (ECONNREFUSED: connect failed)"
    );
  });

  test("finds the code on a nested cause", () => {
    const err = classifyTransportError(
      new TypeError("fetch failed", { cause: withCode("getaddrinfo", "ENOTFOUND") }),
      URL_
    );
    expect(err.outcomeUnknown).toBe(false);
    expect(err.message).toBe(
      "Request to test-vault.vault.azure.net failed (ENOTFOUND: fetch failed)"
    );
  });

  test("treats a reset connection as possibly applied", () => {
    expect(classifyTransportError(withCode("socket hang up", "ECONNRESET"), URL_).outcomeUnknown).toBe(
      true
    );
    expect(classifyTransportError(new Error("mystery"), URL_).outcomeUnknown).toBe(true);
  });
});
