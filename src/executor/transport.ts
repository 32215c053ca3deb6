import { CancelledError, TransientBackendError, errorMessage } from "../errors";
import type { FetchFn } from "../auth/credentials";

export type HttpMethod = "GET" | "PUT" | "POST" | "PATCH" | "DELETE";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  /** Parsed JSON, the raw text when it is not JSON, or null when empty. */
  body: unknown;
}

/**
 * Sends one request. Resolves with any HTTP status; rejects only when no
 * response was received, with a TransientBackendError or a CancelledError.
 */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

// Errors raised before the request could have left the machine.
const NOT_SENT_CODES = new Set([
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
]);

function errorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

/** Maps a failed fetch onto the transient taxonomy. */
export function classifyTransportError(err: unknown, url: string): TransientBackendError {
  const code = errorCode(err);
  const outcomeUnknown = code === undefined || !NOT_SENT_CODES.has(code);
  const detail = code ? `${code}: ${errorMessage(err)}` : errorMessage(err);
  return new TransientBackendError(`Request to ${new URL(url).host} failed (${detail})`, {
    outcomeUnknown,
    cause: err,
  });
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

export interface FetchTransportOptions {
  fetch?: FetchFn;
  /** Per-request timeout. */
  timeoutMs?: number;
}

export function createFetchTransport(options: FetchTransportOptions = {}): HttpTransport {
  const fetchFn: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  const timeoutMs = options.timeoutMs ?? 120_000;

  return async (request) => {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    request.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });
      return { status: response.status, headers, body: await readBody(response) };
    } catch (err) {
      if (request.signal?.aborted) {
        throw new CancelledError("Operation cancelled", { cause: err });
      }
      if (timedOut) {
        throw new TransientBackendError(
          `Request to ${new URL(request.url).host} timed out after ${timeoutMs}ms`,
          { outcomeUnknown: true, cause: err }
        );
      }
      throw classifyTransportError(err, request.url);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onAbort);
    }
  };
}
