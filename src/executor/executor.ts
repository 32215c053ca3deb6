import { z } from "zod";
import {
  AuthError,
  BackendError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  RetryExhaustedError,
  TransientBackendError,
  ValidationError,
  isRetryable,
  throwIfCancelled,
} from "../errors";
import { silentLogger, type Logger } from "../logger";
import type { AuthTokenProvider } from "../auth/token-provider";
import {
  DEFAULT_RETRY_POLICY,
  computeDelay,
  parseRetryAfter,
  sleep as defaultSleep,
  type RetryPolicy,
  type Sleep,
} from "./retry";
import {
  createFetchTransport,
  type HttpMethod,
  type HttpResponse,
  type HttpTransport,
} from "./transport";

export interface BackendRequest {
  /** Human-readable name used in errors and logs, e.g. "set secret db-url". */
  operation: string;
  method: HttpMethod;
  url: string;
  body?: unknown;
  /**
   * False for calls with a side effect that repeats on replay, such as
   * creating a new secret version.
   */
  idempotent: boolean;
}

export type BackendResponse = HttpResponse;

export interface OperationExecutorOptions {
  tokens: AuthTokenProvider;
  scope: string;
  transport?: HttpTransport;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
  now?: () => number;
  random?: () => number;
  sleep?: Sleep;
}

const ErrorBodySchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

function describeFailure(response: HttpResponse): string {
  const parsed = ErrorBodySchema.safeParse(response.body);
  if (parsed.success) {
    const { code, message } = parsed.data.error;
    if (code && message) return `${code}: ${message}`;
    return message ?? code ?? `HTTP ${response.status}`;
  }
  if (typeof response.body === "string" && response.body.length > 0) {
    return response.body.slice(0, 200);
  }
  return `HTTP ${response.status}`;
}

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

/** Maps a non-2xx response onto the error taxonomy. */
export function errorForStatus(
  operation: string,
  response: HttpResponse,
  now: () => number = Date.now
): Error {
  const detail = `${operation}: ${describeFailure(response)}`;
  const { status } = response;
  if (status === 400 || status === 422) return new ValidationError(detail);
  if (status === 401) return new AuthError(detail);
  if (status === 403) return new ForbiddenError(detail);
  if (status === 404) return new NotFoundError(detail);
  if (status === 409) return new ConflictError(detail);
  if (TRANSIENT_STATUSES.has(status)) {
    return new TransientBackendError(detail, {
      status,
      retryAfterMs: parseRetryAfter(response.headers["retry-after"], now),
      // Throttling and overload responses mean the server did not act.
      outcomeUnknown: status === 500 || status === 502 || status === 504,
    });
  }
  return new BackendError(detail, status);
}

/**
 * Turns a logical backend request into one authenticated call, retried with
 * backoff on transient failures.
 *
 * A non-idempotent request whose failure may have reached the server is
 * retried at most `maxAmbiguousRetries` times. The backend has no idempotency
 * keys, so such a retry can create a duplicate secret version.
 */
export class OperationExecutor {
  private readonly tokens: AuthTokenProvider;
  private readonly scope: string;
  private readonly transport: HttpTransport;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly sleep: Sleep;

  constructor(options: OperationExecutorOptions) {
    this.tokens = options.tokens;
    this.scope = options.scope;
    this.transport = options.transport ?? createFetchTransport();
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute(
    request: BackendRequest,
    options: { signal?: AbortSignal } = {}
  ): Promise<BackendResponse> {
    const { signal } = options;
    const startedAt = this.now();
    let sends = 0;
    let transientFailures = 0;
    let ambiguousRetries = 0;
    let reauthenticated = false;

    for (;;) {
      throwIfCancelled(signal);
      sends++;

      let failure: unknown;
      try {
        const response = await this.send(request, signal);
        if (response.status < 400) return response;
        if (response.status === 401 && !reauthenticated) {
          reauthenticated = true;
          this.logger.debug("Token rejected, retrying with a fresh token", {
            operation: request.operation,
          });
          continue;
        }
        failure = errorForStatus(request.operation, response, this.now);
      } catch (err) {
        failure = err;
      }

      if (!isRetryable(failure)) throw failure;
      transientFailures++;

      if (failure.outcomeUnknown && !request.idempotent) {
        if (ambiguousRetries >= this.policy.maxAmbiguousRetries) {
          throw new RetryExhaustedError(request.operation, sends, failure);
        }
        ambiguousRetries++;
        this.logger.warn("Retrying a request that may already have been applied", {
          operation: request.operation,
        });
      }

      if (transientFailures >= this.policy.maxAttempts) {
        throw new RetryExhaustedError(request.operation, sends, failure);
      }
      const delay = computeDelay(
        transientFailures,
        this.policy,
        this.random,
        failure.retryAfterMs
      );
      if (this.now() - startedAt + delay > this.policy.maxElapsedMs) {
        throw new RetryExhaustedError(request.operation, sends, failure);
      }

      this.logger.info("Transient failure, backing off", {
        operation: request.operation,
        attempt: transientFailures,
        delayMs: delay,
        status: failure.status,
      });
      await this.sleep(delay, signal);
    }
  }

  private async send(
    request: BackendRequest,
    signal: AbortSignal | undefined
  ): Promise<HttpResponse> {
    const lease = await this.tokens.getToken(this.scope, { signal });
    try {
      const headers: Record<string, string> = lease.bearer((authorization) => ({
        Authorization: authorization,
        Accept: "application/json",
      }));
      if (request.body !== undefined) {
        headers["Content-Type"] = "application/json";
      }
      const response = await this.transport({
        method: request.method,
        url: request.url,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal,
      });
      if (response.status === 401) {
        this.tokens.invalidate(this.scope, lease);
      }
      return response;
    } finally {
      lease.release();
    }
  }
}
