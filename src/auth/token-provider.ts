import { AuthError, CancelledError, errorMessage, throwIfCancelled } from "../errors";
import { silentLogger, type Logger } from "../logger";
import type { TokenCredential } from "./credentials";
import type { SecretBuffer } from "./secret-buffer";

export const DEFAULT_REFRESH_MARGIN_MS = 5 * 60 * 1000;

interface CacheEntry {
  readonly scope: string;
  readonly token: SecretBuffer;
  readonly expiresOn: number;
  leases: number;
  evicted: boolean;
}

/**
 * A borrowed token. The bytes stay readable until `release()`; once the entry
 * has also been evicted from the cache and no lease holds it, it is zeroed.
 */
export class TokenLease {
  private released = false;

  constructor(
    private readonly entry: CacheEntry,
    private readonly onRelease: (entry: CacheEntry) => void
  ) {}

  get scope(): string {
    return this.entry.scope;
  }

  get expiresOn(): number {
    return this.entry.expiresOn;
  }

  /** @internal identity check used by {@link AuthTokenProvider.invalidate} */
  holds(entry: unknown): boolean {
    return this.entry === entry;
  }

  use<T>(fn: (token: string) => T): T {
    if (this.released) {
      throw new Error("Token lease has already been released");
    }
    return this.entry.token.use(fn);
  }

  /** Builds the Authorization header value for the duration of `fn`. */
  bearer<T>(fn: (header: string) => T): T {
    return this.use((token) => fn(`Bearer ${token}`));
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease(this.entry);
  }
}

export interface AuthTokenProviderOptions {
  credential: TokenCredential;
  refreshMarginMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Per-scope token cache with single-flight refresh.
 *
 * Concurrent callers for a scope whose token is missing or about to expire
 * share one call to the credential. Each caller waits on that shared refresh
 * with its own cancellation signal, so a caller that gives up never strands
 * the others.
 */
export class AuthTokenProvider {
  private readonly credential: TokenCredential;
  private readonly refreshMarginMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly cache = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, Promise<CacheEntry>>();
  private readonly shutdown = new AbortController();
  private closed = false;

  constructor(options: AuthTokenProviderOptions) {
    this.credential = options.credential;
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  async getToken(
    scope: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<TokenLease> {
    for (;;) {
      throwIfCancelled(options.signal);
      if (this.closed) {
        throw new AuthError("Token provider has been closed");
      }

      const cached = this.cache.get(scope);
      const entry =
        cached && this.isFresh(cached)
          ? cached
          : await this.waitFor(this.refresh(scope), options.signal);

      // Another caller may have invalidated the entry while we were resuming.
      if (!entry.token.isZeroed) {
        entry.leases++;
        return new TokenLease(entry, (e) => this.release(e));
      }
    }
  }

  /**
   * Drops the cached token for `scope`. With a lease, only drops it if it is
   * still the token that lease was issued from, so a token another caller
   * has just refreshed survives.
   */
  invalidate(scope: string, lease?: TokenLease): void {
    const entry = this.cache.get(scope);
    if (!entry) return;
    if (lease && !lease.holds(entry)) return;
    this.logger.debug("Invalidating cached token", { scope });
    this.evict(scope);
  }

  /** Zeroes every cached token and refuses further requests. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.shutdown.abort();
    for (const scope of [...this.cache.keys()]) {
      this.evict(scope);
    }
  }

  get cachedScopes(): string[] {
    return [...this.cache.keys()];
  }

  private isFresh(entry: CacheEntry): boolean {
    return entry.expiresOn - this.now() > this.refreshMarginMs;
  }

  private refresh(scope: string): Promise<CacheEntry> {
    const pending = this.inflight.get(scope);
    if (pending) return pending;

    const promise = this.fetchEntry(scope).finally(() => {
      this.inflight.delete(scope);
    });
    this.inflight.set(scope, promise);
    return promise;
  }

  private async fetchEntry(scope: string): Promise<CacheEntry> {
    this.logger.debug("Refreshing token", { scope });
    try {
      const raw = await this.credential.getToken(scope, this.shutdown.signal);
      if (this.closed) {
        raw.token.zero();
        throw new AuthError("Token provider has been closed");
      }
      const entry: CacheEntry = {
        scope,
        token: raw.token,
        expiresOn: raw.expiresOn,
        leases: 0,
        evicted: false,
      };
      this.evict(scope);
      this.cache.set(scope, entry);
      return entry;
    } catch (err) {
      this.evict(scope);
      this.logger.warn("Token refresh failed", { scope, error: errorMessage(err) });
      if (err instanceof AuthError) throw err;
      throw new AuthError(`Token refresh failed for ${scope}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private waitFor<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
    if (!signal) return promise;
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        reject(new CancelledError("Operation cancelled", { cause: signal.reason }));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      if (signal.aborted) onAbort();
      promise.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        }
      );
    });
  }

  private evict(scope: string): void {
    const entry = this.cache.get(scope);
    if (!entry) return;
    this.cache.delete(scope);
    entry.evicted = true;
    if (entry.leases === 0) entry.token.zero();
  }

  private release(entry: CacheEntry): void {
    entry.leases--;
    if (entry.evicted && entry.leases === 0) entry.token.zero();
  }
}
