/**
 * Signing-key cache for one identity-provider realm.
 *
 * Keys are fetched from the JWKS endpoint and cached by key id. Concurrent cache
 * misses share a single in-flight fetch. When the provider cannot be reached the
 * last key set fetched is served, if there is one, and no further fetch is made
 * for the minimum refresh interval.
 */

import { importJWK } from "jose";
import { z } from "zod";
import {
  DEFAULT_HTTP_RETRIES,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JWKS_CACHE_TTL_SECONDS,
} from "../utils/config";
import { fetchWithTimeout, isTransientError, ProviderHttpError, untilAborted } from "../utils/http";
import { logger } from "../utils/logger";
import { withRetry } from "../utils/retry";
import { AuthenticationError } from "./errors";
import { AuthErrorCode } from "./types";

export const DEFAULT_MIN_REFRESH_INTERVAL_MS = 10 * 1000;
export const DEFAULT_RETRY_BASE_DELAY_MS = 200;

/** Algorithm assumed for keys that do not declare one */
const DEFAULT_KEY_ALGORITHM = "RS256";

const jwkSchema = z.object({
  kty: z.string(),
  kid: z.string().optional(),
  use: z.string().optional(),
  alg: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
});

const jwksSchema = z.object({
  keys: z.array(jwkSchema),
});

type ImportedKey = Awaited<ReturnType<typeof importJWK>>;

export interface SigningKey {
  kid: string;
  alg: string;
  key: ImportedKey;
}

export interface KeyRingOptions {
  jwksUri: string;
  cacheTtlMs?: number;
  /**
   * No fetch is made within this window after the last attempt, whether for an
   * unknown kid or after a failed refresh served the cached keys.
   */
  minRefreshIntervalMs?: number;
  timeoutMs?: number;
  retries?: number;
  retryBaseDelayMs?: number;
}

export interface CachedKeySet {
  readonly keys: ReadonlyMap<string, SigningKey>;
  readonly fetchedAt: number;
  readonly expiresAt: number;
}

export class KeyRing {
  readonly jwksUri: string;
  private readonly cacheTtlMs: number;
  private readonly minRefreshIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryBaseDelayMs: number;
  private cache: CachedKeySet | null = null;
  private inflight: Promise<CachedKeySet> | null = null;
  private lastAttemptAt = 0;

  constructor(options: KeyRingOptions) {
    this.jwksUri = options.jwksUri;
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_JWKS_CACHE_TTL_SECONDS * 1000;
    this.minRefreshIntervalMs = options.minRefreshIntervalMs ?? DEFAULT_MIN_REFRESH_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.retries = options.retries ?? DEFAULT_HTTP_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  }

  /** Number of keys currently cached */
  get size(): number {
    return this.cache?.keys.size ?? 0;
  }

  isFresh(): boolean {
    return this.cache !== null && Date.now() < this.cache.expiresAt;
  }

  /**
   * Resolves the signing key for `kid`, fetching the key set when the cache is
   * empty, expired, or does not know the key yet.
   *
   * @param signal Abandons this caller's wait only; a shared fetch keeps running.
   */
  async getKey(kid: string, signal?: AbortSignal): Promise<SigningKey> {
    signal?.throwIfAborted();

    const cached = this.cache;
    if (cached && Date.now() < cached.expiresAt) {
      const hit = cached.keys.get(kid);
      if (hit) {
        return hit;
      }
      if (Date.now() - this.lastAttemptAt < this.minRefreshIntervalMs) {
        throw this.keyNotFound(kid);
      }
      logger.debug(`🔑 Unknown key id ${kid}, refreshing key set`);
    }

    const keySet = await this.refresh(signal);
    const key = keySet.keys.get(kid);
    if (!key) {
      throw this.keyNotFound(kid);
    }
    return key;
  }

  /**
   * Fetches the key set, joining a fetch that is already in flight.
   */
  refresh(signal?: AbortSignal): Promise<CachedKeySet> {
    if (!this.inflight) {
      this.inflight = this.fetchKeySet().finally(() => {
        this.inflight = null;
      });
    }
    return signal ? untilAborted(this.inflight, signal) : this.inflight;
  }

  clear(): void {
    this.cache = null;
    logger.debug("Key set cache cleared");
  }

  private async fetchKeySet(): Promise<CachedKeySet> {
    try {
      const keys = await withRetry(() => this.download(), {
        retries: this.retries,
        baseDelayMs: this.retryBaseDelayMs,
        shouldRetry: isTransientError,
        onRetry: (error, attempt, delayMs) =>
          logger.warn(
            `⚠️ Key set fetch from ${this.jwksUri} failed (${describe(error)}), retry ${attempt}/${this.retries} in ${delayMs}ms`,
          ),
      });

      const now = Date.now();
      this.lastAttemptAt = now;
      this.cache = { keys, fetchedAt: now, expiresAt: now + this.cacheTtlMs };
      logger.debug(`🔑 Key set refreshed from ${this.jwksUri}: ${keys.size} key(s)`);
      return this.cache;
    } catch (error) {
      const now = Date.now();
      this.lastAttemptAt = now;
      if (this.cache) {
        logger.warn(
          `⚠️ Could not refresh key set from ${this.jwksUri}, serving cached keys: ${describe(error)}`,
        );
        this.cache = { ...this.cache, expiresAt: now + this.minRefreshIntervalMs };
        return this.cache;
      }
      logger.error(`❌ Key set unavailable from ${this.jwksUri}: ${describe(error)}`);
      throw new AuthenticationError(
        AuthErrorCode.KEY_RING_UNAVAILABLE,
        "Signing keys of the identity provider are unavailable.",
        { cause: error },
      );
    }
  }

  private async download(): Promise<Map<string, SigningKey>> {
    const response = await fetchWithTimeout(
      this.jwksUri,
      { method: "GET", headers: { Accept: "application/json" } },
      { timeoutMs: this.timeoutMs },
    );

    if (!response.ok) {
      throw new ProviderHttpError(
        response.status,
        `Key set request failed: ${response.status} ${response.statusText}`,
      );
    }

    const parsed = jwksSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Invalid key set response: missing keys array");
    }

    const keys = new Map<string, SigningKey>();
    for (const jwk of parsed.data.keys) {
      if (!jwk.kid || (jwk.use !== undefined && jwk.use !== "sig")) {
        continue;
      }
      const alg = jwk.alg ?? DEFAULT_KEY_ALGORITHM;
      try {
        keys.set(jwk.kid, { kid: jwk.kid, alg, key: await importJWK(jwk, alg) });
      } catch (error) {
        logger.debug(`Skipping key ${jwk.kid} (${alg}): ${describe(error)}`);
      }
    }
    return keys;
  }

  private keyNotFound(kid: string): AuthenticationError {
    return new AuthenticationError(
      AuthErrorCode.KEY_NOT_FOUND,
      `Token is signed with an unknown key (${kid}).`,
    );
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
