import TTLCache from "@isaacs/ttlcache";
import { createHash } from "crypto";
import type { AbortSignalLike } from "./abort.js";
import { AuthError, AUTH_ERROR_CODES, describeError } from "./errors.js";
import { getLogger } from "../utils/logging.js";

const logger = getLogger("cache-manager");

const CACHE_KEY_TRUNCATE_LENGTH = 50;
// Largest delay setTimeout accepts; longer ones fire after 1ms.
export const MAX_TTL_MS = 2_147_483_647;

export interface CacheConfig {
  maxSize: number;
  defaultTtl: number;
}

export interface CacheOptions<T> {
  /** Milliseconds to keep the value, or a function of the value. */
  ttl?: number | ((value: T) => number);
  contextInfo?: Record<string, unknown>;
  /** Stops this caller from waiting; the load is cancelled once nobody waits. */
  signal?: AbortSignalLike;
}

export type CacheLoader<T> = (signal: AbortSignal) => Promise<T>;

interface PendingLoad<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
}

export class CacheManager<T> {
  private cache: TTLCache<string, T>;
  private pendingRequests: Map<string, PendingLoad<T>>;
  private defaultTtl: number;
  private generation = 0;

  constructor(
    config: CacheConfig,
    private cacheType: string,
  ) {
    this.pendingRequests = new Map();
    this.defaultTtl = config.defaultTtl;

    this.cache = new TTLCache<string, T>({
      max: config.maxSize,
      ttl: config.defaultTtl,
      updateAgeOnGet: false,
      checkAgeOnGet: true,
    });
  }

  get(cacheKey: string): T | undefined {
    return this.cache.get(cacheKey);
  }

  /**
   * Always produces a new value through `loader`, replacing the cached one.
   * Callers arriving while a load for the same key is in flight share it.
   */
  async replace(
    cacheKey: string,
    loader: CacheLoader<T>,
    options?: CacheOptions<T>,
  ): Promise<T> {
    const signal = options?.signal;
    if (signal?.aborted) {
      throw this.cancelledError();
    }

    let pending = this.pendingRequests.get(cacheKey);
    if (pending) {
      logger.debug(`Found pending ${this.cacheType} request`, {
        cacheKey: this.createLoggableKey(cacheKey),
        ...options?.contextInfo,
      });
    } else {
      pending = this.startLoad(cacheKey, loader, options);
    }

    return this.waitFor(pending, signal);
  }

  private startLoad(
    cacheKey: string,
    loader: CacheLoader<T>,
    options?: CacheOptions<T>,
  ): PendingLoad<T> {
    const controller = new AbortController();
    const promise = this.createInternal(
      cacheKey,
      () => loader(controller.signal),
      this.generation,
      options,
    ).finally(() => {
      if (this.pendingRequests.get(cacheKey) === pending) {
        this.pendingRequests.delete(cacheKey);
      }
    });
    const pending: PendingLoad<T> = { promise, controller, waiters: 0 };

    // Every waiter may have walked away; the outcome is still observed here.
    promise.catch((error: unknown) => {
      logger.debug(`${this.cacheType} load failed`, {
        cacheKey: this.createLoggableKey(cacheKey),
        error: describeError(error),
      });
    });

    this.pendingRequests.set(cacheKey, pending);
    return pending;
  }

  private waitFor(
    pending: PendingLoad<T>,
    signal: AbortSignalLike | undefined,
  ): Promise<T> {
    pending.waiters++;
    if (!signal) {
      return pending.promise;
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        signal.removeEventListener("abort", onAbort);
        pending.waiters--;
        if (pending.waiters === 0) {
          pending.controller.abort();
        }
        reject(this.cancelledError());
      };
      signal.addEventListener("abort", onAbort);

      pending.promise.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }

  private async createInternal(
    cacheKey: string,
    factory: () => Promise<T>,
    generation: number,
    options?: CacheOptions<T>,
  ): Promise<T> {
    const value = await factory();

    if (generation !== this.generation) {
      logger.debug(`${this.cacheType} entry discarded, cache was cleared`, {
        cacheKey: this.createLoggableKey(cacheKey),
      });
      return value;
    }

    const ttlOption = options?.ttl ?? this.defaultTtl;
    const ttl = Math.min(
      Math.floor(typeof ttlOption === "function" ? ttlOption(value) : ttlOption),
      MAX_TTL_MS,
    );

    if (ttl < 1) {
      this.cache.delete(cacheKey);
      logger.debug(`${this.cacheType} entry not cached, already stale`, {
        cacheKey: this.createLoggableKey(cacheKey),
        ttl,
      });
      return value;
    }

    this.cache.set(cacheKey, value, { ttl });

    logger.debug(`${this.cacheType} entry created and cached`, {
      cacheKey: this.createLoggableKey(cacheKey),
      ttl,
      ...options?.contextInfo,
    });

    return value;
  }

  /** Drops every entry and cancels loads still in flight. */
  clear(): void {
    this.generation++;
    this.cache.clear();
    for (const pending of this.pendingRequests.values()) {
      pending.controller.abort();
    }
    this.pendingRequests.clear();
    logger.debug(`${this.cacheType} cache cleared`);
  }

  private cancelledError(): AuthError {
    return new AuthError(
      AUTH_ERROR_CODES.request_cancelled,
      `${this.cacheType} request was cancelled`,
    );
  }

  private createLoggableKey(rawKey: string): string {
    return rawKey.length > CACHE_KEY_TRUNCATE_LENGTH
      ? rawKey.substring(0, CACHE_KEY_TRUNCATE_LENGTH) + "..."
      : rawKey;
  }
}

export function createStableCacheKey(rawKey: string): string {
  return createHash("md5").update(rawKey, "utf8").digest("base64url");
}
