import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  CacheManager,
  MAX_TTL_MS,
  createStableCacheKey,
} from "../../../src/utils/cache.js";
import { AUTH_ERROR_CODES } from "../../../src/utils/errors.js";

vi.mock("../../../src/utils/logging.js", () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

interface Entry {
  id: string;
}

function gatedLoader() {
  let resolveLoad: (entry: Entry) => void = () => {};
  const signals: AbortSignal[] = [];
  const loader = vi.fn(
    (signal: AbortSignal) =>
      new Promise<Entry>((resolve) => {
        signals.push(signal);
        resolveLoad = resolve;
      }),
  );
  return {
    loader,
    signals,
    resolve: (entry: Entry) => resolveLoad(entry),
  };
}

describe("CacheManager", () => {
  let cache: CacheManager<Entry>;

  beforeEach(() => {
    cache = new CacheManager<Entry>({ maxSize: 3, defaultTtl: 60_000 }, "test-cache");
  });

  it("should always call the loader on replace", async () => {
    let counter = 0;
    const loader = vi.fn(async () => ({ id: `entry-${++counter}` }));

    const first = await cache.replace("key", loader);
    const second = await cache.replace("key", loader);

    expect(first.id).toBe("entry-1");
    expect(second.id).toBe("entry-2");
    expect(cache.get("key")).toBe(second);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("should share an in-flight load between concurrent callers", async () => {
    const { loader, resolve } = gatedLoader();

    const first = cache.replace("key", loader);
    const second = cache.replace("key", loader);
    resolve({ id: "shared" });

    const [a, b] = await Promise.all([first, second]);
    expect(a).toBe(b);
    expect(loader).toHaveBeenCalledTimes(1);
    expect(cache.get("key")).toBe(a);
  });

  it("should start a new load once the previous one settled", async () => {
    const loader = vi.fn(async () => ({ id: "entry" }));

    await cache.replace("key", loader);
    await cache.replace("key", loader);

    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("should not cache a value whose ttl is already spent", async () => {
    const value = await cache.replace("key", async () => ({ id: "stale" }), {
      ttl: () => 0,
    });

    expect(value.id).toBe("stale");
    expect(cache.get("key")).toBeUndefined();
  });

  it("should compute the ttl from the value", async () => {
    const ttl = vi.fn(() => 5_000);
    const value = await cache.replace("key", async () => ({ id: "fresh" }), {
      ttl,
    });

    expect(ttl).toHaveBeenCalledWith(value);
    expect(cache.get("key")).toBe(value);
  });

  it("should cap long ttls at the largest timer delay", async () => {
    const setTimeoutSpy = vi.spyOn(globalThis, "setTimeout");
    try {
      const value = await cache.replace("key", async () => ({ id: "long-lived" }), {
        ttl: 30 * 24 * 60 * 60 * 1000,
      });

      const delays = setTimeoutSpy.mock.calls.map((call) => call[1]);
      expect(delays).toContain(MAX_TTL_MS);
      expect(delays.filter((delay) => (delay ?? 0) > MAX_TTL_MS)).toEqual([]);
      expect(cache.get("key")).toBe(value);
    } finally {
      setTimeoutSpy.mockRestore();
    }
  });

  it("should not cache failed loads", async () => {
    await expect(
      cache.replace("key", async () => {
        throw new Error("load failed");
      }),
    ).rejects.toThrow("load failed");

    expect(cache.get("key")).toBeUndefined();
  });

  it("should keep the load running for callers that did not cancel", async () => {
    const { loader, signals, resolve } = gatedLoader();
    const controller = new AbortController();

    const cancelled = cache.replace("key", loader, { signal: controller.signal });
    const patient = cache.replace("key", loader);
    controller.abort();

    await expect(cancelled).rejects.toMatchObject({
      code: AUTH_ERROR_CODES.request_cancelled,
      message: "test-cache request was cancelled",
    });
    expect(signals[0]?.aborted).toBe(false);

    resolve({ id: "shared" });
    await expect(patient).resolves.toEqual({ id: "shared" });
    expect(cache.get("key")).toEqual({ id: "shared" });
  });

  it("should cancel the load once every caller cancelled", async () => {
    const { loader, signals } = gatedLoader();
    const first = new AbortController();
    const second = new AbortController();

    const a = cache.replace("key", loader, { signal: first.signal });
    const b = cache.replace("key", loader, { signal: second.signal });

    first.abort();
    expect(signals[0]?.aborted).toBe(false);
    second.abort();
    expect(signals[0]?.aborted).toBe(true);

    await expect(a).rejects.toMatchObject({ code: AUTH_ERROR_CODES.request_cancelled });
    await expect(b).rejects.toMatchObject({ code: AUTH_ERROR_CODES.request_cancelled });
  });

  it("should reject an already cancelled caller without loading", async () => {
    const controller = new AbortController();
    controller.abort();
    const loader = vi.fn(async () => ({ id: "unused" }));

    await expect(
      cache.replace("key", loader, { signal: controller.signal }),
    ).rejects.toMatchObject({ code: AUTH_ERROR_CODES.request_cancelled });
    expect(loader).not.toHaveBeenCalled();
  });

  it("should detach from the caller signal once the load settles", async () => {
    const controller = new AbortController();
    const addSpy = vi.spyOn(controller.signal, "addEventListener");
    const removeSpy = vi.spyOn(controller.signal, "removeEventListener");

    for (let i = 0; i < 3; i++) {
      await cache.replace("key", async () => ({ id: `entry-${i}` }), {
        signal: controller.signal,
      });
    }

    expect(addSpy).toHaveBeenCalledTimes(3);
    expect(removeSpy).toHaveBeenCalledTimes(3);
  });

  it("should cancel in-flight loads and drop their results on clear", async () => {
    const { loader, signals, resolve } = gatedLoader();

    const pending = cache.replace("key", loader);
    cache.clear();
    expect(signals[0]?.aborted).toBe(true);

    resolve({ id: "late" });
    await expect(pending).resolves.toEqual({ id: "late" });
    expect(cache.get("key")).toBeUndefined();
  });

  it("should not let a load from before clear evict a newer one", async () => {
    const old = gatedLoader();
    const fresh = gatedLoader();

    const before = cache.replace("key", old.loader);
    cache.clear();
    const after = cache.replace("key", fresh.loader);

    old.resolve({ id: "old" });
    await before;

    const joined = cache.replace("key", fresh.loader);
    fresh.resolve({ id: "new" });

    await expect(Promise.all([after, joined])).resolves.toEqual([
      { id: "new" },
      { id: "new" },
    ]);
    expect(fresh.loader).toHaveBeenCalledTimes(1);
    expect(cache.get("key")).toEqual({ id: "new" });
  });

  it("should clear cached entries", async () => {
    await cache.replace("a", async () => ({ id: "a" }));
    await cache.replace("b", async () => ({ id: "b" }));

    cache.clear();

    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("b")).toBeUndefined();
  });
});

describe("createStableCacheKey", () => {
  it("should produce the same key for the same input", () => {
    expect(createStableCacheKey("tenant::client")).toBe(
      createStableCacheKey("tenant::client"),
    );
    expect(createStableCacheKey("tenant::client")).not.toBe(
      createStableCacheKey("tenant::other"),
    );
  });
});
