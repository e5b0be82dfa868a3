import { describe, it, expect, vi } from "vitest";
import { AzureKeyProvider } from "../../../src/key-provider/provider.js";
import { createAccessToken, type ClosableCredentials } from "../../../src/types.js";

vi.mock("../../../src/utils/logging.js", () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

function stubCredentials(close?: () => Promise<void>): ClosableCredentials {
  const token = createAccessToken("stub-token", 1_700_000_000_000, "https://vault.azure.net");
  return {
    getName: () => "StubCredentials",
    refresh: async () => token,
    getToken: async () => token,
    ...(close ? { close } : {}),
  };
}

function createProvider(credentials: ClosableCredentials) {
  return new AzureKeyProvider({
    vaultName: "test-vault",
    keyName: "test-key",
    vaultHostSuffix: "vault.azure.net",
    resource: "https://vault.azure.net",
    credentials,
  });
}

describe("AzureKeyProvider", () => {
  it("should work with any credentials implementation", async () => {
    const provider = createProvider(stubCredentials());

    expect(await provider.getAuthorizationHeader()).toBe("Bearer stub-token");
    expect(provider.getCredentials().getName()).toBe("StubCredentials");
    await expect(provider.release()).resolves.toBeUndefined();
  });

  it("should close closable credentials on the last release", async () => {
    const close = vi.fn(async () => {});
    const provider = createProvider(stubCredentials(close)).retain();

    await provider.release();
    expect(close).not.toHaveBeenCalled();

    await provider.release();
    expect(close).toHaveBeenCalledTimes(1);
  });
});
