/**
 * Token Manager Tests
 */

import { describe, it, expect, vi } from "vitest";
import type { AccessToken, TokenCredential } from "@azure/identity";
import { AuthError } from "../errors.js";
import { TokenManager, isCredentialFresh } from "./token-manager.js";

const HOUR = 3_600_000;
const MINUTE = 60_000;

function fakeCredential(issue: () => Promise<AccessToken | null>) {
  const getToken = vi.fn(issue);
  const credential: TokenCredential = { getToken };
  return { credential, getToken };
}

function manager(credential: TokenCredential, clock: () => number) {
  return new TokenManager({
    credential,
    identity: { tenantId: "tenant-1", clientId: "client-1" },
    clock,
  });
}

describe("isCredentialFresh", () => {
  it("is false inside the margin", () => {
    const credential = { accessToken: "t", expiresAt: 10 * MINUTE, scopes: [] };
    expect(isCredentialFresh(credential, 4 * MINUTE, 5 * MINUTE)).toBe(true);
    expect(isCredentialFresh(credential, 5 * MINUTE, 5 * MINUTE)).toBe(false);
  });
});

describe("TokenManager", () => {
  it("caches a token until it enters the refresh margin", async () => {
    let now = 0;
    let n = 0;
    const { credential, getToken } = fakeCredential(async () => ({ token: `token-${++n}`, expiresOnTimestamp: HOUR }));
    const tokens = manager(credential, () => now);

    expect((await tokens.getToken()).accessToken).toBe("token-1");
    now = HOUR - 6 * MINUTE;
    expect((await tokens.getToken()).accessToken).toBe("token-1");
    now = HOUR - 5 * MINUTE;
    expect((await tokens.getToken()).accessToken).toBe("token-2");
    expect(getToken).toHaveBeenCalledTimes(2);
    expect(tokens.getExchangeCount()).toBe(2);
  });

  it("shares one exchange between concurrent callers", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { credential, getToken } = fakeCredential(async () => {
      await gate;
      return { token: "shared", expiresOnTimestamp: HOUR };
    });
    const tokens = manager(credential, () => 0);

    const waiters = Array.from({ length: 10 }, () => tokens.getToken());
    release();
    const results = await Promise.all(waiters);

    expect(getToken).toHaveBeenCalledTimes(1);
    expect(new Set(results.map((r) => r.accessToken))).toEqual(new Set(["shared"]));
  });

  it("passes the default Graph scope", async () => {
    const { credential, getToken } = fakeCredential(async () => ({ token: "t", expiresOnTimestamp: HOUR }));
    await manager(credential, () => 0).getToken();
    expect(getToken).toHaveBeenCalledWith(["https://graph.microsoft.com/.default"]);
  });

  it("raises AuthError when the exchange is rejected", async () => {
    const { credential } = fakeCredential(async () => {
      throw new Error("invalid_client");
    });
    const tokens = manager(credential, () => 0);
    await expect(tokens.getToken()).rejects.toBeInstanceOf(AuthError);
    await expect(tokens.getToken()).rejects.toThrow(/invalid_client/);
  });

  it("raises AuthError when no token is returned", async () => {
    const { credential } = fakeCredential(async () => null);
    await expect(manager(credential, () => 0).getToken()).rejects.toThrow(/returned no access token/);
  });

  it("invalidate forces a new exchange only for the stale token", async () => {
    let n = 0;
    const { credential, getToken } = fakeCredential(async () => ({ token: `token-${++n}`, expiresOnTimestamp: HOUR }));
    const tokens = manager(credential, () => 0);

    const first = await tokens.getToken();
    tokens.invalidate(first);
    const second = await tokens.getToken();
    expect(second.accessToken).toBe("token-2");

    tokens.invalidate(first);
    expect((await tokens.getToken()).accessToken).toBe("token-2");
    expect(getToken).toHaveBeenCalledTimes(2);

    tokens.invalidate();
    expect((await tokens.getToken()).accessToken).toBe("token-3");
  });
});
