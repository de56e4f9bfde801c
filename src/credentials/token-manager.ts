/**
 * Token Manager
 *
 * Acquires bearer tokens through an @azure/identity TokenCredential and
 * caches them per (tenant, client, scope set). A cached token is handed out
 * only while it is outside the refresh margin; refreshes are single-flight.
 */

import { ClientSecretCredential, type TokenCredential } from "@azure/identity";
import { emitGovernanceDiagnosticEvent } from "../diagnostics.js";
import { AuthError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type GovernanceLogger } from "../logging/index.js";
import { systemClock, type Clock } from "../types.js";
import type { Credential, CredentialIdentity, TokenManagerOptions, TokenProvider } from "./types.js";

export const GRAPH_DEFAULT_SCOPES = ["https://graph.microsoft.com/.default"];

/** Five minutes: covers clock skew plus the longest request we expect to keep in flight. */
export const DEFAULT_REFRESH_MARGIN_MS = 5 * 60_000;

export function isCredentialFresh(credential: Credential, now: number, marginMs: number): boolean {
  return now < credential.expiresAt - marginMs;
}

export class TokenManager implements TokenProvider {
  private readonly credential: TokenCredential;
  private readonly identity: CredentialIdentity;
  private readonly defaultScopes: readonly string[];
  private readonly refreshMarginMs: number;
  private readonly clock: Clock;
  private readonly logger: GovernanceLogger;

  private cache = new Map<string, Credential>();
  private inFlight = new Map<string, Promise<Credential>>();
  private exchanges = 0;

  constructor(options: TokenManagerOptions) {
    this.credential = options.credential;
    this.identity = options.identity;
    this.defaultScopes = normalizeScopes(options.scopes ?? GRAPH_DEFAULT_SCOPES);
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Return a usable credential, exchanging client credentials when the cache
   * is empty or the cached token is inside the refresh margin.
   */
  async getToken(scopes?: readonly string[]): Promise<Credential> {
    const resolvedScopes = scopes ? normalizeScopes(scopes) : this.defaultScopes;
    const key = this.cacheKey(resolvedScopes);

    const cached = this.cache.get(key);
    if (cached && isCredentialFresh(cached, this.clock(), this.refreshMarginMs)) {
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const exchange = this.exchange(key, resolvedScopes).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, exchange);
    return exchange;
  }

  /**
   * Drop cached credentials. With a credential, only entries still holding
   * that exact token are removed, so a token refreshed meanwhile survives.
   */
  invalidate(credential?: Credential): void {
    if (!credential) {
      this.cache.clear();
      return;
    }
    for (const [key, entry] of this.cache) {
      if (entry.accessToken === credential.accessToken) {
        this.cache.delete(key);
      }
    }
  }

  /** Number of credential exchanges performed so far. */
  getExchangeCount(): number {
    return this.exchanges;
  }

  private async exchange(key: string, scopes: readonly string[]): Promise<Credential> {
    this.exchanges++;
    const started = this.clock();
    this.logger.debug("Acquiring access token", { clientId: this.identity.clientId, scopes: scopes.join(" ") });

    let token: Awaited<ReturnType<TokenCredential["getToken"]>>;
    try {
      token = await this.credential.getToken([...scopes]);
    } catch (error) {
      this.logger.error("Credential exchange rejected", { clientId: this.identity.clientId, error: formatErrorMessage(error) });
      emitGovernanceDiagnosticEvent({ type: "token.refresh", outcome: "failed", error: formatErrorMessage(error) });
      throw new AuthError(
        `Credential exchange failed for client ${this.identity.clientId} in tenant ${this.identity.tenantId}: ${formatErrorMessage(error)}`,
        { cause: error },
      );
    }

    if (!token || !token.token) {
      emitGovernanceDiagnosticEvent({ type: "token.refresh", outcome: "empty" });
      throw new AuthError(`Credential exchange for client ${this.identity.clientId} returned no access token`);
    }

    const credential: Credential = Object.freeze({
      accessToken: token.token,
      expiresAt: token.expiresOnTimestamp,
      scopes: Object.freeze([...scopes]),
    });
    this.cache.set(key, credential);

    emitGovernanceDiagnosticEvent({ type: "token.refresh", outcome: "ok", durationMs: this.clock() - started });
    this.logger.info("Access token acquired", { expiresAt: new Date(credential.expiresAt).toISOString() });
    return credential;
  }

  private cacheKey(scopes: readonly string[]): string {
    return `${this.identity.tenantId}:${this.identity.clientId}:${scopes.join(" ")}`;
  }
}

function normalizeScopes(scopes: readonly string[]): readonly string[] {
  return [...new Set(scopes.map((s) => s.trim()).filter(Boolean))].sort();
}

// =============================================================================
// Factory
// =============================================================================

export type ClientSecretTokenManagerOptions = {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  authorityHost?: string;
  scopes?: string[];
  refreshMarginMs?: number;
  logger?: GovernanceLogger;
};

/**
 * Token manager for an app registration using the client credentials flow.
 */
export function createClientSecretTokenManager(options: ClientSecretTokenManagerOptions): TokenManager {
  const credential = new ClientSecretCredential(
    options.tenantId,
    options.clientId,
    options.clientSecret,
    options.authorityHost ? { authorityHost: options.authorityHost } : undefined,
  );
  return new TokenManager({
    credential,
    identity: { tenantId: options.tenantId, clientId: options.clientId },
    scopes: options.scopes,
    refreshMarginMs: options.refreshMarginMs,
    logger: options.logger,
  });
}
