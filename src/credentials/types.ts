/**
 * Credential Types
 */

import type { TokenCredential } from "@azure/identity";
import type { GovernanceLogger } from "../logging/index.js";
import type { Clock } from "../types.js";

/** Bearer credential handed to the Graph client. */
export type Credential = {
  readonly accessToken: string;
  /** Epoch milliseconds. */
  readonly expiresAt: number;
  readonly scopes: readonly string[];
};

export type CredentialIdentity = {
  tenantId: string;
  clientId: string;
};

export type TokenManagerOptions = {
  credential: TokenCredential;
  identity: CredentialIdentity;
  scopes?: readonly string[];
  refreshMarginMs?: number;
  clock?: Clock;
  logger?: GovernanceLogger;
};

/** What the Graph client needs from a token source. */
export interface TokenProvider {
  getToken(scopes?: readonly string[]): Promise<Credential>;
  invalidate(credential?: Credential): void;
}
