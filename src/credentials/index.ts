export {
  TokenManager,
  createClientSecretTokenManager,
  isCredentialFresh,
  GRAPH_DEFAULT_SCOPES,
  DEFAULT_REFRESH_MARGIN_MS,
} from "./token-manager.js";
export type { ClientSecretTokenManagerOptions } from "./token-manager.js";
export type { Credential, CredentialIdentity, TokenManagerOptions, TokenProvider } from "./types.js";
