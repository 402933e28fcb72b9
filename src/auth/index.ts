/**
 * OIDC authentication core: key cache, client registrations, token lifecycle
 * and the authenticator chain.
 */

export { type AuthContext, type AuthContextOptions, createAuthContext } from "./AuthContext";
export { AuthenticatorChain, type ChainResult } from "./AuthenticatorChain";
export {
  type Authenticator,
  BearerAuthenticator,
  type BearerAuthenticatorOptions,
  type BearerPolicy,
  ClientSecretAuthenticator,
  createConfidentialBearerAuthenticator,
  createPublicBearerAuthenticator,
} from "./authenticators";
export { ClientRegistry } from "./ClientRegistry";
export {
  AuthenticationError,
  ClientDisconnectedError,
  isAuthenticationError,
  notAuthenticated,
  TokenStateError,
} from "./errors";
export { AUTHORIZATION_HEADER, CLIENT_SECRET_HEADER, extractBearerToken, getHeader } from "./headers";
export { KeyRing, type KeyRingOptions, type SigningKey } from "./KeyRing";
export {
  abortOnDisconnect,
  type AuthMiddlewareOptions,
  createAuthMiddleware,
  type DisconnectSignal,
} from "./middleware";
export { OidcClient, type OidcClientConfig, type OidcClientOptions, realmEndpoints } from "./OidcClient";
export { Principal, type PrincipalJson } from "./Principal";
export { Token } from "./Token";
export type {
  AuthConfig,
  AuthError,
  AuthRequest,
  RequestHeaders,
  TokenClaims,
  TokenResponse,
  TokenState,
} from "./types";
export { AuthErrorCode } from "./types";
