/**
 * Shared types for the OIDC authentication core.
 */

import type { JWTPayload } from "jose";

/** Classified reasons an authentication attempt was rejected */
export enum AuthErrorCode {
  AUTHORIZATION_NOT_FOUND = "authorization_not_found",
  BAD_ACCESS_TOKEN = "bad_access_token",
  APP_SECRET_NOT_AUTHORIZED = "app_secret_not_authorized",
  BAD_SIGNATURE = "bad_signature",
  TOKEN_EXPIRED = "token_expired",
  TOKEN_NOT_YET_VALID = "token_not_yet_valid",
  INVALID_AUDIENCE = "invalid_audience",
  INVALID_AZP = "invalid_azp",
  KEY_NOT_FOUND = "key_not_found",
  KEY_RING_UNAVAILABLE = "key_ring_unavailable",
  TOKEN_ISSUANCE_FAILED = "token_issuance_failed",
  TOKEN_EXCHANGE_FAILED = "token_exchange_failed",
  NOT_AUTHENTICATED = "not_authenticated",
}

/** Body rendered for a rejected request */
export interface AuthError {
  code: AuthErrorCode;
  detail: string;
}

/** Decoded JWT claim set */
export type TokenClaims = JWTPayload;

/** Identity provider settings shared by every client registration */
export interface AuthConfig {
  /** Provider base URL, e.g. https://sso.example.com */
  serverUrl: string;
  realm: string;
  publicClientId: string;
  confidentialClientId: string;
  confidentialClientSecret: string;
  /** Machine-client secret -> client id */
  apiClients: Record<string, string>;
  jwksCacheTtlSeconds: number;
  httpTimeoutMs: number;
  httpRetries: number;
  clockSkewSeconds: number;
}

/** Successful answer of the provider's token endpoint */
export interface TokenResponse {
  access_token: string;
  token_type: string;
  expires_in?: number;
  refresh_token?: string;
  scope?: string;
}

/**
 * Validation lifecycle of a token. Every token leaves "unvalidated" at most once
 * and never returns to it.
 */
export type TokenState =
  | { kind: "unvalidated" }
  | { kind: "validated" }
  | { kind: "rejected"; reason: AuthErrorCode }
  | { kind: "pre_trusted" };

/** Headers as handed over by the web framework (Fastify's request satisfies this) */
export type RequestHeaders = Record<string, string | string[] | undefined>;

export interface AuthRequest {
  headers: RequestHeaders;
}
