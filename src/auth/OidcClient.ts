/**
 * One client registration at the identity provider. Mints tokens for itself and
 * verifies bearer tokens against the realm's signing keys.
 */

import { decodeJwt, errors, type JWTVerifyGetKey, jwtVerify } from "jose";
import { z } from "zod";
import {
  DEFAULT_CLOCK_SKEW_SECONDS,
  DEFAULT_HTTP_RETRIES,
  DEFAULT_HTTP_TIMEOUT_MS,
} from "../utils/config";
import { fetchWithTimeout, isTransientError, ProviderHttpError } from "../utils/http";
import { logger } from "../utils/logger";
import { withRetry } from "../utils/retry";
import { AuthenticationError, isAuthenticationError } from "./errors";
import { DEFAULT_RETRY_BASE_DELAY_MS, type KeyRing } from "./KeyRing";
import type { TokenClaims, TokenResponse } from "./types";
import { AuthErrorCode } from "./types";

const TOKEN_EXCHANGE_GRANT = "urn:ietf:params:oauth:grant-type:token-exchange";
const ACCESS_TOKEN_TYPE = "urn:ietf:params:oauth:token-type:access_token";

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
});

export interface RealmEndpoints {
  issuer: string;
  token: string;
  jwks: string;
}

/**
 * Endpoints of a realm on a Keycloak-style provider.
 */
export function realmEndpoints(serverUrl: string, realm: string): RealmEndpoints {
  const issuer = `${serverUrl.replace(/\/+$/, "")}/realms/${encodeURIComponent(realm)}`;
  return {
    issuer,
    token: `${issuer}/protocol/openid-connect/token`,
    jwks: `${issuer}/protocol/openid-connect/certs`,
  };
}

export interface OidcClientConfig {
  serverUrl: string;
  realm: string;
  clientId: string;
  /** Absent for public clients, which cannot request tokens */
  clientSecret?: string;
}

export interface OidcClientOptions {
  keyRing: KeyRing;
  timeoutMs?: number;
  retries?: number;
  retryBaseDelayMs?: number;
  clockSkewSeconds?: number;
}

export class OidcClient {
  readonly clientId: string;
  readonly realm: string;
  readonly endpoints: RealmEndpoints;
  private readonly clientSecret: string | undefined;
  private readonly keyRing: KeyRing;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryBaseDelayMs: number;
  private readonly clockSkewSeconds: number;

  constructor(config: OidcClientConfig, options: OidcClientOptions) {
    this.clientId = config.clientId;
    this.realm = config.realm;
    this.clientSecret = config.clientSecret;
    this.endpoints = realmEndpoints(config.serverUrl, config.realm);
    this.keyRing = options.keyRing;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.retries = options.retries ?? DEFAULT_HTTP_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.clockSkewSeconds = options.clockSkewSeconds ?? DEFAULT_CLOCK_SKEW_SECONDS;
  }

  get issuer(): string {
    return this.endpoints.issuer;
  }

  get isConfidential(): boolean {
    return this.clientSecret !== undefined;
  }

  /**
   * Client-credentials grant: a token asserting this client's own identity.
   */
  async issueToken(signal?: AbortSignal): Promise<TokenResponse> {
    return this.requestToken(
      { grant_type: "client_credentials" },
      AuthErrorCode.TOKEN_ISSUANCE_FAILED,
      signal,
    );
  }

  /**
   * Exchanges a token issued to another client of the realm for one issued to this client.
   */
  async exchangeToken(subjectToken: string, signal?: AbortSignal): Promise<TokenResponse> {
    return this.requestToken(
      {
        grant_type: TOKEN_EXCHANGE_GRANT,
        subject_token: subjectToken,
        subject_token_type: ACCESS_TOKEN_TYPE,
        requested_token_type: ACCESS_TOKEN_TYPE,
      },
      AuthErrorCode.TOKEN_EXCHANGE_FAILED,
      signal,
    );
  }

  /**
   * Verifies signature, issuer and the exp/nbf window of `rawToken`.
   * Audience and authorized party are left to the caller.
   */
  async verify(rawToken: string, signal?: AbortSignal): Promise<TokenClaims> {
    const resolveKey: JWTVerifyGetKey = async (header) => {
      if (!header.kid) {
        throw new AuthenticationError(
          AuthErrorCode.BAD_SIGNATURE,
          "Token header does not name a signing key.",
        );
      }
      const signingKey = await this.keyRing.getKey(header.kid, signal);
      if (header.alg !== signingKey.alg) {
        throw new AuthenticationError(
          AuthErrorCode.BAD_SIGNATURE,
          `Token algorithm ${header.alg} does not match key ${signingKey.kid}.`,
        );
      }
      return signingKey.key;
    };

    try {
      const { payload } = await jwtVerify(rawToken, resolveKey, {
        issuer: this.issuer,
        clockTolerance: this.clockSkewSeconds,
      });
      return payload;
    } catch (error) {
      throw classifyVerificationError(error);
    }
  }

  /**
   * Decodes the claims of `rawToken` without verifying anything.
   */
  decode(rawToken: string): TokenClaims {
    try {
      return decodeJwt(rawToken);
    } catch (error) {
      throw new AuthenticationError(AuthErrorCode.BAD_ACCESS_TOKEN, "Malformed access token.", {
        cause: error,
      });
    }
  }

  private async requestToken(
    grant: Record<string, string>,
    failureCode: AuthErrorCode,
    signal?: AbortSignal,
  ): Promise<TokenResponse> {
    if (this.clientSecret === undefined) {
      throw new AuthenticationError(
        failureCode,
        `Client ${this.clientId} has no secret and cannot request tokens.`,
      );
    }

    const body = new URLSearchParams({
      ...grant,
      client_id: this.clientId,
      client_secret: this.clientSecret,
    });

    try {
      const response = await withRetry(() => this.postToTokenEndpoint(body, signal), {
        retries: this.retries,
        baseDelayMs: this.retryBaseDelayMs,
        signal,
        shouldRetry: isTransientError,
        onRetry: (error, attempt, delayMs) =>
          logger.warn(
            `⚠️ Token request for ${this.clientId} failed (${describe(error)}), retry ${attempt}/${this.retries} in ${delayMs}ms`,
          ),
      });
      logger.debug(`Token issued to ${this.clientId} (${grant.grant_type})`);
      return response;
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      logger.warn(`⚠️ Token request for ${this.clientId} failed: ${describe(error)}`);
      throw new AuthenticationError(
        failureCode,
        `The identity provider did not issue a token for ${this.clientId}.`,
        { cause: error },
      );
    }
  }

  private async postToTokenEndpoint(
    body: URLSearchParams,
    signal?: AbortSignal,
  ): Promise<TokenResponse> {
    const response = await fetchWithTimeout(
      this.endpoints.token,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: body.toString(),
      },
      { timeoutMs: this.timeoutMs, signal },
    );

    if (!response.ok) {
      const errorText = await response.text();
      throw new ProviderHttpError(
        response.status,
        `Token endpoint responded ${response.status}: ${errorText}`,
      );
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Token endpoint response carries no access_token");
    }
    return parsed.data;
  }
}

function classifyVerificationError(error: unknown): unknown {
  if (isAuthenticationError(error)) {
    return error;
  }
  if (error instanceof errors.JWTExpired) {
    return new AuthenticationError(AuthErrorCode.TOKEN_EXPIRED, "Token has expired.", {
      cause: error,
    });
  }
  if (error instanceof errors.JWTClaimValidationFailed) {
    if (error.claim === "nbf") {
      return new AuthenticationError(
        AuthErrorCode.TOKEN_NOT_YET_VALID,
        "Token is not valid yet.",
        { cause: error },
      );
    }
    return new AuthenticationError(
      AuthErrorCode.BAD_SIGNATURE,
      `Token claim "${error.claim}" failed verification.`,
      { cause: error },
    );
  }
  if (error instanceof errors.JOSEError) {
    return new AuthenticationError(
      AuthErrorCode.BAD_SIGNATURE,
      "Token signature could not be verified.",
      { cause: error },
    );
  }
  // Cancellation and unexpected failures are not a verdict on the token
  return error;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
