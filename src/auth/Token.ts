/**
 * An access token and its validation lifecycle.
 *
 * A token is created either from a bearer header (unvalidated) or from a token
 * this process just obtained from the provider (pre-trusted). Verified claims are
 * only readable once the token is validated or pre-trusted.
 */

import { AuthenticationError, isAuthenticationError, TokenStateError } from "./errors";
import type { OidcClient } from "./OidcClient";
import type { TokenClaims, TokenResponse, TokenState } from "./types";
import { AuthErrorCode } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
}

function stringClaim(claims: TokenClaims, name: string): string | null {
  const value = claims[name];
  return typeof value === "string" ? value : null;
}

export class Token {
  readonly raw: string;
  readonly client: OidcClient;
  /** Decoded but unverified; never use for authorization decisions */
  readonly unverifiedClaims: TokenClaims;
  private currentState: TokenState;
  private verifiedClaims: TokenClaims | null;
  private validationStarted = false;

  private constructor(
    raw: string,
    client: OidcClient,
    unverifiedClaims: TokenClaims,
    state: TokenState,
  ) {
    this.raw = raw;
    this.client = client;
    this.unverifiedClaims = unverifiedClaims;
    this.currentState = state;
    this.verifiedClaims = state.kind === "pre_trusted" ? unverifiedClaims : null;
  }

  /**
   * Wraps a token presented by a caller. It must be validated before use.
   */
  static fromRaw(raw: string, client: OidcClient): Token {
    return new Token(raw, client, client.decode(raw), { kind: "unvalidated" });
  }

  /**
   * Wraps a token `client` has just obtained for itself from the provider.
   * Its signature is not checked again: the process trusts its own fresh credentials.
   *
   * @throws AuthenticationError with `token_issuance_failed` when the issued token cannot be decoded
   */
  static preTrusted(response: TokenResponse, client: OidcClient): Token {
    const raw = response.access_token;
    let claims: TokenClaims;
    try {
      claims = client.decode(raw);
    } catch (error) {
      throw new AuthenticationError(
        AuthErrorCode.TOKEN_ISSUANCE_FAILED,
        "The identity provider issued a token that cannot be decoded.",
        { cause: error },
      );
    }
    return new Token(raw, client, claims, { kind: "pre_trusted" });
  }

  get state(): TokenState {
    return this.currentState;
  }

  get isTrusted(): boolean {
    return this.currentState.kind === "validated" || this.currentState.kind === "pre_trusted";
  }

  get claims(): TokenClaims {
    if (!this.verifiedClaims) {
      throw new TokenStateError(`Claims of a ${this.currentState.kind} token are not trusted`);
    }
    return this.verifiedClaims;
  }

  /**
   * Verifies the token and checks that it was issued for one of `expectedAudiences`
   * by one of `expectedAuthorizedParties`. A token validates at most once.
   * A validation that ends without a verdict (aborted, for instance) leaves the
   * token unvalidated and it may be validated again.
   *
   * @throws AuthenticationError when the token is rejected
   * @throws TokenStateError when called a second time or on a pre-trusted token
   */
  async validate(
    expectedAudiences: ReadonlySet<string>,
    expectedAuthorizedParties: ReadonlySet<string>,
    signal?: AbortSignal,
  ): Promise<TokenClaims> {
    if (this.validationStarted || this.currentState.kind !== "unvalidated") {
      throw new TokenStateError(
        `Token cannot be validated again (state: ${this.currentState.kind})`,
      );
    }
    this.validationStarted = true;

    try {
      const claims = await this.client.verify(this.raw, signal);
      checkAudience(claims, expectedAudiences);
      checkAuthorizedParty(claims, expectedAuthorizedParties);

      this.verifiedClaims = claims;
      this.currentState = { kind: "validated" };
      return claims;
    } catch (error) {
      if (isAuthenticationError(error)) {
        this.currentState = { kind: "rejected", reason: error.code };
      } else {
        this.validationStarted = false;
      }
      throw error;
    }
  }

  get subject(): string {
    return this.claims.sub ?? "";
  }

  /**
   * Username of the end user, or the client id for service-account tokens
   * that carry no preferred_username.
   */
  get username(): string {
    return (
      stringClaim(this.claims, "preferred_username") ??
      stringClaim(this.claims, "clientId") ??
      this.authorizedParty ??
      this.subject
    );
  }

  get email(): string | null {
    return stringClaim(this.claims, "email");
  }

  get authorizedParty(): string | null {
    return stringClaim(this.claims, "azp");
  }

  get audiences(): string[] {
    return audienceList(this.claims);
  }

  /** Realm roles plus the roles granted on this token's client */
  get roles(): string[] {
    const roles = new Set<string>();
    const realmAccess = this.claims.realm_access;
    if (isRecord(realmAccess)) {
      for (const role of stringList(realmAccess.roles)) roles.add(role);
    }
    const resourceAccess = this.claims.resource_access;
    if (isRecord(resourceAccess)) {
      const clientAccess = resourceAccess[this.client.clientId];
      if (isRecord(clientAccess)) {
        for (const role of stringList(clientAccess.roles)) roles.add(role);
      }
    }
    return [...roles];
  }

  get groups(): string[] {
    return stringList(this.claims.groups);
  }

  get expiresAt(): Date | null {
    const exp = this.claims.exp;
    return typeof exp === "number" ? new Date(exp * 1000) : null;
  }
}

function audienceList(claims: TokenClaims): string[] {
  const aud = claims.aud;
  if (typeof aud === "string") {
    return [aud];
  }
  return stringList(aud);
}

function checkAudience(claims: TokenClaims, expected: ReadonlySet<string>): void {
  if (!audienceList(claims).some((audience) => expected.has(audience))) {
    throw new AuthenticationError(
      AuthErrorCode.INVALID_AUDIENCE,
      "Token was not issued for this audience.",
    );
  }
}

function checkAuthorizedParty(claims: TokenClaims, expected: ReadonlySet<string>): void {
  const azp = claims.azp;
  if (typeof azp !== "string" || !expected.has(azp)) {
    throw new AuthenticationError(
      AuthErrorCode.INVALID_AZP,
      "Token was requested by a client that is not authorized here.",
    );
  }
}
