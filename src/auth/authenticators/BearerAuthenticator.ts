/**
 * Authenticates `Authorization: Bearer <token>` requests against one client's
 * audience and authorized-party policy.
 *
 * Public tokens are meant for the token-exchange route only. Confidential tokens
 * are accepted everywhere else, whether minted by the confidential client itself
 * or exchanged from a public token (azp then still names the public client).
 */

import { AuthenticationError } from "../errors";
import { AUTHORIZATION_HEADER, extractBearerToken, getHeader } from "../headers";
import type { OidcClient } from "../OidcClient";
import { Principal } from "../Principal";
import { Token } from "../Token";
import type { AuthRequest } from "../types";
import { AuthErrorCode } from "../types";
import type { Authenticator } from "./types";

export interface BearerPolicy {
  client: OidcClient;
  audiences: ReadonlySet<string>;
  authorizedParties: ReadonlySet<string>;
}

export interface BearerAuthenticatorOptions {
  /** Reject requests without an Authorization header instead of abstaining */
  requireBearer?: boolean;
}

export class BearerAuthenticator implements Authenticator {
  constructor(
    readonly name: string,
    private readonly policy: BearerPolicy,
    private readonly options: BearerAuthenticatorOptions = {},
  ) {}

  async authenticate(request: AuthRequest, signal?: AbortSignal): Promise<Principal | null> {
    const authorization = getHeader(request.headers, AUTHORIZATION_HEADER);
    if (authorization === undefined) {
      if (this.options.requireBearer) {
        throw authorizationNotFound();
      }
      return null;
    }
    if (authorization.trim() === "") {
      throw authorizationNotFound();
    }

    const token = Token.fromRaw(extractBearerToken(authorization), this.policy.client);
    await token.validate(this.policy.audiences, this.policy.authorizedParties, signal);
    return Principal.fromToken(token);
  }
}

function authorizationNotFound(): AuthenticationError {
  return new AuthenticationError(
    AuthErrorCode.AUTHORIZATION_NOT_FOUND,
    "Authorization header not found.",
  );
}

export interface BearerClients {
  publicClient: OidcClient;
  confidentialClient: OidcClient;
}

/**
 * Accepts only tokens issued to, and requested by, the public client.
 */
export function createPublicBearerAuthenticator(
  clients: BearerClients,
  options?: BearerAuthenticatorOptions,
): BearerAuthenticator {
  const publicId = clients.publicClient.clientId;
  return new BearerAuthenticator(
    "public-bearer",
    {
      client: clients.publicClient,
      audiences: new Set([publicId]),
      authorizedParties: new Set([publicId]),
    },
    options,
  );
}

/**
 * Accepts tokens for the confidential audience requested by either the
 * confidential or the public client.
 */
export function createConfidentialBearerAuthenticator(
  clients: BearerClients,
  options?: BearerAuthenticatorOptions,
): BearerAuthenticator {
  const confidentialId = clients.confidentialClient.clientId;
  return new BearerAuthenticator(
    "confidential-bearer",
    {
      client: clients.confidentialClient,
      audiences: new Set([confidentialId]),
      authorizedParties: new Set([confidentialId, clients.publicClient.clientId]),
    },
    options,
  );
}
