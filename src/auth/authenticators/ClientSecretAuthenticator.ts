/**
 * Authenticates machine clients by the secret they send in `X-CLIENT-SECRET`.
 *
 * The secret selects a registered client, which obtains a client-credentials token
 * for itself. Such tokens carry the client's identity, not an end user's, so every
 * caller holding the same secret is the same principal.
 */

import type { ClientRegistry } from "../ClientRegistry";
import { AuthenticationError } from "../errors";
import { CLIENT_SECRET_HEADER, getHeader } from "../headers";
import { Principal } from "../Principal";
import { Token } from "../Token";
import type { AuthRequest } from "../types";
import { AuthErrorCode } from "../types";
import type { Authenticator } from "./types";

export class ClientSecretAuthenticator implements Authenticator {
  readonly name = "client-secret";

  constructor(private readonly registry: ClientRegistry) {}

  async authenticate(request: AuthRequest, signal?: AbortSignal): Promise<Principal | null> {
    const secret = getHeader(request.headers, CLIENT_SECRET_HEADER);
    if (secret === undefined) {
      return null;
    }

    // A present but unknown secret must not fall through to weaker schemes
    const client = this.registry.lookup(secret);
    if (!client) {
      throw new AuthenticationError(
        AuthErrorCode.APP_SECRET_NOT_AUTHORIZED,
        "App secret is not authorized.",
      );
    }

    const issued = await client.issueToken(signal);
    return Principal.fromToken(Token.preTrusted(issued, client));
  }
}
