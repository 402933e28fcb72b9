/**
 * The authenticated identity handed to route handlers.
 */

import { TokenStateError } from "./errors";
import type { Token } from "./Token";

const SERVICE_ACCOUNT_PREFIX = "service-account-";

export interface PrincipalJson {
  subject: string;
  username: string;
  email: string | null;
  clientId: string | null;
  roles: string[];
  groups: string[];
  isServiceAccount: boolean;
}

export class Principal {
  readonly subject: string;
  readonly username: string;
  readonly email: string | null;
  /** Client the token was requested by (azp) */
  readonly clientId: string | null;
  readonly roles: ReadonlySet<string>;
  readonly groups: readonly string[];

  private constructor(readonly token: Token) {
    this.subject = token.subject;
    this.username = token.username;
    this.email = token.email;
    this.clientId = token.authorizedParty;
    this.roles = new Set(token.roles);
    this.groups = token.groups;
  }

  /**
   * Only validated or pre-trusted tokens produce a principal.
   */
  static fromToken(token: Token): Principal {
    if (!token.isTrusted) {
      throw new TokenStateError(`Cannot derive a principal from a ${token.state.kind} token`);
    }
    return new Principal(token);
  }

  get isServiceAccount(): boolean {
    return this.username.startsWith(SERVICE_ACCOUNT_PREFIX);
  }

  hasRole(role: string): boolean {
    return this.roles.has(role);
  }

  toJSON(): PrincipalJson {
    return {
      subject: this.subject,
      username: this.username,
      email: this.email,
      clientId: this.clientId,
      roles: [...this.roles],
      groups: [...this.groups],
      isServiceAccount: this.isServiceAccount,
    };
  }
}
