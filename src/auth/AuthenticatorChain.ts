/**
 * Runs authenticators in their configured order until one decides.
 */

import { logger } from "../utils/logger";
import type { Authenticator } from "./authenticators/types";
import type { AuthenticationError } from "./errors";
import { isAuthenticationError } from "./errors";
import type { Principal } from "./Principal";
import type { AuthRequest } from "./types";

export type ChainResult =
  | { status: "authenticated"; principal: Principal; authenticator: string }
  | { status: "rejected"; error: AuthenticationError; authenticator: string }
  | { status: "anonymous" };

export class AuthenticatorChain {
  constructor(private readonly authenticators: readonly Authenticator[]) {}

  get names(): string[] {
    return this.authenticators.map((authenticator) => authenticator.name);
  }

  /**
   * The first principal wins and the first classified rejection ends the run.
   * When every authenticator abstains the request is anonymous. Errors that are
   * not AuthenticationErrors propagate unchanged.
   */
  async run(request: AuthRequest, signal?: AbortSignal): Promise<ChainResult> {
    for (const authenticator of this.authenticators) {
      let principal: Principal | null;
      try {
        principal = await authenticator.authenticate(request, signal);
      } catch (error) {
        if (!isAuthenticationError(error)) {
          throw error;
        }
        logger.debug(`🚫 ${authenticator.name} rejected request: ${error.code}`);
        return { status: "rejected", error, authenticator: authenticator.name };
      }

      if (principal) {
        logger.debug(`🔓 ${authenticator.name} authenticated ${principal.username}`);
        return { status: "authenticated", principal, authenticator: authenticator.name };
      }
    }

    return { status: "anonymous" };
  }
}
