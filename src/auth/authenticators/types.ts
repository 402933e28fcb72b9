import type { Principal } from "../Principal";
import type { AuthRequest } from "../types";

/**
 * One authentication scheme of the chain.
 *
 * Resolves `null` when the request does not carry this scheme's credentials, so
 * the next authenticator gets its turn. Throws AuthenticationError when the
 * credentials are present but not acceptable, which stops the chain.
 */
export interface Authenticator {
  readonly name: string;
  authenticate(request: AuthRequest, signal?: AbortSignal): Promise<Principal | null>;
}
