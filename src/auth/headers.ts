/**
 * Header parsing shared by the authenticators.
 */

import { AuthenticationError } from "./errors";
import type { RequestHeaders } from "./types";
import { AuthErrorCode } from "./types";

export const AUTHORIZATION_HEADER = "authorization";
export const CLIENT_SECRET_HEADER = "x-client-secret";

/**
 * Case-insensitive header lookup. Repeated headers resolve to their first value.
 */
export function getHeader(headers: RequestHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) {
      continue;
    }
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}

/**
 * Extracts the token from an `Authorization: Bearer <token>` value.
 */
export function extractBearerToken(authorization: string): string {
  const match = authorization.trim().match(/^Bearer\s+(\S+)$/i);
  if (!match) {
    throw new AuthenticationError(AuthErrorCode.BAD_ACCESS_TOKEN, "Malformed access token.");
  }
  return match[1];
}
