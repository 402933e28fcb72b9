import type { AuthError } from "./types";
import { AuthErrorCode } from "./types";

/**
 * A classified authentication failure. Thrown by an authenticator it stops the
 * chain and is rendered as HTTP 401 with `{ code, detail }`.
 */
export class AuthenticationError extends Error {
  readonly code: AuthErrorCode;
  readonly detail: string;

  constructor(code: AuthErrorCode, detail: string, options?: { cause?: unknown }) {
    super(detail, options);
    this.name = "AuthenticationError";
    this.code = code;
    this.detail = detail;
  }

  toJSON(): AuthError {
    return { code: this.code, detail: this.detail };
  }
}

/**
 * Raised when a token is used outside its lifecycle, e.g. validated twice.
 * This is a programming error and never reaches the client as a 401.
 */
export class TokenStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TokenStateError";
  }
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function notAuthenticated(): AuthenticationError {
  return new AuthenticationError(
    AuthErrorCode.NOT_AUTHENTICATED,
    "Authentication credentials were not provided.",
  );
}

/**
 * Abort reason used when the HTTP client goes away before its request is answered.
 */
export class ClientDisconnectedError extends Error {
  constructor() {
    super("Client closed the connection");
    this.name = "ClientDisconnectedError";
  }
}
