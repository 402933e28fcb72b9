/**
 * Fastify integration: runs an authenticator chain before the route handler and
 * renders rejections as 401 `{ code, detail }`.
 */

import type { ServerResponse } from "node:http";
import type { FastifyReply, FastifyRequest } from "fastify";
import { logger } from "../utils/logger";
import type { AuthenticatorChain, ChainResult } from "./AuthenticatorChain";
import { ClientDisconnectedError, notAuthenticated } from "./errors";
import type { Principal } from "./Principal";

declare module "fastify" {
  interface FastifyRequest {
    /** Set by the auth middleware; null when no authenticator accepted the request */
    principal: Principal | null;
  }
}

export interface AuthMiddlewareOptions {
  /** Realm reported in the WWW-Authenticate challenge */
  realm: string;
  /** Answer 401 when every authenticator abstains */
  required?: boolean;
}

export interface DisconnectSignal {
  signal: AbortSignal;
  /** Stop watching the connection */
  release(): void;
}

/**
 * Abort signal that fires with a {@link ClientDisconnectedError} when the
 * response is closed before it finished.
 */
export function abortOnDisconnect(raw: ServerResponse): DisconnectSignal {
  const controller = new AbortController();
  const onClose = () => {
    if (!raw.writableFinished) {
      controller.abort(new ClientDisconnectedError());
    }
  };
  raw.once("close", onClose);
  return {
    signal: controller.signal,
    release: () => raw.off("close", onClose),
  };
}

/**
 * Create a preHandler that authenticates the request with `chain`.
 * Provider calls made for the request are abandoned if the client disconnects.
 */
export function createAuthMiddleware(chain: AuthenticatorChain, options: AuthMiddlewareOptions) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const disconnect = abortOnDisconnect(reply.raw);

    let result: ChainResult;
    try {
      result = await chain.run(request, disconnect.signal);
    } finally {
      disconnect.release();
    }

    if (result.status === "authenticated") {
      request.principal = result.principal;
      return;
    }

    request.principal = null;

    if (result.status === "rejected") {
      logger.debug(
        `Authentication rejected for ${request.method} ${request.url}: ${result.error.code}`,
      );
      return reply
        .status(401)
        .header(
          "WWW-Authenticate",
          `Bearer realm="${options.realm}", error="${result.error.code}"`,
        )
        .send(result.error.toJSON());
    }

    if (options.required) {
      logger.debug(`Missing credentials for ${request.method} ${request.url}`);
      return reply
        .status(401)
        .header("WWW-Authenticate", `Bearer realm="${options.realm}"`)
        .send(notAuthenticated().toJSON());
    }
  };
}
