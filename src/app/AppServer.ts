/**
 * HTTP surface of the authentication core: a token-exchange route guarded by the
 * public bearer scheme and an identity route guarded by the machine-secret and
 * confidential bearer schemes.
 */

import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import {
  abortOnDisconnect,
  type AuthContext,
  AuthenticatorChain,
  ClientDisconnectedError,
  ClientSecretAuthenticator,
  createAuthMiddleware,
  createConfidentialBearerAuthenticator,
  createPublicBearerAuthenticator,
  isAuthenticationError,
  notAuthenticated,
  type Principal,
} from "../auth";
import { logger } from "../utils/logger";
import type { AppServerConfig } from "./AppServerConfig";

function requirePrincipal(request: FastifyRequest): Principal {
  if (!request.principal) {
    throw notAuthenticated();
  }
  return request.principal;
}

/** Status attached by Fastify to its own errors (bad JSON body, etc.) */
function errorStatusCode(error: unknown): number {
  if (typeof error === "object" && error !== null && "statusCode" in error) {
    return typeof error.statusCode === "number" ? error.statusCode : 500;
  }
  return 500;
}

export class AppServer {
  private server: FastifyInstance;
  private ready = false;

  constructor(
    private readonly auth: AuthContext,
    private readonly config: AppServerConfig,
  ) {
    this.server = Fastify({
      logger: false, // Use our own logger
    });
  }

  /**
   * Start listening with all routes registered.
   */
  async start(): Promise<FastifyInstance> {
    await this.setupServer();

    try {
      const address = await this.server.listen({
        port: this.config.port,
        host: this.config.host ?? "0.0.0.0",
      });
      logger.info(`🚀 AppServer available at ${address}`);
      logger.info(`   • Realm: ${this.auth.config.realm} (${this.auth.publicClient.issuer})`);
      logger.info(`   • Machine clients: ${this.auth.registry.size}`);
      return this.server;
    } catch (error) {
      logger.error(`❌ Failed to start AppServer: ${error}`);
      await this.server.close();
      throw error;
    }
  }

  async stop(): Promise<void> {
    try {
      await this.server.close();
      logger.info("🛑 AppServer stopped");
    } catch (error) {
      logger.error(`❌ Failed to stop AppServer: ${error}`);
      throw error;
    }
  }

  /**
   * Register routes without listening, e.g. for `inject()` in tests.
   */
  async getServer(): Promise<FastifyInstance> {
    await this.setupServer();
    return this.server;
  }

  private async setupServer(): Promise<void> {
    if (this.ready) {
      return;
    }
    this.ready = true;

    this.server.decorateRequest("principal", null);

    this.server.setErrorHandler(async (error: unknown, request, reply) => {
      if (isAuthenticationError(error)) {
        logger.debug(`${request.method} ${request.url} failed: ${error.code}`);
        return reply.status(401).send(error.toJSON());
      }
      if (error instanceof ClientDisconnectedError) {
        logger.debug(`${request.method} ${request.url} abandoned: client disconnected`);
        return reply
          .status(499)
          .send({ code: "client_closed_request", detail: "Client closed the connection." });
      }
      const message = error instanceof Error ? error.message : String(error);
      const statusCode = errorStatusCode(error);
      if (statusCode < 500) {
        return reply.status(statusCode).send({ code: "bad_request", detail: message });
      }
      logger.error(`❌ ${request.method} ${request.url} failed: ${message}`);
      return reply.status(500).send({ code: "internal_error", detail: "Internal server error." });
    });

    this.server.get("/health", async () => ({ status: "ok" }));

    this.registerIdentityRoute();
    if (this.config.enableTokenExchange) {
      this.registerExchangeRoute();
    }

    await this.server.ready();
  }

  private registerIdentityRoute(): void {
    const chain = new AuthenticatorChain([
      new ClientSecretAuthenticator(this.auth.registry),
      createConfidentialBearerAuthenticator(this.auth),
    ]);

    this.server.get(
      "/api/auth/me",
      { preHandler: createAuthMiddleware(chain, { realm: this.auth.config.realm, required: true }) },
      async (request) => requirePrincipal(request).toJSON(),
    );
    logger.debug(`Identity route guarded by: ${chain.names.join(", ")}`);
  }

  private registerExchangeRoute(): void {
    const chain = new AuthenticatorChain([
      createPublicBearerAuthenticator(this.auth, { requireBearer: true }),
    ]);

    this.server.post(
      "/api/auth/exchange",
      { preHandler: createAuthMiddleware(chain, { realm: this.auth.config.realm, required: true }) },
      async (request, reply) => {
        const principal = requirePrincipal(request);
        const disconnect = abortOnDisconnect(reply.raw);
        try {
          const exchanged = await this.auth.confidentialClient.exchangeToken(
            principal.token.raw,
            disconnect.signal,
          );
          logger.debug(`Exchanged public token of ${principal.username}`);
          return exchanged;
        } finally {
          disconnect.release();
        }
      },
    );
    logger.debug(`Token exchange route guarded by: ${chain.names.join(", ")}`);
  }
}
