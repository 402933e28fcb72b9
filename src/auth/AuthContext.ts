/**
 * Process-wide authentication state, built once at startup and injected
 * wherever authenticators are assembled.
 */

import { ClientRegistry } from "./ClientRegistry";
import { KeyRing } from "./KeyRing";
import { OidcClient, type OidcClientOptions, realmEndpoints } from "./OidcClient";
import type { AuthConfig } from "./types";

export interface AuthContext {
  readonly config: AuthConfig;
  readonly keyRing: KeyRing;
  readonly publicClient: OidcClient;
  readonly confidentialClient: OidcClient;
  readonly registry: ClientRegistry;
}

export interface AuthContextOptions {
  /** Backoff base for provider retries; tests set it to 0 */
  retryBaseDelayMs?: number;
}

export function createAuthContext(
  config: AuthConfig,
  options: AuthContextOptions = {},
): AuthContext {
  const keyRing = new KeyRing({
    jwksUri: realmEndpoints(config.serverUrl, config.realm).jwks,
    cacheTtlMs: config.jwksCacheTtlSeconds * 1000,
    timeoutMs: config.httpTimeoutMs,
    retries: config.httpRetries,
    retryBaseDelayMs: options.retryBaseDelayMs,
  });

  const clientOptions: OidcClientOptions = {
    keyRing,
    timeoutMs: config.httpTimeoutMs,
    retries: config.httpRetries,
    retryBaseDelayMs: options.retryBaseDelayMs,
    clockSkewSeconds: config.clockSkewSeconds,
  };

  const createClient = (clientId: string, clientSecret?: string) =>
    new OidcClient(
      { serverUrl: config.serverUrl, realm: config.realm, clientId, clientSecret },
      clientOptions,
    );

  return Object.freeze({
    config,
    keyRing,
    publicClient: createClient(config.publicClientId),
    confidentialClient: createClient(
      config.confidentialClientId,
      config.confidentialClientSecret,
    ),
    registry: ClientRegistry.fromConfig(config.apiClients, createClient),
  });
}
