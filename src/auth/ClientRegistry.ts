/**
 * Machine clients allowed to authenticate with their own client secret.
 * Built once at startup; read-only afterwards.
 */

import { createHash } from "node:crypto";
import type { OidcClient } from "./OidcClient";

function digest(secret: string): string {
  return createHash("sha256").update(secret, "utf8").digest("hex");
}

export type OidcClientFactory = (clientId: string, clientSecret: string) => OidcClient;

export class ClientRegistry {
  // Keyed by SHA-256 of the secret so raw secrets are not kept or compared char by char
  private readonly clients: ReadonlyMap<string, OidcClient>;

  private constructor(clients: Map<string, OidcClient>) {
    this.clients = clients;
  }

  /**
   * @param apiClients secret -> client id, as configured
   */
  static fromConfig(apiClients: Record<string, string>, createClient: OidcClientFactory): ClientRegistry {
    const clients = new Map<string, OidcClient>();
    for (const [secret, clientId] of Object.entries(apiClients)) {
      clients.set(digest(secret), createClient(clientId, secret));
    }
    return new ClientRegistry(clients);
  }

  static empty(): ClientRegistry {
    return new ClientRegistry(new Map());
  }

  lookup(secret: string): OidcClient | undefined {
    return this.clients.get(digest(secret));
  }

  get size(): number {
    return this.clients.size;
  }

  clientIds(): string[] {
    return [...this.clients.values()].map((client) => client.clientId);
  }
}
