/**
 * Configuration interface for the AppServer.
 */

export interface AppServerConfig {
  /** Port to run the server on */
  port: number;

  /** Interface to bind; defaults to all interfaces */
  host?: string;

  /** Enable the public-token exchange route */
  enableTokenExchange: boolean;
}
