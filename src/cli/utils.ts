/**
 * Shared CLI utilities and helper functions.
 */

import { type AuthContext, createAuthContext } from "../auth";
import { type AppConfig, loadConfig } from "../utils/config";
import { LogLevel, setLogLevel } from "../utils/logger";
import type { GlobalOptions } from "./types";

/**
 * Formats output for CLI commands
 */
export const formatOutput = (data: unknown): string => JSON.stringify(data, null, 2);

/**
 * Sets up logging based on global options
 */
export function setupLogging(options: GlobalOptions): void {
  if (options.silent) {
    setLogLevel(LogLevel.ERROR);
  } else if (options.verbose) {
    setLogLevel(LogLevel.DEBUG);
  }
}

/**
 * Validates and parses port number
 */
export function validatePort(portString: string): number {
  const port = Number.parseInt(portString, 10);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    throw new Error("❌ Invalid port number");
  }
  return port;
}

/**
 * Loads configuration and builds the process-wide authentication context.
 */
export function initializeAuth(env: NodeJS.ProcessEnv = process.env): {
  config: AppConfig;
  auth: AuthContext;
} {
  const config = loadConfig(env);
  return { config, auth: createAuthContext(config.auth) };
}
