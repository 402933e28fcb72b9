/**
 * Serve command - Starts the HTTP server with the authentication routes.
 */

import type { Command } from "commander";
import { startAppServer } from "../../app";
import { logger } from "../../utils/logger";
import { initializeAuth, setupLogging, validatePort } from "../utils";

export function createServeCommand(program: Command): Command {
  return program
    .command("serve")
    .description("Start the HTTP server")
    .option("--port <number>", "Port to listen on (defaults to PORT)")
    .option("--no-token-exchange", "Disable the public-token exchange route")
    .action(async (cmdOptions: { port?: string; tokenExchange: boolean }, command) => {
      const globalOptions = command.parent?.opts() || {};
      setupLogging(globalOptions);

      try {
        const { config, auth } = initializeAuth();
        const port = cmdOptions.port ? validatePort(cmdOptions.port) : config.port;

        const appServer = await startAppServer(auth, {
          port,
          enableTokenExchange: cmdOptions.tokenExchange,
        });

        const shutdown = async (signal: string) => {
          logger.info(`Received ${signal}, shutting down`);
          try {
            await appServer.stop();
            process.exit(0);
          } catch (error) {
            logger.error(`❌ Failed to stop server: ${error}`);
            process.exit(1);
          }
        };
        process.once("SIGINT", (signal) => void shutdown(signal));
        process.once("SIGTERM", (signal) => void shutdown(signal));
      } catch (error) {
        logger.error(`❌ Failed to start server: ${error instanceof Error ? error.message : error}`);
        process.exit(1);
      }
    });
}
