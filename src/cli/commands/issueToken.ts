/**
 * Issue-token command - Requests a client-credentials token for a registered
 * machine client, to check its registration against the provider.
 */

import type { Command } from "commander";
import { logger, redact } from "../../utils/logger";
import { formatOutput, initializeAuth, setupLogging } from "../utils";

export function createIssueTokenCommand(program: Command): Command {
  return program
    .command("issue-token")
    .description("Request a token for the machine client registered under a secret")
    .requiredOption("--secret <secret>", "Machine-client secret as sent in X-CLIENT-SECRET")
    .action(async (cmdOptions: { secret: string }, command) => {
      const globalOptions = command.parent?.opts() || {};
      setupLogging(globalOptions);

      try {
        const { auth } = initializeAuth();
        const client = auth.registry.lookup(cmdOptions.secret);
        if (!client) {
          throw new Error(`No machine client is registered for secret ${redact(cmdOptions.secret)}`);
        }

        const issued = await client.issueToken();
        console.log(formatOutput({ clientId: client.clientId, ...issued }));
      } catch (error) {
        logger.error(`❌ Failed to issue token: ${error instanceof Error ? error.message : error}`);
        process.exit(1);
      }
    });
}
