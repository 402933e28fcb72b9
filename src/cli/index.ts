/**
 * Main CLI setup and command registration.
 */

import { Command, Option } from "commander";
import packageJson from "../../package.json";
import { LogLevel, setLogLevel } from "../utils/logger";
import { createIssueTokenCommand } from "./commands/issueToken";
import { createServeCommand } from "./commands/serve";
import type { GlobalOptions } from "./types";

/**
 * Creates and configures the main CLI program with all commands.
 */
export function createCliProgram(): Command {
  const program = new Command();

  program
    .name("oidc-auth-chain")
    .description("OIDC bearer-token and client-secret authentication server.")
    .version(packageJson.version)
    // Mutually exclusive logging flags
    .addOption(
      new Option("--verbose", "Enable verbose (debug) logging").conflicts("silent"),
    )
    .addOption(new Option("--silent", "Disable all logging except errors"))
    .enablePositionalOptions()
    .allowExcessArguments(false)
    .showHelpAfterError(true);

  program.hook("preAction", (thisCommand) => {
    const globalOptions: GlobalOptions = thisCommand.opts();
    if (globalOptions.silent) setLogLevel(LogLevel.ERROR);
    else if (globalOptions.verbose) setLogLevel(LogLevel.DEBUG);
  });

  createServeCommand(program);
  createIssueTokenCommand(program);

  return program;
}
