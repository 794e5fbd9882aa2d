#!/usr/bin/env node
/**
 * guidecheck CLI
 *
 * Usage:
 *   guidecheck check [dir]            # Run every rule over the guide directory
 *   guidecheck rules                  # List rules and severities
 *   guidecheck toc <file> [--write]   # Generate a table of contents
 *   guidecheck index [dir]            # Show index status for every guide
 *   guidecheck citations scan [dir]   # Report citations
 *   guidecheck citations fix [dir]    # Standardize citations
 *   guidecheck doctor                 # Diagnose configuration
 */

import { program } from "commander";
import { EXIT_USAGE } from "./cli/utils/errors";
import { registerCheckCommand } from "./cli/commands/check";
import { registerRulesCommand } from "./cli/commands/rules";
import { registerTocCommand } from "./cli/commands/toc";
import { registerIndexCommand } from "./cli/commands/index-status";
import { registerCitationsCommand } from "./cli/commands/citations";
import { registerDoctorCommand } from "./cli/commands/doctor";

program
  .name("guidecheck")
  .description("Quality checks for Markdown guide collections")
  .version("0.4.0")
  // Usage errors exit with 2; help and version keep 0
  .exitOverride((error) => {
    process.exit(error.exitCode === 0 ? 0 : EXIT_USAGE);
  });

registerCheckCommand(program);
registerRulesCommand(program);
registerTocCommand(program);
registerIndexCommand(program);
registerCitationsCommand(program);
registerDoctorCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exitCode = 1;
});
