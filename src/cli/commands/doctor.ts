/**
 * Doctor command: diagnose the guidecheck setup
 *
 * Shows where the config came from and checks that the guide directory,
 * the index file and the citation database can all be loaded.
 */

import { existsSync, statSync } from "node:fs";
import { join } from "node:path";
import type { Command } from "commander";
import { createFormatters } from "../utils/colors";
import { describeError, EXIT_FAILURE, withErrorHandling } from "../utils/errors";
import type { ConfigOptions } from "../utils/options";
import { getConfigPaths, loadConfig, resolveConfigPath, resolveGuidesDir } from "../../config/loader";
import { listGuideFiles } from "../../checker/loader";
import { DEFAULT_DATABASE_PATH, loadCitationDatabase } from "../../citations";

export function registerDoctorCommand(program: Command) {
  program
    .command("doctor")
    .description("Diagnose guidecheck configuration")
    .option("-c, --config <path>", "Config file")
    .option("--no-color", "Disable colored output")
    .action(
      withErrorHandling((options: ConfigOptions) => {
        const { paint, ok, fail, warn, header, dimText } = createFormatters({ allowed: options.color });
        let healthy = true;

        console.log(paint("bold", paint("cyan", "guidecheck Doctor")));

        // Configuration
        console.log(header("Configuration:"));
        const loaded = loadConfig({ configPath: options.config });
        if (loaded.path) {
          console.log(`  ${ok(`Loaded ${loaded.path}`)}`);
        } else {
          console.log(`  ${warn("No config file found, using defaults")}`);
          for (const candidate of getConfigPaths()) {
            console.log(`    ${dimText(candidate)}`);
          }
        }

        // Guide directory
        console.log(header("Guides:"));
        const root = resolveGuidesDir(loaded, undefined);
        if (!existsSync(root) || !statSync(root).isDirectory()) {
          console.log(`  ${fail(`Guide directory not found: ${root}`)}`);
          healthy = false;
        } else {
          const files = listGuideFiles(root, loaded.config);
          console.log(`  ${ok(`${root} (${files.length} Markdown files)`)}`);

          const indexPath = join(root, loaded.config.indexFile);
          if (existsSync(indexPath)) {
            console.log(`  ${ok(`Index file ${loaded.config.indexFile}`)}`);
          } else {
            console.log(`  ${fail(`Index file ${loaded.config.indexFile} not found`)}`);
            healthy = false;
          }
        }

        // Citation database
        console.log(header("Citations:"));
        const configured = loaded.config.citations.database;
        const databasePath = configured ? resolveConfigPath(loaded, configured) : DEFAULT_DATABASE_PATH;
        try {
          const db = loadCitationDatabase(databasePath);
          console.log(`  ${ok(`${databasePath} (${db.entries.size} entries)`)}`);
        } catch (error) {
          console.log(`  ${fail(describeError(error))}`);
          healthy = false;
        }

        console.log();
        console.log(healthy ? ok("Everything looks good") : fail("Problems found"));
        if (!healthy) process.exitCode = EXIT_FAILURE;
      })
    );
}
