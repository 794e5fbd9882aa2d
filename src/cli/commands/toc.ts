/**
 * Toc command: print or rewrite a guide's table of contents
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { basename, resolve } from "node:path";
import type { Command } from "commander";
import { createFormatters } from "../utils/colors";
import { EXIT_USAGE, withErrorHandling } from "../utils/errors";
import { integerOption, type ConfigOptions } from "../utils/options";
import { loadConfig } from "../../config/loader";
import { parseDocument } from "../../markdown/parser";
import { buildToc, replaceTocBlock, TOC_END, TOC_START } from "../../markdown/toc";

interface TocCommandOptions extends ConfigOptions {
  minLevel?: number;
  maxLevel?: number;
  write?: boolean;
}

export function registerTocCommand(program: Command) {
  program
    .command("toc <file>")
    .description("Generate a table of contents from a guide's headings")
    .option("-c, --config <path>", "Config file")
    .option("--min-level <n>", "Shallowest heading level", integerOption(1, 6))
    .option("--max-level <n>", "Deepest heading level", integerOption(1, 6))
    .option("-w, --write", `Replace the block between ${TOC_START} and ${TOC_END}`)
    .option("--no-color", "Disable colored output")
    .action(
      withErrorHandling((file: string, options: TocCommandOptions) => {
        const { ok, fail } = createFormatters({ allowed: options.color });
        const { config } = loadConfig({ configPath: options.config });

        const minLevel = options.minLevel ?? config.toc.minLevel;
        const maxLevel = options.maxLevel ?? config.toc.maxLevel;
        if (minLevel > maxLevel) {
          console.error(fail(`--min-level (${minLevel}) must not exceed --max-level (${maxLevel})`));
          process.exitCode = EXIT_USAGE;
          return;
        }

        const path = resolve(file);
        if (!existsSync(path)) {
          console.error(fail(`File not found: ${path}`));
          process.exitCode = EXIT_USAGE;
          return;
        }

        const source = readFileSync(path, "utf-8");
        const toc = buildToc(parseDocument(basename(path), source), { minLevel, maxLevel });

        if (!options.write) {
          console.log(toc);
          return;
        }

        const updated = replaceTocBlock(source, toc);
        if (updated === null) {
          console.error(fail(`No ${TOC_START} ... ${TOC_END} block in ${file}`));
          process.exitCode = EXIT_USAGE;
          return;
        }

        if (updated === source) {
          console.log(ok(`Table of contents in ${file} is up to date`));
          return;
        }
        writeFileSync(path, updated);
        console.log(ok(`Updated table of contents in ${file}`));
      })
    );
}
