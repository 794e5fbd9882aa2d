/**
 * Check command: run every rule over the guide directory
 */

import { join, relative } from "node:path";
import { Option, type Command } from "commander";
import { createFormatters } from "../utils/colors";
import { EXIT_FAILURE, EXIT_USAGE, withErrorHandling } from "../utils/errors";
import { integerOption, type ConfigOptions } from "../utils/options";
import { loadConfig, resolveGuidesDir } from "../../config/loader";
import { checkGuides, hasFailures } from "../../checker/runner";
import { builtinRules } from "../../rules";
import { formatJson, formatText } from "../../report/formatter";

interface CheckOptions extends ConfigOptions {
  format: "text" | "json";
  strict?: boolean;
  maxWarnings?: number;
  rule?: string[];
}

export function registerCheckCommand(program: Command) {
  program
    .command("check [dir]")
    .description("Check a guide directory (default: guidesDir from config)")
    .option("-c, --config <path>", "Config file")
    .addOption(new Option("-f, --format <format>", "Output format").choices(["text", "json"]).default("text"))
    .option("--strict", "Fail on warnings")
    .option("--max-warnings <n>", "Fail when warnings exceed this count", integerOption(0))
    .option("-r, --rule <id...>", "Run only these rules")
    .option("--no-color", "Disable colored output")
    .option("-v, --verbose", "Print each file as it is parsed")
    .action(
      withErrorHandling((dir: string | undefined, options: CheckOptions) => {
        const { colored: useColor, fail, dimText } = createFormatters({ allowed: options.color });
        const log = (text: string) => console.error(dimText(text));

        const known = new Set(builtinRules.map((rule) => rule.id));
        const unknown = (options.rule ?? []).filter((id) => !known.has(id));
        if (unknown.length > 0) {
          console.error(fail(`Unknown rule: ${unknown.join(", ")} (see 'guidecheck rules')`));
          process.exitCode = EXIT_USAGE;
          return;
        }

        const loaded = loadConfig({ configPath: options.config });
        const root = resolveGuidesDir(loaded, dir);
        if (options.verbose) {
          log(`config: ${loaded.path ?? "(defaults)"}`);
          log(`guides: ${root}`);
        }

        const result = checkGuides(root, loaded.config, {
          only: options.rule,
          onDocument: options.verbose
            ? (doc) => log(`  ${doc.path} (${doc.headings.length} headings, ${doc.tables.length} tables)`)
            : undefined,
        });

        if (options.format === "json") {
          console.log(formatJson(result));
        } else {
          const cwd = process.cwd();
          console.log(
            formatText(result, {
              useColor,
              displayPath: (file) => relative(cwd, join(root, file)) || file,
            })
          );
        }

        const failed = hasFailures(result, { strict: options.strict, maxWarnings: options.maxWarnings });
        process.exitCode = failed ? EXIT_FAILURE : 0;
      })
    );
}
