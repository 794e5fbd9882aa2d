import type { Command } from "commander";
import { createFormatters } from "../utils/colors";
import { withErrorHandling } from "../utils/errors";
import type { ConfigOptions } from "../utils/options";
import { loadConfig } from "../../config/loader";
import { builtinRules } from "../../rules";

export function registerRulesCommand(program: Command) {
  program
    .command("rules")
    .description("List the built-in rules and their severities")
    .option("-c, --config <path>", "Config file (shows configured severities)")
    .option("--no-color", "Disable colored output")
    .action(
      withErrorHandling((options: ConfigOptions) => {
        const { subheader, dimText, setting: formatSetting } = createFormatters({ allowed: options.color });
        const { config } = loadConfig({ configPath: options.config });

        const idWidth = Math.max(...builtinRules.map((rule) => rule.id.length));

        console.log(subheader("Rules:"));
        for (const rule of builtinRules) {
          const setting = config.rules[rule.id] ?? rule.defaultSeverity;
          const configured = setting !== rule.defaultSeverity ? dimText(` (default ${rule.defaultSeverity})`) : "";
          console.log(
            `  ${rule.id.padEnd(idWidth)}  ${formatSetting(setting)}  ${rule.description}${configured}`
          );
        }
      })
    );
}
