import type { Command } from "commander";
import { createFormatters } from "../utils/colors";
import { EXIT_FAILURE, withErrorHandling } from "../utils/errors";
import type { ConfigOptions } from "../utils/options";
import { loadConfig, resolveGuidesDir } from "../../config/loader";
import { loadGuideSet } from "../../checker/loader";
import { guideIndexStatus } from "../../checker/status";

export function registerIndexCommand(program: Command) {
  program
    .command("index [dir]")
    .description("List every guide with its title and index status")
    .option("-c, --config <path>", "Config file")
    .option("--no-color", "Disable colored output")
    .action(
      withErrorHandling((dir: string | undefined, options: ConfigOptions) => {
        const { ok, fail, warn, subheader, dimText } = createFormatters({ allowed: options.color });
        const loaded = loadConfig({ configPath: options.config });
        const set = loadGuideSet(resolveGuidesDir(loaded, dir), loaded.config);

        console.log(subheader(`${set.indexPath}:`));
        if (!set.index) {
          console.log(`  ${fail(`Index file not found in ${set.root}`)}`);
        }

        const statuses = guideIndexStatus(set);
        const width = Math.max(0, ...statuses.map((status) => status.path.length));
        for (const status of statuses) {
          const title = dimText(status.title ?? "(no title)");
          const label = status.path.padEnd(width);
          if (status.status === "listed") console.log(`  ${ok(`${label}  ${title}`)}`);
          else if (status.status === "missing") console.log(`  ${fail(`${label}  missing (line ${status.line})`)}`);
          else console.log(`  ${warn(`${label}  ${title}  not listed`)}`);
        }

        const missing = statuses.filter((status) => status.status === "missing").length;
        const orphans = statuses.filter((status) => status.status === "orphan").length;
        console.log(
          `\n${statuses.length - missing - orphans} listed, ${missing} missing, ${orphans} not listed`
        );
        if (!set.index || missing > 0) process.exitCode = EXIT_FAILURE;
      })
    );
}
