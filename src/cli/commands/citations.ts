/**
 * Citations command: find and standardize academic citations in guides
 *
 * Subcommands:
 *   scan [dir]   Report citations that would change or need review
 *   fix [dir]    Rewrite citations (dry run unless --write)
 */

import { existsSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import type { Command } from "commander";
import { createFormatters, type Formatters } from "../utils/colors";
import { withErrorHandling } from "../utils/errors";
import type { ConfigOptions } from "../utils/options";
import { loadConfig, resolveConfigPath, resolveGuidesDir, type LoadedConfig } from "../../config/loader";
import { listGuideFiles } from "../../checker/loader";
import { matchesAny } from "../../checker/glob";
import { GuideDirectoryError } from "../../errors";
import {
  buildBibliography,
  buildCitationReport,
  loadCitationDatabase,
  standardizeCitations,
  type CitationDatabase,
  type FileCitations,
} from "../../citations";

interface CitationOptions extends ConfigOptions {
  database?: string;
}

interface FixOptions extends CitationOptions {
  write?: boolean;
  bibliography?: string;
  report?: string;
}

interface CitationRun {
  root: string;
  db: CitationDatabase;
  results: Array<FileCitations & { source: string }>;
}

function loadDatabase(loaded: LoadedConfig, override?: string): CitationDatabase {
  if (override) return loadCitationDatabase(resolve(override));
  const configured = loaded.config.citations.database;
  return configured ? loadCitationDatabase(resolveConfigPath(loaded, configured)) : loadCitationDatabase();
}

function runCitations(dir: string | undefined, options: CitationOptions): CitationRun {
  const loaded = loadConfig({ configPath: options.config });
  const root = resolveGuidesDir(loaded, dir);
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    throw new GuideDirectoryError({ message: `Guide directory not found: ${root}`, dir: root });
  }

  const db = loadDatabase(loaded, options.database);
  const { files } = loaded.config.citations;
  const paths = listGuideFiles(root, loaded.config).filter((path) => !files || matchesAny(path, files));

  const results = paths.map((file) => {
    const source = readFileSync(join(root, file), "utf-8");
    return { file, source, result: standardizeCitations(source, db) };
  });
  return { root, db, results };
}

function printSummary(run: CitationRun, { ok, warn }: Formatters): void {
  const updated = run.results.reduce((sum, { result }) => sum + result.updated.length, 0);
  const unchanged = run.results.reduce((sum, { result }) => sum + result.unchanged.length, 0);
  const review = run.results.reduce((sum, { result }) => sum + result.review.length, 0);
  const line = `${run.results.length} files: ${updated} to standardize, ${unchanged} already standard, ${review} need review`;
  console.log(`\n${review > 0 ? warn(line) : ok(line)}`);
}

export function registerCitationsCommand(program: Command) {
  const citationsCmd = program
    .command("citations")
    .description("Find and standardize academic citations in guides");

  citationsCmd
    .command("scan [dir]")
    .description("Report matched and unmatched citations")
    .option("-c, --config <path>", "Config file")
    .option("-d, --database <path>", "Citation database JSON")
    .option("--no-color", "Disable colored output")
    .action(
      withErrorHandling((dir: string | undefined, options: CitationOptions) => {
        const formatters = createFormatters({ allowed: options.color });
        const { subheader, warn, dimText } = formatters;
        const run = runCitations(dir, options);

        for (const { file, result } of run.results) {
          const found = result.updated.length + result.unchanged.length + result.review.length;
          if (found === 0) continue;

          console.log(subheader(file));
          for (const citation of result.updated) {
            console.log(`  ${dimText(`${citation.line}:`)} ${citation.raw} ${dimText("->")} ${citation.standard ?? ""}`);
          }
          for (const citation of result.unchanged) {
            console.log(`  ${dimText(`${citation.line}: ${citation.raw} (standard)`)}`);
          }
          for (const citation of result.review) {
            console.log(`  ${warn(`${citation.line}: ${citation.raw} (no database entry for ${citation.author})`)}`);
          }
        }

        printSummary(run, formatters);
      })
    );

  citationsCmd
    .command("fix [dir]")
    .description("Standardize citations (dry run unless --write)")
    .option("-c, --config <path>", "Config file")
    .option("-d, --database <path>", "Citation database JSON")
    .option("-w, --write", "Rewrite guide files in place")
    .option("--bibliography <file>", "Write a bibliography of resolved citations")
    .option("--report <file>", "Write a standardization report")
    .option("--no-color", "Disable colored output")
    .action(
      withErrorHandling((dir: string | undefined, options: FixOptions) => {
        const formatters = createFormatters({ allowed: options.color });
        const { ok, dimText } = formatters;
        const run = runCitations(dir, options);

        for (const { file, source, result } of run.results) {
          if (result.content === source) continue;
          if (options.write) {
            writeFileSync(join(run.root, file), result.content);
            console.log(ok(`${file}: ${result.updated.length} citations standardized`));
          } else {
            console.log(dimText(`${file}: would standardize ${result.updated.length} citations`));
          }
        }

        if (options.bibliography) {
          writeFileSync(resolve(options.bibliography), buildBibliography(run.results, run.db));
          console.log(ok(`Wrote bibliography to ${options.bibliography}`));
        }
        if (options.report) {
          const date = new Date().toISOString().slice(0, 10);
          writeFileSync(resolve(options.report), buildCitationReport(run.results, { date }));
          console.log(ok(`Wrote report to ${options.report}`));
        }

        printSummary(run, formatters);
        if (!options.write) console.log(dimText("Dry run: pass --write to apply changes"));
      })
    );
}
