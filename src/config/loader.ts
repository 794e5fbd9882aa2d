import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, isAbsolute, join, resolve } from "node:path";
import type { ZodError } from "zod";
import { GuideCheckConfigSchema, type GuideCheckConfig, DEFAULT_CONFIG } from "./schema";
import { ConfigError } from "../errors";
import { builtinRules, suggestClosest } from "../rules";

const CONFIG_FILENAME = "guidecheck.json";

export interface LoadConfigOptions {
  /** Explicit config file; failures throw instead of falling back */
  configPath?: string;
  cwd?: string;
}

export interface LoadedConfig {
  config: GuideCheckConfig;
  /** File the config came from, or null for defaults */
  path: string | null;
  /** Directory relative paths in the config are resolved against */
  baseDir: string;
}

/**
 * Get all possible config file paths in priority order
 */
export function getConfigPaths(cwd: string = process.cwd()): string[] {
  return [
    // Project-level config (highest priority)
    join(cwd, CONFIG_FILENAME),
    join(cwd, ".config", CONFIG_FILENAME),
    // User-level config
    join(homedir(), ".config", "guidecheck", CONFIG_FILENAME),
  ];
}

/**
 * Load configuration from file
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();

  if (options.configPath) {
    const configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError({ message: `Config file not found: ${configPath}`, path: configPath });
    }
    const config = readConfigFile(configPath);
    warnUnknownRules(config, configPath);
    return { config, path: configPath, baseDir: dirname(configPath) };
  }

  for (const configPath of getConfigPaths(cwd)) {
    if (existsSync(configPath)) {
      let config: GuideCheckConfig;
      try {
        config = readConfigFile(configPath);
      } catch (error) {
        const message = error instanceof ConfigError ? formatConfigError(error) : String(error);
        console.warn(`Warning: Failed to load config at ${configPath}: ${message}`);
        continue;
      }
      warnUnknownRules(config, configPath);
      return { config, path: configPath, baseDir: projectDirFor(configPath, cwd) };
    }
  }

  // Return default config if no file found
  return { config: DEFAULT_CONFIG, path: null, baseDir: cwd };
}

/**
 * Parse and validate a config file, throwing ConfigError on any problem
 */
export function readConfigFile(configPath: string): GuideCheckConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigError({
      message: `Invalid JSON in ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      path: configPath,
    });
  }

  const result = GuideCheckConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError({
      message: `Invalid configuration in ${configPath}`,
      path: configPath,
      issues: describeIssues(result.error),
    });
  }
  return result.data;
}

/**
 * Configured rule ids that match no built-in rule.
 */
export function unknownRuleIds(config: GuideCheckConfig): string[] {
  const known = new Set(builtinRules.map((rule) => rule.id));
  return Object.keys(config.rules).filter((id) => !known.has(id));
}

function warnUnknownRules(config: GuideCheckConfig, configPath: string): void {
  const ids = builtinRules.map((rule) => rule.id);
  for (const id of unknownRuleIds(config)) {
    const suggestion = suggestClosest(id, ids);
    const hint = suggestion ? ` (did you mean "${suggestion}"?)` : "";
    console.warn(`Warning: Unknown rule "${id}" in ${configPath}${hint}`);
  }
}

function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

export function formatConfigError(error: ConfigError): string {
  return error.issues.length > 0 ? `${error.message}\n  - ${error.issues.join("\n  - ")}` : error.message;
}

// Files under <project>/.config/ still resolve paths from the project root
function projectDirFor(configPath: string, cwd: string): string {
  const dir = dirname(configPath);
  return dir === join(cwd, ".config") ? cwd : dir;
}

/**
 * Resolve a config-relative path to an absolute path
 */
export function resolveConfigPath(loaded: LoadedConfig, path: string): string {
  return isAbsolute(path) ? path : resolve(loaded.baseDir, path);
}

/**
 * Resolve the guide directory: explicit argument (cwd-relative) or config
 */
export function resolveGuidesDir(loaded: LoadedConfig, dirArg?: string, cwd: string = process.cwd()): string {
  return dirArg ? resolve(cwd, dirArg) : resolveConfigPath(loaded, loaded.config.guidesDir);
}
