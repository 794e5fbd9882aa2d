import { CitationDatabaseError, ConfigError, isGuideCheckError } from "../../errors";
import { formatConfigError } from "../../config/loader";
import { createFormatters } from "./colors";

/** Exit code for usage, config and setup errors */
export const EXIT_USAGE = 2;
/** Exit code for a check that found failures */
export const EXIT_FAILURE = 1;

export function describeError(error: unknown): string {
  if (error instanceof ConfigError) return formatConfigError(error);
  if (error instanceof CitationDatabaseError && error.issues.length > 0) {
    return `${error.message}\n  - ${error.issues.join("\n  - ")}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a command action: library errors print as a failure line and set
 * exit code 2. Anything else is rethrown.
 */
export function withErrorHandling<Args extends unknown[]>(
  action: (...args: Args) => void | Promise<void>
): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await action(...args);
    } catch (error) {
      if (!isGuideCheckError(error)) throw error;
      const { fail } = createFormatters({ allowed: true, stream: process.stderr });
      console.error(fail(describeError(error)));
      process.exitCode = EXIT_USAGE;
    }
  };
}
