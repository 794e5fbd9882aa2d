import { InvalidArgumentError } from "commander";

/**
 * commander argument parser for a whole number within [min, max].
 */
export function integerOption(min: number, max: number = Number.MAX_SAFE_INTEGER) {
  return (value: string): number => {
    if (!/^\d+$/.test(value.trim())) {
      throw new InvalidArgumentError("Not a whole number.");
    }
    const parsed = Number.parseInt(value, 10);
    if (parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Must be between ${min} and ${max}.`);
    }
    return parsed;
  };
}

/** Options shared by every command that reads the config */
export interface ConfigOptions {
  config?: string;
  color: boolean;
  verbose?: boolean;
}
