/**
 * Terminal styling for command output and text reports.
 *
 * Every style collapses to plain text when color is off, so callers never
 * branch on color themselves.
 */

import type { RuleSetting } from "../../config/schema";

const ANSI = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
} as const;

const RESET = "\x1b[0m";

export type Style = keyof typeof ANSI;

const SETTING_STYLES: Record<RuleSetting, Style> = {
  error: "red",
  warning: "yellow",
  info: "cyan",
  off: "dim",
};

const SETTING_WIDTH = "warning".length;

/**
 * `true`/`false` force color on or off. The object form is what commands
 * pass: `allowed` is false under `--no-color`, otherwise NO_COLOR and the
 * stream's TTY state decide.
 */
export type ColorMode = boolean | { allowed: boolean; stream?: { isTTY?: boolean } };

export function resolveColor(mode: ColorMode = { allowed: true }): boolean {
  if (typeof mode === "boolean") return mode;
  if (!mode.allowed) return false;
  if (process.env.NO_COLOR) return false;
  return (mode.stream ?? process.stdout).isTTY === true;
}

export interface Formatters {
  colored: boolean;
  paint: (style: Style, text: string) => string;
  ok: (text: string) => string;
  fail: (text: string) => string;
  warn: (text: string) => string;
  header: (text: string) => string;
  subheader: (text: string) => string;
  dimText: (text: string) => string;
  /** Rule setting padded to a fixed column and colored by severity */
  setting: (value: RuleSetting) => string;
}

export function createFormatters(mode?: ColorMode): Formatters {
  const colored = resolveColor(mode);
  const paint = (style: Style, text: string): string => (colored ? `${ANSI[style]}${text}${RESET}` : text);

  return {
    colored,
    paint,
    ok: (text) => `${paint("green", "✓")} ${text}`,
    fail: (text) => `${paint("red", "✗")} ${text}`,
    warn: (text) => `${paint("yellow", "⚠")} ${text}`,
    header: (text) => `\n${paint("bold", text)}`,
    subheader: (text) => paint("bold", text),
    dimText: (text) => paint("dim", text),
    setting: (value) => paint(SETTING_STYLES[value], value.padEnd(SETTING_WIDTH)),
  };
}
