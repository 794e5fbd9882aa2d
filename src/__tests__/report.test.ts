import test from "node:test";
import assert from "node:assert";
import { formatJson, formatText, summaryLine } from "../report";
import type { CheckResult } from "../checker/types";
import { createFormatters, resolveColor } from "../cli/utils/colors";

const RESULT: CheckResult = {
  root: "/guides",
  findings: [
    {
      ruleId: "index-entries",
      severity: "error",
      file: "GUIDE_INDEX.md",
      line: 12,
      message: "Listed guide GONE.md does not exist",
    },
    {
      ruleId: "placeholders",
      severity: "error",
      file: "GUIDE_INDEX.md",
      line: 3,
      message: 'Unresolved placeholder "TBD"',
    },
    {
      ruleId: "index-orphans",
      severity: "warning",
      file: "ORPHAN.md",
      line: 0,
      message: "Guide is not listed in GUIDE_INDEX.md",
    },
  ],
  summary: { files: 3, errors: 2, warnings: 1, infos: 0 },
};

test("formatText", async (t) => {
  await t.test("groups findings per file with aligned columns", () => {
    assert.strictEqual(
      formatText(RESULT, { useColor: false }),
      [
        "GUIDE_INDEX.md",
        "  12  error    Listed guide GONE.md does not exist  index-entries",
        "   3  error    Unresolved placeholder \"TBD\"  placeholders",
        "",
        "ORPHAN.md",
        "  -  warning  Guide is not listed in GUIDE_INDEX.md  index-orphans",
        "",
        "✗ 3 problems (2 errors, 1 warning) in 3 files",
      ].join("\n")
    );
  });

  await t.test("display paths", () => {
    const text = formatText(RESULT, { useColor: false, displayPath: (file) => `docs/${file}` });
    assert.strictEqual(text.split("\n")[0], "docs/GUIDE_INDEX.md");
  });

  await t.test("severities are colored when color is on", () => {
    const line = formatText(RESULT, { useColor: true }).split("\n")[1];
    assert.strictEqual(
      line,
      "  12  \x1b[31merror  \x1b[0m  Listed guide GONE.md does not exist  \x1b[2mindex-entries\x1b[0m"
    );
  });

  await t.test("a clean result is a single line", () => {
    const clean: CheckResult = { root: "/guides", findings: [], summary: { files: 2, errors: 0, warnings: 0, infos: 0 } };
    assert.strictEqual(formatText(clean, { useColor: false }), "✓ No problems found in 2 files");
  });
});

test("summaryLine", () => {
  assert.strictEqual(summaryLine({ files: 1, errors: 0, warnings: 0, infos: 2 }), "2 problems (0 errors, 0 warnings, 2 infos) in 1 file");
  assert.strictEqual(summaryLine({ files: 1, errors: 1, warnings: 0, infos: 0 }), "1 problem (1 error, 0 warnings) in 1 file");
});

test("formatJson", () => {
  const parsed: unknown = JSON.parse(formatJson(RESULT));
  assert.deepStrictEqual(parsed, {
    summary: { files: 3, errors: 2, warnings: 1, infos: 0 },
    findings: [
      {
        file: "GUIDE_INDEX.md",
        line: 12,
        severity: "error",
        ruleId: "index-entries",
        message: "Listed guide GONE.md does not exist",
      },
      {
        file: "GUIDE_INDEX.md",
        line: 3,
        severity: "error",
        ruleId: "placeholders",
        message: 'Unresolved placeholder "TBD"',
      },
      {
        file: "ORPHAN.md",
        line: 0,
        severity: "warning",
        ruleId: "index-orphans",
        message: "Guide is not listed in GUIDE_INDEX.md",
      },
    ],
  });
});

test("formatters", async (t) => {
  await t.test("styles collapse to plain text without color", () => {
    const { ok, setting, paint } = createFormatters(false);
    assert.strictEqual(ok("done"), "✓ done");
    assert.strictEqual(setting("off"), "off    ");
    assert.strictEqual(paint("bold", "x"), "x");
  });

  await t.test("settings are padded before coloring", () => {
    assert.strictEqual(createFormatters(true).setting("info"), "\x1b[36minfo   \x1b[0m");
  });

  await t.test("--no-color and non-terminal streams turn color off", () => {
    assert.strictEqual(resolveColor({ allowed: false, stream: { isTTY: true } }), false);
    assert.strictEqual(resolveColor({ allowed: true, stream: { isTTY: false } }), false);
    assert.strictEqual(resolveColor(true), true);
  });
});
