import test from "node:test";
import assert from "node:assert";
import { parseDocument } from "../markdown/parser";
import { createGuideSet } from "../checker/loader";
import { DEFAULT_CONFIG, GuideCheckConfigSchema } from "../config/schema";
import {
  builtinRules,
  extractIndexEntries,
  findPlaceholders,
  getRule,
  headingHierarchyRule,
  indexEntriesRule,
  indexOrphansRule,
  markdownStructureRule,
  placeholdersRule,
  relativeLinksRule,
  resolveLinkPath,
  suggestClosest,
  tableArithmeticRule,
  tocAnchorsRule,
} from "../rules";
import type { GuideDocument } from "../markdown/types";
import type { GuideCheckConfig } from "../config/schema";
import type { GuideRule } from "../rules/types";

function doc(path: string, lines: string[]): GuideDocument {
  return parseDocument(path, lines.join("\n"));
}

function run(rule: GuideRule, docs: GuideDocument[], config: GuideCheckConfig = DEFAULT_CONFIG) {
  return rule.check({ set: createGuideSet("/guides", docs), config });
}

const INDEX = doc("GUIDE_INDEX.md", [
  "# Guide Index",
  "",
  "| Guide | Description |",
  "| --- | --- |",
  "| [BEE_HOWTO.md](BEE_HOWTO.md) | Bees |",
  "| HUNGER_HOWTO.md | Food |",
  "| `MISSING.md` | Gone |",
]);

const BEE = doc("BEE_HOWTO.md", [
  "# Bees",
  "",
  "- [Finding Bees](#1-finding-bees)",
  "- [Broken](#finding-bees)",
  "",
  "## 1. Finding Bees",
]);

const HUNGER = doc("HUNGER_HOWTO.md", [
  "# Hunger",
  "",
  "See [bees](BEE_HOWTO.md#nope) and ![pic](img/pic.png).",
  "",
  "| Food | Hunger | Saturation | Total Score |",
  "| --- | ---: | ---: | ---: |",
  "| Golden Carrot | 6 | 14.4 | 20.4 |",
  "| Steak | 8 | 12.8 | 20.8 |",
  "| Bread | 5 | 6 | 12 |",
]);

const ORPHAN = doc("ORPHAN.md", ["# Orphan"]);

test("index rules", async (t) => {
  await t.test("links, bare table names and backticked names are entries", () => {
    assert.deepStrictEqual(extractIndexEntries(INDEX), [
      { name: "BEE_HOWTO.md", path: "BEE_HOWTO.md", line: 5 },
      { name: "HUNGER_HOWTO.md", path: "HUNGER_HOWTO.md", line: 6 },
      { name: "MISSING.md", path: "MISSING.md", line: 7 },
    ]);
  });

  await t.test("index-entries reports listed files that do not exist", () => {
    assert.deepStrictEqual(run(indexEntriesRule, [INDEX, BEE, HUNGER, ORPHAN]), [
      { file: "GUIDE_INDEX.md", line: 7, message: "Listed guide MISSING.md does not exist" },
    ]);
  });

  await t.test("index-entries reports a missing index", () => {
    assert.deepStrictEqual(run(indexEntriesRule, [BEE]), [
      { file: "GUIDE_INDEX.md", line: 0, message: "Index file GUIDE_INDEX.md not found" },
    ]);
  });

  await t.test("index-orphans reports unlisted guides", () => {
    assert.deepStrictEqual(run(indexOrphansRule, [INDEX, BEE, HUNGER, ORPHAN]), [
      { file: "ORPHAN.md", line: 0, message: "Guide is not listed in GUIDE_INDEX.md" },
    ]);
  });
});

test("anchor rules", async (t) => {
  await t.test("toc-anchors suggests the numbered slug", () => {
    assert.deepStrictEqual(run(tocAnchorsRule, [BEE]), [
      {
        file: "BEE_HOWTO.md",
        line: 4,
        message: 'Anchor "#finding-bees" does not match any heading in this file (did you mean "#1-finding-bees"?)',
      },
    ]);
  });

  await t.test("relative-links checks targets and their anchors", () => {
    assert.deepStrictEqual(run(relativeLinksRule, [INDEX, BEE, HUNGER]), [
      { file: "HUNGER_HOWTO.md", line: 3, message: 'Anchor "#nope" does not match any heading in BEE_HOWTO.md' },
      { file: "HUNGER_HOWTO.md", line: 3, message: "Image target img/pic.png does not exist" },
    ]);
  });

  await t.test("suggestClosest", () => {
    assert.strictEqual(suggestClosest("instal", ["install", "usage"]), "install");
    assert.strictEqual(suggestClosest("zzz", ["install", "usage"]), null);
  });

  await t.test("resolveLinkPath", () => {
    assert.strictEqual(resolveLinkPath("sub/A.md", "../B.md"), "B.md");
    assert.strictEqual(resolveLinkPath("sub/A.md", "./C.md"), "sub/C.md");
    assert.strictEqual(resolveLinkPath("sub/A.md", "/D.md"), "D.md");
  });
});

test("structure rules", async (t) => {
  await t.test("markdown-structure surfaces parse issues", () => {
    assert.deepStrictEqual(run(markdownStructureRule, [doc("F.md", ["```", "code"])]), [
      { file: "F.md", line: 1, message: "Code fence ``` opened here is never closed" },
    ]);
  });

  await t.test("heading-hierarchy flags skipped levels and extra H1s", () => {
    assert.deepStrictEqual(run(headingHierarchyRule, [doc("H.md", ["# A", "## B", "#### C", "# D"])]), [
      { file: "H.md", line: 3, message: "Heading level jumps from h2 to h4" },
      { file: "H.md", line: 4, message: "Multiple top-level headings (first on line 1)" },
    ]);
  });
});

test("placeholders", async (t) => {
  await t.test("overlapping matches collapse", () => {
    const patterns = [/\[(?:TODO|TBD)\b[^\]]*\]/g, /\bTBD\b/g, /\{\{[^}]*\}\}/g];
    assert.deepStrictEqual(findPlaceholders("Price: [TBD: pricing] and {{name}}", patterns), [
      "[TBD: pricing]",
      "{{name}}",
    ]);
  });

  await t.test("code and directive comments are skipped", () => {
    const guide = doc("P.md", [
      "Price: [TBD: pricing] and {{name}}",
      "Use `{{literal}}` in code",
      "<!-- guidecheck-disable-next-line placeholders -->",
      "TBD here",
      "```",
      "${VAR}",
      "```",
    ]);
    assert.deepStrictEqual(run(placeholdersRule, [guide]), [
      { file: "P.md", line: 1, message: 'Unresolved placeholder "[TBD: pricing]"' },
      { file: "P.md", line: 1, message: 'Unresolved placeholder "{{name}}"' },
      { file: "P.md", line: 4, message: 'Unresolved placeholder "TBD"' },
    ]);
  });

  await t.test("custom patterns extend or replace the defaults", () => {
    const config = GuideCheckConfigSchema.parse({ placeholders: { useDefaults: false, patterns: ["@@\\w+"] } });
    assert.deepStrictEqual(run(placeholdersRule, [doc("P.md", ["TBD @@name"])], config), [
      { file: "P.md", line: 1, message: 'Unresolved placeholder "@@name"' },
    ]);
  });
});

test("table-arithmetic", async (t) => {
  await t.test("total columns are checked against the numeric columns before them", () => {
    assert.deepStrictEqual(run(tableArithmeticRule, [HUNGER]), [
      {
        file: "HUNGER_HOWTO.md",
        line: 9,
        message: 'Row "Bread": Total Score is 12, but {Hunger} + {Saturation} = 11',
      },
    ]);
  });

  await t.test("configured formulas", () => {
    const config = GuideCheckConfigSchema.parse({
      tables: { autoTotals: false, formulas: [{ column: "Ratio", formula: "{Saturation} / {Hunger}" }] },
    });
    const guide = doc("R.md", [
      "| Food | Hunger | Saturation | Ratio |",
      "| --- | --- | --- | --- |",
      "| Golden Carrot | 6 | 14.4 | 2.4 |",
      "| Apple | 4 | 2.4 | 0.6 |",
      "| Steak | 8 | 12.8 | 1.7 |",
      "| Air | 0 | 1 | 0 |",
    ]);
    assert.deepStrictEqual(run(tableArithmeticRule, [guide], config), [
      { file: "R.md", line: 5, message: 'Row "Steak": Ratio is 1.7, but {Saturation} / {Hunger} = 1.6' },
      { file: "R.md", line: 6, message: 'Row "Air": cannot evaluate {Saturation} / {Hunger} (Division by zero)' },
    ]);
  });

  await t.test("formulas limited to other files are skipped", () => {
    const config = GuideCheckConfigSchema.parse({
      tables: { formulas: [{ column: "Total Score", formula: "{Hunger} * 100", files: ["OTHER_*.md"] }] },
    });
    assert.strictEqual(run(tableArithmeticRule, [HUNGER], config).length, 1);
  });

  await t.test("totals shown at lower precision are compared after rounding", () => {
    const guide = doc("S.md", [
      "| Item | A | B | C | Total |",
      "| --- | --- | --- | --- | --- |",
      "| Split | 33.3 | 33.3 | 33.3 | 100 |",
      "| Off | 33.3 | 33.3 | 33.3 | 99 |",
    ]);
    assert.deepStrictEqual(run(tableArithmeticRule, [guide]), [
      { file: "S.md", line: 4, message: 'Row "Off": Total is 99, but {A} + {B} + {C} = 99.9' },
    ]);
  });

  await t.test("unheaded columns are row labels, not summands", () => {
    const guide = doc("E.md", [
      "| | Hunger | Saturation | Total |",
      "| --- | --- | --- | --- |",
      "| 1 | 5 | 6 | 11 |",
      "| 2 | 5 | 6 | 12 |",
    ]);
    assert.deepStrictEqual(run(tableArithmeticRule, [guide]), [
      { file: "E.md", line: 4, message: 'Row "2": Total is 12, but {Hunger} + {Saturation} = 11' },
    ]);
  });

  await t.test("missing cells are not compared", () => {
    const guide = doc("M.md", [
      "| Item | A | B | Total |",
      "| --- | --- | --- | --- |",
      "| One | 1 | - | 3 |",
      "| Two | 2 | 2 | 4 |",
    ]);
    assert.deepStrictEqual(run(tableArithmeticRule, [guide]), []);
  });
});

test("rule registry", () => {
  assert.deepStrictEqual(
    builtinRules.map((rule) => rule.id),
    [
      "index-entries",
      "index-orphans",
      "markdown-structure",
      "heading-hierarchy",
      "toc-anchors",
      "relative-links",
      "placeholders",
      "table-arithmetic",
    ]
  );
  assert.strictEqual(getRule("table-arithmetic")?.defaultSeverity, "warning");
  assert.strictEqual(getRule("nope"), undefined);
});
