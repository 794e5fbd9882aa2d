import test from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  buildBibliography,
  buildCitationReport,
  createCitationDatabase,
  extractCitations,
  formatAuthors,
  formatCitation,
  leadingName,
  loadCitationDatabase,
  lookupCitation,
  primaryAuthor,
  standardizeCitations,
} from "../citations";
import { parseDocument } from "../markdown/parser";
import { createGuideSet } from "../checker/loader";
import { DEFAULT_CONFIG } from "../config/schema";
import { tocAnchorsRule } from "../rules";

const db = createCitationDatabase(
  {
    Orkin: { title: "Applying Goal-Oriented Action Planning to Games", year: "2004", category: "Game AI" },
    Bass: {
      coAuthors: ["Clements", "Kazman"],
      title: "Software Architecture in Practice",
      year: "2012",
      category: "Architecture",
    },
    Vaswani: { etAl: true, title: "Attention Is All You Need", year: "2017", category: "LLM" },
    "Van Vliet": { title: "Software Engineering", year: "2008" },
    Millington: { coAuthors: ["Funge"], title: "Artificial Intelligence for Games", year: "2009", category: "Game AI" },
  },
  ["LLM", "Game AI"]
);

const ORKIN = 'Orkin, "Applying Goal-Oriented Action Planning to Games" (2004)';

const NOTES = [
  "# Notes",
  "",
  "Planning follows [Orkin, 2004] and (Vaswani et al., 2017).",
  "Architecture (Bass, Clements, and Kazman 2012) matters.",
  "Unknown (Smith, 2020) stays.",
  "`[Orkin, 2004]` in code stays, as does [Orkin (2004)](https://example.com/goap).",
  `And already ${ORKIN}.`,
  "",
  "```",
  "[Orkin, 2004]",
  "```",
].join("\n");

test("author handling", async (t) => {
  await t.test("primaryAuthor", () => {
    assert.strictEqual(primaryAuthor("Vaswani et al."), "Vaswani");
    assert.strictEqual(primaryAuthor("Millington & Funge"), "Millington");
    assert.strictEqual(primaryAuthor("Sutton and Barto"), "Sutton");
    assert.strictEqual(primaryAuthor("Bass, Clements, and Kazman"), "Bass");
    assert.strictEqual(primaryAuthor("Van Vliet & Smith"), "Van Vliet");
    assert.strictEqual(primaryAuthor("Van Vliet"), "Vliet");
  });

  await t.test("formatAuthors", () => {
    const entry = { title: "T", year: "2000" };
    assert.strictEqual(formatAuthors("Orkin", entry), "Orkin");
    assert.strictEqual(formatAuthors("Millington", { ...entry, coAuthors: ["Funge"] }), "Millington & Funge");
    assert.strictEqual(formatAuthors("Bass", { ...entry, coAuthors: ["Clements", "Kazman"] }), "Bass, Clements, & Kazman");
    assert.strictEqual(formatAuthors("Hart", { ...entry, coAuthors: ["A", "B", "C"] }), "Hart et al.");
    assert.strictEqual(formatAuthors("Vaswani", { ...entry, etAl: true }), "Vaswani et al.");
  });

  await t.test("formatCitation", () => {
    const orkin = db.entries.get("Orkin");
    assert.ok(orkin);
    assert.strictEqual(formatCitation("Orkin", orkin), ORKIN);
  });

  await t.test("lookupCitation", () => {
    assert.strictEqual(lookupCitation(db, "Vliet")?.key, "Van Vliet");
    assert.strictEqual(lookupCitation(db, "orkin")?.key, "Orkin");
    assert.strictEqual(lookupCitation(db, "Smith"), null);
  });
});

test("standardizeCitations", async (t) => {
  const result = standardizeCitations(NOTES, db);

  await t.test("known citations are rewritten outside code", () => {
    const lines = result.content.split("\n");
    assert.strictEqual(
      lines[2],
      `Planning follows ${ORKIN} and Vaswani et al., "Attention Is All You Need" (2017).`
    );
    assert.strictEqual(
      lines[3],
      'Architecture Bass, Clements, & Kazman, "Software Architecture in Practice" (2012) matters.'
    );
    assert.strictEqual(lines[4], "Unknown (Smith, 2020) stays.");
    assert.strictEqual(lines[5], "`[Orkin, 2004]` in code stays, as does [Orkin (2004)](https://example.com/goap).");
    assert.strictEqual(lines[9], "[Orkin, 2004]");
  });

  await t.test("updated, unchanged and review lists", () => {
    assert.deepStrictEqual(
      result.updated.map((c) => [c.line, c.style, c.author, c.key]),
      [
        [3, "bracket-comma", "Orkin", "Orkin"],
        [3, "paren-comma", "Vaswani", "Vaswani"],
        [4, "paren-space", "Bass", "Bass"],
      ]
    );
    assert.deepStrictEqual(
      result.unchanged.map((c) => [c.line, c.raw, c.key]),
      [[7, ORKIN, "Orkin"]]
    );
    assert.deepStrictEqual(result.review, [
      {
        raw: "(Smith, 2020)",
        style: "paren-comma",
        author: "Smith",
        year: "2020",
        line: 5,
        standard: null,
        key: null,
      },
    ]);
  });

  await t.test("a second pass changes nothing", () => {
    const again = standardizeCitations(result.content, db);
    assert.strictEqual(again.content, result.content);
    assert.deepStrictEqual(again.updated, []);
  });
});

test("author parts that are not citation authors", async (t) => {
  await t.test("a leading word before a known author is kept for review", () => {
    const source = "GOAP works well (See Orkin 2004) here.";
    const result = standardizeCitations(source, db);
    assert.strictEqual(result.content, source);
    assert.deepStrictEqual(result.updated, []);
    assert.deepStrictEqual(result.review, [
      {
        raw: "(See Orkin 2004)",
        style: "paren-space",
        author: "Orkin",
        year: "2004",
        line: 1,
        standard: null,
        key: null,
      },
    ]);
  });

  await t.test("multi-word keys resolve as written", () => {
    assert.strictEqual(
      standardizeCitations("As (Van Vliet, 2008) notes.", db).content,
      'As Van Vliet, "Software Engineering" (2008) notes.'
    );
  });

  await t.test("dates in parentheses are not citations", () => {
    const source = "Released (January 2024) and patched [March, 2023].";
    const result = standardizeCitations(source, db);
    assert.strictEqual(result.content, source);
    assert.deepStrictEqual(result.review, []);
    assert.deepStrictEqual(extractCitations(source), []);
  });

  await t.test("leadingName", () => {
    assert.strictEqual(leadingName("Bass, Clements, and Kazman"), "Bass");
    assert.strictEqual(leadingName("Vaswani et al."), "Vaswani");
    assert.strictEqual(leadingName("Van Vliet & Smith"), "Van Vliet");
    assert.strictEqual(leadingName("See Orkin"), "See Orkin");
  });
});

test("extractCitations lists every citation in line order", () => {
  assert.deepStrictEqual(
    extractCitations(NOTES).map((c) => c.raw),
    ["[Orkin, 2004]", "(Vaswani et al., 2017)", "(Bass, Clements, and Kazman 2012)", "(Smith, 2020)", ORKIN]
  );
});

test("generated documents", async (t) => {
  const results = [{ file: "NOTES.md", result: standardizeCitations(NOTES, db) }];

  await t.test("bibliography groups by category in database order", () => {
    const bibliography = buildBibliography(results, db);
    assert.strictEqual(
      bibliography,
      [
        "# Bibliography",
        "",
        "## Contents",
        "",
        "- [LLM](#llm)",
        "- [Game AI](#game-ai)",
        "- [Architecture](#architecture)",
        "- [Citations Needing Review](#citations-needing-review)",
        "",
        "## LLM",
        "",
        '- Vaswani et al., "Attention Is All You Need" (2017). (used in: NOTES.md)',
        "",
        "## Game AI",
        "",
        `- ${ORKIN}. (used in: NOTES.md)`,
        "",
        "## Architecture",
        "",
        '- Bass, Clements, & Kazman, "Software Architecture in Practice" (2012). (used in: NOTES.md)',
        "",
        "## Citations Needing Review",
        "",
        "- `(Smith, 2020)` (NOTES.md, line 5)",
        "",
      ].join("\n")
    );

    const set = createGuideSet("/out", [parseDocument("BIBLIOGRAPHY.md", bibliography)]);
    assert.deepStrictEqual(tocAnchorsRule.check({ set, config: DEFAULT_CONFIG }), []);
  });

  await t.test("entries name every citing file once", () => {
    const bibliography = buildBibliography(
      [
        { file: "A.md", result: standardizeCitations("[Orkin, 2004] and (Orkin 2004)", db) },
        { file: "B.md", result: standardizeCitations(`${ORKIN}.`, db) },
      ],
      db
    );
    assert.strictEqual(
      bibliography.split("\n").find((line) => line.startsWith("- Orkin")),
      `- ${ORKIN}. (used in: A.md, B.md)`
    );
  });

  await t.test("report summarises counts per file", () => {
    assert.strictEqual(
      buildCitationReport(results, { date: "2026-01-02" }),
      [
        "# Citation Standardization Report",
        "",
        "Generated: 2026-01-02",
        "",
        "## Summary",
        "",
        "- Files scanned: 1",
        "- Citations updated: 3",
        "- Already standard: 1",
        "- Needing review: 1",
        "",
        "## Files",
        "",
        "| File | Updated | Already standard | Review |",
        "| --- | --- | --- | --- |",
        "| NOTES.md | 3 | 1 | 1 |",
        "",
        "## Needing Review",
        "",
        "- NOTES.md:5 `(Smith, 2020)`",
        "",
      ].join("\n")
    );
  });
});

test("loadCitationDatabase", async (t) => {
  const dir = mkdtempSync(join(tmpdir(), "guidecheck-citations-"));
  t.after(() => rmSync(dir, { recursive: true, force: true }));

  await t.test("bundled database", () => {
    const bundled = loadCitationDatabase();
    assert.strictEqual(bundled.entries.size, 17);
    assert.strictEqual(bundled.categories.length, 9);
    assert.strictEqual(lookupCitation(bundled, "Vliet")?.key, "Van Vliet");
  });

  await t.test("schema errors carry issue paths", () => {
    const path = join(dir, "bad.json");
    writeFileSync(path, JSON.stringify({ entries: { X: { title: "T", year: "20" } } }));
    assert.throws(() => loadCitationDatabase(path), {
      name: "CitationDatabaseError",
      message: `Invalid citation database ${path}`,
      issues: ["entries.X.year: year must be four digits"],
    });
  });

  await t.test("missing file", () => {
    const path = join(dir, "none.json");
    assert.throws(() => loadCitationDatabase(path), {
      name: "CitationDatabaseError",
      message: `Citation database not found: ${path}`,
    });
  });
});
