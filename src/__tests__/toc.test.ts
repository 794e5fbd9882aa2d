import test from "node:test";
import assert from "node:assert";
import { parseDocument } from "../markdown/parser";
import { buildToc, replaceTocBlock, tocHeadings } from "../markdown/toc";

const SOURCE = [
  "# Guide",
  "",
  "<!-- toc -->",
  "old",
  "<!-- tocstop -->",
  "",
  "## Contents",
  "",
  "## 1. Setup",
  "",
  "### Install `cli`",
  "",
  "#### Deep",
  "",
  "## FAQ",
  "",
].join("\n");

test("toc", async (t) => {
  const doc = parseDocument("GUIDE.md", SOURCE);

  await t.test("levels 2-3 by default, without the Contents heading", () => {
    assert.deepStrictEqual(
      tocHeadings(doc).map((heading) => heading.slug),
      ["1-setup", "install-cli", "faq"]
    );
    assert.strictEqual(
      buildToc(doc),
      ["- [1. Setup](#1-setup)", "  - [Install cli](#install-cli)", "- [FAQ](#faq)"].join("\n")
    );
  });

  await t.test("deeper levels are indented", () => {
    assert.strictEqual(
      buildToc(doc, { minLevel: 3, maxLevel: 4 }),
      ["- [Install cli](#install-cli)", "  - [Deep](#deep)"].join("\n")
    );
  });

  await t.test("replaceTocBlock swaps the marker contents and is stable", () => {
    const toc = buildToc(doc);
    const updated = replaceTocBlock(SOURCE, toc);
    assert.strictEqual(
      updated,
      SOURCE.replace("<!-- toc -->\nold\n<!-- tocstop -->", `<!-- toc -->\n\n${toc}\n\n<!-- tocstop -->`)
    );
    assert.strictEqual(replaceTocBlock(updated ?? "", toc), updated);
  });

  await t.test("missing markers give null", () => {
    assert.strictEqual(replaceTocBlock("# No markers\n", "- [x](#x)"), null);
    assert.strictEqual(replaceTocBlock("<!-- tocstop -->\n<!-- toc -->", "- [x](#x)"), null);
  });

  await t.test("brackets in heading text are escaped", () => {
    const bracketed = parseDocument("B.md", "## Use [brackets]");
    assert.strictEqual(buildToc(bracketed), "- [Use \\[brackets\\]](#use-brackets)");
  });
});
