import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { test } from "node:test";
import { buildPlaceholderSvg, placeholderExcerpt, renderPlaceholder, writePlaceholder } from "../src/placeholder.js";
import { PNG_SIGNATURE, tempDir } from "./helpers.js";

test("placeholderExcerpt keeps the first five non-empty lines, clipped", () => {
  const long = `A[${"x".repeat(80)}]`;
  const source = `\n\ngraph TD\n\n  ${long}\n  B-->C\n  C-->D\n  D-->E\n  E-->F\n`;
  assert.deepEqual(placeholderExcerpt(source), [
    "graph TD",
    `  ${long}`.slice(0, 50),
    "  B-->C",
    "  C-->D",
    "  D-->E"
  ]);
});

test("placeholderExcerpt never splits a surrogate pair", () => {
  const line = `${"a".repeat(49)}\u{1F600}tail`;
  const [clipped] = placeholderExcerpt(line);
  assert.equal(clipped, `${"a".repeat(49)}\u{1F600}`);
  assert.equal(Array.from(clipped).length, 50);
});

test("buildPlaceholderSvg escapes diagram text", () => {
  const svg = buildPlaceholderSvg("graph TD\n  A[\"<b>&\"] --> B");
  assert.ok(svg.includes('<svg xmlns="http://www.w3.org/2000/svg" width="800" height="600" viewBox="0 0 800 600">'));
  assert.ok(svg.includes(">Mermaid Diagram</text>"));
  assert.ok(svg.includes(">(Placeholder)</text>"));
  assert.ok(svg.includes(">  A[&quot;&lt;b&gt;&amp;&quot;] --&gt; B</text>"));
  assert.ok(svg.includes(">Install @mermaid-js/mermaid-cli for real rendering</text>"));
});

test("renderPlaceholder returns the svg text for svg output", async () => {
  const bytes = await renderPlaceholder("graph TD; A-->B", "svg");
  assert.equal(new TextDecoder().decode(bytes), buildPlaceholderSvg("graph TD; A-->B"));
});

test("renderPlaceholder rasterises to png", async () => {
  const bytes = await renderPlaceholder("graph TD; A-->B", "png");
  assert.deepEqual(Array.from(bytes.subarray(0, 8)), PNG_SIGNATURE);
});

test("writePlaceholder creates missing parent directories", async () => {
  const target = join(tempDir(), "nested", "deeper", "out.svg");
  await writePlaceholder("graph LR; X-->Y", target);
  assert.equal(readFileSync(target, "utf8"), buildPlaceholderSvg("graph LR; X-->Y"));
});
