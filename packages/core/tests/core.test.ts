import assert from "node:assert/strict";
import { test } from "node:test";
import {
  EXAMPLES,
  describeFailure,
  ensureExtension,
  excerpt,
  normalizeDiagram,
  replaceExtension,
  secureFilename
} from "../src/index.js";

test("secureFilename flattens path separators and strips unsafe characters", () => {
  assert.equal(secureFilename("../../etc/passwd"), "etc_passwd");
  assert.equal(secureFilename("my diagram.png"), "my_diagram.png");
  assert.equal(secureFilename("C:\\Users\\me\\chart.png"), "C_Users_me_chart.png");
  assert.equal(secureFilename("résumé?.png"), "resume.png");
});

test("secureFilename returns an empty string when nothing usable is left", () => {
  assert.equal(secureFilename("../.."), "");
  assert.equal(secureFilename("日本語"), "");
});

test("ensureExtension appends only when missing", () => {
  assert.equal(ensureExtension("chart", ".png"), "chart.png");
  assert.equal(ensureExtension("chart.PNG", ".png"), "chart.PNG");
});

test("replaceExtension swaps the extension of the last path segment", () => {
  assert.equal(replaceExtension("diagrams/flow.mmd", ".png"), "diagrams/flow.png");
  assert.equal(replaceExtension("dir.v2/flow", ".png"), "dir.v2/flow.png");
  assert.equal(replaceExtension(".hidden", ".png"), ".hidden.png");
  assert.equal(replaceExtension("archive.tar.mmd", ".png"), "archive.tar.png");
});

test("excerpt trims and truncates captured output", () => {
  assert.equal(excerpt("  \n "), undefined);
  assert.equal(excerpt(" short "), "short");
  assert.equal(excerpt("abcdef", 3), "abc...");
});

test("describeFailure lists stderr before stdout", () => {
  const text = describeFailure({ kind: "non-zero-exit", message: "conversion failed: exited with code 1", stderr: "bad", stdout: "log" });
  assert.equal(text, "non-zero-exit: conversion failed: exited with code 1\nstderr: bad\nstdout: log");
  assert.equal(describeFailure({ kind: "timeout", message: "slow" }), "timeout: slow");
});

test("normalizeDiagram strips blank edges and trailing spaces", () => {
  assert.equal(normalizeDiagram("\r\n\ngraph TD  \r\n  A-->B\t\n\n"), "graph TD\n  A-->B");
});

test("examples cover the five diagram types", () => {
  assert.deepEqual(Object.keys(EXAMPLES), ["flowchart", "sequence", "class", "pie", "gitgraph"]);
  assert.ok(EXAMPLES.gitgraph.code.startsWith("gitGraph"));
  for (const example of Object.values(EXAMPLES)) {
    assert.ok(example.name.length > 0);
    assert.ok(example.code.trim().length > 0);
  }
});
