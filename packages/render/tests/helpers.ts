import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { InvocationCandidate, RunOutcome, RunResult } from "../src/index.js";

export const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export type FakeMode = "ok" | "no-output" | "fail" | "hang" | "conversion-fail";

export function tempDir(prefix = "mmdpng-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Write a node script that behaves like mmdc in the given mode. In "ok" mode
 * every render appends `{ args, config }` as a JSON line to `recordPath`.
 */
export function writeFakeMmdc(dir: string, mode: FakeMode, recordPath = join(dir, "calls.jsonl")): string {
  const script = join(dir, `fake-mmdc-${mode}.mjs`);
  writeFileSync(
    script,
    `import { appendFileSync, readFileSync, writeFileSync } from "node:fs";
const mode = ${JSON.stringify(mode)};
const args = process.argv.slice(2);
if (args.includes("--version")) {
  process.stdout.write("10.9.1\\n");
  process.exit(0);
}
if (args.includes("--help")) {
  if (mode === "hang") setTimeout(() => {}, 60000);
  else process.stdout.write("Usage: mmdc\\n");
} else if (mode === "ok") {
  const output = args[args.indexOf("-o") + 1];
  const configIndex = args.indexOf("-c");
  const config = configIndex === -1 ? null : JSON.parse(readFileSync(args[configIndex + 1], "utf8"));
  writeFileSync(output, Buffer.from(${JSON.stringify(PNG_SIGNATURE)}));
  appendFileSync(${JSON.stringify(recordPath)}, JSON.stringify({ args, config }) + "\\n");
} else if (mode === "fail" || mode === "conversion-fail") {
  process.stderr.write("puppeteer could not launch\\n");
  process.exit(2);
} else if (mode === "hang") {
  setTimeout(() => {}, 60000);
}
`,
    "utf8"
  );
  return script;
}

export function scriptCandidate(script: string): InvocationCandidate {
  return {
    kind: "node-script",
    command: process.execPath,
    args: [script],
    requiresInterpreter: true,
    requiresPackageCheck: false,
    requiredFile: script
  };
}

export function runResult(overrides: Partial<RunResult> = {}): RunResult {
  return { stdout: "", stderr: "", exitCode: 0, durationMs: 1, timedOut: false, signal: null, ...overrides };
}

export function okOutcome(stdout = ""): RunOutcome {
  return { status: "ok", result: runResult({ stdout }) };
}
