import { access, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { excerpt } from "@mmdpng/core";

import { describeCandidate, MERMAID_CLI_PACKAGE, type InvocationCandidate } from "./candidates.js";
import { execute, type CommandRunner, type RunOutcome } from "./runner.js";

export const PROBE_DIAGRAM = "graph TD; A-->B";

export type ProbeOptions = {
  runner?: CommandRunner;
  tmpRoot?: string;
  versionTimeoutMs?: number;
  conversionTimeoutMs?: number;
  onLog?: (message: string) => void;
};

export type ProbeVerdict = {
  candidate: InvocationCandidate;
  usable: boolean;
  version?: string;
  diagnostics: string[];
};

export type DiscoveryResult = {
  active: InvocationCandidate | null;
  verdicts: ProbeVerdict[];
};

const DEFAULT_VERSION_TIMEOUT_MS = 10_000;
const DEFAULT_CONVERSION_TIMEOUT_MS = 30_000;
const PACKAGE_CHECK_TIMEOUT_MS = 10_000;

/**
 * Decide whether a candidate can actually render. A successful `--version`
 * only proves the entry point starts; the headless browser behind mmdc is only
 * exercised by a real conversion, so both must pass.
 */
export async function probeCandidate(candidate: InvocationCandidate, options: ProbeOptions = {}): Promise<ProbeVerdict> {
  const run = options.runner ?? execute;
  const label = describeCandidate(candidate);
  const diagnostics: string[] = [];
  const reject = (reason: string): ProbeVerdict => {
    diagnostics.push(reason);
    options.onLog?.(`  ${reason}`);
    return { candidate, usable: false, diagnostics };
  };

  options.onLog?.(`testing: ${label}`);

  if (candidate.requiredFile && !(await exists(candidate.requiredFile))) {
    return reject(`file not found: ${candidate.requiredFile}`);
  }

  if (candidate.requiresPackageCheck) {
    const listing = await run("npm", ["ls", MERMAID_CLI_PACKAGE], { timeoutMs: PACKAGE_CHECK_TIMEOUT_MS });
    const stdout = "result" in listing ? listing.result.stdout : "";
    if (!stdout.includes(MERMAID_CLI_PACKAGE)) {
      return reject(`${MERMAID_CLI_PACKAGE} not listed by npm ls`);
    }
  }

  const versionOutcome = await run(candidate.command, [...candidate.args, "--version"], {
    timeoutMs: options.versionTimeoutMs ?? DEFAULT_VERSION_TIMEOUT_MS
  });
  if (versionOutcome.status !== "ok") {
    return reject(`version check failed: ${outcomeReason(versionOutcome)}`);
  }
  const version = versionOutcome.result.stdout.trim();
  if (!version) {
    return reject("version check printed nothing");
  }

  const conversion = await runProbeConversion(candidate, run, options);
  if (conversion.status !== "ok") {
    return reject(`version ${version} responded but test conversion failed: ${outcomeReason(conversion)}`);
  }

  diagnostics.push(`version ${version}`);
  options.onLog?.(`  usable (version ${version})`);
  return { candidate, usable: true, version, diagnostics };
}

// Probes in priority order and stops at the first usable candidate.
export async function discoverCandidate(
  candidates: readonly InvocationCandidate[],
  options: ProbeOptions = {}
): Promise<DiscoveryResult> {
  const verdicts: ProbeVerdict[] = [];
  for (const candidate of candidates) {
    const verdict = await probeCandidate(candidate, options);
    verdicts.push(verdict);
    if (verdict.usable) {
      return { active: candidate, verdicts };
    }
  }
  return { active: null, verdicts };
}

async function runProbeConversion(
  candidate: InvocationCandidate,
  run: CommandRunner,
  options: ProbeOptions
): Promise<RunOutcome> {
  const dir = await mkdtemp(join(options.tmpRoot ?? tmpdir(), "mmdpng-probe-"));
  try {
    const inputPath = join(dir, "probe.mmd");
    const outputPath = join(dir, "probe.png");
    await writeFile(inputPath, PROBE_DIAGRAM, "utf8");
    return await run(candidate.command, [...candidate.args, "-i", inputPath, "-o", outputPath], {
      timeoutMs: options.conversionTimeoutMs ?? DEFAULT_CONVERSION_TIMEOUT_MS
    });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function outcomeReason(outcome: RunOutcome): string {
  if (outcome.status === "ok") return "ok";
  if (outcome.status === "failed-to-start") return outcome.reason;
  const stderr = excerpt(outcome.result.stderr, 100);
  return stderr ? `${outcome.reason} (${stderr})` : outcome.reason;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
