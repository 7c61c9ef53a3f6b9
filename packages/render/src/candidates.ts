import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

export const MERMAID_CLI_PACKAGE = "@mermaid-js/mermaid-cli";
export const MMDC_PATH_ENV = "MMDPNG_MMDC_PATH";

export type CandidateKind = "env-override" | "local-bin" | "node-script" | "global-bin" | "package-runner";

export type InvocationCandidate = {
  readonly kind: CandidateKind;
  readonly command: string;
  readonly args: readonly string[];
  /** The entry point is a script handed to the node interpreter; `command` already names it. */
  readonly requiresInterpreter: boolean;
  /** Confirm the package is installed via `npm ls` before executing anything. */
  readonly requiresPackageCheck: boolean;
  readonly requiredFile?: string;
};

export type EnumerateOptions = {
  roots?: string[];
  platform?: NodeJS.Platform;
  envPath?: string;
  nodePath?: string;
};

/**
 * Ordered ways of invoking mmdc, best first: project-local installs before
 * global ones, and a direct binary before an interpreter or package runner.
 */
export function enumerateCandidates(options: EnumerateOptions = {}): InvocationCandidate[] {
  const roots = unique(options.roots ?? defaultRoots());
  const platform = options.platform ?? process.platform;
  const nodePath = options.nodePath ?? process.execPath;
  const envPath = options.envPath ?? process.env[MMDC_PATH_ENV];
  const binName = platform === "win32" ? "mmdc.cmd" : "mmdc";
  const candidates: InvocationCandidate[] = [];

  if (envPath && envPath.trim().length > 0) {
    candidates.push(binary("env-override", envPath.trim()));
  }

  for (const root of roots) {
    const bin = join(root, "node_modules", ".bin", binName);
    candidates.push({ ...binary("local-bin", bin), requiredFile: bin });
  }

  for (const root of roots) {
    const script = join(root, "node_modules", "@mermaid-js", "mermaid-cli", "src", "cli.js");
    candidates.push({
      kind: "node-script",
      command: nodePath,
      args: [script],
      requiresInterpreter: true,
      requiresPackageCheck: false,
      requiredFile: script
    });
  }

  candidates.push(binary("global-bin", "mmdc"));
  candidates.push({
    kind: "package-runner",
    command: platform === "win32" ? "npx.cmd" : "npx",
    args: ["--no", MERMAID_CLI_PACKAGE],
    requiresInterpreter: false,
    requiresPackageCheck: true
  });

  return candidates;
}

export function describeCandidate(candidate: InvocationCandidate): string {
  return [candidate.command, ...candidate.args].join(" ");
}

export function defaultRoots(): string[] {
  return [process.cwd(), guessRepoRoot()];
}

function guessRepoRoot(): string {
  const current = fileURLToPath(import.meta.url);
  return join(dirname(current), "..", "..", "..");
}

function binary(kind: CandidateKind, command: string): InvocationCandidate {
  return { kind, command, args: [], requiresInterpreter: false, requiresPackageCheck: false };
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
