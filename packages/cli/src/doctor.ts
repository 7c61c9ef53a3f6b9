import { mkdir, readdir, stat } from "node:fs/promises";
import { connect } from "node:net";
import { join } from "node:path";
import { errorMessage } from "@mmdpng/core";
import { describeCandidate, execute, type CommandRunner, type DiscoveryResult } from "@mmdpng/render";

export const RUNTIME_MODULES = ["express", "multer", "cors", "sharp", "zod", "cross-spawn"];
export const PROJECT_FILES = ["package.json", "tsconfig.json", "packages/cli/src/cli.ts", "packages/server/public/index.html"];
export const PROJECT_DIRS = ["uploads", "outputs", "examples"];
export const CHECKED_PORTS = [5000, 8000, 3000];

export type FileCheck = { path: string; exists: boolean; size?: number };

export type DirectoryCheck = {
  path: string;
  existed: boolean;
  entries?: number;
  created?: boolean;
  error?: string;
};

export type DoctorReport = {
  runtime: { node: string; execPath: string; platform: string; arch: string };
  modules: Array<{ name: string; ok: boolean }>;
  npm: { ok: boolean; version?: string; reason?: string };
  mermaidCli: {
    available: boolean;
    method: string | null;
    kind: string | null;
    candidates: Array<{ candidate: string; kind: string; interpreter: boolean; usable: boolean; diagnostics: string[] }>;
  };
  files: FileCheck[];
  directories: DirectoryCheck[];
  ports: Array<{ port: number; available: boolean }>;
};

export type DoctorOptions = {
  root: string;
  discovery: DiscoveryResult;
  runner?: CommandRunner;
  host?: string;
};

export async function collectReport(options: DoctorOptions): Promise<DoctorReport> {
  const run = options.runner ?? execute;
  const npmOutcome = await run("npm", ["--version"], { timeoutMs: 10_000 });
  const npm = npmOutcome.status === "ok"
    ? { ok: true, version: npmOutcome.result.stdout.trim() }
    : { ok: false, reason: npmOutcome.reason };

  const active = options.discovery.active;
  const ports: DoctorReport["ports"] = [];
  for (const port of CHECKED_PORTS) {
    ports.push({ port, available: await isPortAvailable(port, options.host) });
  }

  return {
    runtime: {
      node: process.version,
      execPath: process.execPath,
      platform: process.platform,
      arch: process.arch
    },
    modules: await checkModules(RUNTIME_MODULES),
    npm,
    mermaidCli: {
      available: active !== null,
      method: active ? describeCandidate(active) : null,
      kind: active ? active.kind : null,
      candidates: options.discovery.verdicts.map((verdict) => ({
        candidate: describeCandidate(verdict.candidate),
        kind: verdict.candidate.kind,
        interpreter: verdict.candidate.requiresInterpreter,
        usable: verdict.usable,
        diagnostics: verdict.diagnostics
      }))
    },
    files: await checkFiles(options.root, PROJECT_FILES),
    directories: await checkDirectories(options.root, PROJECT_DIRS),
    ports
  };
}

export async function checkModules(names: string[]): Promise<Array<{ name: string; ok: boolean }>> {
  const results: Array<{ name: string; ok: boolean }> = [];
  for (const name of names) {
    results.push({ name, ok: await hasModule(name) });
  }
  return results;
}

export async function checkFiles(root: string, files: string[]): Promise<FileCheck[]> {
  const results: FileCheck[] = [];
  for (const file of files) {
    try {
      const info = await stat(join(root, file));
      results.push({ path: file, exists: true, size: info.size });
    } catch {
      results.push({ path: file, exists: false });
    }
  }
  return results;
}

// Missing directories are created on the spot.
export async function checkDirectories(root: string, dirs: string[]): Promise<DirectoryCheck[]> {
  const results: DirectoryCheck[] = [];
  for (const dir of dirs) {
    const fullPath = join(root, dir);
    const entries = await countEntries(fullPath);
    if (entries !== undefined) {
      results.push({ path: dir, existed: true, entries });
      continue;
    }
    try {
      await mkdir(fullPath, { recursive: true });
      results.push({ path: dir, existed: false, created: true });
    } catch (error) {
      results.push({ path: dir, existed: false, created: false, error: errorMessage(error) });
    }
  }
  return results;
}

/** A port counts as available when nothing accepts a connection on it. */
export function isPortAvailable(port: number, host = "127.0.0.1", timeoutMs = 1000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = connect({ port, host });
    const finish = (available: boolean) => {
      socket.destroy();
      resolve(available);
    };
    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish(false));
    socket.once("timeout", () => finish(false));
    socket.once("error", () => finish(true));
  });
}

export function formatReport(report: DoctorReport): string {
  const lines: string[] = ["mmdpng doctor", ""];

  section(lines, "runtime");
  lines.push(`  node: ${report.runtime.node}`);
  lines.push(`  executable: ${report.runtime.execPath}`);
  lines.push(`  platform: ${report.runtime.platform} (${report.runtime.arch})`);

  section(lines, "modules");
  for (const entry of report.modules) {
    lines.push(`  ${entry.name}: ${entry.ok ? "ok" : "missing"}`);
  }
  lines.push(`  npm: ${report.npm.ok ? report.npm.version : `missing (${report.npm.reason})`}`);

  section(lines, "mermaid cli");
  for (const entry of report.mermaidCli.candidates) {
    const label = entry.interpreter ? `${entry.kind}, via node` : entry.kind;
    lines.push(`  ${entry.usable ? "ok" : "no"}  [${label}] ${entry.candidate}`);
    for (const diagnostic of entry.diagnostics) {
      lines.push(`        ${diagnostic}`);
    }
  }
  lines.push(
    report.mermaidCli.available
      ? `  using: ${report.mermaidCli.method} (${report.mermaidCli.kind})`
      : "  not found; conversions will produce placeholder images"
  );

  section(lines, "project files");
  for (const file of report.files) {
    lines.push(`  ${file.path}: ${file.exists ? `ok (${file.size} bytes)` : "missing"}`);
  }

  section(lines, "project directories");
  for (const dir of report.directories) {
    if (dir.existed) {
      lines.push(`  ${dir.path}/: ok (${dir.entries} items)`);
    } else if (dir.created) {
      lines.push(`  ${dir.path}/: created`);
    } else {
      lines.push(`  ${dir.path}/: missing (${dir.error})`);
    }
  }

  section(lines, "ports");
  for (const entry of report.ports) {
    lines.push(`  ${entry.port}: ${entry.available ? "available" : "in use or blocked"}`);
  }

  section(lines, "recommendations");
  if (!report.mermaidCli.available) {
    lines.push("  install the renderer: npm install @mermaid-js/mermaid-cli (or -g for a global install)");
  }
  const missing = report.modules.filter((entry) => !entry.ok).map((entry) => entry.name);
  if (missing.length > 0) {
    lines.push(`  install missing modules: npm install ${missing.join(" ")}`);
  }
  lines.push("  start the API: mmdpng serve --port 5000");
  lines.push("  convert a file: mmdpng convert --file diagram.mmd --output diagram.png");

  return `${lines.join("\n")}\n`;
}

function section(lines: string[], title: string): void {
  if (lines[lines.length - 1] !== "") lines.push("");
  lines.push(`${title}:`);
}

async function countEntries(path: string): Promise<number | undefined> {
  try {
    return (await readdir(path)).length;
  } catch {
    return undefined;
  }
}

async function hasModule(name: string): Promise<boolean> {
  try {
    await import(name);
    return true;
  } catch {
    return false;
  }
}
