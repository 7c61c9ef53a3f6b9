import { access, copyFile, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import {
  errorMessage,
  excerpt,
  replaceExtension,
  type ConversionFailure,
  type ConversionResult,
  type RendererConfig
} from "@mmdpng/core";

import { describeCandidate, enumerateCandidates, type EnumerateOptions, type InvocationCandidate } from "./candidates.js";
import { PlaceholderUnavailableError, formatForPath, writePlaceholder } from "./placeholder.js";
import { discoverCandidate, outcomeReason, type DiscoveryResult } from "./probe.js";
import { execute, type CommandRunner, type RunOutcome } from "./runner.js";

export type ConverterOptions = {
  candidates?: readonly InvocationCandidate[];
  enumerate?: EnumerateOptions;
  runner?: CommandRunner;
  tmpRoot?: string;
  theme?: string;
  background?: string;
  scale?: number;
  conversionTimeoutMs?: number;
  probeVersionTimeoutMs?: number;
  probeConversionTimeoutMs?: number;
  helpTimeoutMs?: number;
  onLog?: (message: string) => void;
};

export type DependencyStatus = {
  ok: boolean;
  cli: string | null;
  reason?: string;
};

const DEFAULT_CONVERSION_TIMEOUT_MS = 45_000;
const DEFAULT_HELP_TIMEOUT_MS = 10_000;

/**
 * Converts Mermaid source to images through the discovered mmdc invocation.
 * Discovery happens once, in `create`; the outcome is fixed for the lifetime
 * of the instance. Every conversion failure degrades to a placeholder image.
 */
export class MermaidConverter {
  readonly discovery: DiscoveryResult;
  private readonly options: ConverterOptions;
  private readonly run: CommandRunner;

  constructor(discovery: DiscoveryResult, options: ConverterOptions = {}) {
    this.discovery = discovery;
    this.options = options;
    this.run = options.runner ?? execute;
  }

  static async create(options: ConverterOptions = {}): Promise<MermaidConverter> {
    const candidates = options.candidates ?? enumerateCandidates(options.enumerate);
    const discovery = await discoverCandidate(candidates, {
      runner: options.runner,
      tmpRoot: options.tmpRoot,
      versionTimeoutMs: options.probeVersionTimeoutMs,
      conversionTimeoutMs: options.probeConversionTimeoutMs,
      onLog: options.onLog
    });
    if (!discovery.active) {
      options.onLog?.("mermaid CLI not available; conversions will produce placeholder images");
    }
    return new MermaidConverter(discovery, options);
  }

  get available(): boolean {
    return this.discovery.active !== null;
  }

  get cli(): string | null {
    return this.discovery.active ? describeCandidate(this.discovery.active) : null;
  }

  async checkDependencies(): Promise<DependencyStatus> {
    const active = this.discovery.active;
    if (!active) {
      return { ok: false, cli: null, reason: "mermaid CLI not found" };
    }
    const outcome = await this.run(active.command, [...active.args, "--help"], {
      timeoutMs: this.options.helpTimeoutMs ?? DEFAULT_HELP_TIMEOUT_MS
    });
    if (outcome.status === "ok") {
      return { ok: true, cli: this.cli };
    }
    const reason = outcome.status === "timeout" ? "mermaid CLI is not responding" : `mermaid CLI is not working: ${outcomeReason(outcome)}`;
    return { ok: false, cli: this.cli, reason };
  }

  async convert(source: string, outputPath: string, config?: RendererConfig): Promise<ConversionResult> {
    const active = this.discovery.active;
    if (!active) {
      return this.fallback(source, outputPath, { kind: "tool-not-found", message: "mermaid CLI not available" });
    }

    const attempt = await this.attempt(active, source, outputPath, config);
    if ("success" in attempt) return attempt;
    return this.fallback(source, outputPath, attempt);
  }

  async convertFile(inputPath: string, outputPath?: string, config?: RendererConfig): Promise<ConversionResult> {
    const target = outputPath ?? replaceExtension(inputPath, ".png");
    let source: string;
    try {
      source = await readFile(inputPath, "utf8");
    } catch (error) {
      return {
        success: false,
        outputPath: target,
        error: { kind: "input-not-found", message: `input file not found: ${inputPath} (${errorMessage(error)})` },
        warnings: []
      };
    }
    return this.convert(source, target, config);
  }

  // Temp files are gone by the time this resolves, whatever the outcome.
  private async attempt(
    active: InvocationCandidate,
    source: string,
    outputPath: string,
    config?: RendererConfig
  ): Promise<ConversionResult | ConversionFailure> {
    let dir: string;
    try {
      dir = await mkdtemp(join(this.options.tmpRoot ?? tmpdir(), "mmdpng-"));
    } catch (error) {
      return { kind: "io-error", message: `cannot create temp directory: ${errorMessage(error)}` };
    }

    try {
      const inputPath = join(dir, "input.mmd");
      const renderedPath = join(dir, `output.${formatForPath(outputPath)}`);
      await writeFile(inputPath, source, "utf8");

      const args = [...active.args, "-i", inputPath, "-o", renderedPath];
      if (config) {
        const configPath = join(dir, "config.json");
        await writeFile(configPath, JSON.stringify(config, null, 2), "utf8");
        args.push("-c", configPath);
      }
      if (this.options.theme) args.push("-t", this.options.theme);
      if (this.options.background) args.push("-b", this.options.background);
      if (this.options.scale) args.push("-s", String(this.options.scale));

      this.options.onLog?.(`converting to ${outputPath}`);
      const outcome = await this.run(active.command, args, {
        timeoutMs: this.options.conversionTimeoutMs ?? DEFAULT_CONVERSION_TIMEOUT_MS
      });

      if (outcome.status === "ok" && (await exists(renderedPath))) {
        await mkdir(dirname(outputPath), { recursive: true });
        await copyFile(renderedPath, outputPath);
        return { success: true, engine: "mmdc", degraded: false, outputPath, warnings: [] };
      }
      return classifyFailure(outcome);
    } catch (error) {
      return { kind: "io-error", message: errorMessage(error) };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private async fallback(source: string, outputPath: string, cause: ConversionFailure): Promise<ConversionResult> {
    this.options.onLog?.(`falling back to placeholder: ${cause.kind}: ${cause.message}`);
    try {
      await writePlaceholder(source, outputPath);
    } catch (error) {
      const message = error instanceof PlaceholderUnavailableError
        ? error.message
        : `placeholder rendering failed: ${errorMessage(error)}`;
      return {
        success: false,
        outputPath,
        error: { kind: "placeholder-render-failure", message },
        warnings: [cause.message]
      };
    }
    return {
      success: true,
      engine: "placeholder",
      degraded: true,
      cause,
      outputPath,
      warnings: [`${cause.message}; rendered placeholder image`]
    };
  }
}

function classifyFailure(outcome: RunOutcome): ConversionFailure {
  switch (outcome.status) {
    case "failed-to-start":
      return { kind: "tool-not-found", message: outcome.reason };
    case "timeout":
      return { kind: "timeout", message: `conversion ${outcome.reason}`, ...captured(outcome) };
    case "non-zero-exit":
      return {
        kind: "non-zero-exit",
        message: `conversion failed: ${outcome.reason}`,
        exitCode: outcome.result.exitCode,
        ...captured(outcome)
      };
    case "ok":
      return { kind: "output-missing", message: "mermaid CLI exited cleanly but wrote no output", ...captured(outcome) };
  }
}

function captured(outcome: Exclude<RunOutcome, { status: "failed-to-start" }>): Pick<ConversionFailure, "stdout" | "stderr"> {
  return {
    stdout: excerpt(outcome.result.stdout),
    stderr: excerpt(outcome.result.stderr)
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
