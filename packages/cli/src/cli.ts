#!/usr/bin/env -S node --import tsx

import { writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { env, exit, stderr, stdout } from "node:process";
import { fileURLToPath } from "node:url";
import { SAMPLE_DIAGRAM, describeFailure, type ConversionResult, type RendererConfig } from "@mmdpng/core";
import { MERMAID_CLI_PACKAGE, MermaidConverter, batchConvert, type ConverterOptions } from "@mmdpng/render";
import { startServer } from "@mmdpng/server";

import { getFlag, isHelp, parseArgs, parseNumber, type Flags } from "./args.js";
import { loadRendererConfig } from "./config.js";
import { collectReport, formatReport } from "./doctor.js";

const REPO_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "..");
const DEFAULT_PORT = 5000;

const [command, ...rest] = process.argv.slice(2);
const { flags } = parseArgs(rest);

if (isHelp(command, flags)) {
  printHelp();
  exit(0);
}

main().catch((error) => {
  stderr.write(`error: ${error instanceof Error ? error.message : String(error)}\n`);
  exit(1);
});

async function main(): Promise<void> {
  switch (command) {
    case "convert":
      await cmdConvert(flags);
      return;
    case "sample":
      await cmdSample(flags);
      return;
    case "check":
      await cmdCheck(flags);
      return;
    case "doctor":
      await cmdDoctor(flags);
      return;
    case "serve":
      await cmdServe(flags);
      return;
    default:
      stderr.write(`unknown command: ${command}\n`);
      printHelp();
      exit(1);
  }
}

async function cmdConvert(flags: Flags): Promise<void> {
  const file = getFlag(flags, "file");
  const text = getFlag(flags, "text");
  const directory = getFlag(flags, "directory");
  const asJson = Boolean(flags.json);
  const quiet = Boolean(flags.quiet);

  const sources = [file, text, directory].filter((value) => value !== undefined);
  if (sources.length !== 1) {
    throw new Error("convert needs exactly one of --file, --text or --directory");
  }

  const config = await readConfig(flags, quiet);
  const converter = await MermaidConverter.create(converterOptions(flags));

  if (directory !== undefined) {
    const report = await batchConvert(converter, directory, getFlag(flags, "output-directory"), config);
    if (report.error) {
      throw new Error(report.error.message);
    }
    if (!quiet) {
      writeWarnings(report.warnings);
      for (const item of report.items) writeWarnings(item.result.warnings);
    }
    if (asJson) {
      stdout.write(`${JSON.stringify({
        successful: report.successful,
        total: report.total,
        items: report.items.map((item) => ({ input: item.input, ...summarize(item.result) }))
      })}\n`);
    } else {
      for (const item of report.items) {
        stdout.write(item.result.success
          ? `${item.input} -> ${item.result.outputPath}${item.result.degraded ? " (placeholder)" : ""}\n`
          : `${item.input}: failed\n`);
        if (!item.result.success) stderr.write(`${describeFailure(item.result.error)}\n`);
      }
      stdout.write(`converted ${report.successful}/${report.total}\n`);
    }
    if (report.successful !== report.total) process.exitCode = 1;
    return;
  }

  const result = file !== undefined
    ? await converter.convertFile(file, getFlag(flags, "output"), config)
    : await converter.convert(text ?? "", getFlag(flags, "output") ?? "output.png", config);

  if (!quiet) writeWarnings(result.warnings);
  if (asJson) {
    stdout.write(`${JSON.stringify(summarize(result))}\n`);
  } else if (result.success) {
    stdout.write(`${result.outputPath}\n`);
  }
  if (!result.success) {
    stderr.write(`error: ${describeFailure(result.error)}\n`);
    process.exitCode = 1;
  }
}

async function cmdSample(flags: Flags): Promise<void> {
  const output = getFlag(flags, "output") ?? "sample.mmd";
  await writeFile(output, SAMPLE_DIAGRAM, "utf8");
  stdout.write(`${output}\n`);
}

async function cmdCheck(flags: Flags): Promise<void> {
  const converter = await MermaidConverter.create(converterOptions(flags));
  const status = await converter.checkDependencies();
  if (flags.json) {
    stdout.write(`${JSON.stringify({ dependencies_ok: status.ok, mermaid_cli: status.cli, reason: status.reason ?? null })}\n`);
  } else if (status.ok) {
    stdout.write(`mermaid CLI: ok (${status.cli})\n`);
  } else {
    stdout.write(`mermaid CLI: ${status.reason ?? "unavailable"}\n`);
    stdout.write(`install it locally: npm install ${MERMAID_CLI_PACKAGE}\n`);
    stdout.write(`or globally:        npm install -g ${MERMAID_CLI_PACKAGE}\n`);
    stdout.write("conversions will produce placeholder images until then\n");
  }
  if (!status.ok) process.exitCode = 1;
}

async function cmdDoctor(flags: Flags): Promise<void> {
  const converter = await MermaidConverter.create(converterOptions(flags));
  const report = await collectReport({ root: process.cwd(), discovery: converter.discovery });
  if (flags.json) {
    stdout.write(`${JSON.stringify(report)}\n`);
    return;
  }
  stdout.write(formatReport(report));
}

async function cmdServe(flags: Flags): Promise<void> {
  const port = parseNumber(getFlag(flags, "port")) ?? parseNumber(env.PORT) ?? DEFAULT_PORT;
  const host = getFlag(flags, "host") ?? "0.0.0.0";
  const onLog = (message: string) => {
    stderr.write(`${message}\n`);
  };
  const converter = await MermaidConverter.create({ ...converterOptions(flags), onLog });

  await startServer({
    converter,
    uploadsDir: resolve("uploads"),
    outputsDir: resolve("outputs"),
    host,
    port,
    onLog
  });
  stderr.write(`mmdpng listening on http://${host}:${port}\n`);
  if (!converter.available) {
    stderr.write("warning: mermaid CLI not available; responses will carry placeholder images\n");
  }
}

function converterOptions(flags: Flags): ConverterOptions {
  const verbose = Boolean(flags.verbose);
  return {
    enumerate: { roots: [process.cwd(), REPO_ROOT] },
    theme: getFlag(flags, "theme"),
    background: getFlag(flags, "background"),
    scale: parseNumber(getFlag(flags, "scale")),
    onLog: verbose ? (message) => stderr.write(`${message}\n`) : undefined
  };
}

async function readConfig(flags: Flags, quiet: boolean): Promise<RendererConfig | undefined> {
  const path = getFlag(flags, "config");
  if (!path) return undefined;
  const loaded = await loadRendererConfig(path);
  if (loaded.ok) return loaded.config;
  if (!quiet) writeWarnings([`${loaded.failure.kind}: ${loaded.failure.message}`]);
  return undefined;
}

function summarize(result: ConversionResult) {
  if (!result.success) {
    return { success: false, output: result.outputPath, error: result.error, warnings: result.warnings };
  }
  return {
    success: true,
    output: result.outputPath,
    engine: result.engine,
    degraded: result.degraded,
    warnings: result.warnings
  };
}

function writeWarnings(warnings: string[]): void {
  if (warnings.length === 0) return;
  stderr.write(warnings.map((warning) => `warning: ${warning}`).join("\n") + "\n");
}

function printHelp(): void {
  const name = basename(process.argv[1] ?? "mmdpng");
  stdout.write(
    `mmdpng: Mermaid to PNG converter\n\n` +
      `Usage:\n` +
      `  ${name} convert --file diagram.mmd [--output diagram.png]\n` +
      `  ${name} convert --text "graph TD; A-->B" [--output output.png]\n` +
      `  ${name} convert --directory diagrams/ [--output-directory images/]\n` +
      `  ${name} sample [--output sample.mmd]\n` +
      `  ${name} check\n` +
      `  ${name} doctor [--json]\n` +
      `  ${name} serve [--port 5000] [--host 0.0.0.0]\n\n` +
      `Commands:\n` +
      `  convert  Convert Mermaid source to PNG (placeholder when the mermaid CLI is missing)\n` +
      `  sample   Write a sample diagram\n` +
      `  check    Check that the mermaid CLI works\n` +
      `  doctor   Report runtime, modules, CLI discovery, files and ports\n` +
      `  serve    HTTP API with a browser page\n\n` +
      `Flags:\n` +
      `  -f, --file <file>               Input .mmd file\n` +
      `  -t, --text <source>             Inline Mermaid source\n` +
      `  -d, --directory <dir>           Convert every .mmd file in a directory\n` +
      `  -o, --output <file>             Output file\n` +
      `  -od, --output-directory <dir>   Output directory (batch)\n` +
      `  -c, --config <file.json>        Mermaid config file\n` +
      `  --theme <theme>                 default|dark|forest|neutral\n` +
      `  --background <bg>               transparent|white|#hex\n` +
      `  --scale <n>                     Scale factor\n` +
      `  -p, --port <port>               Listen port (serve, default $PORT or 5000)\n` +
      `  --host <host>                   Bind host (serve)\n` +
      `  --json                          Machine-readable output\n` +
      `  -q, --quiet                     Suppress warnings\n` +
      `  -v, --verbose                   Log discovery and conversion steps\n`
  );
}
