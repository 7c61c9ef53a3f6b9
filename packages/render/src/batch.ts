import { mkdir, readdir, stat } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { DIAGRAM_EXTENSION, errorMessage, type ConversionFailure, type ConversionResult, type RendererConfig } from "@mmdpng/core";

import type { MermaidConverter } from "./converter.js";

export type BatchItem = {
  input: string;
  result: ConversionResult;
};

export type BatchReport = {
  successful: number;
  total: number;
  items: BatchItem[];
  warnings: string[];
  error?: ConversionFailure;
};

/**
 * Convert every `.mmd` file directly inside `inputDir`. Items are independent:
 * one failure never stops the rest.
 */
export async function batchConvert(
  converter: MermaidConverter,
  inputDir: string,
  outputDir?: string,
  config?: RendererConfig
): Promise<BatchReport> {
  if (!(await isDirectory(inputDir))) {
    return {
      successful: 0,
      total: 0,
      items: [],
      warnings: [],
      error: { kind: "input-not-found", message: `input directory not found: ${inputDir}` }
    };
  }

  const targetDir = outputDir ?? inputDir;
  try {
    await mkdir(targetDir, { recursive: true });
  } catch (error) {
    return {
      successful: 0,
      total: 0,
      items: [],
      warnings: [],
      error: { kind: "io-error", message: `cannot create output directory ${targetDir}: ${errorMessage(error)}` }
    };
  }

  const entries = await readdir(inputDir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === DIAGRAM_EXTENSION)
    .map((entry) => entry.name)
    .sort();

  if (files.length === 0) {
    return { successful: 0, total: 0, items: [], warnings: [`no ${DIAGRAM_EXTENSION} files found in ${inputDir}`] };
  }

  const items: BatchItem[] = [];
  for (const name of files) {
    const input = join(inputDir, name);
    const output = join(targetDir, `${basename(name, extname(name))}.png`);
    items.push({ input, result: await converter.convertFile(input, output, config) });
  }

  const successful = items.filter((item) => item.result.success).length;
  return { successful, total: items.length, items, warnings: [] };
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
