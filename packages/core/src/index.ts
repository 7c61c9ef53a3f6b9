export { EXAMPLES, SAMPLE_DIAGRAM, type ExampleDiagram, type ExampleId } from "./examples.js";
export { ensureExtension, replaceExtension, secureFilename } from "./filenames.js";

export const DIAGRAM_EXTENSION = ".mmd";
export const DEFAULT_OUTPUT_NAME = "diagram.png";

export type OutputFormat = "png" | "svg";

export type FailureKind =
  | "tool-not-found"
  | "tool-unresponsive"
  | "non-zero-exit"
  | "timeout"
  | "output-missing"
  | "input-not-found"
  | "config-parse-error"
  | "placeholder-render-failure"
  | "io-error";

export type ConversionFailure = {
  kind: FailureKind;
  message: string;
  exitCode?: number;
  stdout?: string;
  stderr?: string;
};

export type RendererConfig = Record<string, unknown>;

export type ConversionResult =
  | {
      success: true;
      engine: "mmdc";
      degraded: false;
      outputPath: string;
      warnings: string[];
    }
  | {
      success: true;
      engine: "placeholder";
      degraded: true;
      cause: ConversionFailure;
      outputPath: string;
      warnings: string[];
    }
  | {
      success: false;
      error: ConversionFailure;
      outputPath: string;
      warnings: string[];
    };

const EXCERPT_LIMIT = 200;

// Failures keep only the head of captured process output.
export function excerpt(text: string, limit = EXCERPT_LIMIT): string | undefined {
  const trimmed = text.trim();
  if (!trimmed) return undefined;
  return trimmed.length > limit ? `${trimmed.slice(0, limit)}...` : trimmed;
}

export function describeFailure(failure: ConversionFailure): string {
  const parts = [`${failure.kind}: ${failure.message}`];
  if (failure.stderr) parts.push(`stderr: ${failure.stderr}`);
  if (failure.stdout) parts.push(`stdout: ${failure.stdout}`);
  return parts.join("\n");
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// Normalize diagram source (line endings, blank edges, trailing spaces).
export function normalizeDiagram(source: string): string {
  const lines = normalizeLineEndings(source).split("\n");
  return trimBlankEdges(lines)
    .map((line) => line.replace(/[ \t]+$/g, ""))
    .join("\n");
}

function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

function trimBlankEdges(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === "") start += 1;
  while (end > start && lines[end - 1].trim() === "") end -= 1;
  return lines.slice(start, end);
}
