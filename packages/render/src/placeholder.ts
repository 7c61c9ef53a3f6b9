import { mkdir, writeFile } from "node:fs/promises";
import { dirname, extname } from "node:path";
import { normalizeDiagram, type OutputFormat } from "@mmdpng/core";

export const PLACEHOLDER_WIDTH = 800;
export const PLACEHOLDER_HEIGHT = 600;
export const EXCERPT_LINES = 5;
export const EXCERPT_WIDTH = 50;

export class PlaceholderUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlaceholderUnavailableError";
  }
}

// First non-empty source lines shown on the placeholder, clipped to a fixed width in code points.
export function placeholderExcerpt(source: string): string[] {
  return normalizeDiagram(source)
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .slice(0, EXCERPT_LINES)
    .map((line) => Array.from(line).slice(0, EXCERPT_WIDTH).join(""));
}

export function buildPlaceholderSvg(source: string): string {
  const width = PLACEHOLDER_WIDTH;
  const height = PLACEHOLDER_HEIGHT;
  const excerptLines = placeholderExcerpt(source)
    .map((line, index) => `<text x="100" y="${482 + index * 15}" class="code" xml:space="preserve">${escapeXml(line)}</text>`)
    .join("");

  return `<?xml version="1.0" encoding="UTF-8"?>\n` +
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
    `<style>text{font-family:Arial,Helvetica,sans-serif}.title{font-size:24px;fill:#333}.subtitle{font-size:16px;fill:#666}` +
    `.label{font-size:16px;fill:#2c3e50}.small{font-size:12px;fill:#7f8c8d}.code{font-family:ui-monospace,Menlo,Consolas,"Courier New",monospace;font-size:12px;fill:#95a5a6}` +
    `.note{font-size:12px;fill:#e67e22}</style>` +
    `<rect width="100%" height="100%" fill="#ffffff"/>` +
    `<rect x="50" y="50" width="${width - 100}" height="${height - 100}" fill="none" stroke="#333" stroke-width="2"/>` +
    `<text x="${width / 2}" y="100" text-anchor="middle" class="title">Mermaid Diagram</text>` +
    `<text x="${width / 2}" y="128" text-anchor="middle" class="subtitle">(Placeholder)</text>` +
    box(150, 200, "#3498db", "#ecf0f1", "Start") +
    `<line x1="300" y1="225" x2="345" y2="225" stroke="#333" stroke-width="2"/>` +
    `<polygon points="345,220 355,225 345,230" fill="#333"/>` +
    box(400, 200, "#e74c3c", "#fadbd8", "Process") +
    `<line x1="475" y1="250" x2="475" y2="295" stroke="#333" stroke-width="2"/>` +
    `<polygon points="470,295 475,305 480,295" fill="#333"/>` +
    box(400, 350, "#27ae60", "#d5f4e6", "End") +
    `<text x="100" y="462" class="small">Source excerpt:</text>` +
    excerptLines +
    `<text x="100" y="560" class="note">Install @mermaid-js/mermaid-cli for real rendering</text>` +
    `</svg>`;
}

export async function renderPlaceholder(source: string, format: OutputFormat): Promise<Uint8Array> {
  const svg = buildPlaceholderSvg(source);
  if (format === "svg") {
    return new TextEncoder().encode(svg);
  }
  return rasterize(svg);
}

export async function writePlaceholder(source: string, outputPath: string): Promise<void> {
  const bytes = await renderPlaceholder(source, formatForPath(outputPath));
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, bytes);
}

export function formatForPath(path: string): OutputFormat {
  return extname(path).toLowerCase() === ".svg" ? "svg" : "png";
}

async function rasterize(svg: string): Promise<Uint8Array> {
  const sharp = await loadSharp();
  const buffer = await sharp(Buffer.from(svg)).png().toBuffer();
  return new Uint8Array(buffer);
}

async function loadSharp() {
  try {
    const sharpModule = await import("sharp");
    return sharpModule.default;
  } catch {
    throw new PlaceholderUnavailableError("placeholder rendering requires dependency 'sharp'");
  }
}

function box(x: number, y: number, stroke: string, fill: string, label: string): string {
  return `<rect x="${x}" y="${y}" width="150" height="50" fill="${fill}" stroke="${stroke}" stroke-width="2"/>` +
    `<text x="${x + 75}" y="${y + 31}" text-anchor="middle" class="label">${escapeXml(label)}</text>`;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
