import { readFile } from "node:fs/promises";
import { z } from "zod";
import { errorMessage, type ConversionFailure, type RendererConfig } from "@mmdpng/core";

const rendererConfigSchema = z.record(z.unknown());

export type LoadedConfig =
  | { ok: true; config: RendererConfig }
  | { ok: false; failure: ConversionFailure };

/** Read a renderer config file; callers continue without it when this fails. */
export async function loadRendererConfig(path: string): Promise<LoadedConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    return { ok: false, failure: { kind: "config-parse-error", message: `cannot read config ${path}: ${errorMessage(error)}` } };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return { ok: false, failure: { kind: "config-parse-error", message: `invalid JSON in config ${path}: ${errorMessage(error)}` } };
  }

  const result = rendererConfigSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, failure: { kind: "config-parse-error", message: `config ${path} must be a JSON object` } };
  }
  return { ok: true, config: result.data };
}
