import { mkdir, mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import cors from "cors";
import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import {
  DEFAULT_OUTPUT_NAME,
  DIAGRAM_EXTENSION,
  EXAMPLES,
  describeFailure,
  ensureExtension,
  errorMessage,
  replaceExtension,
  secureFilename,
  type ConversionResult,
  type RendererConfig
} from "@mmdpng/core";
import type { MermaidConverter } from "@mmdpng/render";

export const MAX_CONTENT_LENGTH = 16 * 1024 * 1024;

export type AppOptions = {
  converter: MermaidConverter;
  uploadsDir: string;
  outputsDir: string;
  onLog?: (message: string) => void;
};

const configSchema = z.record(z.unknown());

const convertBodySchema = z.object({
  mermaid_code: z.string(),
  config: configSchema.nullish(),
  filename: z.string().nullish()
});

const INDEX_HTML = fileURLToPath(new URL("../public/index.html", import.meta.url));

export function createApp(options: AppOptions): express.Express {
  const { converter, uploadsDir, outputsDir } = options;
  const app = express();
  const upload = multer({ dest: uploadsDir, limits: { fileSize: MAX_CONTENT_LENGTH } });

  app.use(cors());
  app.use(express.json({ limit: MAX_CONTENT_LENGTH }));

  app.get("/", (_req, res) => {
    res.sendFile(INDEX_HTML);
  });

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", mermaid_cli_available: converter.available });
  });

  app.get(
    "/api/check-dependencies",
    asyncHandler(async (_req, res) => {
      const status = await converter.checkDependencies();
      res.json({ dependencies_ok: status.ok, mermaid_cli: status.cli });
    })
  );

  app.post(
    "/api/convert",
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      if (!isRecord(body) || body.mermaid_code === undefined || body.mermaid_code === null || isBlank(body.mermaid_code)) {
        res.status(400).json({ error: "Missing mermaid_code in request" });
        return;
      }
      const parsed = convertBodySchema.safeParse(body);
      if (!parsed.success) {
        res.status(400).json({ error: `Invalid request: ${formatIssues(parsed.error)}` });
        return;
      }

      const { mermaid_code: source, config, filename: requested } = parsed.data;
      const filename = ensureExtension(secureFilename(requested ?? DEFAULT_OUTPUT_NAME) || DEFAULT_OUTPUT_NAME, ".png");
      const payload = await convertInRequestDir(outputsDir, filename, (outputPath) =>
        converter.convert(source, outputPath, config ?? undefined)
      );
      if (!payload.ok) {
        options.onLog?.(`conversion failed: ${payload.detail}`);
        res.status(500).json({ success: false, error: "Conversion failed" });
        return;
      }
      res.json({
        success: true,
        image_data: payload.imageData,
        filename,
        message: "Conversion successful",
        degraded: payload.degraded
      });
    })
  );

  app.post(
    "/api/convert-file",
    upload.single("file"),
    asyncHandler(async (req, res) => {
      const file = req.file;
      if (!file) {
        res.status(400).json({ error: "No file uploaded" });
        return;
      }
      // The upload is removed before the reply goes out.
      const reply = await convertUpload(file, req.body).finally(() => rm(file.path, { force: true }));
      res.status(reply.status).json(reply.body);
    })
  );

  app.get("/api/examples", (_req, res) => {
    res.json(EXAMPLES);
  });

  app.use((req, res) => {
    res.status(404).json({ error: `Cannot ${req.method} ${req.path}` });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: err.message });
      return;
    }
    const status = httpStatus(err);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ error: errorMessage(err) });
      return;
    }
    options.onLog?.(`unhandled error: ${errorMessage(err)}`);
    res.status(500).json({ success: false, error: errorMessage(err) });
  });

  async function convertUpload(file: Express.Multer.File, body: unknown): Promise<Reply> {
    if (!file.originalname.toLowerCase().endsWith(DIAGRAM_EXTENSION)) {
      return { status: 400, body: { error: `File must have ${DIAGRAM_EXTENSION} extension` } };
    }

    const config = parseConfigField(isRecord(body) ? body.config : undefined);
    const filename = replaceExtension(secureFilename(file.originalname) || "diagram.mmd", ".png");
    const payload = await convertInRequestDir(outputsDir, filename, (outputPath) =>
      converter.convertFile(file.path, outputPath, config)
    );
    if (!payload.ok) {
      options.onLog?.(`file conversion failed: ${payload.detail}`);
      return { status: 500, body: { success: false, error: "File conversion failed" } };
    }
    return {
      status: 200,
      body: {
        success: true,
        image_data: payload.imageData,
        filename,
        message: "File conversion successful",
        degraded: payload.degraded
      }
    };
  }

  return app;
}

export async function ensureAppDirs(options: Pick<AppOptions, "uploadsDir" | "outputsDir">): Promise<void> {
  await mkdir(options.uploadsDir, { recursive: true });
  await mkdir(options.outputsDir, { recursive: true });
}

type Reply = { status: number; body: Record<string, unknown> };

type ConvertPayload =
  | { ok: true; imageData: string; degraded: boolean }
  | { ok: false; detail: string };

// Each request renders into its own directory, so equal filenames never collide.
async function convertInRequestDir(
  outputsDir: string,
  filename: string,
  convert: (outputPath: string) => Promise<ConversionResult>
): Promise<ConvertPayload> {
  await mkdir(outputsDir, { recursive: true });
  const dir = await mkdtemp(join(outputsDir, "req-"));
  try {
    const result = await convert(join(dir, filename));
    if (!result.success) {
      return { ok: false, detail: describeFailure(result.error) };
    }
    const bytes = await readFile(result.outputPath);
    return { ok: true, imageData: bytes.toString("base64"), degraded: result.degraded };
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function parseConfigField(value: unknown): RendererConfig | undefined {
  if (typeof value !== "string" || value.trim().length === 0) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return undefined;
  }
  const result = configSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join(", ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  return typeof value === "string" && value.trim().length === 0;
}

function httpStatus(error: unknown): number | undefined {
  if (isRecord(error) && typeof error.status === "number") return error.status;
  return undefined;
}
