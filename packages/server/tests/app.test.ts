import assert from "node:assert/strict";
import { mkdtempSync, readdirSync } from "node:fs";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, before, test } from "node:test";
import type { ConversionResult } from "@mmdpng/core";
import { MermaidConverter } from "@mmdpng/render";
import { createApp, ensureAppDirs } from "../src/app.js";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

const root = mkdtempSync(join(tmpdir(), "mmdpng-server-"));
const uploadsDir = join(root, "uploads");
const outputsDir = join(root, "outputs");
const logs: string[] = [];
let server: Server;
let baseUrl = "";

class UnrenderableConverter extends MermaidConverter {
  override async convert(_source: string, outputPath: string): Promise<ConversionResult> {
    return {
      success: false,
      outputPath,
      error: { kind: "placeholder-render-failure", message: "placeholder rendering requires dependency 'sharp'" },
      warnings: ["mermaid CLI not available"]
    };
  }
}

async function listen(app: ReturnType<typeof createApp>): Promise<{ server: Server; url: string }> {
  const listening = await new Promise<Server>((resolve) => {
    const started = app.listen(0, "127.0.0.1", () => resolve(started));
  });
  const address: AddressInfo | string | null = listening.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  return { server: listening, url: `http://127.0.0.1:${address.port}` };
}

function close(target: Server): Promise<void> {
  return new Promise((resolve, reject) => target.close((error) => (error ? reject(error) : resolve())));
}

before(async () => {
  await ensureAppDirs({ uploadsDir, outputsDir });
  const converter = new MermaidConverter({ active: null, verdicts: [] });
  const app = createApp({ converter, uploadsDir, outputsDir, onLog: (message) => logs.push(message) });
  ({ server, url: baseUrl } = await listen(app));
});

after(async () => {
  await close(server);
});

function postJson(path: string, body: string): Promise<Response> {
  return fetch(`${baseUrl}${path}`, { method: "POST", headers: { "content-type": "application/json" }, body });
}

async function jsonBody(response: Response): Promise<Record<string, unknown>> {
  const body: unknown = await response.json();
  if (!isRecord(body)) throw new Error("expected a JSON object");
  return body;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function decodedBytes(base64: unknown): number[] {
  assert.equal(typeof base64, "string");
  return Array.from(Buffer.from(String(base64), "base64").subarray(0, 8));
}

test("GET / serves the page", async () => {
  const response = await fetch(`${baseUrl}/`);
  assert.equal(response.status, 200);
  assert.ok((await response.text()).includes("<title>mmdpng</title>"));
});

test("GET /api/health reports CLI availability", async () => {
  const response = await fetch(`${baseUrl}/api/health`);
  assert.equal(response.status, 200);
  assert.deepEqual(await jsonBody(response), { status: "ok", mermaid_cli_available: false });
});

test("GET /api/check-dependencies without a CLI", async () => {
  const response = await fetch(`${baseUrl}/api/check-dependencies`);
  assert.deepEqual(await jsonBody(response), { dependencies_ok: false, mermaid_cli: null });
});

test("GET /api/examples lists the examples", async () => {
  const response = await fetch(`${baseUrl}/api/examples`);
  const body = await jsonBody(response);
  assert.deepEqual(Object.keys(body), ["flowchart", "sequence", "class", "pie", "gitgraph"]);
  assert.equal(isRecord(body.pie) ? body.pie.name : undefined, "Pie chart");
});

test("POST /api/convert rejects a missing mermaid_code", async () => {
  const response = await postJson("/api/convert", "{}");
  assert.equal(response.status, 400);
  assert.deepEqual(await jsonBody(response), { error: "Missing mermaid_code in request" });
});

test("POST /api/convert rejects blank mermaid_code", async () => {
  const response = await postJson("/api/convert", JSON.stringify({ mermaid_code: "  \n" }));
  assert.equal(response.status, 400);
  assert.deepEqual(await jsonBody(response), { error: "Missing mermaid_code in request" });
});

test("POST /api/convert rejects wrongly typed fields", async () => {
  const response = await postJson("/api/convert", JSON.stringify({ mermaid_code: 42 }));
  assert.equal(response.status, 400);
  const body = await jsonBody(response);
  assert.ok(String(body.error).startsWith("Invalid request: mermaid_code"));
});

test("POST /api/convert rejects malformed JSON", async () => {
  const response = await postJson("/api/convert", "{not json");
  assert.equal(response.status, 400);
});

test("POST /api/convert returns a placeholder image with a safe filename", async () => {
  const response = await postJson(
    "/api/convert",
    JSON.stringify({ mermaid_code: "graph TD; A-->B", filename: "../x/my chart", config: { theme: "dark" } })
  );
  assert.equal(response.status, 200);
  const body = await jsonBody(response);
  assert.equal(body.success, true);
  assert.equal(body.filename, "x_my_chart.png");
  assert.equal(body.message, "Conversion successful");
  assert.equal(body.degraded, true);
  assert.deepEqual(decodedBytes(body.image_data), PNG_SIGNATURE);
  assert.deepEqual(readdirSync(outputsDir), []);
});

test("POST /api/convert defaults the filename", async () => {
  const response = await postJson("/api/convert", JSON.stringify({ mermaid_code: "graph TD; A-->B", filename: null }));
  const body = await jsonBody(response);
  assert.equal(body.filename, "diagram.png");
});

test("POST /api/convert answers 500 when no image can be produced", async () => {
  const failRoot = mkdtempSync(join(tmpdir(), "mmdpng-server-fail-"));
  const failLogs: string[] = [];
  const app = createApp({
    converter: new UnrenderableConverter({ active: null, verdicts: [] }),
    uploadsDir: join(failRoot, "uploads"),
    outputsDir: join(failRoot, "outputs"),
    onLog: (message) => failLogs.push(message)
  });
  const failing = await listen(app);
  try {
    const response = await fetch(`${failing.url}/api/convert`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ mermaid_code: "graph TD; A-->B" })
    });
    assert.equal(response.status, 500);
    assert.deepEqual(await jsonBody(response), { success: false, error: "Conversion failed" });
    assert.deepEqual(failLogs, ["conversion failed: placeholder-render-failure: placeholder rendering requires dependency 'sharp'"]);
    assert.deepEqual(readdirSync(join(failRoot, "outputs")), []);
  } finally {
    await close(failing.server);
  }
});

test("POST /api/convert-file requires a file", async () => {
  const form = new FormData();
  form.append("config", "{}");
  const response = await fetch(`${baseUrl}/api/convert-file`, { method: "POST", body: form });
  assert.equal(response.status, 400);
  assert.deepEqual(await jsonBody(response), { error: "No file uploaded" });
});

test("POST /api/convert-file requires the .mmd extension", async () => {
  const form = new FormData();
  form.append("file", new Blob(["graph TD; A-->B"]), "notes.txt");
  const response = await fetch(`${baseUrl}/api/convert-file`, { method: "POST", body: form });
  assert.equal(response.status, 400);
  assert.deepEqual(await jsonBody(response), { error: "File must have .mmd extension" });
  assert.deepEqual(readdirSync(uploadsDir), []);
});

test("POST /api/convert-file converts an upload and ignores malformed config", async () => {
  const form = new FormData();
  form.append("file", new Blob(["graph TD; A-->B"]), "flow chart.mmd");
  form.append("config", "{broken");
  const response = await fetch(`${baseUrl}/api/convert-file`, { method: "POST", body: form });
  assert.equal(response.status, 200);
  const body = await jsonBody(response);
  assert.equal(body.success, true);
  assert.equal(body.filename, "flow_chart.png");
  assert.equal(body.message, "File conversion successful");
  assert.deepEqual(decodedBytes(body.image_data), PNG_SIGNATURE);
  assert.deepEqual(readdirSync(uploadsDir), []);
  assert.deepEqual(readdirSync(outputsDir), []);
});

test("unknown routes return JSON 404", async () => {
  const response = await fetch(`${baseUrl}/api/nope`);
  assert.equal(response.status, 404);
  assert.deepEqual(await jsonBody(response), { error: "Cannot GET /api/nope" });
});
