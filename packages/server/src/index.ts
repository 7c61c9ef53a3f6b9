import type { Server } from "node:http";

import { createApp, ensureAppDirs, type AppOptions } from "./app.js";

export { MAX_CONTENT_LENGTH, createApp, ensureAppDirs, type AppOptions } from "./app.js";

export type ServeOptions = AppOptions & {
  host: string;
  port: number;
};

export async function startServer(options: ServeOptions): Promise<Server> {
  await ensureAppDirs(options);
  const app = createApp(options);
  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host);
    server.once("listening", () => resolve(server));
    server.once("error", reject);
  });
}
