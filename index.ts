import { createServer, type IncomingMessage } from "http";
import { createApp } from "./app";
import { loadConfig, loadEnvFile } from "./config/env";

function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks)));
    req.on("error", reject);
  });
}

export function startServer() {
  loadEnvFile();
  const config = loadConfig();
  const app = createApp({ config });

  console.log(`Server is starting on port ${config.port}...`);

  // Standard Node HTTP server handing each request to Hono's fetch handler
  const server = createServer(async (req, res) => {
    try {
      const url = new URL(
        req.url || "/",
        `http://${req.headers.host || "localhost"}`
      );
      const method = req.method || "GET";

      const headers = new Headers();
      Object.entries(req.headers).forEach(([key, value]) => {
        if (value)
          headers.set(key, Array.isArray(value) ? value.join(", ") : value);
      });

      const requestInit: RequestInit = { method, headers };
      if (!["GET", "HEAD"].includes(method)) {
        requestInit.body = await readBody(req);
      }

      const response = await app.fetch(new Request(url.toString(), requestInit));

      res.statusCode = response.status;
      response.headers.forEach((value, key) => {
        res.setHeader(key, value);
      });
      res.end(Buffer.from(await response.arrayBuffer()));
    } catch (error) {
      console.error("Server error:", error);

      res.statusCode = 500;
      res.setHeader("Content-Type", "application/json");
      res.end(
        JSON.stringify({
          error: "Internal Server Error",
          message: error instanceof Error ? error.message : String(error),
        })
      );
    }
  });

  server.listen(config.port, () => {
    console.log(`Server is running on http://localhost:${config.port}`);
  });
  return server;
}

// Only start the server if this file is executed directly
if (require.main === module) {
  startServer();
}
