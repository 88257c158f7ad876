import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { AppConfig } from "./config/env";
import { getApiOverview } from "./info/api-reference";
import { createAuthRoutes } from "./routes/auth-routes";
import { createSensorRoutes, type DeviceSource } from "./routes/sensor-routes";
import { createClientFromConfig } from "./services/kaiterra-client";

export interface AppOptions {
  config: AppConfig;
  // Defaults to a KaiterraClient built from config
  devices?: DeviceSource;
  now?: () => Date;
}

export function createApp({ config, devices, now }: AppOptions) {
  const app = new Hono();

  app.use(
    cors({
      origin: config.corsOrigins.includes("*") ? "*" : config.corsOrigins,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type"],
      maxAge: 86400,
    })
  );
  app.use(logger());

  app.get("/", (c) => {
    return c.json({ message: "Kaiterra REST v1 gateway" });
  });

  app.get("/api", (c) => {
    return c.json(
      getApiOverview({
        apiBaseUrl: config.apiBaseUrl,
        authMethod: config.credentials.method,
        postmanCollectionUrl: config.postmanCollectionUrl,
      })
    );
  });

  app.route("/api", createSensorRoutes(devices ?? createClientFromConfig(config), now));
  app.route(
    "/api/auth",
    createAuthRoutes({
      baseUrl: config.apiBaseUrl,
      credentials: config.credentials,
      now,
    })
  );

  return app;
}
