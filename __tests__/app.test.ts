import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { createApp } from "../app";
import type { AppConfig } from "../config/env";
import {
  API_BASE_URLS,
  API_KEY_STEPS,
  DASHBOARD_URL,
  EXAMPLE_SCRIPTS,
  TEST_DEVICES,
} from "../info/api-reference";
import type { DeviceSource } from "../routes/sensor-routes";

const CONFIG: AppConfig = {
  apiBaseUrl: "https://api.kaiterra.com/v1/",
  credentials: { method: "url", apiKey: "test-key" },
  timeoutMs: 10000,
  corsOrigins: ["*"],
  port: 3001,
};

const devices: DeviceSource = {
  getLaserEgg: async () => ({ "info.aqi": { ts: "2024-03-01T08:30:00Z", data: { pm25: 3 } } }),
  getSensedge: async () => ({ latest: null }),
};

describe("createApp", () => {
  it("serves the API overview without secrets", async () => {
    const app = createApp({ config: CONFIG, devices });
    const res = await app.request("/api");

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
      apiBaseUrl: "https://api.kaiterra.com/v1/",
      authMethod: "url",
      regions: { ...API_BASE_URLS },
      dashboardUrl: DASHBOARD_URL,
      apiKeySteps: [...API_KEY_STEPS],
      exampleScripts: { ...EXAMPLE_SCRIPTS },
      testDevices: { ...TEST_DEVICES },
    });
  });

  it("includes the Postman collection when configured", async () => {
    const app = createApp({
      config: { ...CONFIG, postmanCollectionUrl: "https://example.test/collection" },
      devices,
    });
    const res = await app.request("/api");

    assert.match(await res.text(), /"postmanCollectionUrl":"https:\/\/example\.test\/collection"/);
  });

  it("mounts the device routes under /api", async () => {
    const app = createApp({
      config: CONFIG,
      devices,
      now: () => new Date("2024-03-01T08:30:10Z"),
    });
    const res = await app.request("/api/sensedges/edge-1/summary");

    assert.deepEqual(await res.json(), {
      device: "sensedge",
      hasData: false,
      lines: ["Sensedge hasn't uploaded any data yet"],
    });
  });

  it("mounts the auth preview under /api/auth", async () => {
    const app = createApp({ config: CONFIG, devices });
    const res = await app.request("/api/auth/preview", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ path: "/lasereggs/abc" }),
    });

    assert.deepEqual(await res.json(), {
      method: "url",
      url: "https://api.kaiterra.com/v1/lasereggs/abc?key=***",
      headers: {},
    });
  });

  it("sends CORS headers", async () => {
    const app = createApp({ config: CONFIG, devices });
    const res = await app.request("/", { headers: { Origin: "http://localhost:3000" } });

    assert.equal(res.status, 200);
    assert.equal(res.headers.get("access-control-allow-origin"), "*");
    assert.deepEqual(await res.json(), { message: "Kaiterra REST v1 gateway" });
  });
});
