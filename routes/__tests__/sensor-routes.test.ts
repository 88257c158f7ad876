import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { AxiosError } from "axios";

import { createSensorRoutes, type DeviceSource } from "../sensor-routes";
import { ConfigError, KaiterraApiError } from "../../services/errors";

const NOW = new Date("2024-03-01T08:31:00Z");

const LASER_EGG = {
  id: "egg-1",
  "info.aqi": { ts: "2024-03-01T08:30:00Z", data: { pm25: 12 } },
};

const SENSEDGE = {
  id: "edge-1",
  latest: { ts: "2024-03-01T08:30:30Z", "km100.rpm25c": 4, "km102.rtvoc (ppb)": 90 },
};

function fakeDevices(overrides: Partial<DeviceSource> = {}): DeviceSource {
  return {
    getLaserEgg: async () => LASER_EGG,
    getSensedge: async () => SENSEDGE,
    ...overrides,
  };
}

describe("sensor routes", () => {
  it("passes the Laser Egg document through", async () => {
    const requested: string[] = [];
    const app = createSensorRoutes(
      fakeDevices({
        getLaserEgg: async (id) => {
          requested.push(id);
          return LASER_EGG;
        },
      }),
      () => NOW
    );

    const res = await app.request("/lasereggs/egg-1");

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), LASER_EGG);
    assert.deepEqual(requested, ["egg-1"]);
  });

  it("summarizes a Laser Egg", async () => {
    const app = createSensorRoutes(fakeDevices(), () => NOW);
    const res = await app.request("/lasereggs/egg-1/summary");

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
      device: "laser-egg",
      hasData: true,
      updatedAt: "2024-03-01T08:30:00Z",
      updatedSecondsAgo: 60,
      pm25: 12,
      lines: ["Laser Egg data returned:", "  Updated: 60 seconds ago", "  PM2.5:   12 µg/m³"],
    });
  });

  it("summarizes a Sensedge", async () => {
    const app = createSensorRoutes(fakeDevices(), () => NOW);
    const res = await app.request("/sensedges/edge-1/summary");

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
      device: "sensedge",
      hasData: true,
      updatedAt: "2024-03-01T08:30:30Z",
      updatedSecondsAgo: 30,
      pm25: 4,
      tvoc: 90,
      lines: [
        "Sensedge data returned:",
        "  Updated: 30 seconds ago",
        "  PM2.5:   4 µg/m³",
        "  TVOC:    90 ppb",
      ],
    });
  });

  it("maps an upstream 404 to 404", async () => {
    const app = createSensorRoutes(
      fakeDevices({
        getSensedge: async () => {
          throw new KaiterraApiError(404, "https://api.kaiterra.com/v1/sensedges/x?key=***", "");
        },
      })
    );
    const res = await app.request("/sensedges/x");

    assert.equal(res.status, 404);
    assert.deepEqual(await res.json(), { error: "Device not found" });
  });

  it("maps other upstream failures to 502", async () => {
    const app = createSensorRoutes(
      fakeDevices({
        getLaserEgg: async () => {
          throw new KaiterraApiError(401, "https://api.kaiterra.com/v1/lasereggs/x?key=***", "bad key");
        },
      })
    );
    const res = await app.request("/lasereggs/x/summary");

    assert.equal(res.status, 502);
    assert.deepEqual(await res.json(), {
      error: "Kaiterra API request failed",
      details: { status: 401, body: "bad key" },
    });
  });

  it("reports an unexpected document as 502", async () => {
    const app = createSensorRoutes(fakeDevices({ getLaserEgg: async () => null }));
    const res = await app.request("/lasereggs/x/summary");

    assert.equal(res.status, 502);
    assert.match(await res.text(), /^\{"error":"Unexpected Laser Egg response",/);
  });

  function failingLaserEgg(error: unknown) {
    return createSensorRoutes(
      fakeDevices({
        getLaserEgg: async () => {
          throw error;
        },
      }),
      () => NOW
    );
  }

  it("reports a configuration error as 500", async () => {
    const app = failingLaserEgg(
      new ConfigError("HMAC secret key must be an even-length hex string", [
        "KAITERRA_HMAC_SECRET_KEY",
      ])
    );
    const res = await app.request("/lasereggs/x");

    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), {
      error: "HMAC secret key must be an even-length hex string",
      details: ["KAITERRA_HMAC_SECRET_KEY"],
    });
  });

  it("reports a malformed reading timestamp as 502", async () => {
    const app = createSensorRoutes(
      fakeDevices({ getSensedge: async () => ({ latest: { ts: "yesterday" } }) }),
      () => NOW
    );
    const res = await app.request("/sensedges/x/summary");

    assert.equal(res.status, 502);
    assert.deepEqual(await res.json(), {
      error: "Timestamp is not in YYYY-MM-DDTHH:MM:SSZ format: yesterday",
    });
  });

  it("reports invalid JSON from the API as 502", async () => {
    const app = failingLaserEgg(new SyntaxError("Unexpected token < in JSON"));
    const res = await app.request("/lasereggs/x");

    assert.equal(res.status, 502);
    assert.deepEqual(await res.json(), { error: "Kaiterra API returned invalid JSON" });
  });

  it("reports a timeout as 504", async () => {
    for (const code of ["ECONNABORTED", "ETIMEDOUT"]) {
      const app = failingLaserEgg(new AxiosError("timeout of 10000ms exceeded", code));
      const res = await app.request("/lasereggs/x/summary");

      assert.equal(res.status, 504, code);
      assert.deepEqual(await res.json(), { error: "Kaiterra API timed out" });
    }
  });

  it("reports a network failure as 502", async () => {
    const app = failingLaserEgg(new AxiosError("connect ECONNREFUSED", "ECONNREFUSED"));
    const res = await app.request("/lasereggs/x");

    assert.equal(res.status, 502);
    assert.deepEqual(await res.json(), {
      error: "Failed to reach Kaiterra API",
      details: "connect ECONNREFUSED",
    });
  });

  it("reports anything else as 500", async () => {
    const app = failingLaserEgg(new Error("boom"));
    const res = await app.request("/lasereggs/x");

    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), { error: "Internal Server Error", details: "boom" });
  });
});
