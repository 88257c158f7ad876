import { Hono, type Context } from "hono";
import { respondWithError } from "../middleware/error-response";
import {
  formatSummary,
  summarizeLaserEgg,
  summarizeSensedge,
} from "../services/sensor-summary";

// Anything that can fetch raw device documents; KaiterraClient in production
export interface DeviceSource {
  getLaserEgg(id: string): Promise<unknown>;
  getSensedge(id: string): Promise<unknown>;
}

// Re-serializes the decoded device document as the response body
function jsonText(c: Context, data: unknown) {
  return c.body(JSON.stringify(data), 200, {
    "Content-Type": "application/json; charset=UTF-8",
  });
}

export function createSensorRoutes(
  devices: DeviceSource,
  now: () => Date = () => new Date()
) {
  const app = new Hono();

  // Raw Laser Egg document as returned by the API
  app.get("/lasereggs/:id", async (c) => {
    const id = c.req.param("id");
    try {
      console.log(`API request received for Laser Egg ${id}`);
      const data = await devices.getLaserEgg(id);
      return jsonText(c, data);
    } catch (error) {
      return respondWithError(c, error, `fetching Laser Egg ${id}`);
    }
  });

  app.get("/lasereggs/:id/summary", async (c) => {
    const id = c.req.param("id");
    try {
      const summary = summarizeLaserEgg(await devices.getLaserEgg(id), now());
      return c.json({ ...summary, lines: formatSummary(summary) });
    } catch (error) {
      return respondWithError(c, error, `summarizing Laser Egg ${id}`);
    }
  });

  app.get("/sensedges/:id", async (c) => {
    const id = c.req.param("id");
    try {
      console.log(`API request received for Sensedge ${id}`);
      const data = await devices.getSensedge(id);
      return jsonText(c, data);
    } catch (error) {
      return respondWithError(c, error, `fetching Sensedge ${id}`);
    }
  });

  app.get("/sensedges/:id/summary", async (c) => {
    const id = c.req.param("id");
    try {
      const summary = summarizeSensedge(await devices.getSensedge(id), now());
      return c.json({ ...summary, lines: formatSummary(summary) });
    } catch (error) {
      return respondWithError(c, error, `summarizing Sensedge ${id}`);
    }
  });

  return app;
}
