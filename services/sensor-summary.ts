import { z } from "zod";
import { ResponseFormatError, TimestampFormatError } from "./errors";

export type DeviceKind = "laser-egg" | "sensedge";

const optionalReading = z.number().nullish();

// A device that has not reported yet may answer with an empty object
function emptyAsMissing(value: unknown): unknown {
  if (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 0
  ) {
    return null;
  }
  return value;
}

const LaserEggReadingSchema = z.object({
  ts: z.string(),
  data: z.object({ pm25: optionalReading }).passthrough(),
});

const SensedgeReadingSchema = z
  .object({
    ts: z.string(),
    "km100.rpm25c": optionalReading,
    "km102.rtvoc (ppb)": optionalReading,
  })
  .passthrough();

const LaserEggSchema = z
  .object({
    "info.aqi": z.preprocess(emptyAsMissing, LaserEggReadingSchema.nullish()),
  })
  .passthrough();

const SensedgeSchema = z
  .object({
    latest: z.preprocess(emptyAsMissing, SensedgeReadingSchema.nullish()),
  })
  .passthrough();

interface ReadingAge {
  hasData: true;
  updatedAt: string;
  updatedSecondsAgo: number;
  pm25: number | null;
}

export type LaserEggSummary =
  | ({ device: "laser-egg" } & ReadingAge)
  | { device: "laser-egg"; hasData: false };

export type SensedgeSummary =
  | ({ device: "sensedge"; tvoc: number | null } & ReadingAge)
  | { device: "sensedge"; hasData: false };

export type DeviceSummary = LaserEggSummary | SensedgeSummary;

const RFC3339_UTC = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

/**
 * Parses a second-precision UTC timestamp such as "2024-03-01T08:30:00Z".
 * Fractional seconds and numeric offsets are rejected.
 */
export function parseRfc3339Utc(ts: string): Date {
  const match = RFC3339_UTC.exec(ts);
  if (!match) {
    throw new TimestampFormatError(ts);
  }
  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map(Number);
  // setUTCFullYear keeps years 0-99 as written, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  // Overflowing fields roll forward, so compare them back
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new TimestampFormatError(ts);
  }
  return date;
}

function secondsSince(ts: string, now: Date): number {
  return Math.trunc((now.getTime() - parseRfc3339Utc(ts).getTime()) / 1000);
}

function parseDevice<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  label: string
): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ResponseFormatError(
      `Unexpected ${label} response`,
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function summarizeLaserEgg(data: unknown, now: Date = new Date()): LaserEggSummary {
  const device = parseDevice(LaserEggSchema, data, "Laser Egg");
  const latest = device["info.aqi"];
  if (!latest) {
    return { device: "laser-egg", hasData: false };
  }
  return {
    device: "laser-egg",
    hasData: true,
    updatedAt: latest.ts,
    updatedSecondsAgo: secondsSince(latest.ts, now),
    pm25: latest.data.pm25 ?? null,
  };
}

export function summarizeSensedge(data: unknown, now: Date = new Date()): SensedgeSummary {
  const device = parseDevice(SensedgeSchema, data, "Sensedge");
  const latest = device.latest;
  if (!latest) {
    return { device: "sensedge", hasData: false };
  }
  return {
    device: "sensedge",
    hasData: true,
    updatedAt: latest.ts,
    updatedSecondsAgo: secondsSince(latest.ts, now),
    pm25: latest["km100.rpm25c"] ?? null,
    tvoc: latest["km102.rtvoc (ppb)"] ?? null,
  };
}

function deviceLabel(device: DeviceKind): string {
  return device === "laser-egg" ? "Laser Egg" : "Sensedge";
}

function valueOrNoData(value: number | null, unit: string): string {
  return value === null ? "no data" : `${value} ${unit}`;
}

export function formatSummary(summary: DeviceSummary): string[] {
  const label = deviceLabel(summary.device);
  if (!summary.hasData) {
    return [`${label} hasn't uploaded any data yet`];
  }

  const lines = [
    `${label} data returned:`,
    `  Updated: ${summary.updatedSecondsAgo} seconds ago`,
    `  PM2.5:   ${valueOrNoData(summary.pm25, "µg/m³")}`,
  ];
  if (summary.device === "sensedge") {
    lines.push(`  TVOC:    ${valueOrNoData(summary.tvoc, "ppb")}`);
  }
  return lines;
}
