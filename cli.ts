#!/usr/bin/env node
import { parseArgs } from "node:util";
import { loadConfig, loadEnvFile } from "./config/env";
import { TEST_DEVICES } from "./info/api-reference";
import type { DeviceSource } from "./routes/sensor-routes";
import { createClientFromConfig } from "./services/kaiterra-client";
import {
  formatSummary,
  summarizeLaserEgg,
  summarizeSensedge,
} from "./services/sensor-summary";

export interface CliTargets {
  laserEggs: string[];
  sensedges: string[];
}

const USAGE = `Usage: kaiterra-summary [--laser-egg <id>]... [--sensedge <id>]...

Prints the latest reading of each device. Without arguments the public
test devices are queried.`;

export function parseCliArgs(argv: string[]): CliTargets | "help" {
  const { values } = parseArgs({
    args: argv,
    options: {
      "laser-egg": { type: "string", multiple: true },
      sensedge: { type: "string", multiple: true },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) return "help";

  const laserEggs = values["laser-egg"] ?? [];
  const sensedges = values.sensedge ?? [];
  if (laserEggs.length === 0 && sensedges.length === 0) {
    return {
      laserEggs: [TEST_DEVICES.laserEgg],
      sensedges: [TEST_DEVICES.sensedge],
    };
  }
  return { laserEggs, sensedges };
}

export async function summarizeDevices(
  devices: DeviceSource,
  targets: CliTargets,
  print: (line: string) => void = console.log,
  now: () => Date = () => new Date()
) {
  for (const id of targets.laserEggs) {
    const summary = summarizeLaserEgg(await devices.getLaserEgg(id), now());
    formatSummary(summary).forEach((line) => print(line));
    print("");
  }
  for (const id of targets.sensedges) {
    const summary = summarizeSensedge(await devices.getSensedge(id), now());
    formatSummary(summary).forEach((line) => print(line));
    print("");
  }
}

async function main() {
  const targets = parseCliArgs(process.argv.slice(2));
  if (targets === "help") {
    console.log(USAGE);
    return;
  }
  loadEnvFile();
  const client = createClientFromConfig(loadConfig());
  await summarizeDevices(client, targets);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
