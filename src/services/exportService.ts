import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Database } from "../db/index.js";
import { getHourlyPower, type HourlyPower } from "./powerService.js";

export function groupByDevice(rows: HourlyPower[]): Map<string, HourlyPower[]> {
  const grouped = new Map<string, HourlyPower[]>();
  for (const row of rows) {
    const bucket = grouped.get(row.deviceId);
    if (bucket) {
      bucket.push(row);
    } else {
      grouped.set(row.deviceId, [row]);
    }
  }
  return grouped;
}

// hour and power never contain separators, so no quoting is needed
export function toCsv(rows: HourlyPower[]): string {
  const lines = ["hour,power", ...rows.map((r) => `${r.hour},${r.power}`)];
  return lines.join("\n") + "\n";
}

// e.g. "2024-01-01T12:30 d1.txt" (UTC, minute precision). The id is
// percent-encoded so distinct ids never share a file.
export function exportFileName(deviceId: string, now: Date): string {
  const stamp = now.toISOString().slice(0, 16);
  return `${stamp} ${encodeURIComponent(deviceId)}.txt`;
}

// Write one hour,power file per device; returns the written paths
export async function exportHourlyPower(
  db: Database,
  outDir: string,
  now: Date = new Date()
): Promise<string[]> {
  const rows = await getHourlyPower(db);
  await mkdir(outDir, { recursive: true });

  const written: string[] = [];
  for (const [deviceId, deviceRows] of groupByDevice(rows)) {
    const filePath = path.join(outDir, exportFileName(deviceId, now));
    await writeFile(filePath, toCsv(deviceRows), "utf-8");
    written.push(filePath);
  }
  return written;
}
