import fs from "fs";
import csv from "csv-parser";
import { z } from "zod";
import type { Database } from "../db/index.js";
import { devices, power } from "../db/schema.js";

export interface ImportStats {
  rowsProcessed: number;
  rowsInserted: number;
  errors: string[];
}

const deviceRowSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  ipv6: z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : null)),
});

// Timestamps stay as text: readings load into the pre-migration layout
const powerRowSchema = z.object({
  id: z.string().trim().min(1),
  device_id: z.string().trim().min(1),
  timestamp: z.string().trim().min(1),
  power: z.coerce.number().finite(),
});

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Read a CSV file into header-keyed rows
export async function readCsv(filePath: string): Promise<Record<string, string>[]> {
  return new Promise((resolve, reject) => {
    const rows: Record<string, string>[] = [];

    fs.createReadStream(filePath)
      .on("error", reject)
      .pipe(csv())
      .on("data", (row: Record<string, string>) => {
        rows.push(row);
      })
      .on("end", () => resolve(rows))
      .on("error", reject);
  });
}

export async function importDevices(
  db: Database,
  rows: Record<string, string>[]
): Promise<ImportStats> {
  const stats: ImportStats = { rowsProcessed: 0, rowsInserted: 0, errors: [] };

  for (const [index, row] of rows.entries()) {
    stats.rowsProcessed++;
    const parsed = deviceRowSchema.safeParse(row);
    if (!parsed.success) {
      stats.errors.push(`Invalid device row ${index + 1}: ${parsed.error.issues[0].message}`);
      continue;
    }

    try {
      const inserted = await db
        .insert(devices)
        .values(parsed.data)
        .onConflictDoNothing()
        .returning({ id: devices.id });
      stats.rowsInserted += inserted.length;
    } catch (error) {
      stats.errors.push(`Error inserting device ${parsed.data.id}: ${describeError(error)}`);
    }
  }

  return stats;
}

export async function importReadings(
  db: Database,
  rows: Record<string, string>[]
): Promise<ImportStats> {
  const stats: ImportStats = { rowsProcessed: 0, rowsInserted: 0, errors: [] };

  for (const [index, row] of rows.entries()) {
    stats.rowsProcessed++;
    const parsed = powerRowSchema.safeParse(row);
    if (!parsed.success) {
      stats.errors.push(`Invalid reading row ${index + 1}: ${parsed.error.issues[0].message}`);
      continue;
    }

    const { id, device_id, timestamp, power: watts } = parsed.data;
    try {
      const inserted = await db
        .insert(power)
        .values({ id, deviceId: device_id, timestamp, power: watts })
        .onConflictDoNothing() // Skip duplicates
        .returning({ id: power.id });
      stats.rowsInserted += inserted.length;
    } catch (error) {
      stats.errors.push(`Error inserting reading ${id} for device ${device_id}: ${describeError(error)}`);
    }
  }

  return stats;
}
