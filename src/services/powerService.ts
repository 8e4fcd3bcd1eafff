import { and, asc, eq, gte, lt, sql, type SQL } from "drizzle-orm";
import { z } from "zod";
import type { Database } from "../db/index.js";
import { power, type NewPowerReading, type PowerReading } from "../db/schema.js";

export interface HourlyPower {
  deviceId: string;
  hour: string; // "YYYY-MM-DD HH:00:00", or "infinity"/"-infinity" as stored
  power: number;
}

const timestampText = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/, "expected YYYY-MM-DD HH:MM[:SS]");

export const hourlyPowerFilterSchema = z.object({
  deviceId: z.string().min(1).optional(),
  from: timestampText.optional(), // inclusive
  to: timestampText.optional(), // exclusive
});

export type HourlyPowerFilter = z.infer<typeof hourlyPowerFilterSchema>;

// Insert a single reading; an unknown device is rejected by the foreign key
export async function recordReading(db: Database, reading: NewPowerReading): Promise<void> {
  await db.insert(power).values(reading);
}

export async function listReadings(db: Database, deviceId: string): Promise<PowerReading[]> {
  return db
    .select()
    .from(power)
    .where(eq(power.deviceId, deviceId))
    .orderBy(asc(power.timestamp), asc(power.id));
}

/**
 * Sum of power per device and hour. Only (device, hour) pairs with at least
 * one reading produce a row.
 *
 * Needs the native timestamp column: against the text layout Postgres has
 * no `date_trunc(unknown, text)` and the query is rejected.
 */
export async function getHourlyPower(
  db: Database,
  filter: HourlyPowerFilter = {}
): Promise<HourlyPower[]> {
  const { deviceId, from, to } = hourlyPowerFilterSchema.parse(filter);

  const conditions: SQL[] = [];
  if (deviceId) {
    conditions.push(eq(power.deviceId, deviceId));
  }
  if (from) {
    conditions.push(gte(power.timestamp, from));
  }
  if (to) {
    conditions.push(lt(power.timestamp, to));
  }

  const hour = sql<string>`date_trunc('hour', ${power.timestamp})`.mapWith(power.timestamp);

  return db
    .select({
      deviceId: power.deviceId,
      hour,
      power: sql<number>`sum(${power.power})`.mapWith(Number),
    })
    .from(power)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .groupBy(power.deviceId, hour)
    .orderBy(asc(power.deviceId), asc(hour));
}
