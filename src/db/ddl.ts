import { sql } from "drizzle-orm";
import type { Database } from "./index.js";

// power references devices, so it is dropped first and created last
export const DROP_STATEMENTS = [
  "DROP TABLE IF EXISTS power",
  "DROP TABLE IF EXISTS devices",
] as const;

export const CREATE_STATEMENTS = [
  `CREATE TABLE devices (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    ipv6 TEXT
  )`,
  `CREATE TABLE power (
    id TEXT PRIMARY KEY,
    device_id TEXT NOT NULL,
    "timestamp" TEXT NOT NULL,
    power float8 NOT NULL,
    FOREIGN KEY(device_id) REFERENCES devices(id)
  )`,
] as const;

/**
 * Drop and recreate both tables with the text-timestamp layout.
 *
 * This is a reset, not an upgrade: every existing device and reading is
 * discarded. Run `migratePowerTimestamps` afterwards to get the
 * native timestamp column.
 */
export async function resetSchema(db: Database): Promise<void> {
  await db.transaction(async (tx) => {
    for (const statement of [...DROP_STATEMENTS, ...CREATE_STATEMENTS]) {
      await tx.execute(sql.raw(statement));
    }
  });
}
