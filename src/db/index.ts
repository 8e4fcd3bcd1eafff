import { drizzle } from "drizzle-orm/postgres-js";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import postgres from "postgres";

import * as schema from "./schema.js";

/**
 * Driver-agnostic handle on the telemetry schema. postgres-js backs it in
 * the scripts, PGlite in the tests.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface Connection {
  db: Database;
  close: () => Promise<void>;
}

export function connect(databaseUrl: string): Connection {
  // Migrations and resets run sequentially on one session
  const conn = postgres(databaseUrl, { max: 1 });
  return {
    db: drizzle(conn, { schema }),
    close: () => conn.end(),
  };
}
