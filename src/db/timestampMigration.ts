/**
 * Converts power.timestamp from free-form text to a native TIMESTAMP.
 *
 * The conversion goes through a helper column so that a value which does
 * not parse fails the backfill before the column type is touched:
 *  1. add a nullable TIMESTAMP column `t`
 *  2. backfill `t` from the text column
 *  3. change the column type, converting from `t`
 *  4. drop `t`
 *
 * All four steps share one transaction. Writers must be quiesced while it runs.
 */
import { sql, type SQL } from "drizzle-orm";
import type { Database } from "./index.js";
import { power } from "./schema.js";
import { describeColumn } from "./introspection.js";

export type MigrationStep = "inspect" | "add-column" | "backfill" | "alter-type" | "drop-column";

export const NATIVE_TIMESTAMP_TYPE = "timestamp without time zone";

export class MigrationError extends Error {
  readonly step: MigrationStep;

  constructor(step: MigrationStep, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Timestamp migration failed at step "${step}": ${reason}`, { cause });
    this.name = "MigrationError";
    this.step = step;
  }
}

export interface MigrationOptions {
  // Called before each conversion step runs
  onStep?: (step: MigrationStep) => void;
}

export interface MigrationResult {
  applied: boolean;
  rowsBackfilled: number;
  steps: MigrationStep[];
}

const STEPS: ReadonlyArray<{ step: MigrationStep; statement: SQL }> = [
  {
    step: "add-column",
    statement: sql`ALTER TABLE power ADD COLUMN t TIMESTAMP NULL`,
  },
  {
    step: "backfill",
    statement: sql`UPDATE power SET t = "timestamp"::TIMESTAMP`,
  },
  {
    step: "alter-type",
    statement: sql`ALTER TABLE power ALTER COLUMN "timestamp" TYPE TIMESTAMP USING t`,
  },
  {
    step: "drop-column",
    statement: sql`ALTER TABLE power DROP COLUMN t`,
  },
];

export async function migratePowerTimestamps(
  db: Database,
  options: MigrationOptions = {}
): Promise<MigrationResult> {
  return db.transaction(async (tx) => {
    const column = await describeColumn(tx, "power", "timestamp");
    if (!column) {
      throw new MigrationError(
        "inspect",
        new Error("column power.timestamp does not exist; reset the schema first")
      );
    }
    if (column.dataType === NATIVE_TIMESTAMP_TYPE) {
      return { applied: false, rowsBackfilled: 0, steps: [] };
    }

    const [{ count }] = await tx
      .select({ count: sql<number>`count(*)`.mapWith(Number) })
      .from(power);

    const done: MigrationStep[] = [];
    for (const { step, statement } of STEPS) {
      options.onStep?.(step);
      try {
        await tx.execute(statement);
      } catch (error) {
        throw new MigrationError(step, error);
      }
      done.push(step);
    }

    return { applied: true, rowsBackfilled: count, steps: done };
  });
}
