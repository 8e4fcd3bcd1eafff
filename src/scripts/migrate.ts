/**
 * Convert power.timestamp from TEXT to TIMESTAMP.
 * Usage: npm run db:migrate
 *
 * Stop anything that writes to power before running this.
 */

import { loadConfig } from "../config.js";
import { connect } from "../db/index.js";
import { MigrationError, migratePowerTimestamps } from "../db/timestampMigration.js";

async function migrate() {
  const { db, close } = connect(loadConfig().databaseUrl);
  try {
    const result = await migratePowerTimestamps(db, {
      onStep: (step) => console.log(`   → ${step}`),
    });

    if (!result.applied) {
      console.log("Already migrated: power.timestamp is TIMESTAMP.");
    } else {
      console.log(`✅ Migrated power.timestamp, ${result.rowsBackfilled} row(s) converted`);
    }
  } finally {
    await close();
  }
}

migrate().catch((error) => {
  if (error instanceof MigrationError) {
    console.error(`❌ ${error.message}`);
    console.error("   The transaction was rolled back; power.timestamp is unchanged.");
  } else {
    console.error("❌ Migration failed:", error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
});
