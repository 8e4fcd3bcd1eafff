/**
 * Drop and recreate the devices and power tables.
 * Usage: npm run db:reset -- --yes
 *
 * Destructive: every device and reading is discarded.
 */

import { loadConfig } from "../config.js";
import { connect } from "../db/index.js";
import { resetSchema } from "../db/ddl.js";
import { hasFlag } from "./args.js";

async function reset() {
  if (!hasFlag("yes")) {
    console.error("Refusing to reset without --yes: this drops all devices and readings.");
    process.exit(1);
  }

  const { db, close } = connect(loadConfig().databaseUrl);
  try {
    console.log("🧹 Dropping and recreating devices and power...");
    await resetSchema(db);
    console.log("✅ Schema reset complete (power.timestamp is TEXT until migrated)");
  } finally {
    await close();
  }
}

reset().catch((error) => {
  console.error("❌ Reset failed:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
