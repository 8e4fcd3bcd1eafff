/**
 * Write the hourly rollup as one hour,power file per device.
 * Usage: npm run export
 */

import { loadConfig } from "../config.js";
import { connect } from "../db/index.js";
import { exportHourlyPower } from "../services/exportService.js";

async function runExport() {
  const config = loadConfig();
  const { db, close } = connect(config.databaseUrl);
  try {
    const files = await exportHourlyPower(db, config.exportDir);
    console.log(`📦 Wrote ${files.length} file(s) to ${config.exportDir}`);
    files.forEach((file) => console.log(`   - ${file}`));
  } finally {
    await close();
  }
}

runExport().catch((error) => {
  console.error("❌ Export failed:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
