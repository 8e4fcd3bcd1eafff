/**
 * Seed script to load the sample devices and readings
 * Usage: npm run seed
 *
 * Loads into the pre-migration layout; run db:migrate afterwards.
 */

import path from "path";
import { fileURLToPath } from "url";
import { loadConfig } from "../config.js";
import { connect } from "../db/index.js";
import { importDevices, importReadings, readCsv } from "../services/csvIngestion.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

async function seed() {
  const { db, close } = connect(loadConfig().databaseUrl);
  try {
    const dataDir = path.join(__dirname, "../../data");

    console.log("🌱 Seeding database with sample data...");
    const deviceStats = await importDevices(db, await readCsv(path.join(dataDir, "devices.csv")));
    const readingStats = await importReadings(db, await readCsv(path.join(dataDir, "power.csv")));

    console.log("✅ Seeding complete!");
    console.log(`   Devices inserted: ${deviceStats.rowsInserted}/${deviceStats.rowsProcessed}`);
    console.log(`   Readings inserted: ${readingStats.rowsInserted}/${readingStats.rowsProcessed}`);

    const errors = [...deviceStats.errors, ...readingStats.errors];
    if (errors.length > 0) {
      console.log("⚠️  Errors encountered:");
      errors.forEach((err) => console.log(`   - ${err}`));
    }
  } finally {
    await close();
  }
}

seed().catch((error) => {
  console.error("❌ Seeding failed:", error);
  process.exit(1);
});
