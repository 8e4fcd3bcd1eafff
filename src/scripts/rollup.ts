/**
 * Print the hourly power rollup.
 * Usage: npm run rollup -- [--device d1] [--from "2024-01-01 00:00"] [--to "2024-01-02 00:00"]
 */

import { loadConfig } from "../config.js";
import { connect } from "../db/index.js";
import { getHourlyPower, hourlyPowerFilterSchema } from "../services/powerService.js";
import { getFlag } from "./args.js";

async function rollup() {
  const filter = hourlyPowerFilterSchema.parse({
    deviceId: getFlag("device"),
    from: getFlag("from"),
    to: getFlag("to"),
  });

  const { db, close } = connect(loadConfig().databaseUrl);
  try {
    const rows = await getHourlyPower(db, filter);
    if (rows.length === 0) {
      console.log("No readings in range.");
      return;
    }

    const width = Math.max(...rows.map((r) => r.deviceId.length), "device".length);
    console.log(`${"device".padEnd(width)}  ${"hour".padEnd(19)}  power`);
    for (const r of rows) {
      console.log(`${r.deviceId.padEnd(width)}  ${r.hour.padEnd(19)}  ${r.power}`);
    }
  } finally {
    await close();
  }
}

rollup().catch((error) => {
  console.error("❌ Rollup failed:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
