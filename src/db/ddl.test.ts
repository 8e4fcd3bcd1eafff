import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { sql } from "drizzle-orm";
import { createTestDatabase, seedReadings, type TestDatabase } from "../test/utils/test-db.js";
import { CREATE_STATEMENTS, DROP_STATEMENTS, resetSchema } from "./ddl.js";
import { describeTable } from "./introspection.js";
import { devices, power } from "./schema.js";
import { recordReading } from "../services/powerService.js";

describe("resetSchema", () => {
  let testDb: TestDatabase;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetSchema(testDb.db);
  });

  it("creates devices with id, name and an optional ipv6", async () => {
    expect(await describeTable(testDb.db, "devices")).toEqual([
      { name: "id", dataType: "text", nullable: false },
      { name: "name", dataType: "text", nullable: false },
      { name: "ipv6", dataType: "text", nullable: true },
    ]);
  });

  it("creates power with a text timestamp before migration", async () => {
    expect(await describeTable(testDb.db, "power")).toEqual([
      { name: "id", dataType: "text", nullable: false },
      { name: "device_id", dataType: "text", nullable: false },
      { name: "timestamp", dataType: "text", nullable: false },
      { name: "power", dataType: "double precision", nullable: false },
    ]);
  });

  it("leaves the same empty tables when run twice", async () => {
    const first = {
      devices: await describeTable(testDb.db, "devices"),
      power: await describeTable(testDb.db, "power"),
    };

    await resetSchema(testDb.db);

    expect(await describeTable(testDb.db, "devices")).toEqual(first.devices);
    expect(await describeTable(testDb.db, "power")).toEqual(first.power);
    expect(await testDb.db.select().from(devices)).toEqual([]);
    expect(await testDb.db.select().from(power)).toEqual([]);
  });

  it("discards existing rows", async () => {
    await seedReadings(testDb.db, [["r1", "d1", "2024-01-01 10:15:00", 5]]);

    await resetSchema(testDb.db);

    expect(await testDb.db.select().from(devices)).toEqual([]);
    expect(await testDb.db.select().from(power)).toEqual([]);
  });

  it("rejects a reading for an unknown device", async () => {
    await expect(
      recordReading(testDb.db, {
        id: "r1",
        deviceId: "missing",
        timestamp: "2024-01-01 10:15:00",
        power: 1,
      })
    ).rejects.toThrow(/foreign key constraint/);

    expect(await testDb.db.select().from(power)).toEqual([]);
  });

  it("cannot create power before devices exists", async () => {
    for (const statement of DROP_STATEMENTS) {
      await testDb.db.execute(sql.raw(statement));
    }

    await expect(testDb.db.execute(sql.raw(CREATE_STATEMENTS[1]))).rejects.toThrow(
      'relation "devices" does not exist'
    );
  });
});
