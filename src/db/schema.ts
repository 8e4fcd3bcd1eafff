import { pgTable, text, timestamp, doublePrecision } from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";

// Device table - reference table of known devices, provisioned externally
export const devices = pgTable("devices", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  ipv6: text("ipv6"), // Optional network address
});

// Power table - one row per reading, owned by exactly one device.
// The timestamp column starts out as TEXT and becomes TIMESTAMP after the
// timestamp migration; string mode reads and writes both layouts.
export const power = pgTable("power", {
  id: text("id").primaryKey(),
  deviceId: text("device_id").notNull().references(() => devices.id),
  timestamp: timestamp("timestamp", { mode: "string" }).notNull(),
  power: doublePrecision("power").notNull(), // watts
});

// Define relations
export const devicesRelations = relations(devices, ({ many }) => ({
  readings: many(power),
}));

export const powerRelations = relations(power, ({ one }) => ({
  device: one(devices, {
    fields: [power.deviceId],
    references: [devices.id],
  }),
}));

// Type exports
export type Device = typeof devices.$inferSelect;
export type NewDevice = typeof devices.$inferInsert;
export type PowerReading = typeof power.$inferSelect;
export type NewPowerReading = typeof power.$inferInsert;
