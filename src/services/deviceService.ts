import { asc, eq } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { devices, power, type Device, type NewDevice, type PowerReading } from "../db/schema.js";

export interface DeviceWithReadings extends Device {
  readings: PowerReading[];
}

// Devices are provisioned before any reading references them
export async function upsertDevice(db: Database, device: NewDevice): Promise<void> {
  await db
    .insert(devices)
    .values(device)
    .onConflictDoUpdate({
      target: devices.id,
      set: { name: device.name, ipv6: device.ipv6 ?? null },
    });
}

export async function listDevices(db: Database): Promise<Device[]> {
  return db.query.devices.findMany({
    orderBy: asc(devices.id),
  });
}

export async function getDeviceWithReadings(
  db: Database,
  id: string
): Promise<DeviceWithReadings | null> {
  const device = await db.query.devices.findFirst({
    where: eq(devices.id, id),
    with: {
      readings: {
        orderBy: [asc(power.timestamp), asc(power.id)],
      },
    },
  });

  return device ?? null;
}
