import { and, asc, eq, sql } from "drizzle-orm";
import { integer, pgSchema, text } from "drizzle-orm/pg-core";
import type { Database } from "./index.js";

const informationSchema = pgSchema("information_schema");

const columns = informationSchema.table("columns", {
  tableSchema: text("table_schema").notNull(),
  tableName: text("table_name").notNull(),
  columnName: text("column_name").notNull(),
  ordinalPosition: integer("ordinal_position").notNull(),
  dataType: text("data_type").notNull(),
  isNullable: text("is_nullable").notNull(),
});

export interface ColumnInfo {
  name: string;
  dataType: string; // e.g. "text", "timestamp without time zone"
  nullable: boolean;
}

// Columns of a table in the current schema, in declaration order
export async function describeTable(db: Database, table: string): Promise<ColumnInfo[]> {
  const rows = await db
    .select({
      name: columns.columnName,
      dataType: columns.dataType,
      isNullable: columns.isNullable,
    })
    .from(columns)
    .where(and(eq(columns.tableSchema, sql`current_schema()`), eq(columns.tableName, table)))
    .orderBy(asc(columns.ordinalPosition));

  return rows.map((r) => ({
    name: r.name,
    dataType: r.dataType,
    nullable: r.isNullable === "YES",
  }));
}

export async function describeColumn(
  db: Database,
  table: string,
  column: string
): Promise<ColumnInfo | null> {
  const all = await describeTable(db, table);
  return all.find((c) => c.name === column) ?? null;
}
