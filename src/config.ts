import "dotenv/config";
import { z } from "zod";

const configSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: "DATABASE_URL is not set" })
    .min(1, "DATABASE_URL is not set"),
  EXPORT_DIR: z.string().min(1).default("./exports"),
});

export interface Config {
  databaseUrl: string;
  exportDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new Error(result.error.issues.map((issue) => issue.message).join("; "));
  }
  return {
    databaseUrl: result.data.DATABASE_URL,
    exportDir: result.data.EXPORT_DIR,
  };
}
