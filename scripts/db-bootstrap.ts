import "dotenv/config";

import { readFile } from "node:fs/promises";
import path from "node:path";

import postgres from "postgres";

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function resolveDatabaseUrl(): string {
  return process.env.DATABASE_ADMIN_URL || required("DATABASE_URL");
}

function shouldResetSchema(): boolean {
  const value = process.env.DB_BOOTSTRAP_RESET;
  return value === "true" || value === "1";
}

const APP_TABLES = ["crawl_session_events", "variants", "products", "crawl_sessions"] as const;

async function resetAppTables(sql: postgres.Sql): Promise<void> {
  console.log("Reset flag detected. Dropping crawler tables...");

  for (const table of APP_TABLES) {
    await sql.unsafe(`drop table if exists "${table}" cascade`);
  }
}

async function main(): Promise<void> {
  const sql = postgres(resolveDatabaseUrl(), {
    max: 1,
    ssl: process.env.DATABASE_SSL_MODE === "disable" ? false : "require",
    prepare: process.env.DATABASE_PREPARE === "true"
  });

  const schemaPath = path.join(process.cwd(), "sql", "schema.sql");

  try {
    if (shouldResetSchema()) {
      await resetAppTables(sql);
    }

    console.log("Applying schema...");
    // Committed in-repo DDL; unsafe runs the multi-statement file as-is.
    await sql.unsafe(await readFile(schemaPath, "utf8"));

    console.log("Database bootstrap complete.");
  } finally {
    await sql.end({ timeout: 5 });
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
