import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Pool } from "pg";
import { createLogger, errorMessage } from "../src/infra/logger.js";

const logger = createLogger("info", "momo-db-migrate");

async function main(): Promise<void> {
  const connectionString = process.env.MOMO_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("MOMO_POSTGRES_URL is required.");
  }

  const migrationPath = resolve(process.cwd(), "sql", "001_transactions.sql");
  const sql = await readFile(migrationPath, "utf8");
  const pool = new Pool({ connectionString });

  try {
    await pool.query(sql);
    logger.info({ migration: migrationPath }, "db:migrate OK");
  } finally {
    await pool.end();
  }
}

try {
  await main();
} catch (error) {
  logger.error({ err: errorMessage(error) }, "db:migrate failed");
  process.exitCode = 1;
}
