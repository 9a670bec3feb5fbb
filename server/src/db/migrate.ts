import fs from "fs";
import path from "path";
import { DATABASE_URL } from "../config.js";
import { createDatabase, createPool, type Database, type SqlExecutor } from "./index.js";

export const MIGRATIONS_DIR = process.env.MIGRATIONS_DIR || path.join(__dirname, "migrations");

async function ensureSchemaTable(query: SqlExecutor) {
  await query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getApplied(query: SqlExecutor): Promise<Set<string>> {
  const res = await query<{ filename: string }>("SELECT filename FROM schema_migrations");
  return new Set(res.rows.map((r) => r.filename));
}

/**
 * Apply every *.sql file in `dir` not yet recorded in schema_migrations,
 * in filename order, each in its own transaction.
 * @returns Filenames applied by this run
 */
export async function runMigrations(db: Database, dir = MIGRATIONS_DIR): Promise<string[]> {
  await ensureSchemaTable(db.query);
  const applied = await getApplied(db.query);
  const files = (await fs.promises.readdir(dir)).filter((f) => f.endsWith(".sql")).sort();
  const ran: string[] = [];

  for (const file of files) {
    if (applied.has(file)) {
      continue;
    }
    const sql = await fs.promises.readFile(path.join(dir, file), "utf8");
    console.log(`[migrate] applying ${file}`);
    try {
      await db.transaction(async (query) => {
        await query(sql);
        await query("INSERT INTO schema_migrations(filename) VALUES ($1)", [file]);
      });
    } catch (err) {
      console.error(`[migrate] failed on ${file}`, err);
      throw err;
    }
    ran.push(file);
  }
  console.log(`[migrate] done (${ran.length} applied)`);
  return ran;
}

async function main() {
  if (!DATABASE_URL) {
    throw new Error("DATABASE_URL is required to run migrations");
  }
  const db = createDatabase(createPool(DATABASE_URL));
  try {
    await runMigrations(db);
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error("[migrate] fatal", err);
    process.exit(1);
  });
}
