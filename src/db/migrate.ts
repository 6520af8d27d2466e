import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Pool } from "pg";
import { getPool } from "./client.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const MIGRATION_LOCK_KEY = 73_104_221;

export async function listMigrationFiles(migrationDir = path.join(__dirname, "migrations")): Promise<string[]> {
  return (await readdir(migrationDir)).filter((file) => file.endsWith(".sql")).sort();
}

/**
 * Applies pending SQL files in name order, each inside its own transaction, and returns the ones
 * applied. An advisory lock keeps concurrent `sync` processes from migrating at the same time.
 */
export async function runMigrations(pool: Pool = getPool()): Promise<string[]> {
  const migrationDir = path.join(__dirname, "migrations");
  const applied: string[] = [];
  const client = await pool.connect();

  try {
    await client.query("SELECT pg_advisory_lock($1)", [MIGRATION_LOCK_KEY]);
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id text PRIMARY KEY,
        executed_at timestamptz NOT NULL DEFAULT NOW()
      )
    `);

    const done = await client.query<{ id: string }>("SELECT id FROM schema_migrations");
    const doneIds = new Set(done.rows.map((row) => row.id));

    for (const file of await listMigrationFiles(migrationDir)) {
      if (doneIds.has(file)) {
        continue;
      }

      const sql = await readFile(path.join(migrationDir, file), "utf8");
      try {
        await client.query("BEGIN");
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations (id) VALUES ($1)", [file]);
        await client.query("COMMIT");
        applied.push(file);
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
    }
  } finally {
    await client.query("SELECT pg_advisory_unlock($1)", [MIGRATION_LOCK_KEY]);
    client.release();
  }

  return applied;
}
