import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import { fileURLToPath, pathToFileURL } from "node:url";
import type Database from "better-sqlite3";
import type { Logger } from "pino";
import { openDatabase } from "./db/connection";

const MIGRATIONS_TABLE = "schema_migrations";
const MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "db/migrations");

const ensureMigrationsTable = (db: Database.Database) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    );
  `);
};

const migrationIdFromFile = (fileName: string): string => {
  const ext = path.extname(fileName);
  return fileName.replace(ext, "");
};

const computeChecksum = (contents: string): string =>
  createHash("sha256").update(contents).digest("hex");

const appliedChecksum = (db: Database.Database, id: string): string | undefined =>
  db.prepare<[string], { checksum: string }>(`SELECT checksum FROM ${MIGRATIONS_TABLE} WHERE id = ?`).get(id)?.checksum;

const applyMigration = (db: Database.Database, id: string, sql: string, checksum: string) => {
  db.transaction(() => {
    const trimmed = sql.trim();
    if (trimmed) db.exec(trimmed);
    db
      .prepare<{ id: string; checksum: string; applied_at: number }>(
        `INSERT INTO ${MIGRATIONS_TABLE} (id, checksum, applied_at) VALUES (@id, @checksum, @applied_at)`,
      )
      .run({ id, checksum, applied_at: Date.now() });
  })();
};

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

/**
 * Apply every pending `db/migrations/*.sql` file in name order. Already
 * applied files are skipped; a changed checksum is reported but not re-run.
 */
export const runMigrations = (
  db: Database.Database,
  logger?: Logger,
  migrationsDir: string = MIGRATIONS_DIR,
): MigrationResult => {
  ensureMigrationsTable(db);

  const files = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .filter((file) => !file.endsWith("_down.sql") && !file.endsWith(".down.sql"))
    .sort();

  const result: MigrationResult = { applied: [], skipped: [] };
  for (const file of files) {
    const id = migrationIdFromFile(file);
    const sql = fs.readFileSync(path.join(migrationsDir, file), "utf8");
    const checksum = computeChecksum(sql);

    const existing = appliedChecksum(db, id);
    if (existing !== undefined) {
      if (existing !== checksum) {
        logger?.warn({ migration: id, existing, checksum }, "Migration checksum mismatch");
      }
      result.skipped.push(id);
      continue;
    }

    applyMigration(db, id, sql, checksum);
    logger?.info({ migration: id }, "Migration applied");
    result.applied.push(id);
  }

  return result;
};

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  const db = openDatabase();
  const { applied } = runMigrations(db);
  db.close();
  console.log(`[migrate] ${applied.length} migration(s) applied.`);
}
