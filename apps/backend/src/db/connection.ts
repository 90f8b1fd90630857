import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { runtimeConfig } from "../config";

const MEMORY_DB = ":memory:";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const openDatabase = (sqlitePath: string = runtimeConfig.sqlitePath) => {
  let target = MEMORY_DB;
  if (sqlitePath !== MEMORY_DB) {
    target = path.resolve(process.cwd(), sqlitePath);
    ensureDir(target);
  }
  const db = new Database(target);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  // A committed scan must be on disk before the request returns.
  db.pragma("synchronous = FULL");
  db.pragma("foreign_keys = ON");

  return db;
};
