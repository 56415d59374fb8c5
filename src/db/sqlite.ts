import sqlite3 from "sqlite3";
import type { Database } from "sqlite3";
import path from "node:path";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { logger } from "../logger.js";

let db: Database | null = null;

export async function initDb(dbFile: string): Promise<Database> {
  if (dbFile !== ":memory:") {
    const dir = path.dirname(dbFile);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  sqlite3.verbose();
  db = new sqlite3.Database(dbFile);

  await exec("PRAGMA foreign_keys = ON;");
  if (dbFile !== ":memory:") await exec("PRAGMA journal_mode = WAL;");

  // Auto-apply schema if the questions table doesn't exist
  const exists = await tableExists("questions");
  if (!exists) {
    const schemaPath = locateSchemaPath();
    const sql = fs.readFileSync(schemaPath, "utf8");
    await exec(sql);
    logger.info(`Applied schema from ${schemaPath}`);
  } else {
    logger.info(`SQLite ready at ${dbFile} (schema already present)`);
  }

  return db;
}

export function getDb(): Database {
  if (!db) throw new Error("DB not initialized");
  return db;
}

export function closeDb(): Promise<void> {
  const current = db;
  db = null;
  if (!current) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    current.close((err: Error | null) => (err ? reject(err) : resolve()));
  });
}

function exec(sql: string) {
  return new Promise<void>((resolve, reject) => {
    if (!db) return reject(new Error("DB not initialized"));
    db.exec(sql, (err: Error | null) => (err ? reject(err) : resolve()));
  });
}

function get<T>(sql: string, params: readonly unknown[] = []) {
  return new Promise<T | undefined>((resolve, reject) => {
    if (!db) return reject(new Error("DB not initialized"));
    db.get(sql, params, (err: Error | null, row: T | undefined) =>
      err ? reject(err) : resolve(row)
    );
  });
}

async function tableExists(name: string): Promise<boolean> {
  const row = await get<{ name: string }>(
    `SELECT name FROM sqlite_master WHERE type='table' AND name=? LIMIT 1`,
    [name]
  );
  return !!row;
}

/**
 * Finds schema.sql for code running from `src/db` or from the compiled
 * `dist/db`; the build does not copy it, so the latter uses the sources.
 */
export function locateSchemaPath(
  here: string = path.dirname(fileURLToPath(import.meta.url))
): string {
  const candidates = [
    path.resolve(here, "schema.sql"),
    path.resolve(here, "..", "..", "src", "db", "schema.sql"),
  ];
  const found = candidates.find((c) => fs.existsSync(c));
  if (!found) {
    throw new Error(`schema.sql not found in ${candidates.join(" or ")}`);
  }
  return found;
}

/**
 * Runs `body` between BEGIN and COMMIT. On failure it rolls back and rethrows
 * the body's error; a failed rollback is only logged.
 */
export async function inTransaction<T>(
  run: (sql: string) => Promise<unknown>,
  body: () => Promise<T>
): Promise<T> {
  await run("BEGIN");
  try {
    const result = await body();
    await run("COMMIT");
    return result;
  } catch (e) {
    try {
      await run("ROLLBACK");
    } catch (rollbackError) {
      logger.error("Rollback failed:", rollbackError);
    }
    throw e;
  }
}
