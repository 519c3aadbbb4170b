import { promises as fs } from "fs";
import type * as pg from "pg";
import type { LedgerPool } from "./connection.js";

export const DEFAULT_SCHEMA_PATH = "db/schema.sql";

export async function applySqlFile(pool: pg.Pool, filePath: string): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}

export interface LedgerSchemaOptions {
  /** Apply the schema to an external database too; an in-memory one always gets it. */
  autoSchema: boolean;
  schemaPath?: string;
}

/** Returns whether the schema file was applied. */
export async function ensureLedgerSchema(ledger: LedgerPool, opts: LedgerSchemaOptions): Promise<boolean> {
  if (ledger.external && !opts.autoSchema) return false;
  await applySqlFile(ledger.pool, opts.schemaPath ?? DEFAULT_SCHEMA_PATH);
  return true;
}
