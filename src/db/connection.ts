import * as pg from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export function createPgPool(databaseUrl: string): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

/** A process-local ledger; its contents are gone when the gateway exits. */
export function createMemoryPool(): pg.Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export interface LedgerPool {
  pool: pg.Pool;
  external: boolean;
}

export function openLedgerPool(databaseUrl: string | undefined): LedgerPool {
  if (databaseUrl) return { pool: createPgPool(databaseUrl), external: true };
  return { pool: createMemoryPool(), external: false };
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}
