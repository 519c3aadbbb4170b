import { describe, it, expect, beforeAll, afterAll } from "vitest";
import path from "path";

import { ensureLedgerSchema } from "../src/db/bootstrap.js";
import { createDb, openLedgerPool, type LedgerPool } from "../src/db/connection.js";
import { sha256Prefixed } from "../src/core/hash.js";
import { LedgerStore } from "../src/store/ledgerStore.js";

describe("ledger store (pg-mem)", () => {
  let ledgerPool: LedgerPool;
  let store: LedgerStore;

  beforeAll(async () => {
    ledgerPool = openLedgerPool(undefined);
    const applied = await ensureLedgerSchema(ledgerPool, {
      autoSchema: false,
      schemaPath: path.resolve("db/schema.sql")
    });
    expect(applied).toBe(true);
    store = new LedgerStore(createDb(ledgerPool.pool));
  });

  afterAll(async () => {
    await ledgerPool.pool.end();
  });

  it("skips an external database unless asked", async () => {
    const external: LedgerPool = { pool: ledgerPool.pool, external: true };
    expect(await ensureLedgerSchema(external, { autoSchema: false })).toBe(false);
  });

  it("records a submission and reads it back", async () => {
    const script = "#!/bin/bash\n#SBATCH --job-name=ledger_a\n";
    const rec = await store.record({
      jobName: "ledger_a",
      scriptSha256: sha256Prefixed(script),
      script,
      status: "submitted",
      slurmJobId: 77
    });

    expect(rec.submissionId).toMatch(/^sub_[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(rec.slurmJobId).toBe(77);
    expect(rec.chainId).toBeNull();
    expect(rec.error).toBeNull();

    const got = await store.get(rec.submissionId);
    expect(got?.script).toBe(script);
    expect(got?.scriptSha256).toBe(sha256Prefixed(script));
    expect(got?.status).toBe("submitted");
  });

  it("keeps failed attempts with their error", async () => {
    const rec = await store.record({
      jobName: "ledger_b",
      scriptSha256: sha256Prefixed("x"),
      script: "x",
      status: "failed",
      error: "sbatch failed (exit 1): denied"
    });
    expect(rec.slurmJobId).toBeNull();
    expect(rec.error).toBe("sbatch failed (exit 1): denied");
  });

  it("returns null for an unknown id", async () => {
    expect(await store.get("sub_00000000000000000000000000")).toBeNull();
  });

  it("filters by chain", async () => {
    for (const name of ["c1", "c2"]) {
      await store.record({
        jobName: name,
        scriptSha256: sha256Prefixed(name),
        script: name,
        status: "submitted",
        slurmJobId: 1,
        chainId: "chain_test"
      });
    }
    const chained = await store.list(10, "chain_test");
    expect(chained.map((r) => r.jobName).sort()).toEqual(["c1", "c2"]);

    const all = await store.list(10);
    expect(all).toHaveLength(4);
    expect(await store.list(1)).toHaveLength(1);
  });
});
