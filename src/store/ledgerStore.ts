import type { Kysely, Selectable } from "kysely";
import { isSubmissionId, newSubmissionId, type SubmissionId } from "../core/ids.js";
import type { DB, SubmissionsTable } from "../db/types.js";

export type SubmissionStatus = "submitted" | "failed";

export interface SubmissionRecord {
  submissionId: SubmissionId;
  jobName: string;
  scriptSha256: `sha256:${string}`;
  script: string;
  status: SubmissionStatus;
  slurmJobId: number | null;
  chainId: string | null;
  error: string | null;
  createdAt: string;
}

export interface RecordSubmissionInput {
  jobName: string;
  scriptSha256: `sha256:${string}`;
  script: string;
  status: SubmissionStatus;
  slurmJobId?: number | null;
  chainId?: string | null;
  error?: string | null;
}

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toStatus(value: string): SubmissionStatus {
  if (value === "submitted" || value === "failed") return value;
  throw new Error(`ledger: unknown submission status: ${value}`);
}

function toSha256(value: string): `sha256:${string}` {
  if (!value.startsWith("sha256:")) throw new Error(`ledger: malformed script hash: ${value}`);
  return `sha256:${value.slice("sha256:".length)}`;
}

function toSubmissionId(value: string): SubmissionId {
  if (!isSubmissionId(value)) throw new Error(`ledger: malformed submission id: ${value}`);
  return value;
}

function toRecord(row: Selectable<SubmissionsTable>): SubmissionRecord {
  return {
    submissionId: toSubmissionId(row.submission_id),
    jobName: row.job_name,
    scriptSha256: toSha256(row.script_sha256),
    script: row.script,
    status: toStatus(row.status),
    slurmJobId: row.slurm_job_id === null ? null : Number(row.slurm_job_id),
    chainId: row.chain_id,
    error: row.error,
    createdAt: toIso(row.created_at)
  };
}

/** Append-only record of every submission attempt made through the gateway. */
export class LedgerStore {
  constructor(private readonly db: Kysely<DB>) {}

  async record(input: RecordSubmissionInput): Promise<SubmissionRecord> {
    const submissionId = newSubmissionId();
    await this.db
      .insertInto("submissions")
      .values({
        submission_id: submissionId,
        job_name: input.jobName,
        script_sha256: input.scriptSha256,
        script: input.script,
        status: input.status,
        slurm_job_id: input.slurmJobId ?? null,
        chain_id: input.chainId ?? null,
        error: input.error ?? null
      })
      .execute();

    const row = await this.db
      .selectFrom("submissions")
      .selectAll()
      .where("submission_id", "=", submissionId)
      .executeTakeFirstOrThrow();
    return toRecord(row);
  }

  async get(submissionId: string): Promise<SubmissionRecord | null> {
    const row = await this.db
      .selectFrom("submissions")
      .selectAll()
      .where("submission_id", "=", submissionId)
      .executeTakeFirst();
    return row ? toRecord(row) : null;
  }

  /** Newest first. */
  async list(limit: number, chainId?: string): Promise<SubmissionRecord[]> {
    let q = this.db.selectFrom("submissions").selectAll();
    if (chainId !== undefined) {
      q = q.where("chain_id", "=", chainId);
    }
    const rows = await q.orderBy("created_at", "desc").orderBy("submission_id", "desc").limit(limit).execute();
    return rows.map(toRecord);
  }
}
