import type { ColumnType, Generated } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;

export interface SubmissionsTable {
  submission_id: string;
  job_name: string;
  script_sha256: string;
  script: string;
  status: string;
  slurm_job_id: ColumnType<number | null, number | null | undefined, number | null>;
  chain_id: OptionalNullable<string>;
  error: OptionalNullable<string>;
  created_at: Generated<string>;
}

export interface DB {
  submissions: SubmissionsTable;
}
