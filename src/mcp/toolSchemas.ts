import * as z from "zod/v4";
import { CRAY_NETWORK_TYPES } from "../job/crayJob.js";
import { MAIL_TYPES } from "../options/values.js";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zSubmissionId = z.string().regex(new RegExp(`^sub_${ulid26}$`), "invalid submission_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);

export const zDuration = z.object({
  days: z.number().optional(),
  hours: z.number().optional(),
  minutes: z.number().optional(),
  seconds: z.number().optional()
});

const zIsoDate = z.string().min(1).describe("ISO 8601 date-time");
const zTextOrList = z.union([z.string(), z.array(z.string())]);
const zMemory = z.union([z.number().int(), z.string()]);

export const zGresEntry = z.union([
  z.string(),
  z.object({ name: z.string(), count: z.number().int(), type: z.string().optional() })
]);

export const zLicenseEntry = z.union([z.string(), z.object({ name: z.string(), count: z.number().int() })]);

export const zDependencyEntry = z.object({
  kind: z.string(),
  job_ids: z.array(z.number().int()).default([])
});

export const zJobSpec = z.object({
  name: z.string().optional(),
  interpreter: z.string().min(1).optional(),
  body: z.string().default(""),
  partitions: zTextOrList.optional(),
  walltime: zDuration.optional(),
  time_min: zDuration.optional(),
  nodes: z
    .object({
      min: z.number().int().optional(),
      max: z.number().int().optional(),
      use_min_nodes: z.boolean().optional()
    })
    .optional(),
  tasks: z
    .object({
      ntasks: z.number().int().optional(),
      cpus_per_task: z.number().int().optional(),
      ntasks_per_node: z.number().int().optional(),
      ntasks_per_socket: z.number().int().optional(),
      ntasks_per_core: z.number().int().optional(),
      overcommit: z.boolean().optional(),
      oversubscribe: z.boolean().optional(),
      exclusive: z.union([z.boolean(), z.enum(["user", "mcs"])]).optional(),
      spread_job: z.boolean().optional()
    })
    .optional(),
  specialized: z
    .object({
      cores: z.number().int().optional(),
      threads: z.number().int().optional()
    })
    .optional(),
  workdir: z.string().optional(),
  streams: z
    .object({
      output: z.string().optional(),
      error: z.string().optional(),
      input: z.string().optional(),
      open_mode: z.enum(["w", "a"]).optional()
    })
    .optional(),
  email: z
    .object({
      address: z.string(),
      types: z.array(z.enum(MAIL_TYPES)).optional()
    })
    .optional(),
  constraints: z
    .object({
      mincpus: z.number().int().optional(),
      sockets_per_node: z.number().int().optional(),
      cores_per_socket: z.number().int().optional(),
      threads_per_core: z.number().int().optional(),
      mem: zMemory.optional(),
      mem_per_cpu: zMemory.optional(),
      tmp: zMemory.optional(),
      constraint: z.string().optional(),
      gres: z.array(zGresEntry).optional(),
      gres_enforce_binding: z.boolean().optional(),
      contiguous: z.boolean().optional(),
      nodelist: zTextOrList.optional(),
      nodefile: z.string().optional(),
      exclude: zTextOrList.optional(),
      switches: z.object({ count: z.number().int(), max_wait: zDuration.optional() }).optional()
    })
    .optional(),
  signal: z
    .object({
      sig_num: z.union([z.string(), z.number().int()]),
      sig_time: z.number().int().optional(),
      shell_only: z.boolean().optional()
    })
    .optional(),
  reservation: z.string().optional(),
  qos: z.string().optional(),
  account: z.string().optional(),
  licenses: z.array(zLicenseEntry).optional(),
  deadline: zIsoDate.optional(),
  defer: z
    .object({
      immediate: z.boolean().optional(),
      begin: z.union([zDuration, z.string()]).optional()
    })
    .optional(),
  clusters: zTextOrList.optional(),
  export: z
    .object({
      vars: z.union([z.enum(["ALL", "NONE"]), z.array(z.string())]).optional(),
      set: z.record(z.string(), z.union([z.string(), z.number()])).optional(),
      file: z.union([z.string(), z.number().int()]).optional()
    })
    .optional(),
  hold: z.boolean().optional(),
  requeue: z.boolean().optional(),
  network: z.enum(CRAY_NETWORK_TYPES).optional(),
  dependencies: z
    .object({
      require_any: z.boolean().optional(),
      entries: z.array(zDependencyEntry).default([])
    })
    .optional()
});

export type JobSpec = z.infer<typeof zJobSpec>;

export const zSubmissionSummary = z.object({
  submission_id: zSubmissionId,
  job_name: z.string(),
  script_sha256: zSha256,
  status: z.enum(["submitted", "failed"]),
  slurm_job_id: z.number().int().nullable(),
  chain_id: z.string().nullable(),
  error: z.string().nullable(),
  created_at: z.string()
});

export const zJobRenderInput = z.object({
  job: zJobSpec
});

export const zJobRenderOutput = z.object({
  script: z.string(),
  script_sha256: zSha256
});

export const zJobSubmitInput = z.object({
  job: zJobSpec
});

export const zJobSubmitOutput = z.object({
  submission_id: zSubmissionId,
  slurm_job_id: z.number().int(),
  script_sha256: zSha256
});

export const zJobChainSubmitInput = z.object({
  jobs: z.array(zJobSpec).min(1),
  kind: z.string().default("afterok")
});

export const zJobChainSubmitOutput = z.object({
  chain_id: z.string(),
  submissions: z.array(zJobSubmitOutput)
});

export const zSubmissionListInput = z.object({
  limit: z.number().int().min(1).max(500).default(50),
  chain_id: z.string().optional()
});

export const zSubmissionListOutput = z.object({
  submissions: z.array(zSubmissionSummary)
});

export const zSubmissionGetInput = z.object({
  submission_id: zSubmissionId
});

export const zSubmissionGetOutput = z.object({
  submission: zSubmissionSummary,
  script: z.string()
});

export const zSlurmVersionInput = z.object({});

export const zSlurmVersionOutput = z.object({
  version: z.string(),
  version_info: z.array(z.union([z.number(), z.string()]))
});
