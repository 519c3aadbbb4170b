import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ulid } from "ulid";
import type { KitSettings } from "../config/config.js";
import { isOptionError, SbatchKitError } from "../core/errors.js";
import { sha256Prefixed } from "../core/hash.js";
import type { SubmissionId } from "../core/ids.js";
import type { CommandRunner } from "../execution/localProcess.js";
import { SbatchSubmitter, type SlurmSubmitter } from "../execution/slurm/submitter.js";
import { parseSlurmVersionInfo, slurmVersion } from "../execution/slurm/version.js";
import { chainJobs } from "../job/dependencies.js";
import type { LedgerStore, SubmissionRecord } from "../store/ledgerStore.js";
import { buildJob, renderBuilt, type BuiltJob } from "./jobSpec.js";
import {
  zJobChainSubmitInput,
  zJobChainSubmitOutput,
  zJobRenderInput,
  zJobRenderOutput,
  zJobSubmitInput,
  zJobSubmitOutput,
  zSlurmVersionInput,
  zSlurmVersionOutput,
  zSubmissionGetInput,
  zSubmissionGetOutput,
  zSubmissionListInput,
  zSubmissionListOutput,
  type JobSpec
} from "./toolSchemas.js";

export interface GatewayDeps {
  settings: KitSettings;
  ledger: LedgerStore;
  submitter?: SlurmSubmitter;
  /** Process runner for sbatch; a local child process when omitted. */
  runCommand?: CommandRunner;
}

function toSubmissionSummary(r: SubmissionRecord): Record<string, unknown> {
  return {
    submission_id: r.submissionId,
    job_name: r.jobName,
    script_sha256: r.scriptSha256,
    status: r.status,
    slurm_job_id: r.slurmJobId,
    chain_id: r.chainId,
    error: r.error,
    created_at: r.createdAt
  };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Option and dependency problems are the caller's; everything else is ours. */
function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (isOptionError(e)) return new McpError(ErrorCode.InvalidParams, e.message);
  return new McpError(ErrorCode.InternalError, errorMessage(e));
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "sbatchkit-gateway",
    version: "0.1.0"
  });

  const submitter =
    deps.submitter ??
    new SbatchSubmitter({
      executable: deps.settings.sbatchPath(),
      extraArgs: deps.settings.sbatchExtraArgs(),
      run: deps.runCommand
    });

  function build(spec: JobSpec): BuiltJob {
    const bodyBytes = Buffer.byteLength(spec.body, "utf8");
    const max = deps.settings.maxBodyBytes();
    if (bodyBytes > max) {
      throw new McpError(ErrorCode.InvalidRequest, `config denied job body of ${bodyBytes} bytes (max ${max})`);
    }
    return buildJob(spec, { interpreter: deps.settings.interpreter() });
  }

  async function submitBuilt(
    built: BuiltJob,
    chainId: string | null
  ): Promise<{ submissionId: SubmissionId; slurmJobId: number; scriptSha256: `sha256:${string}` }> {
    const script = renderBuilt(built);
    const scriptSha256 = sha256Prefixed(script);
    const jobName = built.job.name ?? "";

    let slurmJobId: number;
    try {
      slurmJobId = await built.job.submitScript(script, submitter);
    } catch (e) {
      const failed = await deps.ledger.record({
        jobName,
        scriptSha256,
        script,
        status: "failed",
        chainId,
        error: errorMessage(e)
      });
      console.error(`[sbatchkit] submission ${failed.submissionId} failed: ${errorMessage(e)}`);
      throw e;
    }

    const rec = await deps.ledger.record({ jobName, scriptSha256, script, status: "submitted", slurmJobId, chainId });
    return { submissionId: rec.submissionId, slurmJobId, scriptSha256 };
  }

  mcp.registerTool(
    "job_render",
    {
      description: "Render a batch job description to an sbatch script without submitting it.",
      inputSchema: zJobRenderInput,
      outputSchema: zJobRenderOutput
    },
    async (args) => {
      try {
        deps.settings.assertToolAllowed("job_render");
        const script = renderBuilt(build(args.job));
        const structured = { script, script_sha256: sha256Prefixed(script) };
        return {
          content: [{ type: "text", text: script }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "job_submit",
    {
      description: "Render a batch job description and submit it with sbatch.",
      inputSchema: zJobSubmitInput,
      outputSchema: zJobSubmitOutput
    },
    async (args) => {
      try {
        deps.settings.assertToolAllowed("job_submit");
        const built = build(args.job);
        const res = await submitBuilt(built, null);
        const structured = {
          submission_id: res.submissionId,
          slurm_job_id: res.slurmJobId,
          script_sha256: res.scriptSha256
        };
        return {
          content: [{ type: "text", text: `Submitted batch job ${res.slurmJobId} (${res.submissionId})` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "job_chain_submit",
    {
      description: "Submit jobs in order, each depending on the previous one with the given dependency kind.",
      inputSchema: zJobChainSubmitInput,
      outputSchema: zJobChainSubmitOutput
    },
    async (args) => {
      try {
        deps.settings.assertToolAllowed("job_chain_submit");
        const built = args.jobs.map((spec) => build(spec));
        chainJobs(
          built.map((b) => b.job),
          args.kind
        );

        const chainId = `chain_${ulid()}`;
        const submissions: Array<Record<string, unknown>> = [];
        for (const [i, b] of built.entries()) {
          try {
            const res = await submitBuilt(b, chainId);
            submissions.push({
              submission_id: res.submissionId,
              slurm_job_id: res.slurmJobId,
              script_sha256: res.scriptSha256
            });
          } catch (e) {
            if (e instanceof SbatchKitError && !isOptionError(e)) {
              throw new McpError(
                ErrorCode.InternalError,
                `chain ${chainId} stopped at job ${i + 1} of ${built.length}: ${e.message}`
              );
            }
            throw e;
          }
        }

        const structured = { chain_id: chainId, submissions };
        return {
          content: [{ type: "text", text: `Submitted ${submissions.length} chained jobs (${chainId})` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "submission_list",
    {
      description: "List recorded submissions, newest first.",
      inputSchema: zSubmissionListInput,
      outputSchema: zSubmissionListOutput
    },
    async (args) => {
      try {
        deps.settings.assertToolAllowed("submission_list");
        const rows = await deps.ledger.list(args.limit, args.chain_id);
        const structured = { submissions: rows.map(toSubmissionSummary) };
        return {
          content: [{ type: "text", text: `Submissions: ${rows.length}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "submission_get",
    {
      description: "Fetch a recorded submission, including the exact script that was sent.",
      inputSchema: zSubmissionGetInput,
      outputSchema: zSubmissionGetOutput
    },
    async (args) => {
      try {
        deps.settings.assertToolAllowed("submission_get");
        const rec = await deps.ledger.get(args.submission_id);
        if (!rec) throw new McpError(ErrorCode.InvalidParams, `unknown submission_id: ${args.submission_id}`);
        const structured = { submission: toSubmissionSummary(rec), script: rec.script };
        return {
          content: [{ type: "text", text: `Submission ${rec.submissionId} (${rec.status})` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "slurm_version",
    {
      description: "Report the version of the sbatch executable.",
      inputSchema: zSlurmVersionInput,
      outputSchema: zSlurmVersionOutput
    },
    async () => {
      try {
        deps.settings.assertToolAllowed("slurm_version");
        const version = await slurmVersion({ executable: deps.settings.sbatchPath(), run: deps.runCommand });
        const structured = { version, version_info: parseSlurmVersionInfo(version) };
        return {
          content: [{ type: "text", text: version }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  return mcp;
}
