import { ExecutableNotFoundError, SubmissionError } from "../../core/errors.js";
import { isSpawnNotFound, runLocalProcess, type CommandResult, type CommandRunner } from "../localProcess.js";
import { resolveSbatchPath } from "./executable.js";

export interface SlurmSubmitResult {
  jobId: number;
  stdout: string;
  stderr: string;
}

export interface SlurmSubmitter {
  submit(script: string): Promise<SlurmSubmitResult>;
}

/** Parses `sbatch --parsable` output: `<jobid>` or `<jobid>;<cluster>`. */
export function parseSbatchJobId(output: string): number | null {
  const trimmed = output.trim();
  if (!/^\d+(?:;\S+)?$/.test(trimmed)) return null;
  const jobId = Number.parseInt(trimmed.split(";")[0] ?? "", 10);
  return Number.isSafeInteger(jobId) && jobId > 0 ? jobId : null;
}

export interface SbatchSubmitterOptions {
  executable?: string | null;
  extraArgs?: string[];
  run?: CommandRunner;
}

/** Submits by piping the script to `sbatch` on stdin. */
export class SbatchSubmitter implements SlurmSubmitter {
  private readonly executable: string | null;
  private readonly extraArgs: string[];
  private readonly run: CommandRunner;

  constructor(opts: SbatchSubmitterOptions = {}) {
    this.executable = opts.executable ?? null;
    this.extraArgs = opts.extraArgs ?? [];
    this.run = opts.run ?? runLocalProcess;
  }

  async submit(script: string): Promise<SlurmSubmitResult> {
    const executable = await resolveSbatchPath(this.executable);

    let res: CommandResult;
    try {
      res = await this.run(executable, [...this.extraArgs], { input: script });
    } catch (err) {
      if (isSpawnNotFound(err)) throw new ExecutableNotFoundError(executable);
      throw err;
    }

    const { exitCode, stdout, stderr } = res;
    if (exitCode !== 0) {
      const detail = stderr.trim() || stdout.trim();
      throw new SubmissionError(`${executable} failed (exit ${exitCode})${detail ? `: ${detail}` : ""}`, exitCode);
    }

    const jobId = parseSbatchJobId(stdout);
    if (jobId === null) {
      throw new SubmissionError(`unable to parse sbatch job id from output: ${stdout.trim() || stderr.trim()}`);
    }

    return { jobId, stdout, stderr };
  }
}
