import { describe, it, expect } from "vitest";
import { duration } from "../src/core/duration.js";
import {
  DependentOptionError,
  MutuallyExclusiveError,
  SubmissionError,
  UnknownOptionError,
  ValidationError
} from "../src/core/errors.js";
import type { CommandRunner } from "../src/execution/localProcess.js";
import { SbatchSubmitter, type SlurmSubmitter } from "../src/execution/slurm/submitter.js";
import { SlurmJob } from "../src/job/slurmJob.js";

function directives(job: SlurmJob): string[] {
  return job
    .dump()
    .split("\n")
    .filter((line) => line.startsWith("#SBATCH "));
}

function fixedSubmitter(jobId: number): SlurmSubmitter & { scripts: string[] } {
  const scripts: string[] = [];
  return {
    scripts,
    async submit(script) {
      scripts.push(script);
      return { jobId, stdout: `${jobId}\n`, stderr: "" };
    }
  };
}

describe("SlurmJob", () => {
  it("dumps a minimal job exactly", () => {
    const job = new SlurmJob({
      name: "hello_world",
      interpreter: "/bin/bash",
      partitions: "debug",
      body: "srun -n ${SLURM_NTASKS} pwd\n"
    });

    expect(job.dump()).toBe(
      [
        "#!/bin/bash",
        "#SBATCH --job-name=hello_world",
        "#SBATCH --partition=debug",
        "#SBATCH --parsable",
        "#SBATCH --quiet",
        "srun -n ${SLURM_NTASKS} pwd",
        ""
      ].join("\n")
    );
  });

  it("renders options in the order they were first set", () => {
    const job = new SlurmJob({ interpreter: "/bin/sh", walltime: duration({ hours: 1 }), account: "physics" });
    job.tasksAllocation({ ntasks: 4, exclusive: "user" }).hold().requeue(false);

    expect(directives(job)).toEqual([
      "#SBATCH --time=01:00:00",
      "#SBATCH --account=physics",
      "#SBATCH --ntasks=4",
      "#SBATCH --exclusive=user",
      "#SBATCH --hold",
      "#SBATCH --no-requeue",
      "#SBATCH --parsable",
      "#SBATCH --quiet"
    ]);
  });

  it("normalizes body line endings", () => {
    const job = new SlurmJob({ interpreter: "/bin/sh", body: "echo a\r\necho b\r\n" });
    expect(job.script).toBe("echo a\necho b\n");
  });

  it("leaves the job unchanged when a duration is negative", () => {
    const job = new SlurmJob({ walltime: duration({ hours: 2 }) });
    const before = job.snapshot();

    expect(() => job.walltime(duration(-30))).toThrow(ValidationError);
    expect(() => job.deferAllocation({ begin: duration(-30) })).toThrow(ValidationError);
    expect(() => job.constraints({ switches: [2, duration(-30)] })).toThrow(ValidationError);
    expect(job.snapshot()).toEqual(before);
  });

  it("rejects a minimum time above the time limit", () => {
    const job = new SlurmJob();
    expect(() => job.walltime(duration({ hours: 1 }), duration({ hours: 2 }))).toThrow(DependentOptionError);
    expect(job.snapshot()).toEqual([]);
    job.walltime(duration({ hours: 2 }), duration({ hours: 1 }));
    expect(job.option("time-min")).toEqual(duration({ hours: 1 }));
  });

  it("treats mem and mem-per-cpu as mutually exclusive", () => {
    const job = new SlurmJob();
    job.constraints({ mem: "4G" });
    const before = job.snapshot();

    expect(() => job.constraints({ memPerCpu: 1024 })).toThrow(MutuallyExclusiveError);
    expect(() => job.constraints({ memPerCpu: 1024 })).toThrow(
      "constraints(): options 'mem' and 'mem-per-cpu' are mutually exclusive"
    );
    expect(job.snapshot()).toEqual(before);

    const other = new SlurmJob().constraints({ memPerCpu: 1024 });
    expect(other.option("mem-per-cpu")).toBe(1024);
  });

  it("rejects mem after mem-per-cpu", () => {
    const job = new SlurmJob().constraints({ memPerCpu: 1024 });
    const before = job.snapshot();

    expect(() => job.constraints({ mem: "4G" })).toThrow(
      "constraints(): options 'mem' and 'mem-per-cpu' are mutually exclusive"
    );
    expect(job.snapshot()).toEqual(before);
  });

  it("keeps its own copy of tuples and lists", () => {
    const gres: [string, number] = ["gpu", 2];
    const license: [string, number] = ["matlab", 1];
    const vars = ["HOME", "PATH"];
    const job = new SlurmJob({ interpreter: "/bin/sh" })
      .constraints({ gres })
      .licenses(license)
      .exportEnv({ exportVars: vars });

    gres[1] = -7;
    license[1] = 0;
    vars.push("1BAD");

    const lines = job.dump().split("\n");
    expect(lines).toContain("#SBATCH --gres=gpu:2");
    expect(lines).toContain("#SBATCH --licenses=matlab:1");
    expect(lines).toContain("#SBATCH --export=HOME,PATH");
  });

  it("requires minnodes before maxnodes", () => {
    const job = new SlurmJob();
    expect(() => job.nodesAllocation({ maxnodes: 32 })).toThrow(DependentOptionError);

    job.nodesAllocation({ minnodes: 16, maxnodes: 32 });
    expect(directives(job)[0]).toBe("#SBATCH --nodes=16-32");

    job.nodesAllocation({ maxnodes: 64 });
    expect(directives(job)[0]).toBe("#SBATCH --nodes=16-64");

    expect(() => job.nodesAllocation({ minnodes: 16, maxnodes: 8 })).toThrow(DependentOptionError);
    expect(directives(job)[0]).toBe("#SBATCH --nodes=16-64");
  });

  it("rejects unknown keyword options", () => {
    const job = new SlurmJob();
    const args = { ntasks: 2, ntask_per_node: 1 };
    expect(() => job.tasksAllocation(args)).toThrow(UnknownOptionError);
    expect(() => job.tasksAllocation(args)).toThrow("tasksAllocation(): unknown option: ntask_per_node");
    expect(job.option("ntasks")).toBeUndefined();
  });

  it("rejects core and thread specialization together", () => {
    expect(() => new SlurmJob().specialized({ cores: 2, threads: 2 })).toThrow(MutuallyExclusiveError);
  });

  it("validates stream filename patterns", () => {
    const job = new SlurmJob();
    expect(() => job.jobStreams({ output: "%k.out" })).toThrow(ValidationError);
    job.jobStreams({ output: "slurm-%j.out", openMode: "a" });
    expect(directives(job).slice(0, 2)).toEqual(["#SBATCH --output=slurm-%j.out", "#SBATCH --open-mode=append"]);
  });

  it("renders mail, signal, export and begin options", () => {
    const job = new SlurmJob()
      .workdir("/scratch/run1")
      .email("someone@example.org", ["BEGIN", "END"])
      .signal({ sigNum: "USR1", sigTime: 60, shellOnly: true })
      .exportEnv({ exportVars: ["PATH"], setVars: { OMP_NUM_THREADS: 4 } })
      .deferAllocation({ begin: duration({ days: 1 }) });

    expect(directives(job).slice(0, 6)).toEqual([
      "#SBATCH --chdir=/scratch/run1",
      "#SBATCH --mail-user=someone@example.org",
      "#SBATCH --mail-type=BEGIN,END",
      "#SBATCH --signal=B:USR1@60",
      "#SBATCH --export=PATH,OMP_NUM_THREADS=4",
      "#SBATCH --begin=now+1days"
    ]);
  });

  it("amends the stored signal when sigNum is absent", () => {
    const job = new SlurmJob().signal({ sigNum: "USR1", sigTime: 60 });
    expect(directives(job)[0]).toBe("#SBATCH --signal=USR1@60");

    job.signal({ shellOnly: true });
    expect(directives(job)[0]).toBe("#SBATCH --signal=B:USR1@60");

    job.signal({ sigTime: null });
    expect(directives(job)[0]).toBe("#SBATCH --signal=B:USR1");

    job.signal({ sigNum: null });
    expect(job.option("signal")).toBeUndefined();

    expect(() => new SlurmJob().signal({ sigTime: 5 })).toThrow("signal(): sigTime requires sigNum");
  });

  it("rejects invalid dates and addresses", () => {
    const job = new SlurmJob();
    expect(() => job.deferAllocation({ begin: new Date("not a date") })).toThrow(ValidationError);
    expect(() => job.deadline(new Date(Number.NaN))).toThrow(ValidationError);
    expect(() => job.email("not-an-address")).toThrow(ValidationError);
    expect(job.snapshot()).toEqual([]);
  });

  it("renders gres tuples and licenses", () => {
    const job = new SlurmJob().constraints({ gres: ["gpu", 2] }).licenses(["matlab", ["ansys", 4]]);
    expect(directives(job).slice(0, 2)).toEqual(["#SBATCH --gres=gpu:2", "#SBATCH --licenses=matlab,ansys:4"]);
  });

  it("removes options set to null", () => {
    const job = new SlurmJob({ account: "physics" }).qos("normal");
    job.account(null);
    expect(job.snapshot()).toEqual([["qos", "normal"]]);
  });

  it("records the job id of a successful submission", async () => {
    const job = new SlurmJob({ name: "ok", interpreter: "/bin/sh" });
    const submitter = fixedSubmitter(4242);

    await expect(job.submit(submitter)).resolves.toBe(4242);
    expect(job.submitted).toBe(true);
    expect(job.jobId).toBe(4242);
    expect(submitter.scripts).toEqual([job.dump()]);
  });

  it("stays unsubmitted when sbatch exits non-zero", async () => {
    const run: CommandRunner = async () => ({
      exitCode: 1,
      stdout: "",
      stderr: "sbatch: error: invalid partition specified: nope\n"
    });
    const job = new SlurmJob({ name: "bad", interpreter: "/bin/sh", partitions: "nope" });
    const submitter = new SbatchSubmitter({ executable: "/opt/slurm/bin/sbatch", run });

    await expect(job.submit(submitter)).rejects.toThrow(SubmissionError);
    await expect(job.submit(submitter)).rejects.toThrow("invalid partition specified: nope");
    expect(job.submitted).toBe(false);
    expect(job.jobId).toBeNull();
    expect(job.state).toEqual({
      status: "failed",
      reason: "/opt/slurm/bin/sbatch failed (exit 1): sbatch: error: invalid partition specified: nope"
    });
  });
});
