import { duration, type DurationParts } from "../core/duration.js";
import { ValidationError } from "../core/errors.js";
import { CrayJob } from "../job/crayJob.js";
import { SlurmJob } from "../job/slurmJob.js";
import { beginSpec } from "../options/rules.js";
import { isBeginToken, type BeginSpec, type GresSpec, type LicenseSpec, type SwitchesSpec } from "../options/values.js";
import type { JobSpec } from "./toolSchemas.js";

/** A job built from a description; `cray` is set when a network was requested. */
export interface BuiltJob {
  job: SlurmJob;
  cray: CrayJob | null;
}

export interface BuildDefaults {
  interpreter?: string | null;
}

function toDate(setter: string, option: string, iso: string): Date {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) throw new ValidationError(setter, `${option}: invalid date: ${iso}`, option);
  return d;
}

function toBegin(raw: DurationParts | string): BeginSpec {
  if (typeof raw !== "string") return duration(raw);
  if (isBeginToken(raw)) return raw;
  const d = new Date(raw);
  if (Number.isNaN(d.getTime())) throw new ValidationError("deferAllocation", `begin: ${beginSpec.message}`, "begin");
  return d;
}

function toGres(entry: string | { name: string; count: number; type?: string }): GresSpec {
  if (typeof entry === "string") return entry;
  return entry.type === undefined ? [entry.name, entry.count] : [entry.name, entry.count, entry.type];
}

function toLicense(entry: string | { name: string; count: number }): LicenseSpec {
  return typeof entry === "string" ? entry : [entry.name, entry.count];
}

/**
 * Applies a job description through the job's own setters, so every value is
 * validated exactly as a direct caller's would be.
 */
export function buildJob(spec: JobSpec, defaults: BuildDefaults = {}): BuiltJob {
  const interpreter = spec.interpreter ?? defaults.interpreter ?? undefined;
  const job = new SlurmJob({
    name: spec.name ?? null,
    interpreter,
    body: spec.body,
    partitions: spec.partitions ?? null,
    walltime: spec.walltime ? duration(spec.walltime) : null,
    timeMin: spec.time_min ? duration(spec.time_min) : null,
    account: spec.account ?? null,
    qos: spec.qos ?? null
  });

  if (spec.nodes) {
    job.nodesAllocation({
      minnodes: spec.nodes.min,
      maxnodes: spec.nodes.max,
      useMinNodes: spec.nodes.use_min_nodes
    });
  }

  if (spec.tasks) {
    const t = spec.tasks;
    job.tasksAllocation({
      ntasks: t.ntasks,
      cpusPerTask: t.cpus_per_task,
      ntasksPerNode: t.ntasks_per_node,
      ntasksPerSocket: t.ntasks_per_socket,
      ntasksPerCore: t.ntasks_per_core,
      overcommit: t.overcommit,
      oversubscribe: t.oversubscribe,
      exclusive: t.exclusive === false ? null : t.exclusive,
      spreadJob: t.spread_job
    });
  }

  if (spec.specialized) job.specialized(spec.specialized);
  if (spec.workdir !== undefined) job.workdir(spec.workdir);

  if (spec.streams) {
    job.jobStreams({
      output: spec.streams.output,
      error: spec.streams.error,
      input: spec.streams.input,
      openMode: spec.streams.open_mode
    });
  }

  if (spec.email) job.email(spec.email.address, spec.email.types ?? null);

  if (spec.constraints) {
    const c = spec.constraints;
    let switches: SwitchesSpec | undefined;
    if (c.switches) switches = c.switches.max_wait ? [c.switches.count, duration(c.switches.max_wait)] : c.switches.count;
    job.constraints({
      mincpus: c.mincpus,
      socketsPerNode: c.sockets_per_node,
      coresPerSocket: c.cores_per_socket,
      threadsPerCore: c.threads_per_core,
      mem: c.mem,
      memPerCpu: c.mem_per_cpu,
      tmp: c.tmp,
      constraint: c.constraint,
      gres: c.gres?.map(toGres),
      gresEnforceBinding: c.gres_enforce_binding,
      contiguous: c.contiguous,
      nodelist: c.nodelist,
      nodefile: c.nodefile,
      exclude: c.exclude,
      switches
    });
  }

  if (spec.signal) {
    job.signal({ sigNum: spec.signal.sig_num, sigTime: spec.signal.sig_time, shellOnly: spec.signal.shell_only });
  }

  if (spec.reservation !== undefined) job.reservation(spec.reservation);
  if (spec.licenses) job.licenses(spec.licenses.map(toLicense));
  if (spec.deadline !== undefined) job.deadline(toDate("deadline", "deadline", spec.deadline));

  if (spec.defer) {
    job.deferAllocation({
      immediate: spec.defer.immediate,
      begin: spec.defer.begin === undefined ? undefined : toBegin(spec.defer.begin)
    });
  }

  if (spec.clusters !== undefined) job.clusters(spec.clusters);

  if (spec.export) {
    job.exportEnv({ exportVars: spec.export.vars, setVars: spec.export.set, exportFile: spec.export.file });
  }

  if (spec.hold !== undefined) job.hold(spec.hold);
  if (spec.requeue !== undefined) job.requeue(spec.requeue);

  if (spec.dependencies) {
    for (const entry of spec.dependencies.entries) job.addDependencies(entry.kind, entry.job_ids);
    if (spec.dependencies.require_any !== undefined) job.dependenciesRequireAny(spec.dependencies.require_any);
  }

  const cray = spec.network === undefined ? null : new CrayJob(job).setNetwork(spec.network);
  return { job, cray };
}

export function renderBuilt(built: BuiltJob): string {
  return built.cray ? built.cray.dump() : built.job.dump();
}
