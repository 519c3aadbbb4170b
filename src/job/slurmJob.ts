import { isDuration, type Duration } from "../core/duration.js";
import { DependentOptionError, SbatchKitError, SubmissionError, ValidationError } from "../core/errors.js";
import type { SlurmSubmitter } from "../execution/slurm/submitter.js";
import { OptionRegistry, type OptionContainer, type ScopedOptions } from "../options/registry.js";
import {
  beginSpec,
  constraintExpression,
  emailAddress,
  envVarName,
  filenamePattern,
  gresSpecs,
  licenseSpecs,
  listEntries,
  mailTypes,
  memorySize,
  nonEmpty,
  nonEmptyList,
  nonNegative,
  nonNegativeDuration,
  positive,
  reservationName,
  rule,
  singleLine,
  type Rule,
  switchesSpec
} from "../options/rules.js";
import {
  isGresSpec,
  isLicenseSpec,
  isNodeRange,
  isSignalSpec,
  isValidDate,
  kinds,
  MAIL_TYPES,
  type BeginSpec,
  type ExclusiveMode,
  type ExportSpec,
  type ExportVars,
  type GresSpec,
  type LicenseSpec,
  type MailType,
  type NodeRange,
  type OpenMode,
  type OptionValue,
  type SignalSpec,
  type SwitchesSpec,
  type ValueKind
} from "../options/values.js";
import { renderDirective } from "../render/renderer.js";
import { DependencySet, type Prerequisite } from "./dependencies.js";

export interface NodesAllocation {
  minnodes?: number | null;
  maxnodes?: number | null;
  useMinNodes?: boolean | null;
}

export interface TasksAllocation {
  ntasks?: number | null;
  cpusPerTask?: number | null;
  ntasksPerNode?: number | null;
  ntasksPerSocket?: number | null;
  ntasksPerCore?: number | null;
  overcommit?: boolean | null;
  oversubscribe?: boolean | null;
  exclusive?: ExclusiveMode | false | null;
  spreadJob?: boolean | null;
}

export interface Specialization {
  cores?: number | null;
  threads?: number | null;
}

export interface JobStreams {
  output?: string | null;
  error?: string | null;
  input?: string | null;
  openMode?: OpenMode | null;
}

export interface NodeConstraints {
  mincpus?: number | null;
  socketsPerNode?: number | null;
  coresPerSocket?: number | null;
  threadsPerCore?: number | null;
  mem?: number | string | null;
  memPerCpu?: number | string | null;
  tmp?: number | string | null;
  constraint?: string | null;
  gres?: GresSpec | readonly GresSpec[] | null;
  gresEnforceBinding?: boolean | null;
  contiguous?: boolean | null;
  nodelist?: string | readonly string[] | null;
  nodefile?: string | null;
  exclude?: string | readonly string[] | null;
  switches?: SwitchesSpec | null;
}

export interface SignalOptions {
  sigNum?: string | number | null;
  sigTime?: number | null;
  shellOnly?: boolean | null;
}

export interface DeferAllocation {
  immediate?: boolean | null;
  begin?: BeginSpec | null;
}

export interface ExportEnv {
  exportVars?: ExportVars | null;
  setVars?: Record<string, string | number> | null;
  exportFile?: string | number | null;
}

export interface SlurmJobInit {
  name?: string | null;
  interpreter?: string;
  body?: string;
  partitions?: string | readonly string[] | null;
  walltime?: Duration | null;
  timeMin?: Duration | null;
  nodes?: number | null;
  account?: string | null;
  qos?: string | null;
}

export type SubmissionState =
  | { status: "pending" }
  | { status: "submitted"; jobId: number }
  | { status: "failed"; reason: string };

export function defaultInterpreter(): string {
  const shell = process.env.SHELL?.trim();
  return shell ? shell : "/bin/bash";
}

export function normalizeBody(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

const textOrList: ValueKind<string | readonly string[]> = {
  expected: "a string or a list of strings",
  is: (raw: unknown): raw is string | readonly string[] => kinds.text.is(raw) || kinds.textList.is(raw)
};

const gresInput: ValueKind<GresSpec | readonly GresSpec[]> = {
  expected: "a gres spec or a list of gres specs",
  is: (raw: unknown): raw is GresSpec | readonly GresSpec[] => isGresSpec(raw) || kinds.gresList.is(raw)
};

const licenseInput: ValueKind<LicenseSpec | readonly LicenseSpec[]> = {
  expected: "a license spec or a list of license specs",
  is: (raw: unknown): raw is LicenseSpec | readonly LicenseSpec[] => isLicenseSpec(raw) || kinds.licenseList.is(raw)
};

const exclusiveKind: ValueKind<ExclusiveMode> = {
  expected: "true, 'user' or 'mcs'",
  is: (raw: unknown): raw is ExclusiveMode => raw === true || raw === "user" || raw === "mcs"
};

const openModeKind: ValueKind<OpenMode> = {
  expected: "'w' (truncate) or 'a' (append)",
  is: (raw: unknown): raw is OpenMode => raw === "w" || raw === "a"
};

const beginKind: ValueKind<BeginSpec> = {
  expected: "a date, a duration or a time token",
  is: (raw: unknown): raw is BeginSpec => typeof raw === "string" || raw instanceof Date || isDuration(raw)
};

const signalNameKind: ValueKind<string | number> = {
  expected: "a signal name or number",
  is: (raw: unknown): raw is string | number => typeof raw === "string" || typeof raw === "number"
};

const exportVarsKind: ValueKind<ExportVars> = {
  expected: "'ALL', 'NONE' or a list of variable names",
  is: (raw: unknown): raw is ExportVars => raw === "ALL" || raw === "NONE" || kinds.textList.is(raw)
};

const setVarsKind: ValueKind<Record<string, string | number>> = {
  expected: "a mapping of variable names to values",
  is: (raw: unknown): raw is Record<string, string | number> =>
    typeof raw === "object" &&
    raw !== null &&
    !Array.isArray(raw) &&
    Object.values(raw).every((v) => typeof v === "string" || typeof v === "number")
};

const exportFileKind: ValueKind<string | number> = {
  expected: "a file name or a file descriptor",
  is: (raw: unknown): raw is string | number =>
    (typeof raw === "string" && raw.length > 0) || (typeof raw === "number" && nonNegative.check(raw))
};

function isMailType(raw: unknown): raw is MailType {
  return MAIL_TYPES.some((t) => t === raw);
}

const mailTypesKind: ValueKind<MailType | readonly MailType[]> = {
  expected: `one or more of ${MAIL_TYPES.join(", ")}`,
  is: (raw: unknown): raw is MailType | readonly MailType[] =>
    isMailType(raw) ||
    (Array.isArray(raw) && raw.every(isMailType))
};

const nameRules = [nonEmpty, singleLine];
const filenameRules = [nonEmpty, singleLine, filenamePattern];
const listRules: ReadonlyArray<Rule<readonly string[]>> = [nonEmptyList, listEntries];
const gresRules: ReadonlyArray<Rule<readonly GresSpec[]>> = [nonEmptyList, gresSpecs];
const licenseRules: ReadonlyArray<Rule<readonly LicenseSpec[]>> = [nonEmptyList, licenseSpecs];

const signalRule = rule<SignalSpec>((s) => {
  if (typeof s.signal === "number") return Number.isInteger(s.signal) && s.signal >= 1 && s.signal <= 64;
  return /^(SIG)?[A-Z][A-Z0-9]*$/.test(s.signal);
}, "signal must be a number between 1 and 64 or a signal name such as USR1");

const signalTimeRule = rule<SignalSpec>(
  (s) => s.seconds === null || (Number.isInteger(s.seconds) && s.seconds >= 0 && s.seconds <= 65535),
  "signal time must be an integer number of seconds between 0 and 65535"
);

const exportRule = rule<ExportSpec>(
  (e) =>
    (e.vars === null || typeof e.vars === "string" || e.vars.every((v) => envVarName.check(v))) &&
    e.assignments.every(([k, v]) => envVarName.check(k) && !/[,\r\n]/.test(v)),
  "export variables must be valid names and values must not contain commas or line breaks"
);

// A lone tuple such as ["gpu", 2] is one spec, not a list of two.
function asList<T>(value: T | readonly T[], isItem: (v: unknown) => v is T): readonly T[] {
  if (isItem(value)) return [value];
  return Array.isArray(value) ? value.filter(isItem) : [];
}

function isText(v: unknown): v is string {
  return typeof v === "string";
}

/**
 * A SLURM batch job description: named setters validate into an ordered
 * option registry, `dump()` renders the script and `submit()` hands it to a
 * submitter. Setters return `this`; a failing setter leaves the job unchanged.
 */
export class SlurmJob {
  readonly interpreter: string;
  readonly dependencies: DependencySet;

  private readonly options = new OptionRegistry();
  private nameValue: string | null = null;
  private body = "";
  private submission: SubmissionState = { status: "pending" };

  constructor(init: SlurmJobInit = {}) {
    const { name, interpreter, body, ...rest } = init;
    this.interpreter = interpreter ?? defaultInterpreter();
    this.dependencies = new DependencySet(this);
    this.nameValue = name === undefined ? null : this.checkName("SlurmJob", name);

    this.options.transaction(() => {
      const opts = this.options.forSetter("SlurmJob");
      const container: OptionContainer = { ...rest };
      const partitions = opts.take(container, "partitions", textOrList);
      if (partitions !== undefined) {
        opts.set("partition", partitions === null ? null : asList(partitions, isText), listRules);
      }
      opts.setFrom("time", container, "walltime", kinds.duration, [nonNegativeDuration]);
      opts.setFrom("time-min", container, "timeMin", kinds.duration, [nonNegativeDuration]);
      this.checkTimeMin(opts);
      const nodes = opts.take(container, "nodes", kinds.integer);
      if (nodes !== undefined) this.setNodes(opts, nodes, undefined);
      opts.setFrom("account", container, "account", kinds.text, nameRules);
      opts.setFrom("qos", container, "qos", kinds.text, nameRules);
      opts.assertNoUnknown(container);
    });

    if (body !== undefined) this.setBody(body);
  }

  get name(): string | null {
    return this.nameValue;
  }

  get state(): SubmissionState {
    return this.submission;
  }

  get submitted(): boolean {
    return this.submission.status === "submitted";
  }

  get jobId(): number | null {
    return this.submission.status === "submitted" ? this.submission.jobId : null;
  }

  get script(): string {
    return this.body;
  }

  option(name: string): OptionValue | undefined {
    return this.options.get(name);
  }

  snapshot(): Array<[string, OptionValue]> {
    return this.options.snapshot();
  }

  private checkName(setter: string, name: string | null): string | null {
    if (name === null || name === "") return null;
    for (const r of nameRules) {
      if (!r.check(name)) throw new ValidationError(setter, `job-name: ${r.message}`, "job-name");
    }
    return name;
  }

  private checkTimeMin(opts: ScopedOptions): void {
    const time = opts.get("time");
    const timeMin = opts.get("time-min");
    if (isDuration(time) && isDuration(timeMin) && timeMin.seconds > time.seconds) {
      throw new DependentOptionError(opts.setter, "time_min may not exceed time");
    }
  }

  /** `undefined` leaves a bound as it is (maxnodes alone keeps the stored minimum), `null` clears it. */
  private setNodes(opts: ScopedOptions, minnodes: number | null | undefined, maxnodes: number | null | undefined): void {
    const current = opts.get("nodes");
    const stored = isNodeRange(current) ? current : null;
    const min = minnodes === undefined ? (stored?.min ?? null) : minnodes;
    const max = maxnodes === undefined ? (minnodes === undefined ? (stored?.max ?? null) : null) : maxnodes;

    if (min === null) {
      if (max !== null) throw new DependentOptionError(opts.setter, "maxnodes requires minnodes");
      opts.set("nodes", null);
      return;
    }
    if (!positive.check(min)) throw new ValidationError(opts.setter, "minnodes must be a positive integer", "nodes");
    if (max !== null) {
      if (!positive.check(max)) throw new ValidationError(opts.setter, "maxnodes must be a positive integer", "nodes");
      if (max < min) throw new DependentOptionError(opts.setter, `maxnodes (${max}) must be >= minnodes (${min})`);
    }
    opts.set<NodeRange>("nodes", { kind: "node_range", min, max });
  }

  jobName(name: string | null): this {
    this.nameValue = this.checkName("jobName", name);
    return this;
  }

  partitions(partitions: string | readonly string[] | null): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("partitions");
      opts.set("partition", partitions === null ? null : asList(partitions, isText), listRules);
    });
    return this;
  }

  walltime(time: Duration | null, timeMin: Duration | null = null): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("walltime");
      opts.set("time", time, [nonNegativeDuration]);
      opts.set("time-min", timeMin, [nonNegativeDuration]);
      this.checkTimeMin(opts);
    });
    return this;
  }

  nodesAllocation(args: NodesAllocation): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("nodesAllocation");
      const container: OptionContainer = { ...args };
      const minnodes = opts.take(container, "minnodes", kinds.integer);
      const maxnodes = opts.take(container, "maxnodes", kinds.integer);
      if (minnodes !== undefined || maxnodes !== undefined) this.setNodes(opts, minnodes, maxnodes);
      opts.setFrom("use-min-nodes", container, "useMinNodes", kinds.flag);
      opts.assertNoUnknown(container);
    });
    return this;
  }

  tasksAllocation(args: TasksAllocation): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("tasksAllocation");
      const container: OptionContainer = { ...args };
      opts.setFrom("ntasks", container, "ntasks", kinds.integer, [positive]);
      opts.setFrom("cpus-per-task", container, "cpusPerTask", kinds.integer, [positive]);
      opts.setFrom("ntasks-per-node", container, "ntasksPerNode", kinds.integer, [positive]);
      opts.setFrom("ntasks-per-socket", container, "ntasksPerSocket", kinds.integer, [positive]);
      opts.setFrom("ntasks-per-core", container, "ntasksPerCore", kinds.integer, [positive]);
      opts.setFrom("overcommit", container, "overcommit", kinds.flag);
      opts.setFrom("oversubscribe", container, "oversubscribe", kinds.flag);
      opts.setFrom("exclusive", container, "exclusive", exclusiveKind);
      opts.setFrom("spread-job", container, "spreadJob", kinds.flag);
      opts.assertNoUnknown(container);
    });
    return this;
  }

  specialized(args: Specialization): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("specialized");
      const container: OptionContainer = { ...args };
      opts.setFrom("core-spec", container, "cores", kinds.integer, [positive]);
      opts.setFrom("thread-spec", container, "threads", kinds.integer, [positive]);
      opts.assertNoUnknown(container);
      opts.assertExclusive("core-spec", "thread-spec");
    });
    return this;
  }

  workdir(dir: string | null): this {
    this.options.forSetter("workdir").set("chdir", dir, nameRules);
    return this;
  }

  jobStreams(args: JobStreams): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("jobStreams");
      const container: OptionContainer = { ...args };
      opts.setFrom("output", container, "output", kinds.text, filenameRules);
      opts.setFrom("error", container, "error", kinds.text, filenameRules);
      opts.setFrom("input", container, "input", kinds.text, filenameRules);
      opts.setFrom("open-mode", container, "openMode", openModeKind);
      opts.assertNoUnknown(container);
    });
    return this;
  }

  email(address: string | null, types: MailType | readonly MailType[] | null = null): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("email");
      if (address === null) {
        opts.set("mail-user", null);
        opts.set("mail-type", null);
        return;
      }
      opts.set("mail-user", address, [singleLine, emailAddress]);
      const container: OptionContainer = { types };
      const list = opts.take(container, "types", mailTypesKind);
      opts.set("mail-type", list === null || list === undefined ? null : asList<string>(list, isText), [mailTypes]);
    });
    return this;
  }

  constraints(args: NodeConstraints): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("constraints");
      const container: OptionContainer = { ...args };
      opts.setFrom("mincpus", container, "mincpus", kinds.integer, [positive]);
      opts.setFrom("sockets-per-node", container, "socketsPerNode", kinds.integer, [positive]);
      opts.setFrom("cores-per-socket", container, "coresPerSocket", kinds.integer, [positive]);
      opts.setFrom("threads-per-core", container, "threadsPerCore", kinds.integer, [positive]);
      opts.setFrom("mem", container, "mem", kinds.memory, [memorySize]);
      opts.setFrom("mem-per-cpu", container, "memPerCpu", kinds.memory, [memorySize]);
      opts.setFrom("tmp", container, "tmp", kinds.memory, [memorySize]);
      opts.setFrom("constraint", container, "constraint", kinds.text, [constraintExpression]);

      const gres = opts.take(container, "gres", gresInput);
      if (gres !== undefined) opts.set("gres", gres === null ? null : asList(gres, isGresSpec), gresRules);

      const binding = opts.take(container, "gresEnforceBinding", kinds.flag);
      if (binding !== undefined) opts.set("gres-flags", binding === null ? null : "enforce-binding");

      opts.setFrom("contiguous", container, "contiguous", kinds.flag);

      const nodelist = opts.take(container, "nodelist", textOrList);
      if (nodelist !== undefined) opts.set("nodelist", nodelist === null ? null : asList(nodelist, isText), listRules);
      opts.setFrom("nodefile", container, "nodefile", kinds.text, filenameRules);
      const exclude = opts.take(container, "exclude", textOrList);
      if (exclude !== undefined) opts.set("exclude", exclude === null ? null : asList(exclude, isText), listRules);

      opts.setFrom("switches", container, "switches", kinds.switches, [switchesSpec]);
      opts.assertNoUnknown(container);
      opts.assertExclusive("mem", "mem-per-cpu");
    });
    return this;
  }

  signal(args: SignalOptions): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("signal");
      const container: OptionContainer = { ...args };
      const sig = opts.take(container, "sigNum", signalNameKind);
      const seconds = opts.take(container, "sigTime", kinds.integer);
      const shellOnly = opts.take(container, "shellOnly", kinds.flag);
      opts.assertNoUnknown(container);

      if (sig === null) {
        if (seconds !== null && seconds !== undefined) throw new DependentOptionError("signal", "sigTime requires sigNum");
        opts.set("signal", null);
        return;
      }
      if (sig === undefined) {
        if (seconds === undefined && shellOnly === undefined) return;
        // Amends the stored signal; without one there is nothing to amend.
        const current = opts.get("signal");
        if (!isSignalSpec(current)) {
          if (seconds !== null && seconds !== undefined) throw new DependentOptionError("signal", "sigTime requires sigNum");
          if (shellOnly === true) throw new DependentOptionError("signal", "shellOnly requires sigNum");
          return;
        }
        opts.set<SignalSpec>(
          "signal",
          {
            kind: "signal",
            signal: current.signal,
            seconds: seconds === undefined ? current.seconds : seconds,
            shellOnly: shellOnly === undefined ? current.shellOnly : shellOnly === true
          },
          [signalRule, signalTimeRule]
        );
        return;
      }
      opts.set<SignalSpec>(
        "signal",
        { kind: "signal", signal: sig, seconds: seconds ?? null, shellOnly: shellOnly === true },
        [signalRule, signalTimeRule]
      );
    });
    return this;
  }

  reservation(name: string | null): this {
    this.options.forSetter("reservation").set("reservation", name, [nonEmpty, reservationName]);
    return this;
  }

  qos(name: string | null): this {
    this.options.forSetter("qos").set("qos", name, nameRules);
    return this;
  }

  account(name: string | null): this {
    this.options.forSetter("account").set("account", name, nameRules);
    return this;
  }

  licenses(specs: LicenseSpec | readonly LicenseSpec[] | null): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("licenses");
      const list = opts.take({ specs }, "specs", licenseInput);
      opts.set("licenses", list === null || list === undefined ? null : asList(list, isLicenseSpec), licenseRules);
    });
    return this;
  }

  deadline(when: Date | null): this {
    this.options
      .forSetter("deadline")
      .set("deadline", when, [rule<Date>((d) => isValidDate(d), "deadline must be a valid date")]);
    return this;
  }

  deferAllocation(args: DeferAllocation): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("deferAllocation");
      const container: OptionContainer = { ...args };
      opts.setFrom("immediate", container, "immediate", kinds.flag);
      opts.setFrom("begin", container, "begin", beginKind, [beginSpec]);
      opts.assertNoUnknown(container);
    });
    return this;
  }

  clusters(names: string | readonly string[] | null): this {
    this.options.forSetter("clusters").set("clusters", names === null ? null : asList(names, isText), listRules);
    return this;
  }

  exportEnv(args: ExportEnv): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("exportEnv");
      const container: OptionContainer = { ...args };
      const vars = opts.take(container, "exportVars", exportVarsKind);
      const setVars = opts.take(container, "setVars", setVarsKind);
      if (vars !== undefined || setVars !== undefined) {
        const assignments = Object.entries(setVars ?? {}).map(([k, v]) => [k, String(v)] as const);
        const spec: ExportSpec | null =
          (vars === null || vars === undefined) && assignments.length === 0
            ? null
            : { kind: "export", vars: vars ?? null, assignments };
        opts.set("export", spec, [exportRule]);
      }
      opts.setFrom("export-file", container, "exportFile", exportFileKind);
      opts.assertNoUnknown(container);
    });
    return this;
  }

  hold(flag = true): this {
    this.options.forSetter("hold").set("hold", flag);
    return this;
  }

  requeue(flag: boolean | null): this {
    this.options.transaction(() => {
      const opts = this.options.forSetter("requeue");
      opts.set("requeue", flag === true);
      opts.set("no-requeue", flag === false);
    });
    return this;
  }

  setBody(text: string): this {
    this.body = normalizeBody(text);
    return this;
  }

  addDependencies(kind: string, prerequisites: readonly Prerequisite[] = []): this {
    this.dependencies.add(kind, prerequisites);
    return this;
  }

  dependenciesRequireAny(flag: boolean): this {
    this.dependencies.requireAny = flag;
    return this;
  }

  dump(): string {
    return this.dumpWith(new Map());
  }

  /**
   * Renders with `overrides` replacing stored values in place; override names
   * not present in the registry are appended after the stored options.
   */
  dumpWith(overrides: ReadonlyMap<string, OptionValue>): string {
    const lines = [`#!${this.interpreter}`];
    if (this.nameValue !== null) lines.push(renderDirective("job-name", this.nameValue));

    for (const [name, value] of this.options.entries()) {
      lines.push(renderDirective(name, overrides.get(name) ?? value));
    }
    for (const [name, value] of overrides) {
      if (!this.options.has(name)) lines.push(renderDirective(name, value));
    }

    const dependency = this.dependencies.render();
    if (dependency !== null) lines.push(`#SBATCH --dependency=${dependency}`);

    lines.push("#SBATCH --parsable", "#SBATCH --quiet");
    return `${lines.join("\n")}\n${this.body}`;
  }

  submit(submitter: SlurmSubmitter): Promise<number> {
    return this.submitScript(this.dump(), submitter);
  }

  async submitScript(script: string, submitter: SlurmSubmitter): Promise<number> {
    let jobId: number;
    try {
      const result = await submitter.submit(script);
      jobId = result.jobId;
    } catch (e) {
      const err = e instanceof SbatchKitError ? e : new SubmissionError(e instanceof Error ? e.message : String(e));
      this.submission = { status: "failed", reason: err.message };
      throw err;
    }

    if (!Number.isInteger(jobId) || jobId <= 0) {
      const err = new SubmissionError(`malformed job id from submitter: ${jobId}`);
      this.submission = { status: "failed", reason: err.message };
      throw err;
    }

    this.submission = { status: "submitted", jobId };
    return jobId;
  }
}
