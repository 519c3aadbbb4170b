import { DependentOptionError, InvalidDependencyKindError, ValidationError } from "../core/errors.js";
import type { SlurmJob } from "./slurmJob.js";

export const DEPENDENCY_KINDS = ["afterok", "afterany", "afternotok", "expand", "singleton"] as const;
export type DependencyKind = (typeof DEPENDENCY_KINDS)[number];

/** A live job (resolved to its handle at render time) or an already captured handle. */
export type Prerequisite = SlurmJob | number;

export function isDependencyKind(kind: string): kind is DependencyKind {
  return DEPENDENCY_KINDS.some((k) => k === kind);
}

function describe(p: Prerequisite): string {
  return typeof p === "number" ? String(p) : `'${p.name ?? "(unnamed)"}'`;
}

export class DependencySet {
  private readonly groups = new Map<DependencyKind, Prerequisite[]>();
  private anyOf = false;

  constructor(private readonly owner: SlurmJob) {}

  get requireAny(): boolean {
    return this.anyOf;
  }

  set requireAny(flag: boolean) {
    this.anyOf = flag;
  }

  get isEmpty(): boolean {
    return this.groups.size === 0;
  }

  /**
   * Appends prerequisites under `kind`. A prerequisite already listed under
   * the same kind is not added twice.
   */
  add(kind: string, prerequisites: readonly Prerequisite[] = []): void {
    if (!isDependencyKind(kind)) throw new InvalidDependencyKindError(kind);

    if (kind === "singleton") {
      if (prerequisites.length > 0) {
        throw new ValidationError("addDependencies", "singleton dependency takes no prerequisite jobs", "dependency");
      }
      this.groups.set("singleton", []);
      return;
    }

    for (const p of prerequisites) {
      if (typeof p === "number" && !(Number.isInteger(p) && p > 0)) {
        throw new ValidationError("addDependencies", `invalid job id: ${p}`, "dependency");
      }
      if (p === this.owner) {
        throw new ValidationError("addDependencies", "a job cannot depend on itself", "dependency");
      }
    }

    const list = this.groups.get(kind) ?? [];
    for (const p of prerequisites) {
      if (!list.includes(p)) list.push(p);
    }
    this.groups.set(kind, list);
  }

  get(kind: DependencyKind): readonly Prerequisite[] {
    return this.groups.get(kind) ?? [];
  }

  kinds(): DependencyKind[] {
    return [...this.groups.keys()];
  }

  /**
   * `afterok:1:2,afterany:3` (all groups required) or `afterok:1:2?afterany:3`
   * (any one suffices). Live prerequisites must already carry a job id.
   */
  render(): string | null {
    if (this.groups.size === 0) return null;

    const parts: string[] = [];
    for (const [kind, prerequisites] of this.groups) {
      if (kind === "singleton") {
        parts.push("singleton");
        continue;
      }
      const ids = prerequisites.map((p) => {
        if (typeof p === "number") return p;
        if (p.jobId === null) {
          throw new DependentOptionError("dump", `prerequisite job ${describe(p)} has not been submitted`);
        }
        return p.jobId;
      });
      if (ids.length > 0) parts.push([kind, ...ids].join(":"));
    }
    return parts.length > 0 ? parts.join(this.anyOf ? "?" : ",") : null;
  }
}

/**
 * Makes every job depend on its predecessor with `kind`. The first job gets no
 * dependency from the chain; a single job is left unchanged.
 */
export function chainJobs(jobs: readonly SlurmJob[], kind: string): void {
  if (jobs.length === 0) throw new ValidationError("chainJobs", "at least one job is required");
  if (!isDependencyKind(kind)) throw new InvalidDependencyKindError(kind);
  if (kind === "singleton") throw new ValidationError("chainJobs", "singleton dependencies cannot form a chain");

  const pairs: Array<[prev: SlurmJob, next: SlurmJob]> = [];
  for (let i = 1; i < jobs.length; i++) {
    const prev = jobs[i - 1];
    const next = jobs[i];
    if (!prev || !next) continue;
    if (prev === next) {
      throw new ValidationError("chainJobs", `job ${i + 1} follows itself in the chain`, "dependency");
    }
    pairs.push([prev, next]);
  }
  for (const [prev, next] of pairs) next.addDependencies(kind, [prev]);
}
