import { ValidationError } from "../core/errors.js";
import type { SlurmSubmitter } from "../execution/slurm/submitter.js";
import type { OptionValue } from "../options/values.js";
import { SlurmJob, type SlurmJobInit } from "./slurmJob.js";

export const CRAY_NETWORK_TYPES = ["system", "blade"] as const;
export type CrayNetwork = (typeof CRAY_NETWORK_TYPES)[number];

/**
 * Job for Cray systems. Wraps a plain SlurmJob; a network request is rendered
 * as `--network=<type>` and forces `--exclusive` at dump time without touching
 * the wrapped job's own options.
 */
export class CrayJob {
  readonly job: SlurmJob;
  private networkType: CrayNetwork | null = null;

  constructor(init: SlurmJobInit | SlurmJob = {}) {
    this.job = init instanceof SlurmJob ? init : new SlurmJob(init);
  }

  get network(): CrayNetwork | null {
    return this.networkType;
  }

  setNetwork(type: CrayNetwork | null): this {
    if (type !== null && !CRAY_NETWORK_TYPES.some((t) => t === type)) {
      throw new ValidationError("network", "network type must be either 'system' or 'blade'", "network");
    }
    this.networkType = type;
    return this;
  }

  private overrides(): Map<string, OptionValue> {
    const out = new Map<string, OptionValue>();
    if (this.networkType !== null) {
      out.set("network", this.networkType);
      out.set("exclusive", true);
    }
    return out;
  }

  dump(): string {
    return this.job.dumpWith(this.overrides());
  }

  submit(submitter: SlurmSubmitter): Promise<number> {
    return this.job.submitScript(this.dump(), submitter);
  }
}
