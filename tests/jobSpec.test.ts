import { describe, it, expect } from "vitest";
import { ValidationError } from "../src/core/errors.js";
import { buildJob, renderBuilt } from "../src/mcp/jobSpec.js";
import { zJobSpec } from "../src/mcp/toolSchemas.js";

function directives(raw: Record<string, unknown>): string[] {
  const built = buildJob(zJobSpec.parse(raw), { interpreter: "/bin/sh" });
  return renderBuilt(built)
    .split("\n")
    .filter((line) => line.startsWith("#SBATCH ") && line !== "#SBATCH --parsable" && line !== "#SBATCH --quiet");
}

describe("buildJob", () => {
  it("maps grouped fields onto the job setters", () => {
    expect(
      directives({
        nodes: { min: 2, max: 4 },
        constraints: {
          gres: [{ name: "gpu", count: 2, type: "k80" }, "mic"],
          switches: { count: 1, max_wait: { minutes: 5 } },
          exclude: ["node01", "node02"]
        },
        export: { vars: "NONE", set: { MODE: "fast" } },
        dependencies: { entries: [{ kind: "afterany", job_ids: [7, 8] }], require_any: true }
      })
    ).toEqual([
      "#SBATCH --nodes=2-4",
      "#SBATCH --gres=gpu:k80:2,mic",
      "#SBATCH --exclude=node01,node02",
      "#SBATCH --switches=1@05:00",
      "#SBATCH --export=NONE,MODE=fast",
      "#SBATCH --dependency=afterany:7:8"
    ]);
  });

  it("accepts begin tokens, offsets and dates", () => {
    expect(directives({ defer: { begin: "midnight", immediate: true } })).toEqual([
      "#SBATCH --immediate",
      "#SBATCH --begin=midnight"
    ]);
    expect(directives({ defer: { begin: { hours: 2 } } })).toEqual(["#SBATCH --begin=now+7200"]);
  });

  it("prefers the description's interpreter over the default", () => {
    const built = buildJob(zJobSpec.parse({ interpreter: "/usr/bin/env zsh" }), { interpreter: "/bin/sh" });
    expect(built.job.interpreter).toBe("/usr/bin/env zsh");
    expect(built.cray).toBeNull();
  });

  it("rejects unparsable dates", () => {
    expect(() => buildJob(zJobSpec.parse({ deadline: "next week" }))).toThrow(ValidationError);
    expect(() => buildJob(zJobSpec.parse({ deadline: "next week" }))).toThrow("deadline(): deadline: invalid date: next week");
  });
});
