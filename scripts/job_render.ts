import { promises as fs } from "fs";
import YAML from "yaml";
import { KitSettings } from "../src/config/config.js";
import { SbatchSubmitter } from "../src/execution/slurm/submitter.js";
import { buildJob, renderBuilt } from "../src/mcp/jobSpec.js";
import { zJobSpec } from "../src/mcp/toolSchemas.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/job_render.ts --job <file.yaml> [--config <sbatchkit.yaml>] [--submit]",
    "",
    "notes:",
    "  - The job file uses the same fields as the job_render gateway tool.",
    "  - With --submit the rendered script is piped to sbatch and the job id printed.",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help" || key === "submit") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const jobPath = args.job;
  if (typeof jobPath !== "string") throw new Error(`--job is required\n\n${usage()}`);

  const configPath = typeof args.config === "string" ? args.config : process.env.SBATCHKIT_CONFIG ?? "config/sbatchkit.yaml";
  const settings = await KitSettings.loadFromFile(configPath);

  const parsed = zJobSpec.safeParse(YAML.parse(await fs.readFile(jobPath, "utf8")));
  if (!parsed.success) {
    throw new Error(`invalid job description at ${jobPath}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }

  const built = buildJob(parsed.data, { interpreter: settings.interpreter() });
  const script = renderBuilt(built);
  process.stdout.write(script.endsWith("\n") ? script : `${script}\n`);

  if (args.submit) {
    const submitter = new SbatchSubmitter({ executable: settings.sbatchPath(), extraArgs: settings.sbatchExtraArgs() });
    const jobId = await built.job.submitScript(script, submitter);
    console.error(`submitted batch job ${jobId}`);
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
