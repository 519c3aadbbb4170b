import { ExecutableNotFoundError } from "../../core/errors.js";
import { isSpawnNotFound, runLocalProcess, type CommandResult, type CommandRunner } from "../localProcess.js";
import { resolveSbatchPath } from "./executable.js";

export interface SlurmVersionOptions {
  executable?: string | null;
  run?: CommandRunner;
}

export type SlurmVersionInfo = Array<number | string>;

/** Output of `sbatch --version`, e.g. `slurm 23.02.7`. */
export async function slurmVersion(opts: SlurmVersionOptions = {}): Promise<string> {
  const executable = await resolveSbatchPath(opts.executable);
  const run = opts.run ?? runLocalProcess;

  let res: CommandResult;
  try {
    res = await run(executable, ["--version"]);
  } catch (err) {
    if (isSpawnNotFound(err)) throw new ExecutableNotFoundError(executable);
    throw err;
  }
  if (res.exitCode !== 0) {
    throw new Error(`${executable} --version failed (exit ${res.exitCode})${res.stderr ? `: ${res.stderr.trim()}` : ""}`);
  }
  return res.stdout.trim();
}

/** `<product> <version>`, e.g. `slurm-wlm 21.08.5`; a bare version is taken as is. */
export function parseSlurmVersionInfo(version: string): SlurmVersionInfo {
  const words = version.trim().split(/\s+/);
  const bare = (words.length > 1 ? words.slice(1).join(" ") : words[0]) ?? "";
  if (!bare) return [];
  return bare.split(/[.-]/).map((token) => (/^\d+$/.test(token) ? Number.parseInt(token, 10) : token));
}

export async function slurmVersionInfo(opts: SlurmVersionOptions = {}): Promise<SlurmVersionInfo> {
  return parseSlurmVersionInfo(await slurmVersion(opts));
}
