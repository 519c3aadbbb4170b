import { constants, promises as fs } from "fs";
import path from "path";
import { ExecutableNotFoundError } from "../../core/errors.js";

export async function locateExecutable(name: string, searchPath = process.env.PATH ?? ""): Promise<string | null> {
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    try {
      await fs.access(candidate, constants.X_OK);
      return candidate;
    } catch (err) {
      const code = (err as NodeJS.ErrnoException).code;
      if (code !== "ENOENT" && code !== "EACCES" && code !== "ENOTDIR") throw err;
    }
  }
  return null;
}

/**
 * A configured path wins; otherwise the first `sbatch` on PATH. Resolved on
 * each call so a missing executable only matters when something needs it.
 */
export async function resolveSbatchPath(configured: string | null | undefined, searchPath?: string): Promise<string> {
  if (configured) return configured;
  const found = await locateExecutable("sbatch", searchPath);
  if (!found) throw new ExecutableNotFoundError("sbatch");
  return found;
}
