import { spawn } from "child_process";

const MAX_CAPTURE_BYTES = 1024 * 1024;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  input?: string;
  env?: Record<string, string>;
}

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number; truncated: boolean }): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

/** Runs a command to completion, feeding `input` on stdin and capturing both output streams. */
export const runLocalProcess: CommandRunner = async (command, args, options = {}) => {
  const child = spawn(command, args, {
    env: { ...process.env, ...options.env },
    stdio: ["pipe", "pipe", "pipe"] as const
  });

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  const stdoutState = { bytes: 0, truncated: false };
  const stderrState = { bytes: 0, truncated: false };

  child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
  child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

  const exited = new Promise<number>((resolve, reject) => {
    child.on("error", reject);
    child.on("close", (code: number | null) => resolve(code ?? 0));
  });

  // EPIPE when the command exits without reading stdin.
  const stdinState: { error: Error | null } = { error: null };
  child.stdin.on("error", (err: Error) => {
    stdinState.error = err;
  });
  child.stdin.end(options.input ?? "");

  const exitCode = await exited;
  if (stdinState.error !== null && exitCode === 0) throw stdinState.error;

  const stdout = Buffer.concat(stdoutChunks).toString("utf8") + (stdoutState.truncated ? "\n[stdout truncated]\n" : "");
  const stderr = Buffer.concat(stderrChunks).toString("utf8") + (stderrState.truncated ? "\n[stderr truncated]\n" : "");

  return { exitCode, stdout, stderr };
};

export function isSpawnNotFound(err: unknown): boolean {
  return err instanceof Error && (err as NodeJS.ErrnoException).code === "ENOENT";
}
