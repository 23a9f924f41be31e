import { execFile } from "node:child_process";

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
}

/**
 * Runs an external program with an explicit argument array (never a shell
 * string) and reports its exit code instead of throwing on non-zero.
 * Tests inject a fake; production uses {@link execFileRunner}.
 */
export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

const MAX_BUFFER = 16 * 1024 * 1024;

export const execFileRunner: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { cwd: options.cwd, timeout: options.timeoutMs ?? 0, maxBuffer: MAX_BUFFER, encoding: "utf8" },
      (err, stdout, stderr) => {
        if (err && typeof err.code !== "number") {
          // Spawn failure (ENOENT, EACCES, killed by timeout): no exit code to report.
          reject(err);
          return;
        }
        resolve({ code: err && typeof err.code === "number" ? err.code : 0, stdout, stderr });
      },
    );
  });

/** Throw unless the command exited 0. */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: CommandOptions,
): Promise<CommandResult> {
  const result = await runner(command, args, options);
  if (result.code !== 0) {
    throw new Error(`${command} exited with ${result.code}: ${result.stderr.trim() || result.stdout.trim()}`);
  }
  return result;
}
