import { execa } from "execa";
import { DeployError, DeployErrorCode } from "./errors.js";

export interface ExecResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode?: number;
}

export interface RunOptions {
  cwd?: string;
  /** Don't echo stdout */
  quiet?: boolean;
}

/**
 * Run an external command without throwing on failure. A command that
 * cannot be spawned (not installed) comes back with ok=false.
 */
export async function run(command: string, args: string[], options: RunOptions = {}): Promise<ExecResult> {
  const result = await execa(command, args, { cwd: options.cwd, reject: false });
  const stdout = typeof result.stdout === "string" ? result.stdout.trim() : "";
  const stderr = typeof result.stderr === "string" ? result.stderr.trim() : "";
  if (stdout && !options.quiet) {
    console.log(stdout);
  }
  return { ok: !result.failed, stdout, stderr, exitCode: result.exitCode };
}

/**
 * Run an external command and throw COMMAND_FAILED unless it succeeds
 */
export async function runOrThrow(
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<ExecResult> {
  const result = await run(command, args, options);
  if (!result.ok) {
    throw new DeployError(
      DeployErrorCode.COMMAND_FAILED,
      `Command failed: ${[command, ...args].join(" ")}`,
      { exitCode: result.exitCode, stderr: result.stderr }
    );
  }
  return result;
}

/**
 * Hand the terminal to a command, for interactive tools such as `docker login`
 */
export async function runInteractive(command: string, args: string[]): Promise<void> {
  const result = await execa(command, args, { stdio: "inherit", reject: false });
  if (result.failed) {
    throw new DeployError(
      DeployErrorCode.COMMAND_FAILED,
      `Command failed: ${[command, ...args].join(" ")}`,
      { exitCode: result.exitCode }
    );
  }
}
