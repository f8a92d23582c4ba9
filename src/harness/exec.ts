import { spawn } from "child_process";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Stream child output to this process instead of capturing it. */
  inherit?: boolean;
  /** Kills the child after this long and resolves with TIMEOUT_EXIT_CODE. */
  timeoutMs?: number;
}

export const TIMEOUT_EXIT_CODE = 124;

/** Runs an external command to completion. Never rejects: spawn failures become exit code 1. */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd ?? process.cwd(),
      env: options.env ?? process.env,
      stdio: options.inherit ? "inherit" : ["ignore", "pipe", "pipe"],
      shell: false,
    });

    let stdout = "";
    let stderr = "";
    const debug = process.env.DEBUG === "1";

    // Always consume stdout/stderr so a chatty child never blocks on a full pipe
    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
      if (debug) process.stdout.write(`[${command}:out] ${chunk}`);
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
      if (debug) process.stderr.write(`[${command}:err] ${chunk}`);
    });

    let timedOut = false;
    const timer =
      options.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, options.timeoutMs);

    child.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut) {
        const note = `${command} timed out after ${options.timeoutMs}ms`;
        resolve({ exitCode: TIMEOUT_EXIT_CODE, stdout, stderr: stderr ? `${stderr.trimEnd()}\n${note}` : note });
        return;
      }
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });

    child.on("error", (error) => {
      clearTimeout(timer);
      resolve({ exitCode: 1, stdout: "", stderr: error.message });
    });
  });
};
