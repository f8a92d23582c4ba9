import { describe, it, expect } from "vitest";
import { runCommand, TIMEOUT_EXIT_CODE } from "./exec.js";

const node = process.execPath;

describe("runCommand", () => {
  it("captures output and the exit code", async () => {
    const result = await runCommand(node, ["-e", "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"]);
    expect(result).toEqual({ exitCode: 3, stdout: "out", stderr: "err" });
  });

  it("resolves with exit code 1 when the binary does not exist", async () => {
    const result = await runCommand("definitely-not-a-real-binary-x9", []);
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe("");
    expect(result.stderr).toContain("ENOENT");
  });

  it("kills a child that outlives its timeout", async () => {
    const started = Date.now();
    const result = await runCommand(node, ["-e", "setTimeout(() => {}, 30000)"], { timeoutMs: 200 });

    expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
    expect(result.stderr).toBe(`${node} timed out after 200ms`);
    expect(Date.now() - started).toBeLessThan(10_000);
  });

  it("leaves a fast child alone when a timeout is set", async () => {
    const result = await runCommand(node, ["-e", "process.stdout.write('done')"], { timeoutMs: 10_000 });
    expect(result).toEqual({ exitCode: 0, stdout: "done", stderr: "" });
  });
});
