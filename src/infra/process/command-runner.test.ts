import { describe, expect, it } from "vitest";
import { runCapturedCommand } from "./command-runner.js";

describe("runCapturedCommand", () => {
  it("captures stdout and stderr of a successful command", async () => {
    const result = await runCapturedCommand(
      process.execPath,
      ["-e", "process.stdout.write('out'); process.stderr.write('err')"],
      { timeoutMs: 10_000 }
    );

    expect(result).toEqual({ ok: true, stdout: "out", stderr: "err", exitCode: 0 });
  });

  it("reports a non-zero exit code", async () => {
    const result = await runCapturedCommand(process.execPath, ["-e", "process.exit(3)"], {
      timeoutMs: 10_000,
    });

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(3);
    expect(result.error).toBe("Command exited with code 3");
  });

  it("reports spawn failures instead of throwing", async () => {
    const result = await runCapturedCommand("abverify-command-that-does-not-exist", [], {
      timeoutMs: 10_000,
    });

    expect(result.ok).toBe(false);
    expect(result.error).toMatch(/ENOENT/);
  });

  it("kills commands that outlive the timeout", async () => {
    const result = await runCapturedCommand(
      process.execPath,
      ["-e", "setTimeout(() => {}, 60000)"],
      { timeoutMs: 100, killGraceMs: 100 }
    );

    expect(result.ok).toBe(false);
    expect(result.timedOut).toBe(true);
    expect(result.error).toBe("Command timed out after 100ms");
  });
});
