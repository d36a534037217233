import { describe, it, expect } from "vitest";
import { runCommand } from "../src/utils/process.js";

// The current Node binary stands in for the TeX engine
const node = process.execPath;

describe("runCommand", () => {
  it("collects output and the exit code", async () => {
    const res = await runCommand(node, ["-e", "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"]);
    expect(res).toEqual({ command: node, args: expect.any(Array), code: 3, stdout: "out", stderr: "err", timedOut: false });
  });

  it("kills the process when the timeout fires", async () => {
    const res = await runCommand(node, ["-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 200 });
    expect(res.timedOut).toBe(true);
    expect(res.code).toBeNull();
  });

  it("kills the process when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = runCommand(node, ["-e", "setTimeout(() => {}, 10000)"], { signal: controller.signal });
    setTimeout(() => controller.abort(), 100);
    const res = await pending;
    expect(res.timedOut).toBe(false);
    expect(res.code).toBeNull();
  });

  it("rejects when the command does not exist", async () => {
    await expect(runCommand("latex-tools-no-such-binary", [])).rejects.toMatchObject({ code: "ENOENT" });
  });
});
