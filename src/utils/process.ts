// Child process runner for the TeX engine.
// Arguments are passed as an array and no shell is involved, so file names
// with spaces or quotes reach the engine unchanged.
import { spawn } from "node:child_process";

export interface RunOptions {
  cwd?: string;
  // Kill the process after this many milliseconds
  timeoutMs?: number;
  // Kill the process when aborted; it then resolves with a null code
  signal?: AbortSignal;
}

export interface RunResult {
  command: string;
  args: string[];
  // Exit code (null if terminated/killed)
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Run a command and collect its output. Resolves once the process exits or
 * the timeout fires; rejects only when the process cannot be started
 * (ENOENT, EACCES).
 */
export function runCommand(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
  return new Promise<RunResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
      shell: false,
    });

    let stdout = "";
    let stderr = "";
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const onAbort = () => { child.kill(); };

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      fn();
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      const limit = options.timeoutMs;
      timer = setTimeout(() => {
        child.kill();
        finish(() => resolve({
          command, args, code: null, stdout,
          stderr: stderr + `\n[timeout] process exceeded ${limit}ms`,
          timedOut: true,
        }));
      }, limit);
    }

    if (options.signal?.aborted) onAbort();
    else options.signal?.addEventListener("abort", onAbort, { once: true });

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (d: string) => { stdout += d; });
    child.stderr?.on("data", (d: string) => { stderr += d; });

    child.on("error", (err) => finish(() => reject(err)));
    child.on("close", (code) => finish(() => resolve({ command, args, code, stdout, stderr, timedOut: false })));
  });
}
