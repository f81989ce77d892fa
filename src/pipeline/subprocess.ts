// pattern: Imperative Shell
import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";

const STDERR_TAIL_BYTES = 4096;

export type ToolRunOptions = {
  readonly cwd: string;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
};

export type ToolRun = {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;
  readonly timedOut: boolean;
  readonly cancelled: boolean;
  readonly spawnError: string | null;
};

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Kills the child together with everything it spawned. The child leads its own
 * process group (`detached`), so signalling the negative pid reaches the
 * converter processes the tool forks as well.
 */
export function killProcessGroup(child: ChildProcess): void {
  if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
    return;
  }

  if (process.platform !== "win32") {
    try {
      process.kill(-child.pid, "SIGKILL");
      return;
    } catch (err) {
      if (isErrnoException(err) && err.code === "ESRCH") return;
    }
  }
  child.kill("SIGKILL");
}

/**
 * Runs an external tool in its own session and waits for it to exit, keeping
 * the tail of stderr for diagnostics. The whole process group is killed when
 * `timeoutMs` elapses or `signal` aborts. Never rejects.
 */
export function runTool(
  command: string,
  args: ReadonlyArray<string>,
  options: ToolRunOptions,
): Promise<ToolRun> {
  return new Promise((resolve) => {
    let stderr = "";
    let timedOut = false;
    let cancelled = false;
    let settled = false;

    const child = spawn(command, args, {
      cwd: options.cwd,
      detached: true,
      stdio: ["ignore", "ignore", "pipe"],
    });

    const timeout = setTimeout(() => {
      timedOut = true;
      killProcessGroup(child);
    }, options.timeoutMs);

    const onAbort = () => {
      cancelled = true;
      killProcessGroup(child);
    };
    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    child.stderr?.on("data", (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_BYTES);
    });

    const finish = (
      exitCode: number | null,
      signal: NodeJS.Signals | null,
      spawnError: string | null,
    ) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onAbort);
      resolve({ exitCode, signal, stderr: stderr.trim(), timedOut, cancelled, spawnError });
    };

    // A failed spawn (missing binary, bad cwd) emits "error" without a pid.
    child.on("error", (err) => {
      if (child.pid === undefined) {
        finish(null, null, err.message);
      }
    });

    child.on("close", (code, signal) => {
      finish(code, signal, null);
    });
  });
}
