import { spawn } from "node:child_process";
import type { CommandOptions, CommandResult, CommandRunner } from "./types.js";

const STDERR_TAIL_BYTES = 4096;
const DEFAULT_KILL_GRACE_MS = 10_000;

function keepTail(current: string, chunk: string): string {
  const next = current + chunk;
  return next.length > STDERR_TAIL_BYTES ? next.slice(next.length - STDERR_TAIL_BYTES) : next;
}

/**
 * Spawns `command` in its own process group and resolves once the group leader
 * has exited. Timeout and abort terminate the whole group, so every worker the
 * launcher forked goes down with it. Rejects only when the process cannot be
 * started at all.
 */
export const defaultCommandRunner: CommandRunner = async (
  command,
  args,
  options: CommandOptions = {},
) => {
  const timeoutMs = options.timeoutMs ?? 0;
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

  return await new Promise<CommandResult>((resolve, reject) => {
    if (options.signal?.aborted) {
      resolve({ code: null, signal: null, stderrTail: "", timedOut: false, aborted: true });
      return;
    }

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      env: options.env ?? process.env,
      detached: process.platform !== "win32",
    });

    let stderrTail = "";
    let timedOut = false;
    let aborted = false;
    let terminating = false;
    let timer: NodeJS.Timeout | null = null;
    let killTimer: NodeJS.Timeout | null = null;

    const signalGroup = (sig: NodeJS.Signals) => {
      if (child.pid == null) {
        return;
      }
      if (process.platform === "win32") {
        child.kill(sig);
        return;
      }
      try {
        process.kill(-child.pid, sig);
      } catch {
        // Group already reaped; fall back to the leader alone.
        child.kill(sig);
      }
    };

    const terminate = () => {
      terminating = true;
      signalGroup("SIGTERM");
      if (!killTimer) {
        killTimer = setTimeout(() => signalGroup("SIGKILL"), killGraceMs);
      }
    };

    const onAbort = () => {
      aborted = true;
      terminate();
    };

    const cleanup = () => {
      if (timer) {
        clearTimeout(timer);
      }
      if (killTimer) {
        clearTimeout(killTimer);
      }
      options.signal?.removeEventListener("abort", onAbort);
    };

    child.stdout.on("data", (chunk) => {
      options.onStdout?.(String(chunk));
    });

    child.stderr.on("data", (chunk) => {
      const text = String(chunk);
      stderrTail = keepTail(stderrTail, text);
      options.onStderr?.(text);
    });

    child.on("error", (err) => {
      cleanup();
      reject(err);
    });

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeoutMs);
    }

    options.signal?.addEventListener("abort", onAbort, { once: true });

    child.on("close", (code, signal) => {
      // The leader is gone, but workers that ignored SIGTERM may still hold the group.
      if (terminating) {
        signalGroup("SIGKILL");
      }
      cleanup();
      resolve({
        code,
        signal,
        stderrTail,
        timedOut,
        aborted,
      });
    });
  });
};
