import { spawn as nodeSpawn } from "node:child_process";
import { Readable } from "node:stream";
import { ProcessError } from "../errors.js";
import type { ProcessHandle, ProcessManager, SpawnOptions } from "../interfaces/process-manager.js";

/**
 * ProcessManager over node:child_process. Output streams are exposed as web
 * ReadableStreams through Readable.toWeb().
 */
export class NodeProcessManager implements ProcessManager {
  spawn(options: SpawnOptions): ProcessHandle {
    const child = nodeSpawn(options.command, options.args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    if (typeof child.pid !== "number") {
      // The "error" event still follows; the throw below is the report
      child.on("error", () => undefined);
      throw new ProcessError(`Failed to spawn ${options.command}`);
    }
    const pid = child.pid;

    const stdout = child.stdout
      ? (Readable.toWeb(child.stdout) as ReadableStream<Uint8Array>)
      : null;
    const stderr = child.stderr
      ? (Readable.toWeb(child.stderr) as ReadableStream<Uint8Array>)
      : null;

    // ENOENT and friends arrive as "error" events after spawn() returns
    const exited = new Promise<number | null>((resolve) => {
      child.on("exit", (code, signal) => {
        // null code when killed by signal
        resolve(signal ? null : (code ?? null));
      });
      child.on("error", () => {
        resolve(null);
      });
    });

    return {
      pid,
      exited,
      kill(signal: "SIGTERM" | "SIGKILL" | "SIGINT" = "SIGTERM") {
        if (child.exitCode !== null || child.signalCode !== null) return;
        child.kill(signal);
      },
      stdout,
      stderr,
    };
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }
}
