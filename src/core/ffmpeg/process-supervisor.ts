import { spawn, SpawnOptions } from "child_process";
import type { Readable } from "stream";
import { ProgressCallback } from "../types/types";
import { TranscodeError } from "../utils/errors";
import { debugLogger } from "../utils/debug-logger";
import { createLineSplitter, parseProgress } from "./progress-parser";

export const KILL_TIMEOUT_MS = 5000;
const STDERR_TAIL_LINES = 20;

/**
 * The parts of a ChildProcess the supervisor relies on.
 */
export interface EngineProcess {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: "error", listener: (err: Error) => void): this;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnEngine = (command: string, args: readonly string[], options: SpawnOptions) => EngineProcess;

const defaultSpawn: SpawnEngine = (command, args, options) => spawn(command, [...args], options);

export type SupervisorState = "idle" | "running" | "succeeded" | "failed" | "cancelling" | "cancelled";

export type SupervisorResult =
  | { status: "succeeded" }
  | { status: "failed"; exitCode: number | null; signal: NodeJS.Signals | null; stderrTail: string[] }
  | { status: "cancelled" };

export interface SupervisorOptions {
  enginePath: string;
  spawnProcess?: SpawnEngine;
  killTimeoutMs?: number;
}

function hasExited(proc: EngineProcess): boolean {
  return proc.exitCode !== null || proc.signalCode !== null;
}

/**
 * Resolves true once the process has exited, or false after `timeoutMs`.
 * Without a timeout it waits for as long as it takes.
 */
function waitForExit(proc: EngineProcess, timeoutMs?: number): Promise<boolean> {
  if (hasExited(proc)) {
    return Promise.resolve(true);
  }

  return new Promise((resolve) => {
    let timer: ReturnType<typeof setTimeout> | undefined;
    proc.once("exit", () => {
      if (timer) clearTimeout(timer);
      resolve(true);
    });
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => resolve(false), timeoutMs);
    }
  });
}

/**
 * Owns one FFmpeg process: spawns it, turns its stderr into progress
 * percentages and stops it on request (SIGTERM, then SIGKILL after the
 * kill timeout).
 */
export class ProcessSupervisor {
  private state: SupervisorState = "idle";
  private proc: EngineProcess | null = null;
  private keepReading = false;
  private lastPercent = -1;
  private readonly spawnProcess: SpawnEngine;
  private readonly killTimeoutMs: number;

  constructor(private readonly options: SupervisorOptions) {
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.killTimeoutMs = options.killTimeoutMs ?? KILL_TIMEOUT_MS;
  }

  getState(): SupervisorState {
    return this.state;
  }

  getPid(): number | undefined {
    return this.proc?.pid;
  }

  hasSpawned(): boolean {
    return this.proc !== null;
  }

  run(args: readonly string[], totalDuration: number, onProgress?: ProgressCallback): Promise<SupervisorResult> {
    if (this.state === "cancelled") {
      return Promise.resolve({ status: "cancelled" });
    }
    if (this.state !== "idle") {
      return Promise.reject(new TranscodeError("UnexpectedFailure", `Supervisor already used (state: ${this.state})`));
    }

    return new Promise((resolve, reject) => {
      debugLogger.logCommand(this.options.enginePath, args);

      let proc: EngineProcess;
      try {
        proc = this.spawnProcess(this.options.enginePath, args, {
          stdio: ["ignore", "pipe", "pipe"],
          windowsHide: true,
        });
      } catch (error) {
        this.state = "failed";
        reject(new TranscodeError("UnexpectedFailure", `Failed to start FFmpeg: ${error instanceof Error ? error.message : String(error)}`));
        return;
      }

      this.proc = proc;
      this.state = "running";
      this.keepReading = true;

      const stderrTail: string[] = [];
      const report = (percent: number) => {
        try {
          onProgress?.(percent);
        } catch (error) {
          debugLogger.error("[FFmpeg] Progress listener threw", error);
        }
      };
      const emitProgress = (percent: number) => {
        if (percent <= this.lastPercent) return;
        this.lastPercent = percent;
        report(percent);
      };

      const splitter = createLineSplitter((line) => {
        if (!this.keepReading) return;

        const percent = parseProgress(line, totalDuration);
        if (percent !== undefined) {
          emitProgress(percent);
          return;
        }

        debugLogger.logEngineOutput(line);
        stderrTail.push(line);
        if (stderrTail.length > STDERR_TAIL_LINES) {
          stderrTail.shift();
        }
      });

      // Nothing useful on stdout, but it must be drained
      proc.stdout?.resume();
      if (proc.stderr) {
        proc.stderr.setEncoding("utf8");
        proc.stderr.on("data", (chunk: string) => splitter.push(chunk));
      }

      let settled = false;

      proc.on("error", (error) => {
        if (settled) return;
        settled = true;
        this.keepReading = false;
        this.state = "failed";
        const missing = "code" in error && error.code === "ENOENT";
        reject(
          new TranscodeError(
            missing ? "ToolNotFound" : "UnexpectedFailure",
            missing
              ? `Failed to start FFmpeg: "${this.options.enginePath}" not found`
              : `Failed to start FFmpeg: ${error.message}`
          )
        );
      });

      proc.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        splitter.flush();

        if (this.state === "cancelling" || this.state === "cancelled") {
          this.state = "cancelled";
          debugLogger.info(`[FFmpeg] Cancelled (code ${code}, signal ${signal})`);
          resolve({ status: "cancelled" });
          return;
        }

        this.keepReading = false;

        if (code === 0) {
          this.state = "succeeded";
          // Always close with 100, even if the last marker already got there
          this.lastPercent = 100;
          report(100);
          resolve({ status: "succeeded" });
          return;
        }

        this.state = "failed";
        debugLogger.error(`[FFmpeg] Exited with code ${code}${signal ? ` (signal ${signal})` : ""}`, {
          stderrTail,
        });
        resolve({ status: "failed", exitCode: code, signal, stderrTail: [...stderrTail] });
      });
    });
  }

  /**
   * Stop the running process. Only the first call escalates; later calls
   * (and calls after the process ended) do nothing. Calling this before
   * run() makes run() resolve as cancelled without spawning.
   */
  async cancel(): Promise<void> {
    if (this.state === "idle") {
      this.state = "cancelled";
      return;
    }
    if (this.state !== "running" || !this.proc) {
      return;
    }

    const proc = this.proc;
    this.state = "cancelling";
    this.keepReading = false;

    debugLogger.info("[FFmpeg] Cancelling, sending SIGTERM");
    proc.kill("SIGTERM");

    const exited = await waitForExit(proc, this.killTimeoutMs);
    if (!exited) {
      debugLogger.warn(`[FFmpeg] Still running after ${this.killTimeoutMs}ms, sending SIGKILL`);
      proc.kill("SIGKILL");
      await waitForExit(proc);
    }
  }
}
