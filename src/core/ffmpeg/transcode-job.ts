import { randomUUID } from "crypto";
import * as fs from "fs";
import * as path from "path";
import {
  JobOutcome,
  JobState,
  ToolPaths,
  TranscodeJobEvents,
  TranscodeMode,
  TranscodeRequest,
} from "../types/types";
import { TranscodeError, isMissingPathError, toJobFailure } from "../utils/errors";
import { ToolRunner, runTool as defaultRunTool } from "../utils/run-tool";
import { debugLogger } from "../utils/debug-logger";
import { buildFfmpegArgs } from "./command-builder";
import { DEFAULT_QUALITY_TIER } from "./presets";
import { checkToolAvailability, isFilenameProblematic, validateInputFile } from "./preflight";
import { FreeSpaceReader, checkDiskSpace, readFreeBytes } from "./disk-space";
import { probeDuration } from "./duration-probe";
import { ProcessSupervisor, SpawnEngine } from "./process-supervisor";

export const CONVERT_CONTAINER = ".mp4";

/** Output is estimated at up to twice the input size. */
export const DISK_ESTIMATE_FACTOR = 2;

export interface TranscodeJobOptions {
  tools: ToolPaths;
  runTool?: ToolRunner;
  spawnProcess?: SpawnEngine;
  readFreeBytes?: FreeSpaceReader;
  killTimeoutMs?: number;
  cleanupPartialOutput?: boolean;
}

/**
 * Convert mode always writes the canonical container; compress mode keeps
 * the caller's extension, which picks the codec profile.
 */
export function resolveOutputPath(outputPath: string, mode: TranscodeMode): string {
  if (mode !== "convert") {
    return outputPath;
  }
  const ext = path.extname(outputPath);
  if (ext.toLowerCase() === CONVERT_CONTAINER) {
    return outputPath;
  }
  return outputPath.slice(0, outputPath.length - ext.length) + CONVERT_CONTAINER;
}

/**
 * Absolute path with forward slashes, the form handed to FFmpeg on every platform.
 */
export function normalizeMediaPath(filePath: string): string {
  return path.resolve(filePath).split(path.sep).join("/");
}

class JobCancelledSignal {}

/**
 * One transcode from request to outcome. Runs preflight, disk check,
 * duration probe and the supervised FFmpeg process in order, and reports
 * exactly one outcome through `onOutcome` and `done`.
 */
export class TranscodeJob {
  readonly id: string = randomUUID();
  readonly request: Readonly<TranscodeRequest>;
  private state: JobState = "idle";
  private cancelRequested = false;
  private supervisor: ProcessSupervisor | null = null;
  private outputPath: string;
  private runPromise: Promise<JobOutcome> | null = null;
  private readonly runTool: ToolRunner;

  constructor(
    request: TranscodeRequest,
    private readonly options: TranscodeJobOptions,
    private readonly events: TranscodeJobEvents = {}
  ) {
    this.request = Object.freeze({ ...request });
    this.outputPath = resolveOutputPath(request.outputPath, request.mode);
    this.runTool = options.runTool ?? defaultRunTool;
  }

  getState(): JobState {
    return this.state;
  }

  /** Output path after container resolution and normalization. */
  getOutputPath(): string {
    return this.outputPath;
  }

  /**
   * Start the job. Calling it again returns the same run.
   */
  start(): Promise<JobOutcome> {
    if (!this.runPromise) {
      this.runPromise = this.run();
    }
    return this.runPromise;
  }

  /** Resolves with the outcome; never rejects. */
  get done(): Promise<JobOutcome> {
    return this.start();
  }

  /**
   * Request cancellation. Before the engine starts this just stops the
   * pipeline at the next stage; afterwards it escalates SIGTERM -> SIGKILL.
   */
  async cancel(): Promise<void> {
    if (this.cancelRequested) return;
    this.cancelRequested = true;
    if (this.supervisor && this.state === "running") {
      this.setState("cancelling");
      await this.supervisor.cancel();
    }
  }

  private setState(state: JobState): void {
    if (this.state === state) return;
    this.state = state;
    this.notify("onStateChange", () => this.events.onStateChange?.(state));
  }

  // A throwing listener is logged and must not change the outcome
  private notify(name: keyof TranscodeJobEvents, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      debugLogger.error(`[Job ${this.id}] ${name} listener threw`, error);
    }
  }

  private throwIfCancelled(): void {
    if (this.cancelRequested) {
      throw new JobCancelledSignal();
    }
  }

  private async run(): Promise<JobOutcome> {
    let outcome: JobOutcome;
    try {
      outcome = await this.execute();
    } catch (error) {
      if (error instanceof JobCancelledSignal) {
        outcome = { status: "cancelled", message: "Transcode cancelled by user" };
      } else {
        const failure = toJobFailure(error);
        outcome = { status: "failed", ...failure, message: failure.detail };
      }
    }

    const engineStarted = this.supervisor?.hasSpawned() ?? false;
    if (outcome.status !== "succeeded" && engineStarted && this.options.cleanupPartialOutput !== false) {
      await this.removePartialOutput();
    }

    this.setState(outcome.status);
    if (outcome.status === "failed") {
      debugLogger.error(`[Job ${this.id}] ${outcome.kind}: ${outcome.detail}`);
    } else {
      debugLogger.info(`[Job ${this.id}] ${outcome.message}`);
    }
    this.notify("onOutcome", () => this.events.onOutcome?.(outcome));
    return outcome;
  }

  private async execute(): Promise<JobOutcome> {
    const { tools } = this.options;
    const { inputPath, mode } = this.request;
    const qualityTier = this.request.qualityTier ?? DEFAULT_QUALITY_TIER;

    this.throwIfCancelled();
    this.setState("validating");

    await checkToolAvailability(tools, this.runTool);
    this.throwIfCancelled();

    const { size: inputSize } = await validateInputFile(inputPath, tools, this.runTool);
    this.throwIfCancelled();

    if (isFilenameProblematic(inputPath) || isFilenameProblematic(this.outputPath)) {
      debugLogger.warn(`[Job ${this.id}] File name may cause problems for FFmpeg (very long or non-ASCII)`, {
        inputPath,
        outputPath: this.outputPath,
      });
    }

    await checkDiskSpace(
      this.outputPath,
      inputSize * DISK_ESTIMATE_FACTOR,
      this.options.readFreeBytes ?? readFreeBytes
    );
    await fs.promises.mkdir(path.dirname(path.resolve(this.outputPath)), { recursive: true });
    this.throwIfCancelled();

    const normalizedInput = normalizeMediaPath(inputPath);
    this.outputPath = normalizeMediaPath(this.outputPath);
    debugLogger.log("PATHS", "Resolved paths", { input: normalizedInput, output: this.outputPath });

    this.setState("probing");
    const totalDuration = await probeDuration(normalizedInput, tools, this.runTool);
    debugLogger.logFileInfo(normalizedInput, inputSize, totalDuration);
    this.throwIfCancelled();

    const args = buildFfmpegArgs(normalizedInput, this.outputPath, mode, qualityTier);

    const supervisor = new ProcessSupervisor({
      enginePath: tools.ffmpegPath,
      spawnProcess: this.options.spawnProcess,
      killTimeoutMs: this.options.killTimeoutMs,
    });
    this.supervisor = supervisor;

    this.setState("running");
    const result = await supervisor.run(args, totalDuration, (percent) =>
      this.notify("onProgress", () => this.events.onProgress?.(percent))
    );

    switch (result.status) {
      case "succeeded":
        return {
          status: "succeeded",
          outputPath: this.outputPath,
          message: `Transcode complete: ${this.outputPath}`,
        };
      case "cancelled":
        throw new JobCancelledSignal();
      case "failed": {
        const exitDescription = result.exitCode !== null ? `code ${result.exitCode}` : `signal ${result.signal}`;
        let detail = `FFmpeg exited with ${exitDescription}`;
        if (result.stderrTail.length > 0) {
          detail += `\n\nError output:\n${result.stderrTail.join("\n")}`;
        }
        throw new TranscodeError("EngineFailure", detail, result.exitCode);
      }
    }
  }

  private async removePartialOutput(): Promise<void> {
    try {
      await fs.promises.unlink(this.outputPath);
      debugLogger.info(`[Job ${this.id}] Removed partial output ${this.outputPath}`);
    } catch (error) {
      if (!isMissingPathError(error)) {
        debugLogger.warn(`[Job ${this.id}] Could not remove partial output: ${error}`);
      }
    }
  }
}

/**
 * Create and start a job. Progress and outcome arrive through `events`;
 * `job.done` resolves with the same outcome.
 */
export function startTranscodeJob(
  request: TranscodeRequest,
  options: TranscodeJobOptions,
  events: TranscodeJobEvents = {}
): TranscodeJob {
  const job = new TranscodeJob(request, options, events);
  job.start().catch((error: unknown) => {
    debugLogger.error(`[Job ${job.id}] Unhandled job error: ${error}`);
  });
  return job;
}

export function cancelTranscodeJob(job: TranscodeJob): Promise<void> {
  return job.cancel();
}
