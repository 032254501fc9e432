import * as fs from "fs";
import * as path from "path";
import type { RuntimeContext } from "./ffmpeg-path";
import { formatCommandLine } from "../ffmpeg/command-builder";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Debug logging utility with file persistence
 */
class DebugLogger {
  private enabled: boolean = false;
  private level: LogLevel = "info";
  private logDir: string | null = null;
  private logFile: string | null = null;

  /**
   * Initialize the debug logger
   * Creates/overwrites log file on each launch
   */
  initialize(context: RuntimeContext): void {
    this.logDir = context.userDataPath || process.cwd();

    try {
      if (!fs.existsSync(this.logDir)) {
        fs.mkdirSync(this.logDir, { recursive: true });
      }

      // Fixed name so it's overwritten each launch
      this.logFile = path.join(this.logDir, "debug.log");

      const header = `${"=".repeat(80)}\n` +
        `Transcode Log - Started: ${new Date().toISOString()}\n` +
        `Platform: ${process.platform} ${process.arch}\n` +
        `Node Version: ${process.version}\n` +
        `${"=".repeat(80)}\n\n`;

      fs.writeFileSync(this.logFile, header, "utf8");
    } catch (error) {
      // Logger isn't usable yet, console is the only way out
      console.error(`[DebugLogger] Failed to initialize: ${error}`);
      this.logFile = null;
    }
  }

  /**
   * Enable or disable debug logging
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (this.logFile) {
      this.writeToFile(`\n[${new Date().toISOString()}] Debug logging ${enabled ? "ENABLED" : "DISABLED"}\n`);
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  // Debug mode lets everything through regardless of the level
  private shouldLog(level: LogLevel): boolean {
    const threshold = this.enabled ? "debug" : this.level;
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  /**
   * Log a debug message
   * Only written when debug is enabled or the level is "debug"
   */
  log(category: string, message: string, data?: unknown): void {
    if (!this.shouldLog("debug")) return;
    this.emit(category, message, data, (line) => console.log(line));
  }

  /**
   * Log initialization message (always written, even if debug is disabled)
   */
  logInit(message: string, data?: unknown): void {
    this.emit("INIT", message, data, (line) => console.log(line));
  }

  info(message: string, data?: unknown): void {
    if (!this.shouldLog("info")) return;
    this.emit("INFO", message, data, (line) => console.log(line));
  }

  warn(message: string, data?: unknown): void {
    if (!this.shouldLog("warn")) return;
    this.emit("WARN", message, data, (line) => console.warn(line));
  }

  /**
   * Log an error message
   * Always shows in console, and goes to the log file when there is one
   */
  error(message: string, data?: unknown): void {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [ERROR] ${message}`);
    this.appendEntry(`[${timestamp}] [ERROR] ${message}`, data);
  }

  /**
   * Log the engine command line, quoted so it can be pasted into a shell
   */
  logCommand(executable: string, args: readonly string[]): void {
    if (!this.shouldLog("debug")) return;
    this.log("COMMAND", "FFmpeg command", {
      commandLine: formatCommandLine(executable, args),
      args,
    });
  }

  logEngineOutput(line: string): void {
    if (!this.shouldLog("debug")) return;
    this.log("FFMPEG_STDERR", line.trim());
  }

  logFileInfo(filePath: string, fileSize: number, duration?: number): void {
    if (!this.shouldLog("debug")) return;
    this.log("FILE_INFO", "Input file information", {
      path: filePath,
      size: fileSize,
      sizeMB: (fileSize / (1024 * 1024)).toFixed(2),
      duration,
      calculatedBitrateKbps: duration && fileSize > 0
        ? ((fileSize * 8) / duration / 1000).toFixed(0)
        : undefined,
    });
  }

  getLogFilePath(): string | null {
    return this.logFile;
  }

  private emit(category: string, message: string, data: unknown, print: (line: string) => void): void {
    const logLine = `[${new Date().toISOString()}] [${category}] ${message}`;
    print(logLine);
    this.appendEntry(logLine, data);
  }

  private appendEntry(logLine: string, data: unknown): void {
    if (!this.logFile) return;
    let fileContent = logLine;
    if (data !== undefined) {
      fileContent += `\n${JSON.stringify(data, null, 2)}`;
    }
    this.writeToFile(fileContent + "\n");
  }

  private writeToFile(content: string): void {
    if (!this.logFile) return;

    try {
      fs.appendFileSync(this.logFile, content, "utf8");
    } catch (error) {
      // Report once, then stop writing to the file
      console.error(`[DebugLogger] Disabling file output: ${error}`);
      this.logFile = null;
    }
  }
}

// Singleton instance
export const debugLogger = new DebugLogger();
