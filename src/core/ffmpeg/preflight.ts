import * as fs from 'fs';
import * as path from 'path';
import { ToolPaths } from '../types/types';
import { TranscodeError, isMissingPathError } from '../utils/errors';
import { ToolRunner } from '../utils/run-tool';
import { debugLogger } from '../utils/debug-logger';

export const TOOL_CHECK_TIMEOUT_MS = 10_000;
export const STREAM_CHECK_TIMEOUT_MS = 10_000;

/**
 * Verify that ffmpeg and ffprobe can be started and answer `-version`.
 */
export async function checkToolAvailability(tools: ToolPaths, runTool: ToolRunner): Promise<void> {
  for (const toolPath of [tools.ffmpegPath, tools.ffprobePath]) {
    const result = await runTool(toolPath, ['-version'], { timeoutMs: TOOL_CHECK_TIMEOUT_MS });
    if (result.error || result.timedOut || result.code !== 0) {
      debugLogger.warn(`[Preflight] ${toolPath} -version failed`, {
        code: result.code,
        timedOut: result.timedOut,
        error: result.error,
      });
      throw new TranscodeError(
        'ToolNotFound',
        `FFmpeg not found (${toolPath}). Install FFmpeg and add it to PATH, or set FFMPEG_PATH/FFPROBE_PATH.`
      );
    }
  }
}

/**
 * Input must exist, be non-empty and contain at least one video stream.
 * Returns the input size in bytes.
 */
export async function validateInputFile(
  inputPath: string,
  tools: ToolPaths,
  runTool: ToolRunner
): Promise<{ size: number }> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(inputPath);
  } catch (error) {
    if (isMissingPathError(error)) {
      throw new TranscodeError('InputMissing', `Input file does not exist: ${inputPath}`);
    }
    throw error;
  }

  if (!stats.isFile()) {
    throw new TranscodeError('InputMissing', `Input is not a file: ${inputPath}`);
  }

  if (stats.size === 0) {
    throw new TranscodeError('InputEmpty', `Input file is empty: ${inputPath}`);
  }

  const result = await runTool(
    tools.ffprobePath,
    ['-v', 'error', '-select_streams', 'v:0', '-show_entries', 'stream=codec_type', '-of', 'csv=p=0', inputPath],
    { timeoutMs: STREAM_CHECK_TIMEOUT_MS }
  );

  if (result.timedOut) {
    throw new TranscodeError('InputCorrupted', `Timed out validating video file: ${inputPath}`);
  }
  if (result.error || result.code !== 0) {
    throw new TranscodeError('InputCorrupted', `Not a valid video file, or the file is corrupted: ${inputPath}`);
  }
  if (!result.stdout.trim()) {
    throw new TranscodeError('InputCorrupted', `File has no valid video stream: ${inputPath}`);
  }

  return { size: stats.size };
}

/**
 * True when a file name is likely to trip up FFmpeg on some platforms:
 * very long names, or anything outside ASCII (emoji, unusual symbols).
 */
export function isFilenameProblematic(filePath: string, maxLength = 100): boolean {
  const name = path.basename(filePath);

  if (name.length > maxLength) {
    return true;
  }

  return [...name].some((char) => char.charCodeAt(0) > 127);
}
