import { ToolPaths } from '../types/types';
import { ToolRunner } from '../utils/run-tool';
import { debugLogger } from '../utils/debug-logger';

export const DURATION_PROBE_TIMEOUT_MS = 30_000;

/**
 * Total media duration in seconds via ffprobe.
 * Returns 0 (unknown) on any failure; the job then runs without percentages.
 */
export async function probeDuration(inputPath: string, tools: ToolPaths, runTool: ToolRunner): Promise<number> {
  const result = await runTool(
    tools.ffprobePath,
    ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', inputPath],
    { timeoutMs: DURATION_PROBE_TIMEOUT_MS }
  );

  if (result.timedOut) {
    debugLogger.warn(`[Duration] ffprobe timed out after ${DURATION_PROBE_TIMEOUT_MS / 1000}s for ${inputPath}`);
    return 0;
  }
  if (result.error || result.code !== 0) {
    debugLogger.warn(`[Duration] ffprobe failed with code ${result.code}`, { error: result.error });
    return 0;
  }

  const raw = result.stdout.trim();
  const duration = raw === '' ? NaN : Number(raw);
  if (!Number.isFinite(duration) || duration < 0) {
    debugLogger.warn(`[Duration] Could not parse duration from ffprobe output: "${raw.substring(0, 100)}"`);
    return 0;
  }

  return duration;
}
