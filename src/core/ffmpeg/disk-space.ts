import * as fs from 'fs';
import * as path from 'path';
import { TranscodeError, isMissingPathError } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

export const DISK_SPACE_MARGIN = 1.1; // 10% on top of the estimate
const MB = 1024 * 1024;

export type FreeSpaceReader = (directory: string) => Promise<number>;

export const readFreeBytes: FreeSpaceReader = async (directory) => {
  const stats = await fs.promises.statfs(directory);
  return stats.bavail * stats.bsize;
};

async function statIfExists(target: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(target);
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw error;
  }
}

async function nearestExistingDirectory(target: string): Promise<string> {
  let current = path.resolve(target);
  for (;;) {
    const stats = await statIfExists(current);
    if (stats?.isDirectory()) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return current;
    }
    current = parent;
  }
}

/**
 * Fail with InsufficientDiskSpace when the output volume can't hold
 * `requiredBytes` plus the safety margin. An existing output file is
 * overwritten, so its size is credited back. Advisory only: when free
 * space can't be read the job goes ahead.
 */
export async function checkDiskSpace(
  outputPath: string,
  requiredBytes: number,
  readFree: FreeSpaceReader = readFreeBytes
): Promise<void> {
  let required = requiredBytes;
  let freeBytes: number;

  try {
    const existing = await statIfExists(outputPath);
    if (existing?.isFile()) {
      required -= existing.size;
    }
    const directory = await nearestExistingDirectory(path.dirname(outputPath));
    freeBytes = await readFree(directory);
  } catch (error) {
    debugLogger.warn(`[Disk] Could not determine free space for ${outputPath}, continuing: ${error}`);
    return;
  }

  const needed = required * DISK_SPACE_MARGIN;
  debugLogger.log('DISK', 'Disk space check', {
    requiredMB: Math.ceil(required / MB),
    freeMB: Math.floor(freeBytes / MB),
  });

  if (freeBytes < needed) {
    const shortfallMb = Math.ceil((needed - freeBytes) / MB);
    throw new TranscodeError(
      'InsufficientDiskSpace',
      `Insufficient disk space: ${Math.ceil(required / MB)}MB required, ${shortfallMb}MB short`
    );
  }
}
