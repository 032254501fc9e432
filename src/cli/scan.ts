import * as fs from 'fs';
import * as path from 'path';
import { TranscodeMode, WatchConfig } from '../core/types/types';

// Containers the batch scanner picks up
export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4', '.mkv', '.mov', '.avi', '.wmv', '.flv', '.webm', '.m4v',
  '.mpg', '.mpeg', '.m2v', '.ts', '.mts', '.m2ts', '.vob',
  '.3gp', '.3g2', '.f4v', '.ogv', '.divx', '.asf',
]);

const EXCLUDED_DIRS = [
  '/node_modules/',
  '/.git/',
  '/dist/',
  '/build/',
  '/out/',
  '/vendor/',
];

// Partial downloads and temp files, for the watcher
export const WATCH_IGNORED: readonly (string | RegExp)[] = [
  /(^|[/\\])\../,
  '**/*.part',
  '**/*.tmp',
  '**/*.crdownload',
  '**/node_modules/**',
  '**/.git/**',
  '**/*.d.ts',
];

export interface ScannedFile {
  name: string;
  path: string;
  relativePath: string;
}

/**
 * Excluded directory names are matched below `rootDir` only, so an input
 * directory that itself sits under e.g. `out/` still yields its files.
 */
export function isVideoFile(filePath: string, rootDir?: string): boolean {
  const filename = path.basename(filePath).toLowerCase();

  // .ts is also MPEG transport stream; declaration files are not
  if (filename.endsWith('.d.ts')) {
    return false;
  }

  const scopedPath = rootDir ? path.relative(rootDir, filePath) : filePath;
  const normalizedPath = '/' + scopedPath.toLowerCase().replace(/\\/g, '/');
  if (EXCLUDED_DIRS.some((dir) => normalizedPath.includes(dir))) {
    return false;
  }

  return VIDEO_EXTENSIONS.has(path.extname(filename));
}

/**
 * Walk `dirPath` for video files, skipping dotfiles. Results are sorted by
 * relative path so batch runs are repeatable.
 */
export function scanDirectoryRecursive(dirPath: string, baseDir: string = dirPath): ScannedFile[] {
  const results: ScannedFile[] = [];

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    console.error(`Error scanning directory ${dirPath}:`, error);
    return results;
  }

  for (const entry of entries) {
    if (entry.name.startsWith('.')) {
      continue;
    }

    const fullPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      results.push(...scanDirectoryRecursive(fullPath, baseDir));
    } else if (entry.isFile() && isVideoFile(fullPath, baseDir)) {
      results.push({
        name: entry.name,
        path: fullPath,
        relativePath: path.relative(baseDir, fullPath),
      });
    }
  }

  return results.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}

/**
 * Output extension (with dot) for a batch file: .mp4 for convert, the
 * configured format for compress, else the input's own.
 */
export function outputExtensionFor(inputPath: string, mode: TranscodeMode, format?: string): string {
  if (mode === 'convert') return '.mp4';
  if (format) return `.${format}`;
  return path.extname(inputPath).toLowerCase() || '.mp4';
}

/**
 * Output path for a queued file, mirroring its subdirectory under the
 * output directory.
 */
export function outputPathFor(config: WatchConfig, inputPath: string): string {
  const relativePath = path.relative(config.inputDirectory, inputPath);
  const subDir = path.dirname(relativePath);
  const baseName = path.basename(inputPath, path.extname(inputPath));
  const fileName = baseName + outputExtensionFor(inputPath, config.mode, config.outputFormat);
  return subDir === '.' || subDir.startsWith('..')
    ? path.join(config.outputDirectory, fileName)
    : path.join(config.outputDirectory, subDir, fileName);
}
