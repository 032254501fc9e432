import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isVideoFile, outputExtensionFor, outputPathFor, scanDirectoryRecursive } from '../cli/scan';
import { WatchConfig } from '../core/types/types';

describe('isVideoFile', () => {
  it('accepts known video containers in any case', () => {
    expect(isVideoFile('/media/clip.MKV')).toBe(true);
    expect(isVideoFile('/media/broadcast.ts')).toBe(true);
  });

  it('rejects declaration files, other files and excluded directories', () => {
    expect(isVideoFile('/src/types.d.ts')).toBe(false);
    expect(isVideoFile('/media/notes.txt')).toBe(false);
    expect(isVideoFile('/project/node_modules/pkg/sample.mp4')).toBe(false);
  });

  it('matches excluded directories only below the given root', () => {
    expect(isVideoFile('/renders/out/raw/clip.mkv', '/renders/out/raw')).toBe(true);
    expect(isVideoFile('/renders/out/raw/build/clip.mkv', '/renders/out/raw')).toBe(false);
  });
});

describe('scanDirectoryRecursive', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'scan-'));
    await fs.promises.mkdir(path.join(root, 'day2'), { recursive: true });
    await fs.promises.mkdir(path.join(root, '.hidden'), { recursive: true });
    for (const file of ['b.mp4', 'a.mov', 'readme.txt', '.partial.mp4', 'day2/c.avi', '.hidden/d.mp4']) {
      await fs.promises.writeFile(path.join(root, file), 'x');
    }
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it('finds video files below the root, sorted, skipping dotfiles', () => {
    const files = scanDirectoryRecursive(root);
    expect(files.map((f) => f.relativePath)).toEqual(['a.mov', 'b.mp4', path.join('day2', 'c.avi')]);
    expect(files[2]).toEqual({ name: 'c.avi', path: path.join(root, 'day2', 'c.avi'), relativePath: path.join('day2', 'c.avi') });
  });

  it('scans an input directory that sits under an excluded directory name', async () => {
    const nested = path.join(root, 'out', 'raw');
    await fs.promises.mkdir(path.join(nested, 'dist'), { recursive: true });
    await fs.promises.writeFile(path.join(nested, 'clip.mkv'), 'x');
    await fs.promises.writeFile(path.join(nested, 'dist', 'skipped.mkv'), 'x');

    expect(scanDirectoryRecursive(nested).map((f) => f.relativePath)).toEqual(['clip.mkv']);
  });
});

describe('output naming', () => {
  const config: WatchConfig = {
    inputDirectory: '/media/in',
    outputDirectory: '/media/out',
    mode: 'compress',
    qualityTier: 'balanced',
    watchMode: false,
  };

  it('picks the extension by mode and format', () => {
    expect(outputExtensionFor('/media/in/a.MOV', 'convert')).toBe('.mp4');
    expect(outputExtensionFor('/media/in/a.MOV', 'compress', 'webm')).toBe('.webm');
    expect(outputExtensionFor('/media/in/a.MOV', 'compress')).toBe('.mov');
  });

  it('mirrors subdirectories under the output directory', () => {
    expect(outputPathFor(config, '/media/in/2024/june/a.avi')).toBe(path.join('/media/out', '2024', 'june', 'a.avi'));
    expect(outputPathFor({ ...config, mode: 'convert' }, '/media/in/a.avi')).toBe(path.join('/media/out', 'a.mp4'));
  });

  it('places files from outside the input directory at the top level', () => {
    expect(outputPathFor(config, '/elsewhere/a.mkv')).toBe(path.join('/media/out', 'a.mkv'));
  });
});
