import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RuntimeContext, createCliContext, getFfmpegToolsWithContext, getUserDataPath } from '../core/utils/ffmpeg-path';

describe('getFfmpegToolsWithContext', () => {
  let root: string;
  let context: RuntimeContext;

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'tools-'));
    context = { appPath: root, resourcesPath: root };
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it('falls back to the bare names on PATH', () => {
    expect(getFfmpegToolsWithContext(context, {}, {}, 'linux')).toEqual({ ffmpegPath: 'ffmpeg', ffprobePath: 'ffprobe' });
  });

  it('adds .exe on Windows', () => {
    expect(getFfmpegToolsWithContext(context, {}, {}, 'win32')).toEqual({
      ffmpegPath: 'ffmpeg.exe',
      ffprobePath: 'ffprobe.exe',
    });
  });

  it('prefers environment variables over PATH', () => {
    const env = { FFMPEG_PATH: '/opt/ff/ffmpeg', FFPROBE_PATH: '/opt/ff/ffprobe' };
    expect(getFfmpegToolsWithContext(context, {}, env, 'linux')).toEqual({
      ffmpegPath: '/opt/ff/ffmpeg',
      ffprobePath: '/opt/ff/ffprobe',
    });
  });

  it('prefers explicit overrides over everything else', () => {
    const env = { FFMPEG_PATH: '/opt/ff/ffmpeg' };
    const tools = getFfmpegToolsWithContext(context, { ffmpegPath: '/custom/ffmpeg' }, env, 'linux');
    expect(tools).toEqual({ ffmpegPath: '/custom/ffmpeg', ffprobePath: 'ffprobe' });
  });

  it('finds a bundled build, platform folder first', async () => {
    const platformBin = path.join(root, 'ffmpeg', 'linux', 'bin');
    const sharedBin = path.join(root, 'ffmpeg', 'bin');
    await fs.promises.mkdir(platformBin, { recursive: true });
    await fs.promises.mkdir(sharedBin, { recursive: true });
    await fs.promises.writeFile(path.join(platformBin, 'ffmpeg'), '');
    await fs.promises.writeFile(path.join(sharedBin, 'ffmpeg'), '');
    await fs.promises.writeFile(path.join(sharedBin, 'ffprobe'), '');

    expect(getFfmpegToolsWithContext(context, {}, {}, 'linux')).toEqual({
      ffmpegPath: path.join(platformBin, 'ffmpeg'),
      ffprobePath: path.join(sharedBin, 'ffprobe'),
    });
  });
});

describe('getUserDataPath', () => {
  it('uses XDG_CONFIG_HOME on Linux when set', () => {
    expect(getUserDataPath('linux', { XDG_CONFIG_HOME: '/xdg' }, '/home/user')).toBe(path.join('/xdg', 'transcode-pilot'));
    expect(getUserDataPath('linux', {}, '/home/user')).toBe(path.join('/home/user', '.config', 'transcode-pilot'));
  });

  it('uses Application Support on macOS', () => {
    expect(getUserDataPath('darwin', {}, '/Users/user')).toBe(
      path.join('/Users/user', 'Library', 'Application Support', 'transcode-pilot')
    );
  });
});

describe('createCliContext', () => {
  it('roots the context at the given directory', () => {
    const context = createCliContext('/opt/pilot');
    expect(context.appPath).toBe('/opt/pilot');
    expect(context.resourcesPath).toBe('/opt/pilot');
    expect(context.userDataPath).toBeTruthy();
  });
});
