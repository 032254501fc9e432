import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { probeDuration } from '../core/ffmpeg/duration-probe';
import { createFakeToolRunner } from './helpers/fakes';

const tools = { ffmpegPath: 'ffmpeg', ffprobePath: '/opt/ffmpeg/bin/ffprobe' };

describe('probeDuration', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('parses the duration ffprobe prints', async () => {
    const { runTool, calls } = createFakeToolRunner(() => ({ stdout: '5.000000\n' }));
    await expect(probeDuration('/videos/clip.mkv', tools, runTool)).resolves.toBe(5);
    expect(calls[0]).toEqual({
      command: '/opt/ffmpeg/bin/ffprobe',
      args: ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', '/videos/clip.mkv'],
      options: { timeoutMs: 30_000 },
    });
  });

  it.each([
    ['a timeout', { code: null, timedOut: true }],
    ['a failed probe', { code: 1, stderr: 'Invalid data found' }],
    ['a spawn error', { code: null, error: 'spawn ffprobe ENOENT' }],
    ['empty output', { stdout: '' }],
    ['N/A', { stdout: 'N/A\n' }],
    ['a negative value', { stdout: '-3\n' }],
  ])('returns 0 for %s', async (_label, result) => {
    const { runTool } = createFakeToolRunner(() => result);
    await expect(probeDuration('/videos/clip.mkv', tools, runTool)).resolves.toBe(0);
  });
});
