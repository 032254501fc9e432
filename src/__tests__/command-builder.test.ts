import { describe, expect, it } from 'vitest';
import { buildFfmpegArgs, formatCommandLine, quoteArg, resolveCodecProfile } from '../core/ffmpeg/command-builder';
import { CODEC_PROFILES, QUALITY_PRESETS, QUALITY_TIERS, getCodecProfile, getQualityPreset } from '../core/ffmpeg/presets';

describe('presets', () => {
  it('maps every tier to its preset', () => {
    expect(getQualityPreset('high')).toEqual({ crf: '18', speedPreset: 'slow', audioBitrate: '192k' });
    expect(getQualityPreset('extreme')).toEqual({ crf: '32', speedPreset: 'veryfast', audioBitrate: '64k' });
  });

  it('falls back to balanced for unknown or missing tiers', () => {
    expect(getQualityPreset('ultra')).toBe(QUALITY_PRESETS.balanced);
    expect(getQualityPreset(undefined)).toBe(QUALITY_PRESETS.balanced);
  });

  it('looks up codec profiles case-insensitively', () => {
    expect(getCodecProfile('.WEBM')).toEqual({ videoCodec: 'libvpx-vp9', audioCodec: 'libopus' });
  });

  it('does not treat inherited object keys as containers', () => {
    expect(getCodecProfile('constructor')).toBe(CODEC_PROFILES['.mp4']);
  });

  it('tables cannot be modified', () => {
    expect(Object.isFrozen(QUALITY_PRESETS)).toBe(true);
    expect(Object.isFrozen(QUALITY_PRESETS.high)).toBe(true);
    expect(Object.isFrozen(CODEC_PROFILES['.avi'])).toBe(true);
  });
});

describe('resolveCodecProfile', () => {
  it.each(Object.keys(CODEC_PROFILES))('selects the registered profile for %s', (ext) => {
    expect(resolveCodecProfile(`/videos/out${ext}`)).toBe(CODEC_PROFILES[ext]);
  });

  it.each(['/videos/out.flv', '/videos/out', '/videos/out.'])('falls back to MP4 for %s', (output) => {
    expect(resolveCodecProfile(output)).toBe(CODEC_PROFILES['.mp4']);
  });
});

describe('buildFfmpegArgs', () => {
  it('copies both streams in convert mode', () => {
    expect(buildFfmpegArgs('in.avi', 'out.mp4', 'convert')).toEqual([
      '-i', 'in.avi', '-c:v', 'copy', '-c:a', 'copy', 'out.mp4', '-y',
    ]);
  });

  it('never adds quality arguments in convert mode', () => {
    for (const tier of QUALITY_TIERS) {
      const args = buildFfmpegArgs('in.mkv', 'out.avi', 'convert', tier);
      expect(args).not.toContain('-crf');
      expect(args).not.toContain('-qscale:v');
      expect(args).not.toContain('-preset');
    }
  });

  it('builds the balanced MKV command', () => {
    expect(buildFfmpegArgs('clip.mkv', 'out.mkv', 'compress', 'balanced')).toEqual([
      '-i', 'clip.mkv',
      '-c:v', 'libx264', '-crf', '23', '-preset', 'medium',
      '-c:a', 'aac', '-b:a', '128k',
      'out.mkv', '-y',
    ]);
  });

  it('uses qscale and no CRF for AVI', () => {
    expect(buildFfmpegArgs('clip.avi', 'out.avi', 'compress', 'high')).toEqual([
      '-i', 'clip.avi',
      '-c:v', 'mpeg4', '-qscale:v', '5',
      '-c:a', 'mp3', '-b:a', '192k',
      'out.avi', '-y',
    ]);
  });

  it('uses CRF and no qscale for every other container', () => {
    for (const ext of ['.mp4', '.webm', '.mov', '.mkv', '.flv']) {
      const args = buildFfmpegArgs('in.mov', `out${ext}`, 'compress', 'compressed');
      expect(args).toContain('-crf');
      expect(args).not.toContain('-qscale:v');
    }
  });

  it('defaults to the balanced tier', () => {
    const args = buildFfmpegArgs('in.mov', 'out.webm', 'compress');
    expect(args.slice(2)).toEqual([
      '-c:v', 'libvpx-vp9', '-crf', '23', '-preset', 'medium',
      '-c:a', 'libopus', '-b:a', '128k',
      'out.webm', '-y',
    ]);
  });

  it('passes paths with spaces and quotes through untouched', () => {
    const args = buildFfmpegArgs("/tmp/my clip's.mov", '/tmp/out dir/result.mp4', 'convert');
    expect(args[1]).toBe("/tmp/my clip's.mov");
    expect(args[6]).toBe('/tmp/out dir/result.mp4');
  });
});

describe('quoteArg', () => {
  it('leaves plain arguments alone', () => {
    expect(quoteArg('-c:v')).toBe('-c:v');
    expect(quoteArg('/tmp/out.mp4')).toBe('/tmp/out.mp4');
  });

  it('single-quotes arguments with spaces or shell characters', () => {
    expect(quoteArg('my clip.mp4')).toBe("'my clip.mp4'");
    expect(quoteArg('a;rm -rf b')).toBe("'a;rm -rf b'");
    expect(quoteArg('')).toBe("''");
  });

  it('escapes embedded single quotes', () => {
    expect(quoteArg("it's.mp4")).toBe("'it'\\''s.mp4'");
  });

  it('renders a full command line', () => {
    expect(formatCommandLine('ffmpeg', ['-i', 'my clip.mov', 'out.mp4', '-y'])).toBe(
      "ffmpeg -i 'my clip.mov' out.mp4 -y"
    );
  });
});
