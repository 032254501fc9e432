import * as path from 'path';
import { CodecProfile, QualityTier, TranscodeMode } from '../types/types';
import { DEFAULT_QUALITY_TIER, getCodecProfile, getQualityPreset } from './presets';

/**
 * Codec profile for an output path, picked by its extension.
 * Unknown or missing extensions get the MP4 profile.
 */
export function resolveCodecProfile(outputPath: string): Readonly<CodecProfile> {
  return getCodecProfile(path.extname(outputPath));
}

/**
 * Build the FFmpeg argument list (without the executable).
 *
 * The engine is spawned without a shell, so paths go into argv untouched.
 * Use formatCommandLine() to get a shell-safe rendering of the same command.
 */
export function buildFfmpegArgs(
  inputPath: string,
  outputPath: string,
  mode: TranscodeMode,
  qualityTier: QualityTier = DEFAULT_QUALITY_TIER
): string[] {
  if (mode === 'convert') {
    // Stream copy: repackage only, no re-encoding
    return ['-i', inputPath, '-c:v', 'copy', '-c:a', 'copy', outputPath, '-y'];
  }

  const quality = getQualityPreset(qualityTier);
  const profile = resolveCodecProfile(outputPath);

  const args = ['-i', inputPath];

  if (profile.qscale !== undefined) {
    args.push('-c:v', profile.videoCodec, '-qscale:v', profile.qscale);
  } else {
    args.push('-c:v', profile.videoCodec, '-crf', quality.crf);
    if (quality.speedPreset) {
      args.push('-preset', quality.speedPreset);
    }
  }

  args.push('-c:a', profile.audioCodec, '-b:a', quality.audioBitrate, outputPath, '-y');

  return args;
}

const SHELL_SAFE = /^[A-Za-z0-9_\-.,:/=+@%]+$/;

/**
 * Quote a single argument for a POSIX shell.
 */
export function quoteArg(arg: string): string {
  if (arg.length > 0 && SHELL_SAFE.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function formatCommandLine(executable: string, args: readonly string[]): string {
  return [executable, ...args].map(quoteArg).join(' ');
}
