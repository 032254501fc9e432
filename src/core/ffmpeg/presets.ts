import { CodecProfile, QualityPreset, QualityTier } from '../types/types';

export const DEFAULT_QUALITY_TIER: QualityTier = 'balanced';

/**
 * Encoding parameters per quality tier.
 * CRF: 0-51, lower = better quality and bigger files.
 */
export const QUALITY_PRESETS: Readonly<Record<QualityTier, Readonly<QualityPreset>>> = Object.freeze({
  high: Object.freeze({ crf: '18', speedPreset: 'slow', audioBitrate: '192k' }),
  balanced: Object.freeze({ crf: '23', speedPreset: 'medium', audioBitrate: '128k' }),
  compressed: Object.freeze({ crf: '28', speedPreset: 'fast', audioBitrate: '96k' }),
  extreme: Object.freeze({ crf: '32', speedPreset: 'veryfast', audioBitrate: '64k' }),
});

export const DEFAULT_CONTAINER = '.mp4';

/**
 * Codecs required by each output container, keyed by lower-cased extension.
 * AVI has no CRF-capable encoder in this set, so it uses a fixed qscale.
 */
export const CODEC_PROFILES: Readonly<Record<string, Readonly<CodecProfile>>> = Object.freeze({
  '.mp4': Object.freeze({ videoCodec: 'libx264', audioCodec: 'aac' }),
  '.webm': Object.freeze({ videoCodec: 'libvpx-vp9', audioCodec: 'libopus' }),
  '.mov': Object.freeze({ videoCodec: 'libx264', audioCodec: 'aac' }),
  '.mkv': Object.freeze({ videoCodec: 'libx264', audioCodec: 'aac' }),
  '.avi': Object.freeze({ videoCodec: 'mpeg4', audioCodec: 'mp3', qscale: '5' }),
});

export const QUALITY_TIERS: readonly QualityTier[] = ['high', 'balanced', 'compressed', 'extreme'];

export function isQualityTier(value: string): value is QualityTier {
  return QUALITY_TIERS.some((tier) => tier === value);
}

export function getQualityPreset(tier: string | undefined): Readonly<QualityPreset> {
  if (tier !== undefined && isQualityTier(tier)) {
    return QUALITY_PRESETS[tier];
  }
  return QUALITY_PRESETS[DEFAULT_QUALITY_TIER];
}

export function getCodecProfile(extension: string): Readonly<CodecProfile> {
  const key = extension.toLowerCase();
  if (Object.prototype.hasOwnProperty.call(CODEC_PROFILES, key)) {
    return CODEC_PROFILES[key];
  }
  return CODEC_PROFILES[DEFAULT_CONTAINER];
}
