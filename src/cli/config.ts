import * as fs from 'fs';
import * as yaml from 'yaml';
import { QualityTier, TranscodeMode } from '../core/types/types';
import { DEFAULT_QUALITY_TIER, QUALITY_TIERS, isQualityTier } from '../core/ffmpeg/presets';
import { LOG_LEVELS, LogLevel, isLogLevel } from '../core/utils/debug-logger';

/**
 * Options as they arrive from commander or a config file, before validation
 */
export type CliOptions = {
  input?: string;
  output?: string;
  mode?: string;
  quality?: string;
  format?: string;
  watch?: boolean;
  processedDir?: string;
  failedDir?: string;
  ffmpegPath?: string;
  ffprobePath?: string;
  concurrency?: string;
  logLevel?: string;
  debug?: boolean;
  dryRun?: boolean;
  config?: string;
};

export interface CliConfig {
  input: string;
  output: string;
  mode: TranscodeMode;
  quality: QualityTier;
  format?: string; // Without the dot
  watch: boolean;
  processedDir?: string;
  failedDir?: string;
  ffmpegPath?: string;
  ffprobePath?: string;
  concurrency: number;
  logLevel: LogLevel;
  debug: boolean;
  dryRun: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: RawConfig, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}

function readBoolean(raw: RawConfig, key: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`"${key}" must be true or false`);
  }
  return value;
}

/**
 * Parse YAML config file contents. Long directory names
 * (inputDirectory, processedDirectory, ...) are accepted as aliases.
 */
export function parseConfigFile(contents: string, source = 'config file'): CliOptions {
  let parsed: unknown;
  try {
    parsed = yaml.parse(contents);
  } catch (error) {
    throw new ConfigError(`Could not parse ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${source} must contain a mapping of options`);
  }

  return {
    input: readString(parsed, 'input', 'inputDirectory'),
    output: readString(parsed, 'output', 'outputDirectory'),
    mode: readString(parsed, 'mode'),
    quality: readString(parsed, 'quality', 'qualityTier'),
    format: readString(parsed, 'format', 'outputFormat'),
    watch: readBoolean(parsed, 'watch'),
    processedDir: readString(parsed, 'processedDir', 'processedDirectory'),
    failedDir: readString(parsed, 'failedDir', 'failedDirectory'),
    ffmpegPath: readString(parsed, 'ffmpegPath'),
    ffprobePath: readString(parsed, 'ffprobePath'),
    concurrency: readString(parsed, 'concurrency'),
    logLevel: readString(parsed, 'logLevel'),
    debug: readBoolean(parsed, 'debug'),
  };
}

export function loadConfigFile(filePath: string): CliOptions {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfigFile(contents, filePath);
}

function parseMode(value: string | undefined): TranscodeMode {
  if (value === undefined) return 'compress';
  if (value === 'convert' || value === 'compress') return value;
  throw new ConfigError(`Invalid mode "${value}" (expected convert or compress)`);
}

function parseQuality(value: string | undefined): QualityTier {
  if (value === undefined) return DEFAULT_QUALITY_TIER;
  if (isQualityTier(value)) return value;
  throw new ConfigError(`Invalid quality "${value}" (expected one of: ${QUALITY_TIERS.join(', ')})`);
}

function parseFormat(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const format = value.replace(/^\./, '').toLowerCase();
  if (!/^[a-z0-9]+$/.test(format)) {
    throw new ConfigError(`Invalid format "${value}"`);
  }
  return format;
}

function parseConcurrency(value: string | undefined): number {
  if (value === undefined) return 1;
  const concurrency = Number(value);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Invalid concurrency "${value}" (expected a whole number of 1 or more)`);
  }
  return concurrency;
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) return 'info';
  if (isLogLevel(value)) return value;
  throw new ConfigError(`Invalid log level "${value}" (expected one of: ${LOG_LEVELS.join(', ')})`);
}

/**
 * Merge command-line options over file options over defaults and validate.
 */
export function resolveCliConfig(cli: CliOptions, file: CliOptions = {}): CliConfig {
  const input = cli.input ?? file.input;
  const output = cli.output ?? file.output;

  if (!input) {
    throw new ConfigError('--input is required');
  }
  if (!output) {
    throw new ConfigError('--output is required');
  }

  return {
    input,
    output,
    mode: parseMode(cli.mode ?? file.mode),
    quality: parseQuality(cli.quality ?? file.quality),
    format: parseFormat(cli.format ?? file.format),
    watch: cli.watch ?? file.watch ?? false,
    processedDir: cli.processedDir ?? file.processedDir,
    failedDir: cli.failedDir ?? file.failedDir,
    ffmpegPath: cli.ffmpegPath ?? file.ffmpegPath,
    ffprobePath: cli.ffprobePath ?? file.ffprobePath,
    concurrency: parseConcurrency(cli.concurrency ?? file.concurrency),
    logLevel: parseLogLevel(cli.logLevel ?? file.logLevel),
    debug: cli.debug ?? file.debug ?? false,
    dryRun: cli.dryRun ?? false,
  };
}
