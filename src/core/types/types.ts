export type TranscodeMode = 'convert' | 'compress';

export type QualityTier = 'high' | 'balanced' | 'compressed' | 'extreme';

export interface TranscodeRequest {
  inputPath: string;
  outputPath: string;
  mode: TranscodeMode;
  qualityTier?: QualityTier; // Only read in compress mode
}

export interface QualityPreset {
  crf: string;
  speedPreset: string; // Empty string = let the encoder pick
  audioBitrate: string;
}

export interface CodecProfile {
  videoCodec: string;
  audioCodec: string;
  qscale?: string; // Legacy containers use -qscale:v instead of -crf
}

export interface ToolPaths {
  ffmpegPath: string;
  ffprobePath: string;
}

export type ErrorKind =
  | 'ToolNotFound'
  | 'InputMissing'
  | 'InputEmpty'
  | 'InputCorrupted'
  | 'InsufficientDiskSpace'
  | 'EngineFailure'
  | 'UnexpectedFailure';

export type JobOutcome =
  | { status: 'succeeded'; outputPath: string; message: string }
  | {
      status: 'failed';
      kind: ErrorKind;
      detail: string;
      exitCode: number | null;
      message: string;
    }
  | { status: 'cancelled'; message: string };

export type JobState =
  | 'idle'
  | 'validating'
  | 'probing'
  | 'running'
  | 'cancelling'
  | 'succeeded'
  | 'failed'
  | 'cancelled';

export interface ProgressCallback {
  (percent: number): void;
}

export interface TranscodeJobEvents {
  onProgress?: ProgressCallback;
  onOutcome?: (outcome: JobOutcome) => void;
  onStateChange?: (state: JobState) => void;
}

// CLI-specific types
export interface WatchConfig {
  inputDirectory: string;
  outputDirectory: string;
  mode: TranscodeMode;
  qualityTier: QualityTier;
  outputFormat?: string; // Extension without the dot; undefined = keep the input's
  watchMode: boolean;
  processedDirectory?: string;  // Move originals here after success
  failedDirectory?: string;     // Move failed files here
  concurrency?: number;         // Number of files to process simultaneously
}

export interface QueuedFile {
  path: string;
  name: string;
  relativePath?: string;
  size: number;
  addedAt: Date;
  attempts: number;
  status: 'pending' | 'processing' | 'completed' | 'failed' | 'cancelled';
  error?: string;
}
