export * from './types/types';
export * from './ffmpeg/presets';
export * from './ffmpeg/command-builder';
export * from './ffmpeg/progress-parser';
export * from './ffmpeg/preflight';
export * from './ffmpeg/disk-space';
export * from './ffmpeg/duration-probe';
export * from './ffmpeg/process-supervisor';
export * from './ffmpeg/transcode-job';
export * from './utils/errors';
export * from './utils/run-tool';
export { debugLogger, LOG_LEVELS, isLogLevel } from './utils/debug-logger';
export type { LogLevel } from './utils/debug-logger';
export * from './utils/ffmpeg-path';
