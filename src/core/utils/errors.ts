import { ErrorKind } from '../types/types';

/**
 * Single error type for every failure the core can report.
 * `kind` decides how the caller reacts (preflight kinds are never retried).
 */
export class TranscodeError extends Error {
  readonly kind: ErrorKind;
  readonly exitCode: number | null;

  constructor(kind: ErrorKind, message: string, exitCode: number | null = null) {
    super(message);
    this.name = 'TranscodeError';
    this.kind = kind;
    this.exitCode = exitCode;
  }
}

export function isTranscodeError(value: unknown): value is TranscodeError {
  return value instanceof TranscodeError;
}

const PREFLIGHT_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'ToolNotFound',
  'InputMissing',
  'InputEmpty',
  'InputCorrupted',
  'InsufficientDiskSpace',
]);

export function isPreflightKind(kind: ErrorKind): boolean {
  return PREFLIGHT_KINDS.has(kind);
}

export function toJobFailure(error: unknown): { kind: ErrorKind; detail: string; exitCode: number | null } {
  if (isTranscodeError(error)) {
    return { kind: error.kind, detail: error.message, exitCode: error.exitCode };
  }
  const detail = error instanceof Error ? error.message : String(error);
  return { kind: 'UnexpectedFailure', detail, exitCode: null };
}

/**
 * ENOENT/ENOTDIR from fs: the path (or one of its parents) is not there.
 */
export function isMissingPathError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
