// FFmpeg status line: "frame=  120 fps= 60 q=28.0 size=  256kB time=00:00:02.50 bitrate= 838.9kbits/s speed=2.01x"
const TIME_MARKER = /time=(\d+:\d+:\d+\.\d+)/;

/**
 * Parse "HH:MM:SS.ff" into seconds. Returns undefined for anything else.
 */
export function parseTimecode(value: string): number | undefined {
  const parts = value.trim().split(':');
  if (parts.length !== 3) {
    return undefined;
  }

  const [hours, minutes, seconds] = parts.map((part) => Number(part));
  if (![hours, minutes, seconds].every(Number.isFinite)) {
    return undefined;
  }

  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Percentage (0-100) for one diagnostic line, or undefined when the line
 * carries no time marker or the total duration is unknown.
 */
export function parseProgress(line: string, totalDuration: number): number | undefined {
  if (!(totalDuration > 0)) {
    return undefined;
  }

  const match = TIME_MARKER.exec(line);
  if (!match) {
    return undefined;
  }

  const elapsed = parseTimecode(match[1]);
  if (elapsed === undefined) {
    return undefined;
  }

  const percent = Math.floor((elapsed / totalDuration) * 100);
  return Math.min(100, Math.max(0, percent));
}

export interface LineSplitter {
  push(chunk: string): void;
  flush(): void;
}

/**
 * Incremental line splitter for the diagnostic stream.
 * FFmpeg terminates status lines with "\r", so CR, LF and CRLF all end a line.
 */
export function createLineSplitter(onLine: (line: string) => void): LineSplitter {
  let buffer = '';

  return {
    push(chunk: string) {
      buffer += chunk;
      const lines = buffer.split(/\r\n|\r|\n/);
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        if (line.length > 0) {
          onLine(line);
        }
      }
    },
    flush() {
      const rest = buffer;
      buffer = '';
      if (rest.length > 0) {
        onLine(rest);
      }
    },
  };
}
