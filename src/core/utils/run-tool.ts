import { spawn } from 'child_process';

export interface ToolResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  error?: string; // Set when the process could not be started
}

export interface ToolRunOptions {
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export type ToolRunner = (command: string, args: readonly string[], options: ToolRunOptions) => Promise<ToolResult>;

/**
 * Run a short-lived tool (version query, probe) and collect its output.
 * Never rejects: spawn failures and timeouts are reported in the result.
 */
export const runTool: ToolRunner = (command, args, options) => {
  return new Promise((resolve) => {
    const proc = spawn(command, [...args], {
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let done = false;

    const finish = (result: ToolResult) => {
      if (done) return;
      done = true;
      clearTimeout(timeout);
      resolve(result);
    };

    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');
    proc.stdout.on('data', (data: string) => {
      stdout += data;
    });
    proc.stderr.on('data', (data: string) => {
      stderr += data;
    });

    proc.on('close', (code) => {
      finish({ code, stdout, stderr, timedOut });
    });

    proc.on('error', (err) => {
      finish({ code: null, stdout, stderr, timedOut: false, error: err.message });
    });

    const timeout = setTimeout(() => {
      timedOut = true;
      proc.kill('SIGKILL');
      finish({ code: null, stdout, stderr, timedOut });
    }, options.timeoutMs);
  });
};
