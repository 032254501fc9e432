import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import { ToolPaths } from '../types/types';
import { debugLogger } from './debug-logger';

export const APP_NAME = 'transcode-pilot';

/**
 * Runtime context for FFmpeg path resolution
 */
export interface RuntimeContext {
  appPath: string;       // Root the CLI was started for
  resourcesPath: string; // Where a bundled ffmpeg/ directory may live
  userDataPath?: string; // User-writable data directory for logs
}

export interface ToolOverrides {
  ffmpegPath?: string;
  ffprobePath?: string;
}

function executableName(tool: 'ffmpeg' | 'ffprobe', platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? `${tool}.exe` : tool;
}

/**
 * Directories a bundled FFmpeg build is looked up in, most specific first
 */
function bundledBinCandidates(context: RuntimeContext, platform: NodeJS.Platform): string[] {
  const root = path.join(context.resourcesPath, 'ffmpeg');
  const platformFolder = platform === 'win32' ? 'windows' : platform === 'darwin' ? 'macos' : 'linux';
  return [
    path.join(root, platformFolder, 'bin'),
    path.join(root, 'bin'),
    root,
  ];
}

/**
 * Resolve ffmpeg/ffprobe executables.
 * Order: explicit overrides, FFMPEG_PATH/FFPROBE_PATH, bundled build, system PATH.
 */
export function getFfmpegToolsWithContext(
  context: RuntimeContext,
  overrides: ToolOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): ToolPaths {
  const resolveTool = (tool: 'ffmpeg' | 'ffprobe', override: string | undefined, envValue: string | undefined): string => {
    if (override) {
      return override;
    }
    if (envValue) {
      return envValue;
    }

    const executable = executableName(tool, platform);
    for (const binPath of bundledBinCandidates(context, platform)) {
      const candidate = path.join(binPath, executable);
      if (fs.existsSync(candidate)) {
        debugLogger.log('TOOLS', `Using bundled ${tool}`, { path: candidate });
        return candidate;
      }
    }

    // Fall back to system PATH
    return executable;
  };

  return {
    ffmpegPath: resolveTool('ffmpeg', overrides.ffmpegPath, env.FFMPEG_PATH),
    ffprobePath: resolveTool('ffprobe', overrides.ffprobePath, env.FFPROBE_PATH),
  };
}

/**
 * Per-platform user data directory for logs
 */
export function getUserDataPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): string {
  if (platform === 'win32') {
    return path.join(env.APPDATA || path.join(homeDir, 'AppData', 'Roaming'), APP_NAME);
  }
  if (platform === 'darwin') {
    return path.join(homeDir, 'Library', 'Application Support', APP_NAME);
  }
  return path.join(env.XDG_CONFIG_HOME || path.join(homeDir, '.config'), APP_NAME);
}

/**
 * Create a CLI runtime context
 * @param ffmpegRoot Optional directory holding a bundled ffmpeg/ folder
 */
export function createCliContext(ffmpegRoot?: string): RuntimeContext {
  const root = ffmpegRoot || process.cwd();
  return {
    appPath: root,
    resourcesPath: root,
    userDataPath: getUserDataPath(),
  };
}
