#!/usr/bin/env node
import { Command } from 'commander';
import * as chokidar from 'chokidar';
import * as fs from 'fs';
import * as path from 'path';
import { ProcessingQueue } from './queue';
import { CliConfig, CliOptions, ConfigError, loadConfigFile, resolveCliConfig } from './config';
import { formatBytes, formatProgressLine, formatTime } from './format';
import { WATCH_IGNORED, isVideoFile, outputExtensionFor, outputPathFor, scanDirectoryRecursive } from './scan';
import { createCliContext, getFfmpegToolsWithContext } from '../core/utils/ffmpeg-path';
import { debugLogger } from '../core/utils/debug-logger';
import { isMissingPathError } from '../core/utils/errors';
import { buildFfmpegArgs, formatCommandLine } from '../core/ffmpeg/command-builder';
import { resolveOutputPath, startTranscodeJob } from '../core/ffmpeg/transcode-job';
import { QUALITY_TIERS } from '../core/ffmpeg/presets';
import { ToolPaths, TranscodeRequest, WatchConfig } from '../core/types/types';

const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_CANCELLED = 130;

const program = new Command();

program
  .name('transcode-pilot')
  .description('Convert or compress video files with FFmpeg - single files, batches and watched directories')
  .version('1.0.0')
  .option('-i, --input <path>', 'Input video file or directory')
  .option('-o, --output <path>', 'Output file or directory')
  .option('-c, --config <file>', 'Path to YAML config file')
  .option('-m, --mode <mode>', 'convert (stream copy to MP4) or compress (re-encode)')
  .option('-q, --quality <tier>', `Compression quality: ${QUALITY_TIERS.join(', ')}`)
  .option('--format <ext>', 'Output container for compress mode in batches (e.g. mp4, mkv, webm)')
  .option('-w, --watch', 'Continuous monitoring mode (watch for new files)')
  .option('--processed-dir <dir>', 'Move original files here after successful processing')
  .option('--failed-dir <dir>', 'Move failed files here')
  .option('--ffmpeg-path <path>', 'Path to the ffmpeg executable')
  .option('--ffprobe-path <path>', 'Path to the ffprobe executable')
  .option('--concurrency <num>', 'Number of files to process simultaneously')
  .option('--log-level <level>', 'Log level: debug, info, warn, error')
  .option('--debug', 'Write a debug log to the user data directory')
  .option('--dry-run', 'Print the FFmpeg command lines without running them');

function describeCommand(request: TranscodeRequest, tools: ToolPaths): string {
  const outputPath = resolveOutputPath(request.outputPath, request.mode);
  const args = buildFfmpegArgs(request.inputPath, outputPath, request.mode, request.qualityTier);
  return formatCommandLine(tools.ffmpegPath, args);
}

/**
 * Cancel on Ctrl+C / SIGTERM. Returns a function that removes the handlers.
 */
function onInterrupt(handler: () => void): () => void {
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}

function singleOutputPath(config: CliConfig): string {
  const isDirectory =
    /[/\\]$/.test(config.output) || (fs.existsSync(config.output) && fs.statSync(config.output).isDirectory());
  if (!isDirectory) {
    return config.output;
  }
  const baseName = path.basename(config.input, path.extname(config.input));
  return path.join(config.output, baseName + outputExtensionFor(config.input, config.mode, config.format));
}

async function runSingleFile(config: CliConfig, tools: ToolPaths): Promise<number> {
  const request: TranscodeRequest = {
    inputPath: config.input,
    outputPath: singleOutputPath(config),
    mode: config.mode,
    qualityTier: config.quality,
  };

  if (config.dryRun) {
    console.log(describeCommand(request, tools));
    return EXIT_OK;
  }

  const name = path.basename(config.input);
  const startTime = Date.now();

  const job = startTranscodeJob(
    request,
    { tools },
    {
      onProgress: (percent) => {
        process.stdout.write(`\r${formatProgressLine(name, percent, (Date.now() - startTime) / 1000)}    `);
      },
    }
  );

  const removeHandlers = onInterrupt(() => {
    console.log('\n[Cancel] Stopping FFmpeg...');
    job.cancel().catch((error: unknown) => console.error(`[Cancel] ${error}`));
  });

  const outcome = await job.done;
  removeHandlers();
  process.stdout.write('\n');

  switch (outcome.status) {
    case 'succeeded':
      console.log(`[Complete] ${outcome.message}`);
      return EXIT_OK;
    case 'cancelled':
      console.log(`[Cancelled] ${outcome.message}`);
      return EXIT_CANCELLED;
    case 'failed':
      console.error(`[Failed] ${outcome.kind}: ${outcome.message}`);
      return EXIT_FAILED;
  }
}

async function runDirectory(config: CliConfig, tools: ToolPaths): Promise<number> {
  const watchConfig: WatchConfig = {
    inputDirectory: path.resolve(config.input),
    outputDirectory: path.resolve(config.output),
    mode: config.mode,
    qualityTier: config.quality,
    outputFormat: config.format,
    watchMode: config.watch,
    processedDirectory: config.processedDir ? path.resolve(config.processedDir) : undefined,
    failedDirectory: config.failedDir ? path.resolve(config.failedDir) : undefined,
    concurrency: config.concurrency,
  };

  if (config.dryRun) {
    for (const file of scanDirectoryRecursive(watchConfig.inputDirectory)) {
      const request: TranscodeRequest = {
        inputPath: file.path,
        outputPath: outputPathFor(watchConfig, file.path),
        mode: watchConfig.mode,
        qualityTier: watchConfig.qualityTier,
      };
      console.log(describeCommand(request, tools));
    }
    return EXIT_OK;
  }

  await fs.promises.mkdir(watchConfig.outputDirectory, { recursive: true });

  console.log('');
  console.log('  Transcode Pilot');
  console.log('');
  console.log(`  Input:       ${watchConfig.inputDirectory}`);
  console.log(`  Output:      ${watchConfig.outputDirectory}`);
  console.log(`  Mode:        ${watchConfig.mode}`);
  if (watchConfig.mode === 'compress') {
    console.log(`  Quality:     ${watchConfig.qualityTier}`);
  }
  console.log(`  Concurrency: ${watchConfig.concurrency}`);
  console.log(`  Watch Mode:  ${watchConfig.watchMode ? 'Enabled' : 'Disabled'}`);
  if (watchConfig.processedDirectory) {
    console.log(`  Processed:   ${watchConfig.processedDirectory}`);
  }
  if (watchConfig.failedDirectory) {
    console.log(`  Failed:      ${watchConfig.failedDirectory}`);
  }
  console.log('');

  let filesProcessed = 0;
  let filesFailed = 0;
  let bytesProcessed = 0;
  const startTime = Date.now();

  const queue = new ProcessingQueue({
    config: watchConfig,
    tools,
    onFileStart: (file) => {
      console.log(`\n[Processing] Starting: ${file.name} (${formatBytes(file.size)})`);
    },
    onFileComplete: (file, outputPath) => {
      filesProcessed++;
      bytesProcessed += file.size;
      console.log(`\n[Complete] ${file.name} -> ${outputPath}`);
      printStats();
    },
    onFileFailed: (file, failure) => {
      filesFailed++;
      console.error(`\n[Failed] ${file.name}: ${failure.kind}: ${failure.detail}`);
      printStats();
    },
    onProgress: (file, percent) => {
      process.stdout.write(`\r${formatProgressLine(file.name, percent)}    `);
    },
    onQueueEmpty: () => {
      if (watchConfig.watchMode) {
        console.log('\n[Watch] Queue empty, waiting for new files...');
      }
    },
  });

  function printStats(): void {
    const elapsed = (Date.now() - startTime) / 1000;
    const status = queue.getStatus();
    console.log(`  Stats: ${filesProcessed} processed, ${filesFailed} failed, ${status.pending} pending`);
    console.log(`  Total: ${formatBytes(bytesProcessed)} in ${formatTime(elapsed)}`);
  }

  if (watchConfig.watchMode) {
    console.log(`[Watch] Monitoring ${watchConfig.inputDirectory} for new video files...`);
    console.log('[Watch] Press Ctrl+C to stop\n');

    const watcher = chokidar.watch(watchConfig.inputDirectory, {
      persistent: true,
      ignoreInitial: false, // Existing files are processed on startup
      awaitWriteFinish: {
        stabilityThreshold: 2000,
        pollInterval: 100,
      },
      ignored: [...WATCH_IGNORED],
    });

    watcher
      .on('add', (filePath) => {
        if (!isVideoFile(filePath, watchConfig.inputDirectory)) return;
        console.log(`\n[Watch] New file detected: ${path.basename(filePath)}`);
        queue.addFile(filePath).catch((error: unknown) => console.error(`[Watch] ${error}`));
      })
      .on('error', (error) => {
        console.error('[Watch] Error:', error);
      });

    return new Promise((resolve) => {
      const removeHandlers = onInterrupt(() => {
        removeHandlers();
        console.log('\n\n[Shutdown] Received shutdown signal...');
        Promise.all([watcher.close(), queue.shutdown()])
          .then(() => {
            printStats();
            resolve(EXIT_OK);
          })
          .catch((error: unknown) => {
            console.error(`[Shutdown] ${error}`);
            resolve(EXIT_FAILED);
          });
      });
    });
  }

  const files = scanDirectoryRecursive(watchConfig.inputDirectory);
  if (files.length === 0) {
    console.log('[Info] No video files found in input directory');
    return EXIT_OK;
  }

  console.log(`[Info] Found ${files.length} video file(s) to process\n`);

  let interrupted = false;
  const removeHandlers = onInterrupt(() => {
    interrupted = true;
    console.log('\n[Cancel] Stopping running jobs...');
    queue.shutdown().catch((error: unknown) => console.error(`[Cancel] ${error}`));
  });

  for (const file of files) {
    await queue.addFile(file.path);
  }
  await queue.waitForCompletion();
  removeHandlers();

  console.log('\n');
  printStats();
  if (interrupted) return EXIT_CANCELLED;
  return filesFailed > 0 ? EXIT_FAILED : EXIT_OK;
}

async function main(): Promise<number> {
  program.parse();
  const opts = program.opts<CliOptions>();

  let config: CliConfig;
  try {
    const fileConfig = opts.config ? loadConfigFile(opts.config) : {};
    if (opts.config) {
      console.log(`[Config] Loaded configuration from ${opts.config}`);
    }
    config = resolveCliConfig(opts, fileConfig);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return EXIT_FAILED;
    }
    throw error;
  }

  const context = createCliContext();
  debugLogger.setLevel(config.logLevel);
  if (config.debug) {
    debugLogger.initialize(context);
    debugLogger.setEnabled(true);
  }

  const tools = getFfmpegToolsWithContext(context, {
    ffmpegPath: config.ffmpegPath,
    ffprobePath: config.ffprobePath,
  });
  debugLogger.log('TOOLS', 'Resolved tools', tools);

  let inputStats: fs.Stats;
  try {
    inputStats = fs.statSync(config.input);
  } catch (error) {
    if (isMissingPathError(error)) {
      console.error(`Error: Input does not exist: ${config.input}`);
      return EXIT_FAILED;
    }
    throw error;
  }

  if (inputStats.isDirectory()) {
    return runDirectory(config, tools);
  }
  if (config.watch) {
    console.error('Error: --watch needs an input directory');
    return EXIT_FAILED;
  }
  return runSingleFile(config, tools);
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(EXIT_FAILED);
  });
