import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfigFile, parseConfigFile, resolveCliConfig } from '../cli/config';

describe('parseConfigFile', () => {
  it('reads keys and long-form aliases', () => {
    const options = parseConfigFile(
      [
        'inputDirectory: /media/incoming',
        'outputDirectory: /media/done',
        'mode: compress',
        'quality: high',
        'format: mkv',
        'watch: true',
        'processedDirectory: /media/originals',
        'concurrency: 2',
        'debug: false',
      ].join('\n')
    );

    expect(options).toMatchObject({
      input: '/media/incoming',
      output: '/media/done',
      mode: 'compress',
      quality: 'high',
      format: 'mkv',
      watch: true,
      processedDir: '/media/originals',
      concurrency: '2',
      debug: false,
    });
  });

  it('treats an empty file as no options', () => {
    expect(parseConfigFile('')).toEqual({});
  });

  it('rejects a file that is not a mapping', () => {
    expect(() => parseConfigFile('- a\n- b\n')).toThrow(ConfigError);
  });

  it('rejects a non-boolean watch flag', () => {
    expect(() => parseConfigFile('watch: sometimes')).toThrow('"watch" must be true or false');
  });

  it('reports unreadable files as configuration errors', () => {
    const missing = path.join(os.tmpdir(), 'transcode-pilot-missing', 'config.yaml');
    expect(() => loadConfigFile(missing)).toThrow(ConfigError);
  });

  it('loads a file from disk', async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'config-'));
    const file = path.join(dir, 'pilot.yaml');
    await fs.promises.writeFile(file, 'input: ./in\noutput: ./out\n');
    try {
      expect(loadConfigFile(file)).toMatchObject({ input: './in', output: './out' });
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  });
});

describe('resolveCliConfig', () => {
  it('applies defaults', () => {
    expect(resolveCliConfig({ input: 'in.mov', output: 'out.mp4' })).toEqual({
      input: 'in.mov',
      output: 'out.mp4',
      mode: 'compress',
      quality: 'balanced',
      format: undefined,
      watch: false,
      processedDir: undefined,
      failedDir: undefined,
      ffmpegPath: undefined,
      ffprobePath: undefined,
      concurrency: 1,
      logLevel: 'info',
      debug: false,
      dryRun: false,
    });
  });

  it('lets command-line options win over the file', () => {
    const config = resolveCliConfig(
      { input: 'cli-in', quality: 'extreme' },
      { input: 'file-in', output: 'file-out', quality: 'high', concurrency: '3' }
    );
    expect(config.input).toBe('cli-in');
    expect(config.output).toBe('file-out');
    expect(config.quality).toBe('extreme');
    expect(config.concurrency).toBe(3);
  });

  it('normalizes the output format', () => {
    expect(resolveCliConfig({ input: 'a', output: 'b', format: '.MKV' }).format).toBe('mkv');
  });

  it.each([
    [{ mode: 'transmux' }, 'Invalid mode "transmux" (expected convert or compress)'],
    [{ quality: 'best' }, 'Invalid quality "best" (expected one of: high, balanced, compressed, extreme)'],
    [{ concurrency: '0' }, 'Invalid concurrency "0" (expected a whole number of 1 or more)'],
    [{ concurrency: '1.5' }, 'Invalid concurrency "1.5" (expected a whole number of 1 or more)'],
    [{ logLevel: 'loud' }, 'Invalid log level "loud" (expected one of: debug, info, warn, error)'],
    [{ format: 'm k v' }, 'Invalid format "m k v"'],
  ])('rejects %o', (overrides, message) => {
    expect(() => resolveCliConfig({ input: 'a', output: 'b', ...overrides })).toThrow(message);
  });

  it('requires input and output', () => {
    expect(() => resolveCliConfig({ output: 'b' })).toThrow('--input is required');
    expect(() => resolveCliConfig({ input: 'a' })).toThrow('--output is required');
  });
});
