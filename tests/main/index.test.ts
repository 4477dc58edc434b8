/**
 * Tests for the command-line entry point
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { main, parseCliArgs, USAGE } from '../../src/main/index';
import { ConfigurationError } from '../../src/main/services/errors';
import { getLogFileName } from '../../src/main/services/logger';

let appData: string;

beforeEach(() => {
  appData = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'));
  vi.stubEnv('APPDATA', appData);
});

afterEach(() => {
  vi.unstubAllEnvs();
  fs.rmSync(appData, { recursive: true, force: true });
});

describe('parseCliArgs', () => {
  it('should default to exporting playlists with no overrides', () => {
    expect(parseCliArgs([])).toEqual({
      overrides: {},
      outputFile: undefined,
      exportPlaylists: true,
      tracksOnly: false,
      logFile: false,
      saveSettings: false,
      help: false,
    });
  });

  it('should map flags to setting overrides', () => {
    expect(
      parseCliArgs([
        '--provider',
        'anthropic',
        '--batch-size',
        '10',
        '--max-retries',
        '2',
        '-o',
        'out.json',
        '--playlist-dir',
        'lists',
        '--no-playlists',
      ]),
    ).toEqual({
      overrides: { provider: 'anthropic', batchSize: 10, maxRetries: 2, playlistDir: 'lists' },
      outputFile: 'out.json',
      exportPlaylists: false,
      tracksOnly: false,
      logFile: false,
      saveSettings: false,
      help: false,
    });
  });

  it('should read the log-file and save-settings switches', () => {
    expect(parseCliArgs(['--log-file', '--save-settings'])).toMatchObject({ logFile: true, saveSettings: true });
  });

  it('should reject non-numeric sizes', () => {
    expect(() => parseCliArgs(['--batch-size', 'abc'])).toThrow('--batch-size must be a positive integer, got "abc"');
    expect(() => parseCliArgs(['--max-retries', '0'])).toThrow(ConfigurationError);
  });

  it('should reject unknown options', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(ConfigurationError);
  });
});

describe('main', () => {
  it('should print usage for --help', async () => {
    const lines: string[] = [];
    await expect(main(['--help'], {}, (line) => lines.push(line))).resolves.toBe(0);
    expect(lines).toEqual([USAGE]);
  });

  it('should fail when the Spotify token is missing', async () => {
    const lines: string[] = [];
    await expect(main([], {}, (line) => lines.push(line))).resolves.toBe(1);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /ERROR \[ConfigurationError\] ConfigurationError: SPOTIFY_ACCESS_TOKEN environment variable not set \| step: configuration$/,
    );
  });

  it('should fail on an unsupported provider before any request', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const lines: string[] = [];

    const code = await main(['--provider', 'cohere'], { SPOTIFY_ACCESS_TOKEN: 'test-token' }, (line) =>
      lines.push(line),
    );

    expect(code).toBe(1);
    expect(lines[0]).toContain('Unsupported provider: cohere. Use one of: openai, anthropic');
    expect(fetchMock).not.toHaveBeenCalled();
    vi.unstubAllGlobals();
  });

  it('should fail when the provider key is missing', async () => {
    const lines: string[] = [];

    const code = await main(['--provider', 'anthropic'], { SPOTIFY_ACCESS_TOKEN: 'test-token' }, (line) =>
      lines.push(line),
    );

    expect(code).toBe(1);
    expect(lines[0]).toContain('ANTHROPIC_API_KEY environment variable not set');
  });

  it('should report bad arguments as configuration errors', async () => {
    const lines: string[] = [];
    await expect(main(['--batch-size', '-1'], {}, (line) => lines.push(line))).resolves.toBe(1);
    expect(lines[0]).toContain('[ConfigurationError]');
  });

  it('should check the backend configuration in tracks-only mode', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const lines: string[] = [];

    const code = await main(['--tracks-only'], { SPOTIFY_ACCESS_TOKEN: 'test-token' }, (line) => lines.push(line));

    expect(code).toBe(1);
    expect(lines[0]).toContain('OPENAI_API_KEY environment variable not set');
    expect(fetchMock).not.toHaveBeenCalled();
    vi.unstubAllGlobals();
  });

  it('should write the log to a daily file with --log-file', async () => {
    const lines: string[] = [];
    const logPath = path.join(appData, 'track-genre-classifier', 'logs', getLogFileName(new Date()));

    await expect(main(['--log-file'], {}, (line) => lines.push(line))).resolves.toBe(1);

    expect(lines).toHaveLength(2);
    expect(lines[1]).toMatch(/INFO Log written to /);
    expect(lines[1].endsWith(`Log written to ${logPath}`)).toBe(true);
    expect(fs.readFileSync(logPath, 'utf-8').split('\n')[0]).toMatch(
      /ERROR \[ConfigurationError\] ConfigurationError: SPOTIFY_ACCESS_TOKEN environment variable not set/,
    );
  });

  it('should store flag values as defaults with --save-settings', async () => {
    const lines: string[] = [];
    const settingsPath = path.join(appData, 'track-genre-classifier', 'settings.json');

    const code = await main(['--save-settings', '--provider', 'anthropic', '--batch-size', '10'], {}, (line) =>
      lines.push(line),
    );

    expect(code).toBe(0);
    expect(lines[0]).toContain(`Settings saved to ${settingsPath}`);
    expect(JSON.parse(fs.readFileSync(settingsPath, 'utf-8'))).toMatchObject({
      provider: 'anthropic',
      batchSize: 10,
      maxRetries: 3,
    });
  });
});
