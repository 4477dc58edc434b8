/**
 * Track Genre Classifier - Command Line Entry Point
 *
 * Classifies a Spotify library into Dance Pop, House and Bass, saves the
 * results as JSON and writes one playlist file per category.
 */

import { parseArgs } from 'util';
import { ClassifierSettings } from '../shared/types';
import { createLlmBackend } from './services/llmBackend';
import { MusicClassifier } from './services/batchClassifier';
import { SpotifyCatalog } from './services/spotifyCatalog';
import { ClassificationWorkflow } from './services/classificationWorkflow';
import { SettingsManager } from './services/settingsManager';
import { Logger } from './services/logger';
import { ConfigurationError, isClassifierError } from './services/errors';

export const USAGE = `Usage: track-genre-classifier [options]

Options:
  --provider <openai|anthropic>  Text-generation provider (default: LLM_PROVIDER or openai)
  --batch-size <n>               Tracks per request (default: BATCH_SIZE or 25)
  --max-retries <n>              Attempts per batch (default: MAX_RETRIES or 3)
  -o, --output <file>            Results file (default: timestamped JSON file)
  --playlist-dir <dir>           Directory for playlist files (default: playlists)
  --no-playlists                 Skip creating playlist files
  --tracks-only                  Only fetch tracks and show a sample
  --log-file                     Also write the log to a daily file in the app-data directory
  --save-settings                Store the given provider, sizes and playlist directory as defaults, then exit
  -h, --help                     Show this help`;

/** Parsed command-line options */
export interface CliOptions {
  overrides: Partial<ClassifierSettings>;
  outputFile?: string;
  exportPlaylists: boolean;
  tracksOnly: boolean;
  logFile: boolean;
  saveSettings: boolean;
  help: boolean;
}

/**
 * Parses command-line arguments (without the node and script entries).
 *
 * @throws ConfigurationError for unknown options or non-numeric sizes
 */
export function parseCliArgs(argv: string[]): CliOptions {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigurationError(cause.message, { cause });
  }

  const overrides: Partial<ClassifierSettings> = {};
  if (values.provider !== undefined) {
    overrides.provider = values.provider;
  }
  if (values['batch-size'] !== undefined) {
    overrides.batchSize = parseIntegerFlag('--batch-size', values['batch-size']);
  }
  if (values['max-retries'] !== undefined) {
    overrides.maxRetries = parseIntegerFlag('--max-retries', values['max-retries']);
  }
  if (values['playlist-dir'] !== undefined) {
    overrides.playlistDir = values['playlist-dir'];
  }

  return {
    overrides,
    outputFile: values.output,
    exportPlaylists: !values['no-playlists'],
    tracksOnly: values['tracks-only'] === true,
    logFile: values['log-file'] === true,
    saveSettings: values['save-settings'] === true,
    help: values.help === true,
  };
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      provider: { type: 'string' },
      'batch-size': { type: 'string' },
      'max-retries': { type: 'string' },
      output: { type: 'string', short: 'o' },
      'playlist-dir': { type: 'string' },
      'no-playlists': { type: 'boolean', default: false },
      'tracks-only': { type: 'boolean', default: false },
      'log-file': { type: 'boolean', default: false },
      'save-settings': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

function parseIntegerFlag(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Runs the CLI and returns the process exit code.
 */
export async function main(
  argv: string[],
  env: NodeJS.ProcessEnv,
  print: (line: string) => void = (line) => console.log(line),
): Promise<number> {
  let logger = new Logger({ console: print });

  try {
    const cli = parseCliArgs(argv);
    if (cli.help) {
      print(USAGE);
      return 0;
    }

    logger = new Logger({ console: print, writeToFile: cli.logFile });
    await logger.initialize();

    const settingsManager = new SettingsManager({ logger });
    await settingsManager.initialize();

    if (cli.saveSettings) {
      await settingsManager.save(cli.overrides);
      logger.info(`Settings saved to ${settingsManager.getFilePath()}`, { step: 'configuration' });
      return finish(logger, 0);
    }

    const settings = settingsManager.resolve(env, cli.overrides);

    if (!settings.spotifyAccessToken) {
      throw new ConfigurationError('SPOTIFY_ACCESS_TOKEN environment variable not set');
    }
    const catalog = new SpotifyCatalog(settings.spotifyAccessToken, { logger });
    const backend = createLlmBackend(settings.provider, settings);

    if (cli.tracksOnly) {
      const tracks = await catalog.enrichTracksWithFeatures(await catalog.getAllUserTracks());
      print(`Found ${tracks.length} tracks`);
      const sample = tracks[0];
      if (sample) {
        print('Sample track info:');
        print(`Name: ${sample.name}`);
        print(`Artists: ${sample.artists.join(', ')}`);
        print(`Genres: ${sample.genres.join(', ')}`);
        print(`Tempo: ${String(sample.audioFeatures?.tempo ?? 'N/A')}`);
        print(`Energy: ${String(sample.audioFeatures?.energy ?? 'N/A')}`);
        print(`Danceability: ${String(sample.audioFeatures?.danceability ?? 'N/A')}`);
      }
      return finish(logger, 0);
    }

    const classifier = new MusicClassifier(backend, {
      batchSize: settings.batchSize,
      maxRetries: settings.maxRetries,
      logger,
    });
    const workflow = new ClassificationWorkflow(catalog, classifier, logger);

    const result = await workflow.run({
      outputFile: cli.outputFile,
      exportPlaylists: cli.exportPlaylists,
      playlistDir: settings.playlistDir,
    });
    if (!result) {
      logger.error('No tracks found');
      return finish(logger, 1);
    }

    logger.info('Workflow completed successfully');
    return finish(logger, 0);
  } catch (error: unknown) {
    if (isClassifierError(error)) {
      logger.error(error.toUserMessage(), { category: error.category, step: error.step });
    } else {
      logger.logError(error, { step: 'workflow' });
    }
    return finish(logger, 1);
  }
}

/**
 * Reports warnings and the log file location, then passes the exit code through.
 */
function finish(logger: Logger, exitCode: number): number {
  const summary = logger.getSummary();
  if (summary.warnCount > 0) {
    logger.info(`Finished with ${summary.warnCount} warnings`);
  }
  if (summary.logFilePath) {
    logger.info(`Log written to ${summary.logFilePath}`);
  }
  return exitCode;
}
