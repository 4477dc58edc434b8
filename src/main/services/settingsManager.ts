/**
 * Settings Manager Service for the Track Genre Classifier
 *
 * Settings are resolved in three layers, later layers winning:
 *   1. JSON settings file at %APPDATA%/track-genre-classifier/settings.json
 *      (Windows) or ~/.config/track-genre-classifier/settings.json
 *   2. Environment variables (LLM_PROVIDER, BATCH_SIZE, MAX_RETRIES,
 *      OPENAI_API_KEY, ANTHROPIC_API_KEY, SPOTIFY_ACCESS_TOKEN)
 *   3. Explicit overrides (CLI flags)
 *
 * Invalid values fall back to defaults. The provider identifier is kept
 * verbatim; it is checked when the backend is built.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ClassifierSettings, DEFAULT_SETTINGS } from '../../shared/types';
import { ConfigurationError } from './errors';
import { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface SettingsManagerOptions {
  /** Custom directory to store settings file. Defaults to platform-specific appdata */
  settingsDir?: string;
  /** Custom filename for the settings file. Defaults to 'settings.json' */
  fileName?: string;
  /** Logger for ignored settings files */
  logger?: Logger;
}

/** Environment variable names, keyed by the setting they feed */
export const ENV_VARIABLES = {
  provider: 'LLM_PROVIDER',
  batchSize: 'BATCH_SIZE',
  maxRetries: 'MAX_RETRIES',
  openaiApiKey: 'OPENAI_API_KEY',
  anthropicApiKey: 'ANTHROPIC_API_KEY',
  spotifyAccessToken: 'SPOTIFY_ACCESS_TOKEN',
} as const;

// ─── Constants ───────────────────────────────────────────────────────────────

const APP_DIR_NAME = 'track-genre-classifier';
const DEFAULT_SETTINGS_FILENAME = 'settings.json';

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Returns the default settings directory path.
 * On Windows: %APPDATA%/track-genre-classifier/
 * On other platforms: ~/.config/track-genre-classifier/
 */
export function getDefaultSettingsDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

/**
 * Accepts positive integers, or strings holding one; anything else is null.
 */
export function parsePositiveInteger(value: unknown): number | null {
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    parsed = Number.parseInt(value, 10);
  } else {
    return null;
  }
  return Number.isInteger(parsed) && parsed >= 1 ? parsed : null;
}

function trimmedString(value: unknown): string | null {
  return typeof value === 'string' ? value.trim() : null;
}

/**
 * Validates a partial settings object and merges it over `base`.
 * Fields of the wrong type or out of range keep the base value.
 */
export function validateSettings(partial: unknown, base: ClassifierSettings = DEFAULT_SETTINGS): ClassifierSettings {
  const validated: ClassifierSettings = { ...base };
  if (partial === null || typeof partial !== 'object' || Array.isArray(partial)) {
    return validated;
  }

  const raw: Record<string, unknown> = { ...partial };

  if (typeof raw.provider === 'string' && raw.provider.length > 0) {
    validated.provider = raw.provider;
  }

  validated.batchSize = parsePositiveInteger(raw.batchSize) ?? validated.batchSize;
  validated.maxRetries = parsePositiveInteger(raw.maxRetries) ?? validated.maxRetries;

  for (const key of ['openaiApiKey', 'anthropicApiKey', 'spotifyAccessToken'] as const) {
    const value = trimmedString(raw[key]);
    if (value !== null) {
      validated[key] = value;
    }
  }

  const playlistDir = trimmedString(raw.playlistDir);
  if (playlistDir) {
    validated.playlistDir = playlistDir;
  }

  return validated;
}

/**
 * Reads the settings that the environment provides. Unset and empty
 * variables are left out.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): Partial<Record<keyof typeof ENV_VARIABLES, string>> {
  const fromEnv: Partial<Record<keyof typeof ENV_VARIABLES, string>> = {};
  for (const [key, variable] of Object.entries(ENV_VARIABLES)) {
    const value = env[variable];
    if (value !== undefined && value.trim().length > 0 && isEnvKey(key)) {
      fromEnv[key] = value;
    }
  }
  return fromEnv;
}

function isEnvKey(key: string): key is keyof typeof ENV_VARIABLES {
  return key in ENV_VARIABLES;
}

export function serializeSettings(settings: ClassifierSettings): string {
  return JSON.stringify(settings, null, 2);
}

/**
 * Parses settings file content. Returns null if it is not a JSON object.
 */
export function deserializeSettings(json: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return null;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Loads and persists classifier settings.
 *
 * Usage:
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize();                      // Load settings file (or defaults)
 * const settings = manager.resolve(process.env, { batchSize: 10 });
 * await manager.save({ provider: 'anthropic' });   // Partial update + persist
 * ```
 */
export class SettingsManager {
  private settings: ClassifierSettings;
  private readonly settingsDir: string;
  private readonly fileName: string;
  private readonly logger: Logger | null;

  constructor(options?: SettingsManagerOptions) {
    this.settingsDir = options?.settingsDir ?? getDefaultSettingsDir();
    this.fileName = options?.fileName ?? DEFAULT_SETTINGS_FILENAME;
    this.logger = options?.logger ?? null;
    this.settings = { ...DEFAULT_SETTINGS };
  }

  /**
   * Loads settings from file. A missing file means defaults; an unreadable
   * or corrupt file is logged and ignored.
   */
  async initialize(): Promise<void> {
    const filePath = this.getFilePath();
    try {
      const content = await fs.promises.readFile(filePath, 'utf-8');
      const parsed = deserializeSettings(content);
      if (parsed) {
        this.settings = validateSettings(parsed);
      } else {
        this.logger?.warn(`Ignoring settings file "${filePath}": not a JSON object`, { step: 'configuration' });
      }
    } catch (error: unknown) {
      if (!isMissingFileError(error)) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger?.warn(`Ignoring settings file "${filePath}": ${message}`, { step: 'configuration' });
      }
    }
  }

  /**
   * Layers environment variables and explicit overrides over the file-backed settings.
   */
  resolve(env: NodeJS.ProcessEnv, overrides: Partial<ClassifierSettings> = {}): ClassifierSettings {
    const withEnv = validateSettings(settingsFromEnv(env), this.settings);
    return validateSettings(overrides, withEnv);
  }

  /**
   * Merges a partial update into the file-backed settings and persists them.
   *
   * @throws ConfigurationError if the settings file cannot be written
   */
  async save(updates: Partial<ClassifierSettings>): Promise<ClassifierSettings> {
    this.settings = validateSettings(updates, this.settings);

    const filePath = this.getFilePath();
    try {
      await fs.promises.mkdir(this.settingsDir, { recursive: true });
      await fs.promises.writeFile(filePath, serializeSettings(this.settings), 'utf-8');
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigurationError(`Failed to write settings file "${filePath}": ${cause.message}`, { cause });
    }

    return { ...this.settings };
  }

  getFilePath(): string {
    return path.join(this.settingsDir, this.fileName);
  }
}
