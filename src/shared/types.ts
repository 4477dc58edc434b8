/**
 * Shared type definitions for the Track Genre Classifier.
 * These interfaces are used by the catalog client, the classification
 * engine, and the exporters.
 */

/** The genre labels the classifier ever outputs, in declared priority order */
export const CATEGORIES = ['Dance Pop', 'House', 'Bass'] as const;

/** One of the three canonical genre labels */
export type CanonicalCategory = (typeof CATEGORIES)[number];

/** A classification outcome; null means the category could not be determined */
export type ClassificationResult = CanonicalCategory | null;

/** Supported text-generation providers */
export const LLM_PROVIDERS = ['openai', 'anthropic'] as const;

/** Identifier of a supported text-generation provider */
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

/**
 * Audio analysis values for a track. Only tempo, energy and danceability
 * are read by the classifier; everything else is carried through as-is.
 */
export interface AudioFeatures {
  /** Tempo in beats per minute */
  tempo?: number | null;
  /** Perceived intensity (0-1) */
  energy?: number | null;
  /** Suitability for dancing (0-1) */
  danceability?: number | null;
  [feature: string]: unknown;
}

/** A catalog track enriched with audio features and genre tags */
export interface Track {
  /** Catalog track ID */
  id: string;
  /** Track title */
  name: string;
  /** Artist names in credit order */
  artists: string[];
  /** Catalog artist IDs, aligned with `artists` */
  artistIds?: string[];
  /** Genre tags collected from the track's artists */
  genres: string[];
  /** Audio analysis, or null when the catalog has none */
  audioFeatures: AudioFeatures | null;
  /** Album name */
  album?: string;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Catalog popularity (0-100) */
  popularity?: number;
  /** 30-second preview URL */
  previewUrl?: string | null;
  /** External links keyed by service name */
  externalUrls?: Record<string, string>;
  /** When the track was saved or added to a playlist (ISO 8601) */
  addedAt?: string;
  /** Where the track was found, e.g. 'liked_songs' or 'playlist_<name>' */
  source?: string;
  /** Playlist the track came from */
  playlistId?: string;
}

/** A track copy carrying its classification */
export type ClassifiedTrack = Track & { classification: ClassificationResult };

/** Tally of classification results */
export interface ClassificationSummary {
  /** Number of tracks considered */
  totalTracks: number;
  /** Count per canonical category (all categories always present) */
  categories: Record<CanonicalCategory, number>;
  /** Tracks without a canonical category */
  unclassified: number;
  /** Fraction of tracks classified (0 when there are no tracks) */
  successRate: number;
}

/** Progress reported after each batch completes */
export interface BatchProgress {
  /** 1-based batch number */
  batchNumber: number;
  /** Total number of batches in the run */
  totalBatches: number;
  /** Tracks in this batch */
  batchSize: number;
  /** Tracks in this batch that received a category */
  classifiedCount: number;
}

/** Application settings */
export interface ClassifierSettings {
  /** Text-generation provider identifier (validated when the backend is built) */
  provider: string;
  /** Tracks per prompt */
  batchSize: number;
  /** Attempts per batch */
  maxRetries: number;
  /** OpenAI API key */
  openaiApiKey: string;
  /** Anthropic API key */
  anthropicApiKey: string;
  /** Spotify user access token with library and playlist read scopes */
  spotifyAccessToken: string;
  /** Directory for exported playlist files */
  playlistDir: string;
}

/** Default application settings */
export const DEFAULT_SETTINGS: ClassifierSettings = {
  provider: 'openai',
  batchSize: 25,
  maxRetries: 3,
  openaiApiKey: '',
  anthropicApiKey: '',
  spotifyAccessToken: '',
  playlistDir: 'playlists',
};

/**
 * Type guard for canonical categories. Matching is exact and case-sensitive.
 */
export function isCanonicalCategory(value: unknown): value is CanonicalCategory {
  return CATEGORIES.some((category) => category === value);
}

/**
 * Type guard for supported provider identifiers.
 */
export function isLlmProvider(value: unknown): value is LlmProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}
