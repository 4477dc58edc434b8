/**
 * Spotify Web API Catalog Client
 *
 * Reads the current user's library with a user access token
 * (scopes: user-library-read, playlist-read-private, playlist-read-collaborative):
 *  - Liked songs and the tracks of playlists the user owns, deduplicated by ID
 *  - Audio features (tempo, energy, danceability, ...) per track
 *  - Genre tags per artist, merged onto each track
 *
 * Rate limiting:
 *  - Enforces ~3 requests/second (one request per 334 ms) via a FIFO drain queue
 *  - Respects the `Retry-After` response header on HTTP 429 responses and
 *    sends the request again, a bounded number of times
 */

import type { AudioFeatures, Track } from '../../shared/types';
import { CatalogError } from './errors';
import { Logger } from './logger';

// ─── Constants ────────────────────────────────────────────────────────────────

const API_BASE_URL = 'https://api.spotify.com/v1';
const REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_RETRY_AFTER_SECONDS = 30;
const DEFAULT_MAX_RATE_LIMIT_RETRIES = 3;

const LIKED_SONGS_PAGE_SIZE = 50;
const PLAYLISTS_PAGE_SIZE = 50;
const PLAYLIST_TRACKS_PAGE_SIZE = 100;
const AUDIO_FEATURES_CHUNK_SIZE = 100;
const ARTISTS_CHUNK_SIZE = 50;

// ─── Types ────────────────────────────────────────────────────────────────────

/** A playlist owned by the current user */
export interface SpotifyPlaylist {
  id: string;
  name: string;
  description: string | null;
  tracksTotal: number;
  public: boolean | null;
  collaborative: boolean;
  externalUrls: Record<string, string>;
}

export interface SpotifyCatalogOptions {
  /** API base URL, without trailing slash */
  baseUrl?: string;
  /** HTTP request timeout in milliseconds */
  timeoutMs?: number;
  /** Times a rate-limited (429) request is sent again before giving up */
  maxRateLimitRetries?: number;
  /** Shared rate limiter */
  rateLimiter?: SpotifyRateLimiter;
  /** Logger for fetch progress */
  logger?: Logger;
}

// Raw shapes we parse from the Spotify REST responses ─────────────────────────

interface SpotifyArtistRef {
  id: string | null;
  name: string;
}

interface SpotifyTrackObject {
  id: string | null;
  name: string;
  artists: SpotifyArtistRef[];
  album: { name: string };
  duration_ms: number;
  popularity: number;
  preview_url: string | null;
  external_urls: Record<string, string>;
}

interface SpotifySavedTrackItem {
  added_at: string;
  track: SpotifyTrackObject | null;
}

interface SpotifyPlaylistObject {
  id: string;
  name: string;
  description: string | null;
  owner: { id: string };
  tracks: { total: number };
  public: boolean | null;
  collaborative: boolean;
  external_urls: Record<string, string>;
}

interface SpotifyPage<T> {
  items: T[];
  next?: string | null;
}

interface SpotifyAudioFeaturesObject extends AudioFeatures {
  id: string;
}

interface SpotifyAudioFeaturesResponse {
  audio_features: Array<SpotifyAudioFeaturesObject | null>;
}

interface SpotifyArtistsResponse {
  artists: Array<{ id: string; genres: string[] } | null>;
}

// ─── Rate Limiter ─────────────────────────────────────────────────────────────

/**
 * FIFO drain-queue rate limiter for Spotify API calls.
 *
 * Drains one request every `intervalMs` milliseconds. When a 429 response is
 * received, call `handleRetryAfter(seconds)` to pause the drain queue for the
 * required amount of time before resuming.
 */
export class SpotifyRateLimiter {
  private readonly intervalMs: number;
  private nextSlotAt: number = 0;
  private waitQueue: Array<() => void> = [];
  private drainTimer: ReturnType<typeof setTimeout> | null = null;
  private retryAfterUntil: number = 0;

  constructor(intervalMs: number = 334) {
    this.intervalMs = intervalMs;
  }

  /**
   * Waits until a request slot is available, then resolves.
   */
  waitForSlot(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
      this.scheduleDrain();
    });
  }

  /**
   * Pause the drain queue for `seconds` seconds.
   */
  handleRetryAfter(seconds: number): void {
    const resumeAt = Date.now() + seconds * 1000;
    if (resumeAt > this.retryAfterUntil) {
      this.retryAfterUntil = resumeAt;
    }
    if (this.drainTimer !== null) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
    this.scheduleDrain();
  }

  private scheduleDrain(): void {
    if (this.drainTimer !== null || this.waitQueue.length === 0) return;

    const nextAllowedAt = Math.max(this.nextSlotAt, this.retryAfterUntil);
    const delay = Math.max(0, nextAllowedAt - Date.now());

    this.drainTimer = setTimeout(() => {
      this.drainTimer = null;
      const resolve = this.waitQueue.shift();
      if (resolve) {
        this.nextSlotAt = Date.now() + this.intervalMs;
        resolve();
      }
      this.scheduleDrain();
    }, delay);
  }
}

// ─── Helper Functions ─────────────────────────────────────────────────────────

/**
 * Maps a raw Spotify track object to a Track without features or genres.
 */
export function mapSpotifyTrack(track: SpotifyTrackObject & { id: string }, addedAt: string): Track {
  return {
    id: track.id,
    name: track.name,
    artists: track.artists.map((artist) => artist.name),
    artistIds: track.artists.flatMap((artist) => (artist.id ? [artist.id] : [])),
    genres: [],
    audioFeatures: null,
    album: track.album.name,
    durationMs: track.duration_ms,
    popularity: track.popularity,
    previewUrl: track.preview_url,
    externalUrls: track.external_urls,
    addedAt,
  };
}

function hasTrackId(track: SpotifyTrackObject | null): track is SpotifyTrackObject & { id: string } {
  return track !== null && typeof track.id === 'string' && track.id.length > 0;
}

/**
 * Splits a list into chunks of at most `size` elements.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

/**
 * Removes the per-track ID from an audio-features object.
 */
function toAudioFeatures(features: SpotifyAudioFeaturesObject): AudioFeatures {
  const { id: _id, ...rest } = features;
  return rest;
}

// ─── Catalog Client ───────────────────────────────────────────────────────────

export class SpotifyCatalog {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRateLimitRetries: number;
  private readonly rateLimiter: SpotifyRateLimiter;
  private readonly logger: Logger | null;

  constructor(
    private readonly accessToken: string,
    options: SpotifyCatalogOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? DEFAULT_MAX_RATE_LIMIT_RETRIES;
    this.rateLimiter = options.rateLimiter ?? new SpotifyRateLimiter();
    this.logger = options.logger ?? null;
  }

  /**
   * Fetches every liked song, 50 per page.
   */
  async getLikedSongs(): Promise<Track[]> {
    const items = await this.fetchAllPages<SpotifySavedTrackItem>('/me/tracks', LIKED_SONGS_PAGE_SIZE);
    return items.flatMap((item) => (hasTrackId(item.track) ? [mapSpotifyTrack(item.track, item.added_at)] : []));
  }

  /**
   * Fetches the playlists owned by the current user (followed playlists are skipped).
   */
  async getUserCreatedPlaylists(): Promise<SpotifyPlaylist[]> {
    const user = await this.request<{ id: string }>('/me');
    const playlists = await this.fetchAllPages<SpotifyPlaylistObject>('/me/playlists', PLAYLISTS_PAGE_SIZE);

    return playlists
      .filter((playlist) => playlist.owner.id === user.id)
      .map((playlist) => ({
        id: playlist.id,
        name: playlist.name,
        description: playlist.description,
        tracksTotal: playlist.tracks.total,
        public: playlist.public,
        collaborative: playlist.collaborative,
        externalUrls: playlist.external_urls,
      }));
  }

  /**
   * Fetches a playlist's tracks, 100 per page. Local and removed tracks
   * (no track object or no ID) are skipped.
   */
  async getPlaylistTracks(playlistId: string): Promise<Track[]> {
    const items = await this.fetchAllPages<SpotifySavedTrackItem>(
      `/playlists/${encodeURIComponent(playlistId)}/tracks`,
      PLAYLIST_TRACKS_PAGE_SIZE,
    );
    return items.flatMap((item) =>
      hasTrackId(item.track) ? [{ ...mapSpotifyTrack(item.track, item.added_at), playlistId }] : [],
    );
  }

  /**
   * Liked songs followed by the tracks of each owned playlist, deduplicated
   * by track ID (first occurrence wins).
   */
  async getAllUserTracks(): Promise<Track[]> {
    const seen = new Set<string>();
    const tracks: Track[] = [];

    const addUnique = (candidates: Track[], source: string): void => {
      for (const track of candidates) {
        if (!seen.has(track.id)) {
          seen.add(track.id);
          tracks.push({ ...track, source });
        }
      }
    };

    addUnique(await this.getLikedSongs(), 'liked_songs');
    this.logger?.info(`Fetched ${tracks.length} liked songs`, { step: 'catalog_fetch' });

    const playlists = await this.getUserCreatedPlaylists();
    for (const playlist of playlists) {
      addUnique(await this.getPlaylistTracks(playlist.id), `playlist_${playlist.name}`);
    }
    this.logger?.info(`Fetched ${tracks.length} unique tracks from liked songs and ${playlists.length} playlists`, {
      step: 'catalog_fetch',
    });

    return tracks;
  }

  /**
   * Returns copies of the tracks with audio features and artist genres attached.
   * Tracks without audio analysis get `audioFeatures: null`.
   */
  async enrichTracksWithFeatures(tracks: readonly Track[]): Promise<Track[]> {
    const features = new Map<string, AudioFeatures>();
    for (const ids of chunk(tracks.map((track) => track.id), AUDIO_FEATURES_CHUNK_SIZE)) {
      const response = await this.request<SpotifyAudioFeaturesResponse>(`/audio-features?ids=${ids.join(',')}`);
      for (const entry of response.audio_features) {
        if (entry) {
          features.set(entry.id, toAudioFeatures(entry));
        }
      }
    }

    const artistIds = [...new Set(tracks.flatMap((track) => track.artistIds ?? []))];
    const artistGenres = new Map<string, string[]>();
    for (const ids of chunk(artistIds, ARTISTS_CHUNK_SIZE)) {
      const response = await this.request<SpotifyArtistsResponse>(`/artists?ids=${ids.join(',')}`);
      for (const artist of response.artists) {
        if (artist) {
          artistGenres.set(artist.id, artist.genres);
        }
      }
    }

    return tracks.map((track) => ({
      ...track,
      audioFeatures: features.get(track.id) ?? null,
      genres: [...new Set((track.artistIds ?? []).flatMap((id) => artistGenres.get(id) ?? []))],
    }));
  }

  // ─── Transport ────────────────────────────────────────────────────────────

  private async fetchAllPages<T>(pathname: string, limit: number): Promise<T[]> {
    const items: T[] = [];
    for (let offset = 0; ; offset += limit) {
      const separator = pathname.includes('?') ? '&' : '?';
      const page = await this.request<SpotifyPage<T>>(`${pathname}${separator}limit=${limit}&offset=${offset}`);
      items.push(...page.items);
      if (page.items.length < limit) {
        return items;
      }
    }
  }

  /**
   * GETs a path. A 429 pauses the rate limiter for `Retry-After` seconds and
   * the same request is sent again, up to `maxRateLimitRetries` times.
   */
  private async request<T>(pathname: string): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      const response = await this.send(pathname);

      if (response.status === 429) {
        const retryAfterHeader = response.headers.get('Retry-After');
        const parsed = retryAfterHeader ? Number.parseInt(retryAfterHeader, 10) : NaN;
        const retryAfterSeconds = Number.isNaN(parsed) ? DEFAULT_RETRY_AFTER_SECONDS : parsed;
        this.rateLimiter.handleRetryAfter(retryAfterSeconds);

        if (attempt < this.maxRateLimitRetries) {
          this.logger?.warn(
            `Spotify rate limit hit for ${pathname}; retrying in ${retryAfterSeconds} seconds ` +
              `(${attempt + 1}/${this.maxRateLimitRetries})`,
            { category: 'CatalogError', step: 'catalog_fetch' },
          );
          continue;
        }
        throw new CatalogError(`Spotify rate limit exceeded. Retry after ${retryAfterSeconds} seconds.`, {
          statusCode: 429,
        });
      }

      if (response.status === 401) {
        throw new CatalogError('Spotify access token is invalid or expired.', { statusCode: 401 });
      }

      if (!response.ok) {
        throw new CatalogError(`Spotify request failed for ${pathname}: ${response.status} ${response.statusText}`, {
          statusCode: response.status,
        });
      }

      return (await response.json()) as T;
    }
  }

  /** One rate-limited fetch with a timeout */
  private async send(pathname: string): Promise<Response> {
    await this.rateLimiter.waitForSlot();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${pathname}`, {
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
        },
        signal: controller.signal,
      });
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new CatalogError(`Spotify request failed for ${pathname}: ${cause.message}`, { cause });
    } finally {
      clearTimeout(timeoutId);
    }
    return response;
  }
}
