/**
 * Results and Playlist Export Service
 *
 * Writes the classification run to a JSON results file and, per category,
 * a plain-text playlist file listing "<name> - <artists>" with the track's
 * Spotify URL when known.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CATEGORIES, isCanonicalCategory } from '../../shared/types';
import type { CanonicalCategory, ClassificationSummary, ClassifiedTrack } from '../../shared/types';
import { ExportError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export const UNCLASSIFIED_GROUP = 'Unclassified';

export type PlaylistGroup = CanonicalCategory | typeof UNCLASSIFIED_GROUP;

/** Tracks grouped by category, in category order with Unclassified last */
export type GroupedTracks = Record<PlaylistGroup, ClassifiedTrack[]>;

/** Run metadata written alongside the results */
export interface ResultsMetadata {
  timestamp: string;
  totalTracks: number;
  llmProvider: string;
  batchSize: number;
}

/** Shape of the JSON results file */
export interface ResultsFile {
  metadata: ResultsMetadata;
  summary: ClassificationSummary;
  tracks: ClassifiedTrack[];
}

// ─── Helper Functions ────────────────────────────────────────────────────────

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Default results filename, e.g. spotify_classifications_20240115_093005.json
 */
export function defaultResultsFileName(date: Date): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `spotify_classifications_${stamp}.json`;
}

/** "2024-01-15 09:30:05" in local time */
export function formatGeneratedAt(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Playlist filename for a group: lowercased, spaces replaced by underscores.
 */
export function playlistFileName(group: PlaylistGroup): string {
  return `${group.toLowerCase().replace(/ /g, '_')}_playlist.txt`;
}

/**
 * Groups tracks by classification. Anything that is not a canonical
 * category lands in Unclassified.
 */
export function groupByCategory(tracks: readonly ClassifiedTrack[]): GroupedTracks {
  const grouped: GroupedTracks = { 'Dance Pop': [], House: [], Bass: [], [UNCLASSIFIED_GROUP]: [] };
  for (const track of tracks) {
    if (isCanonicalCategory(track.classification)) {
      grouped[track.classification].push(track);
    } else {
      grouped[UNCLASSIFIED_GROUP].push(track);
    }
  }
  return grouped;
}

/**
 * Renders the text content of one playlist file.
 */
export function renderPlaylist(group: PlaylistGroup, tracks: readonly ClassifiedTrack[], generatedAt: Date): string {
  const lines = [`# ${group} Playlist`, `# Generated on ${formatGeneratedAt(generatedAt)}`, `# ${tracks.length} tracks`, ''];

  for (const track of tracks) {
    const artists = track.artists.length > 0 ? track.artists.join(', ') : 'Unknown';
    lines.push(`${track.name} - ${artists}`);
    const spotifyUrl = track.externalUrls?.spotify;
    if (spotifyUrl) {
      lines.push(`  ${spotifyUrl}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ─── Writers ─────────────────────────────────────────────────────────────────

/**
 * Writes the results JSON file.
 *
 * @returns The path written
 * @throws ExportError if the file cannot be written
 */
export async function saveResults(
  tracks: readonly ClassifiedTrack[],
  summary: ClassificationSummary,
  run: { llmProvider: string; batchSize: number },
  outputFile?: string,
  now: Date = new Date(),
): Promise<string> {
  const filePath = outputFile ?? defaultResultsFileName(now);
  const content: ResultsFile = {
    metadata: {
      timestamp: now.toISOString(),
      totalTracks: tracks.length,
      llmProvider: run.llmProvider,
      batchSize: run.batchSize,
    },
    summary,
    tracks: [...tracks],
  };

  try {
    const dir = path.dirname(filePath);
    await fs.promises.mkdir(dir, { recursive: true });
    await fs.promises.writeFile(filePath, JSON.stringify(content, null, 2), 'utf-8');
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ExportError(`Failed to write results file "${filePath}": ${cause.message}`, { cause });
  }

  return filePath;
}

/**
 * Writes one playlist file per non-empty group into `outputDir`.
 *
 * @returns Paths written, in category order with Unclassified last
 * @throws ExportError if the directory or a file cannot be written
 */
export async function exportPlaylistFiles(
  grouped: GroupedTracks,
  outputDir: string = 'playlists',
  now: Date = new Date(),
): Promise<string[]> {
  const created: string[] = [];

  try {
    await fs.promises.mkdir(outputDir, { recursive: true });

    for (const group of [...CATEGORIES, UNCLASSIFIED_GROUP] as const) {
      const tracks = grouped[group];
      if (tracks.length === 0) continue;

      const filePath = path.join(outputDir, playlistFileName(group));
      await fs.promises.writeFile(filePath, renderPlaylist(group, tracks, now), 'utf-8');
      created.push(filePath);
    }
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ExportError(`Failed to export playlists to "${outputDir}": ${cause.message}`, { cause });
  }

  return created;
}
