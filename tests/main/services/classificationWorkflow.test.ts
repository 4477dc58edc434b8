/**
 * Tests for the end-to-end classification workflow
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Track } from '../../../src/shared/types';
import { ClassificationWorkflow } from '../../../src/main/services/classificationWorkflow';
import type { TrackSource } from '../../../src/main/services/classificationWorkflow';
import { MusicClassifier } from '../../../src/main/services/batchClassifier';
import type { LlmBackend } from '../../../src/main/services/llmBackend';
import { Logger } from '../../../src/main/services/logger';

// ─── Test Helpers ────────────────────────────────────────────────────────────

const tempDirs: string[] = [];

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'workflow-test-'));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function createTrack(id: string): Track {
  return { id, name: `Song ${id}`, artists: ['Artist'], genres: [], audioFeatures: null };
}

function createSource(tracks: Track[]) {
  const source = {
    getAllUserTracks: vi.fn(async () => tracks),
    enrichTracksWithFeatures: vi.fn(async (input: readonly Track[]) =>
      input.map((track) => ({ ...track, genres: ['bass house'], audioFeatures: { tempo: 126 } })),
    ),
  };
  const typed: TrackSource = source;
  return { source, typed };
}

/** Replies Bass for track t1 and an unknown label for anything else */
function createBackend(): LlmBackend {
  return {
    provider: 'anthropic',
    model: 'claude-3-5-sonnet-20241022',
    send: vi.fn(async (prompt: string) =>
      prompt.includes('"Song t1"') ? 'Track 1: **Bass**' : 'Track 1: **Techno**',
    ),
  };
}

function createWorkflow(tracks: Track[], logger = new Logger()) {
  const { source, typed } = createSource(tracks);
  const classifier = new MusicClassifier(createBackend(), {
    batchSize: 1,
    maxRetries: 1,
    sleep: vi.fn(async () => undefined),
    logger,
  });
  return { source, workflow: new ClassificationWorkflow(typed, classifier, logger) };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('ClassificationWorkflow', () => {
  it('should stop with null and skip enrichment when the library is empty', async () => {
    const logger = new Logger();
    const { source, workflow } = createWorkflow([], logger);

    await expect(workflow.run({ exportPlaylists: true })).resolves.toBeNull();
    expect(source.enrichTracksWithFeatures).not.toHaveBeenCalled();
    expect(logger.getWarnings().map((entry) => entry.message)).toEqual(['No tracks found']);
  });

  it('should enrich before classifying', async () => {
    const { workflow } = createWorkflow([createTrack('t1')]);

    const enriched = await workflow.fetchAndEnrichTracks();
    expect(enriched).toEqual([{ ...createTrack('t1'), genres: ['bass house'], audioFeatures: { tempo: 126 } }]);
  });

  it('should classify, save results and export playlists', async () => {
    const dir = createTempDir();
    const outputFile = path.join(dir, 'results.json');
    const playlistDir = path.join(dir, 'playlists');
    const { workflow } = createWorkflow([createTrack('t1'), createTrack('t2')]);

    const result = await workflow.run({ outputFile, exportPlaylists: true, playlistDir });

    expect(result).not.toBeNull();
    expect(result?.tracks.map((track) => track.classification)).toEqual(['Bass', null]);
    expect(result?.summary).toEqual({
      totalTracks: 2,
      categories: { 'Dance Pop': 0, House: 0, Bass: 1 },
      unclassified: 1,
      successRate: 0.5,
    });
    expect(result?.resultsFile).toBe(outputFile);
    expect(result?.playlistFiles).toEqual([
      path.join(playlistDir, 'bass_playlist.txt'),
      path.join(playlistDir, 'unclassified_playlist.txt'),
    ]);
    expect(JSON.parse(fs.readFileSync(outputFile, 'utf-8')).metadata).toMatchObject({
      totalTracks: 2,
      llmProvider: 'anthropic',
      batchSize: 1,
    });
  });

  it('should skip playlist export when disabled', async () => {
    const dir = createTempDir();
    const { workflow } = createWorkflow([createTrack('t1')]);

    const result = await workflow.run({
      outputFile: path.join(dir, 'results.json'),
      exportPlaylists: false,
      playlistDir: path.join(dir, 'playlists'),
    });

    expect(result?.playlistFiles).toEqual([]);
    expect(fs.existsSync(path.join(dir, 'playlists'))).toBe(false);
  });

  it('should log the category breakdown', async () => {
    const logger = new Logger();
    const { workflow } = createWorkflow([createTrack('t1'), createTrack('t2')], logger);

    await workflow.classifyAllTracks([createTrack('t1'), createTrack('t2')]);

    expect(logger.getEntries({ step: 'summary' }).map((entry) => entry.message)).toEqual([
      'Classification summary: 2 tracks, 50.0% success rate, 1 unclassified',
      '  Dance Pop: 0 tracks (0.0%)',
      '  House: 0 tracks (0.0%)',
      '  Bass: 1 tracks (50.0%)',
    ]);
  });
});
