/**
 * Classification Workflow
 *
 * Orchestrates a full run: fetch + enrich the user's library → classify →
 * summarize → save results → export playlists (optional).
 */

import { CATEGORIES } from '../../shared/types';
import type { ClassificationSummary, ClassifiedTrack, Track } from '../../shared/types';
import { MusicClassifier } from './batchClassifier';
import { groupByCategory, saveResults, exportPlaylistFiles } from './playlistExporter';
import { formatShare } from './summaryAggregator';
import { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** The part of the catalog client the workflow needs */
export interface TrackSource {
  getAllUserTracks(): Promise<Track[]>;
  enrichTracksWithFeatures(tracks: readonly Track[]): Promise<Track[]>;
}

export interface WorkflowRunOptions {
  /** Results file path (default: timestamped name in the working directory) */
  outputFile?: string;
  /** Whether to write per-category playlist files */
  exportPlaylists: boolean;
  /** Directory for playlist files */
  playlistDir?: string;
}

export interface WorkflowResult {
  tracks: ClassifiedTrack[];
  resultsFile: string;
  playlistFiles: string[];
  summary: ClassificationSummary;
}

// ─── Workflow ────────────────────────────────────────────────────────────────

export class ClassificationWorkflow {
  constructor(
    private readonly source: TrackSource,
    private readonly classifier: MusicClassifier,
    private readonly logger: Logger,
  ) {}

  /**
   * Fetches the library and enriches it. Enrichment is skipped when the
   * library is empty.
   */
  async fetchAndEnrichTracks(): Promise<Track[]> {
    this.logger.info("Fetching user's liked songs and playlists...", { step: 'catalog_fetch' });
    const tracks = await this.source.getAllUserTracks();

    if (tracks.length === 0) {
      this.logger.warn('No tracks found', { step: 'catalog_fetch' });
      return [];
    }

    this.logger.info(`Found ${tracks.length} unique tracks; enriching with audio features and genres...`, {
      step: 'catalog_fetch',
    });
    const enriched = await this.source.enrichTracksWithFeatures(tracks);
    this.logger.info(`Successfully enriched ${enriched.length} tracks`, { step: 'catalog_fetch' });
    return enriched;
  }

  /**
   * Classifies tracks and logs the category breakdown.
   */
  async classifyAllTracks(tracks: readonly Track[]): Promise<ClassifiedTrack[]> {
    if (tracks.length === 0) {
      return [];
    }

    const classified = await this.classifier.classifyTracks(tracks);
    this.logSummary(this.classifier.getClassificationSummary(classified));
    return classified;
  }

  /**
   * Runs the whole workflow. Returns null when the library has no tracks.
   */
  async run(options: WorkflowRunOptions): Promise<WorkflowResult | null> {
    const tracks = await this.fetchAndEnrichTracks();
    if (tracks.length === 0) {
      return null;
    }

    const classified = await this.classifyAllTracks(tracks);
    const summary = this.classifier.getClassificationSummary(classified);

    const resultsFile = await saveResults(
      classified,
      summary,
      { llmProvider: this.classifier.provider, batchSize: this.classifier.getBatchSize() },
      options.outputFile,
    );
    this.logger.info(`Results saved to: ${resultsFile}`, { step: 'export' });

    let playlistFiles: string[] = [];
    if (options.exportPlaylists) {
      playlistFiles = await exportPlaylistFiles(groupByCategory(classified), options.playlistDir);
      for (const file of playlistFiles) {
        this.logger.info(`Created playlist: ${file}`, { step: 'export' });
      }
    }

    return { tracks: classified, resultsFile, playlistFiles, summary };
  }

  private logSummary(summary: ClassificationSummary): void {
    this.logger.info(
      `Classification summary: ${summary.totalTracks} tracks, ` +
        `${(summary.successRate * 100).toFixed(1)}% success rate, ${summary.unclassified} unclassified`,
      { step: 'summary' },
    );
    for (const category of CATEGORIES) {
      const count = summary.categories[category];
      this.logger.info(`  ${category}: ${count} tracks (${formatShare(count, summary.totalTracks)}%)`, {
        step: 'summary',
      });
    }
  }
}
