/**
 * Batch Classification Service
 *
 * Splits a track list into fixed-size batches and classifies them one after
 * another through the retry controller, pacing requests between batches to
 * respect backend rate limits.
 *
 * Key design decisions:
 * - Strictly sequential: one batch, one attempt in flight at a time
 * - Per-batch failure isolation (an exhausted batch yields nulls, the run continues)
 * - Copy-on-write: input tracks are never mutated
 * - Progress callbacks for CLI integration
 */

import { DEFAULT_SETTINGS } from '../../shared/types';
import type {
  BatchProgress,
  ClassificationResult,
  ClassificationSummary,
  ClassifiedTrack,
  LlmProvider,
  Track,
} from '../../shared/types';
import type { LlmBackend } from './llmBackend';
import { buildClassificationPrompt } from './promptBuilder';
import { countClassified } from './responseParser';
import { RetryController, DEFAULT_DELAY_UNIT_MS, defaultSleep } from './retryController';
import type { SleepFn } from './retryController';
import { summarizeClassifications } from './summaryAggregator';
import { Logger } from './logger';
import { ConfigurationError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface MusicClassifierOptions {
  /** Tracks per prompt (positive integer, default 25) */
  batchSize?: number;
  /** Attempts per batch (positive integer, default 3) */
  maxRetries?: number;
  /** Milliseconds per time unit, used for backoff and pacing (default 1000) */
  delayUnitMs?: number;
  /** Injectable sleep (for testing) */
  sleep?: SleepFn;
  /** Logger instance for structured logging */
  logger?: Logger;
  /** Callback after each batch completes */
  onBatchComplete?: (progress: BatchProgress) => void;
}

/** Pause between batches, in time units */
export const PACING_DELAY_UNITS = 1;

// ─── Helpers ─────────────────────────────────────────────────────────────────

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Splits a list into consecutive slices of at most `size` elements.
 */
export function splitIntoBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

/**
 * Returns a copy of each track with its classification attached.
 */
export function attachClassifications(
  tracks: readonly Track[],
  classifications: readonly ClassificationResult[],
): ClassifiedTrack[] {
  return tracks.map((track, index) => ({ ...track, classification: classifications[index] ?? null }));
}

// ─── Classifier ──────────────────────────────────────────────────────────────

/**
 * Classifies tracks into Dance Pop, House or Bass with a text-generation backend.
 */
export class MusicClassifier {
  private readonly batchSize: number;
  private readonly delayUnitMs: number;
  private readonly sleep: SleepFn;
  private readonly logger: Logger | null;
  private readonly onBatchComplete: ((progress: BatchProgress) => void) | null;
  private readonly retryController: RetryController;

  /**
   * @throws ConfigurationError when batchSize or maxRetries is not a positive integer
   */
  constructor(
    private readonly backend: LlmBackend,
    options: MusicClassifierOptions = {},
  ) {
    this.batchSize = requirePositiveInteger('batchSize', options.batchSize ?? DEFAULT_SETTINGS.batchSize);
    const maxRetries = requirePositiveInteger('maxRetries', options.maxRetries ?? DEFAULT_SETTINGS.maxRetries);
    this.delayUnitMs = options.delayUnitMs ?? DEFAULT_DELAY_UNIT_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? null;
    this.onBatchComplete = options.onBatchComplete ?? null;

    this.retryController = new RetryController(backend, {
      maxRetries,
      delayUnitMs: this.delayUnitMs,
      sleep: this.sleep,
      logger: options.logger,
    });
  }

  get provider(): LlmProvider {
    return this.backend.provider;
  }

  getBatchSize(): number {
    return this.batchSize;
  }

  getMaxRetries(): number {
    return this.retryController.getMaxRetries();
  }

  /**
   * Classifies one batch. Always returns one entry per track, null where
   * no category could be determined. Never throws.
   */
  async classifyBatch(tracks: readonly Track[]): Promise<ClassificationResult[]> {
    if (tracks.length === 0) {
      return [];
    }

    const prompt = buildClassificationPrompt(tracks);
    const outcome = await this.retryController.run(prompt, tracks.length);
    return outcome.classifications;
  }

  /**
   * Classifies every track, batch by batch, in order.
   *
   * @returns New track records with a `classification` field, in input order
   */
  async classifyTracks(tracks: readonly Track[]): Promise<ClassifiedTrack[]> {
    if (tracks.length === 0) {
      return [];
    }

    const batches = splitIntoBatches(tracks, this.batchSize);
    const classified: ClassifiedTrack[] = [];

    this.logger?.info(
      `Classifying ${tracks.length} tracks in ${batches.length} batches using ${this.backend.provider}`,
      { step: 'classify' },
    );

    for (let index = 0; index < batches.length; index++) {
      const batch = batches[index];
      const batchNumber = index + 1;

      this.logger?.info(`Processing batch ${batchNumber}/${batches.length} (${batch.length} tracks)...`, {
        step: 'classify',
      });

      const classifications = await this.classifyBatch(batch);
      classified.push(...attachClassifications(batch, classifications));

      const classifiedCount = countClassified(classifications);
      this.logger?.info(
        `Batch ${batchNumber} complete: ${classifiedCount}/${batch.length} classified successfully`,
        { step: 'classify' },
      );
      this.onBatchComplete?.({
        batchNumber,
        totalBatches: batches.length,
        batchSize: batch.length,
        classifiedCount,
      });

      if (batchNumber < batches.length) {
        await this.sleep(PACING_DELAY_UNITS * this.delayUnitMs);
      }
    }

    const summary = this.getClassificationSummary(classified);
    this.logger?.info(
      `Classification complete: ${summary.totalTracks - summary.unclassified}/${summary.totalTracks} tracks classified ` +
        `(${(summary.successRate * 100).toFixed(1)}% success rate)`,
      { step: 'classify' },
    );

    return classified;
  }

  /**
   * Tallies classified tracks per category.
   */
  getClassificationSummary(tracks: readonly ClassifiedTrack[]): ClassificationSummary {
    return summarizeClassifications(tracks);
  }
}
