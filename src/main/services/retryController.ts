/**
 * Per-batch retry controller.
 *
 * Drives up to `maxRetries` attempts of send → parse → threshold check for
 * one batch prompt. An attempt is accepted when at least 70% of the batch
 * resolves to a category. Failed attempts (below threshold, or a transport
 * failure) back off for 2^attempt time units before the next one; when the
 * budget runs out the batch result is all null.
 */

import type { ClassificationResult } from '../../shared/types';
import type { LlmBackend } from './llmBackend';
import { toTransportFailure } from './llmBackend';
import { parseClassificationResponse, countClassified } from './responseParser';
import { Logger } from './logger';

// ─── Constants ───────────────────────────────────────────────────────────────

/** Minimum fraction of a batch that must be classified for an attempt to stand */
export const ACCEPTANCE_THRESHOLD = 0.7;

/** Default attempt budget per batch */
export const DEFAULT_MAX_RETRIES = 3;

/** Length of one backoff time unit in milliseconds */
export const DEFAULT_DELAY_UNIT_MS = 1000;

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Suspends for the given number of milliseconds */
export type SleepFn = (ms: number) => Promise<void>;

export type RetryState = 'attempting' | 'accepted' | 'exhausted';

export interface RetryControllerOptions {
  /** Attempt budget (positive integer, default 3) */
  maxRetries?: number;
  /** Milliseconds per backoff unit (default 1000) */
  delayUnitMs?: number;
  /** Injectable sleep (for testing) */
  sleep?: SleepFn;
  /** Logger for failed attempts */
  logger?: Logger;
}

/** Outcome of running one batch through the controller */
export interface RetryOutcome {
  state: Exclude<RetryState, 'attempting'>;
  /** Backend calls made */
  attempts: number;
  /** Final per-track results (all null when exhausted) */
  classifications: ClassificationResult[];
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export const defaultSleep: SleepFn = (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Backoff before the attempt after `attemptIndex` (0-based), in time units.
 */
export function backoffDelay(attemptIndex: number): number {
  return Math.pow(2, attemptIndex);
}

/**
 * Fraction of non-null results; 0 for an empty list.
 */
export function successRate(classifications: readonly ClassificationResult[], batchSize: number): number {
  return batchSize > 0 ? countClassified(classifications) / batchSize : 0;
}

// ─── Controller ──────────────────────────────────────────────────────────────

export class RetryController {
  private readonly maxRetries: number;
  private readonly delayUnitMs: number;
  private readonly sleep: SleepFn;
  private readonly logger: Logger | null;

  constructor(
    private readonly backend: LlmBackend,
    options: RetryControllerOptions = {},
  ) {
    this.maxRetries = Math.max(1, Math.floor(options.maxRetries ?? DEFAULT_MAX_RETRIES));
    this.delayUnitMs = options.delayUnitMs ?? DEFAULT_DELAY_UNIT_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? null;
  }

  getMaxRetries(): number {
    return this.maxRetries;
  }

  /**
   * Runs the attempt ladder for one prompt. Never throws.
   *
   * @param prompt - The batch prompt, sent verbatim on every attempt
   * @param batchSize - Number of tracks the prompt describes
   */
  async run(prompt: string, batchSize: number): Promise<RetryOutcome> {
    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const classifications = await this.attempt(prompt, batchSize, attempt);

      if (classifications !== null) {
        const rate = successRate(classifications, batchSize);
        if (rate >= ACCEPTANCE_THRESHOLD) {
          return { state: 'accepted', attempts: attempt + 1, classifications };
        }
        this.logger?.warn(
          `Low success rate (${(rate * 100).toFixed(2)}%) on attempt ${attempt + 1}/${this.maxRetries}`,
          { step: 'classify' },
        );
      }

      if (attempt < this.maxRetries - 1) {
        await this.sleep(backoffDelay(attempt) * this.delayUnitMs);
      }
    }

    this.logger?.warn(`Batch exhausted after ${this.maxRetries} attempts; ${batchSize} tracks left unclassified`, {
      step: 'classify',
    });
    return {
      state: 'exhausted',
      attempts: this.maxRetries,
      classifications: new Array<ClassificationResult>(batchSize).fill(null),
    };
  }

  /**
   * One send + parse. Returns null when the backend call failed.
   */
  private async attempt(prompt: string, batchSize: number, attempt: number): Promise<ClassificationResult[] | null> {
    let reply: string;
    try {
      reply = await this.backend.send(prompt);
    } catch (error: unknown) {
      const failure = toTransportFailure(error, this.backend.provider);
      this.logger?.warn(`Classification attempt ${attempt + 1}/${this.maxRetries} failed: ${failure.message}`, {
        category: failure.category,
        step: failure.step,
        cause: failure.cause?.message,
      });
      return null;
    }
    return parseClassificationResponse(reply, batchSize);
  }
}
