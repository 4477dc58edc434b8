/**
 * Classification Prompt Builder
 *
 * Renders a batch of tracks into a single instruction prompt: category
 * descriptions, three few-shot examples, one numbered block per track and
 * a strict output-format instruction. Pure and deterministic.
 */

import type { Track } from '../../shared/types';

// ─── Prompt Text ─────────────────────────────────────────────────────────────

export const PROMPT_HEADER = `You are an expert in electronic music categorization, helping DJs classify tracks into broad electronic genres. The available categories are:

- Dance Pop: melodic, catchy, often vocal-heavy tracks intended for mainstream dance audiences. Think Dua Lipa, Calvin Harris, or remixes of pop hits.
- House: rhythm-driven tracks with 4/4 beats, consistent grooves, minimal vocals, and strong club energy. Think deep house, tech house, or progressive house.
- Bass: includes genres like dubstep, trap, future bass, or other subgenres focused on heavy low-end, syncopated beats, or experimental production.

Categorize each song based on the metadata provided.`;

export const FEW_SHOT_EXAMPLES = `### Example 1
Track: "One Kiss"
Artist: Calvin Harris, Dua Lipa
Genres: dance pop, pop, EDM
Tempo: 124 BPM
Energy: 0.80
Danceability: 0.85
Prediction: **Dance Pop**

### Example 2
Track: "Losing It"
Artist: Fisher
Genres: tech house, house
Tempo: 125 BPM
Energy: 0.90
Danceability: 0.82
Prediction: **House**

### Example 3
Track: "Core"
Artist: RL Grime
Genres: trap, bass, electronic
Tempo: 150 BPM
Energy: 0.95
Danceability: 0.60
Prediction: **Bass**`;

export const OUTPUT_INSTRUCTION = `Respond with ONLY the predictions in this exact format for each track:
Track X: **Category**

Do not include any other text, explanations, or formatting.`;

const UNKNOWN = 'Unknown';

// ─── Field Formatting ────────────────────────────────────────────────────────

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** "128 BPM" for a numeric tempo, "Unknown" otherwise */
export function formatTempo(tempo: unknown): string {
  return isFiniteNumber(tempo) ? `${Math.round(tempo)} BPM` : UNKNOWN;
}

/** Two decimal places for a numeric 0-1 feature, "Unknown" otherwise */
export function formatDecimal(value: unknown): string {
  return isFiniteNumber(value) ? value.toFixed(2) : UNKNOWN;
}

function joinOrUnknown(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : UNKNOWN;
}

// ─── Builders ────────────────────────────────────────────────────────────────

/**
 * Formats one track as a numbered prompt block.
 *
 * @param index - 0-based position in the batch; rendered 1-based
 */
export function formatTrackForPrompt(track: Track, index: number): string {
  const features = track.audioFeatures ?? {};

  return [
    `### Track ${index + 1}`,
    `Track: "${track.name}"`,
    `Artist: ${joinOrUnknown(track.artists)}`,
    `Genres: ${joinOrUnknown(track.genres)}`,
    `Tempo: ${formatTempo(features.tempo)}`,
    `Energy: ${formatDecimal(features.energy)}`,
    `Danceability: ${formatDecimal(features.danceability)}`,
    'Prediction:',
  ].join('\n');
}

/**
 * Builds the full classification prompt for a batch of tracks.
 */
export function buildClassificationPrompt(tracks: readonly Track[]): string {
  const trackBlocks = tracks.map((track, index) => formatTrackForPrompt(track, index)).join('\n\n');

  return [PROMPT_HEADER, FEW_SHOT_EXAMPLES, trackBlocks, OUTPUT_INSTRUCTION].join('\n\n');
}
