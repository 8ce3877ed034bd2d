/**
 * Search Result Formatter
 *
 * Renders hits for the agent: one block per hit with the file and a
 * confidence derived from the cosine distance, followed by the code.
 *
 * ```text
 * File: src/auth.py (score: 87.5%)
 * ```
 * def login(user):
 *     ...
 * ```
 * ```
 */

import type { SearchHit } from './types.js';

export const NO_RESULTS_MESSAGE = 'No relevant code found.';

/**
 * Confidence percentage for a cosine distance, one decimal.
 *
 * @example formatConfidence(0.125) // '87.5%'
 */
export function formatConfidence(score: number): string {
  return `${((1 - score) * 100).toFixed(1)}%`;
}

/**
 * Best available path of a hit's source file.
 */
export function hitSource(hit: SearchHit): string {
  const { metadata } = hit.record;
  const source = metadata.repo_relative_path ?? metadata.source_path;
  return typeof source === 'string' && source.length > 0 ? source : 'unknown';
}

export function formatHit(hit: SearchHit): string {
  return `File: ${hitSource(hit)} (score: ${formatConfidence(hit.score)})\n\`\`\`\n${hit.record.text}\n\`\`\``;
}

export function formatSearchResults(hits: readonly SearchHit[]): string {
  if (hits.length === 0) return NO_RESULTS_MESSAGE;
  return hits.map(formatHit).join('\n\n');
}
