/**
 * Secondary Splitter
 *
 * Bounds record size before embedding. Records within the budget pass
 * through untouched; larger ones are cut with LangChain's recursive
 * character splitter, preferring declaration and blank-line boundaries.
 */

import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';

import { ValidationError } from '../../errors/index.js';
import type { ChunkRecord } from '../types.js';

export interface SplitterConfig {
  /** Maximum characters per record */
  chunkSize: number;

  /** Characters shared between consecutive pieces */
  chunkOverlap: number;
}

export const DEFAULT_SPLITTER_CONFIG: SplitterConfig = {
  chunkSize: 2000,
  chunkOverlap: 200,
};

/**
 * Cut points in priority order. The empty separator slices raw characters
 * when nothing else fits.
 */
export const SPLIT_SEPARATORS = ['\nclass ', '\ndef ', '\n\n', '\n', '\n{\n', ''];

function validateConfig(config: SplitterConfig): void {
  const issues: string[] = [];
  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    issues.push(`chunkSize must be a positive integer (got ${config.chunkSize})`);
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    issues.push(`chunkOverlap must be a non-negative integer (got ${config.chunkOverlap})`);
  }
  if (config.chunkOverlap >= config.chunkSize) {
    issues.push(
      `chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`
    );
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid splitter configuration', issues);
  }
}

/**
 * Split oversize records into overlapping pieces.
 *
 * Pieces inherit the parent's metadata with `character_count` set to the
 * piece length plus `split_index` and `split_count`.
 */
export async function splitRecords(
  records: readonly ChunkRecord[],
  config: Partial<SplitterConfig> = {}
): Promise<ChunkRecord[]> {
  const resolved: SplitterConfig = { ...DEFAULT_SPLITTER_CONFIG, ...config };
  validateConfig(resolved);

  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: resolved.chunkSize,
    chunkOverlap: resolved.chunkOverlap,
    separators: SPLIT_SEPARATORS,
  });

  const output: ChunkRecord[] = [];
  for (const record of records) {
    if (record.text.length <= resolved.chunkSize) {
      output.push(record);
      continue;
    }

    const pieces = await splitter.splitText(record.text);
    pieces.forEach((piece, index) => {
      output.push({
        text: piece,
        metadata: {
          ...record.metadata,
          character_count: piece.length,
          split_index: index,
          split_count: pieces.length,
        },
      });
    });
  }

  return output;
}
