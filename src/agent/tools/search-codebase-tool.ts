/**
 * Search Codebase Tool
 *
 * Lets the agent run a similarity search over the indexed chunks. The
 * result is plain text: one fenced block per hit, led by its file and
 * confidence.
 *
 * Errors never reach the agent loop as exceptions; they come back as a
 * `Search error: ...` string so the model can react to them.
 */

import { z } from 'zod';

import { formatSearchResults } from '../../search/formatter.js';
import type { SimilaritySearcher } from '../../search/types.js';
import type { Tool } from '../types.js';

export const SEARCH_CODEBASE_TOOL_NAME = 'search_codebase';

const DEFAULT_TOP_K = 5;

const searchCodebaseInputSchema = z.object({
  query: z.string().min(1),
});

export interface SearchCodebaseToolOptions {
  /** Number of hits per search. Default: 5 */
  topK?: number;
}

/**
 * Create the search_codebase tool over a searcher.
 *
 * @example
 * ```typescript
 * const tool = createSearchCodebaseTool(vectorIndex, { topK: config.search.top_k });
 * await tool.execute({ query: 'where are sessions validated?' });
 * ```
 */
export function createSearchCodebaseTool(
  searcher: SimilaritySearcher,
  options: SearchCodebaseToolOptions = {}
): Tool {
  const topK = options.topK ?? DEFAULT_TOP_K;

  return {
    name: SEARCH_CODEBASE_TOOL_NAME,
    description:
      'Search the indexed codebase for code relevant to a query.\n\n' +
      'Use it for questions about how code works, where something is defined, ' +
      'or which files implement a feature. Include function, class or file ' +
      'names in the query when you know them.',
    parameters: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Natural-language or keyword query for the codebase',
        },
      },
      required: ['query'],
      additionalProperties: false,
    },

    async execute(args: Record<string, unknown>): Promise<string> {
      const input = searchCodebaseInputSchema.safeParse(args);
      if (!input.success) {
        return `Search error: ${input.error.issues.map((i) => i.message).join('; ')}`;
      }

      try {
        const hits = await searcher.similaritySearch(input.data.query, topK);
        return formatSearchResults(hits);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return `Search error: ${message}`;
      }
    },
  };
}
