/**
 * search_codebase Tool Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { createSearchCodebaseTool, SEARCH_CODEBASE_TOOL_NAME } from '../search-codebase-tool.js';
import { NO_RESULTS_MESSAGE } from '../../../search/formatter.js';
import type { SearchHit, SimilaritySearcher } from '../../../search/types.js';

function createSearcher(hits: SearchHit[]) {
  const similaritySearch = vi.fn(async (_query: string, _k: number) => hits);
  const searcher: SimilaritySearcher = { similaritySearch };
  return { searcher, similaritySearch };
}

const LOGIN_HIT: SearchHit = {
  id: 'chunk-1',
  record: { text: 'def login(user):\n    ...', metadata: { repo_relative_path: 'src/auth.py' } },
  score: 0.125,
};

describe('createSearchCodebaseTool', () => {
  it('should describe a single required query parameter', () => {
    const { searcher } = createSearcher([]);
    const tool = createSearchCodebaseTool(searcher);

    expect(tool.name).toBe(SEARCH_CODEBASE_TOOL_NAME);
    expect(tool.parameters).toMatchObject({
      type: 'object',
      required: ['query'],
      additionalProperties: false,
    });
  });

  it('should format the hits of a search', async () => {
    const { searcher, similaritySearch } = createSearcher([LOGIN_HIT]);
    const tool = createSearchCodebaseTool(searcher);

    const output = await tool.execute({ query: 'login' });

    expect(output).toBe('File: src/auth.py (score: 87.5%)\n```\ndef login(user):\n    ...\n```');
    expect(similaritySearch).toHaveBeenCalledWith('login', 5);
  });

  it('should pass the configured topK', async () => {
    const { searcher, similaritySearch } = createSearcher([]);
    await createSearchCodebaseTool(searcher, { topK: 8 }).execute({ query: 'x' });

    expect(similaritySearch).toHaveBeenCalledWith('x', 8);
  });

  it('should report when nothing matched', async () => {
    const { searcher } = createSearcher([]);
    await expect(createSearchCodebaseTool(searcher).execute({ query: 'x' })).resolves.toBe(
      NO_RESULTS_MESSAGE
    );
  });

  describe('errors', () => {
    it('should reject an empty query without searching', async () => {
      const { searcher, similaritySearch } = createSearcher([]);
      const output = await createSearchCodebaseTool(searcher).execute({ query: '' });

      expect(output).toBe('Search error: String must contain at least 1 character(s)');
      expect(similaritySearch).not.toHaveBeenCalled();
    });

    it('should reject a missing query', async () => {
      const { searcher } = createSearcher([]);
      await expect(createSearchCodebaseTool(searcher).execute({})).resolves.toBe(
        'Search error: Required'
      );
    });

    it('should return search failures as text', async () => {
      const searcher: SimilaritySearcher = {
        similaritySearch: async () => {
          throw new Error('index offline');
        },
      };

      await expect(createSearchCodebaseTool(searcher).execute({ query: 'x' })).resolves.toBe(
        'Search error: index offline'
      );
    });
  });
});
