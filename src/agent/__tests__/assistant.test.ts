/**
 * CodebaseAssistant Tests
 *
 * Wires the real pipeline, store and agent with in-process providers over
 * a temp repository.
 */

import { describe, it, expect, vi, afterAll } from 'vitest';
import { resolve } from 'node:path';

import { CodebaseAssistant } from '../assistant.js';
import { ConversationStore } from '../conversation-store.js';
import { McpToolset } from '../tools/index.js';
import type { ChatCompletion } from '../types.js';
import { resolveConfig } from '../../config/loader.js';
import { IN_MEMORY, openDatabase } from '../../database/index.js';
import { NotInitializedError } from '../../errors/index.js';
import { ChunkStore } from '../../search/store.js';
import {
  createInProcessServers,
  createTempRepo,
  KeywordEmbeddingProvider,
  ScriptedChatModel,
} from '../../test-utils/index.js';

const repo = createTempRepo({
  'src/app.py': 'def run():\n    return 1\n',
  'src/util.ts': 'export function add(a, b) {\n  return a + b;\n}\n',
});
const emptyRepo = createTempRepo({});

afterAll(() => {
  repo.cleanup();
  emptyRepo.cleanup();
});

const SEARCH_THEN_ANSWER: ChatCompletion[] = [
  { content: '', toolCalls: [{ id: 'call-1', name: 'search_codebase', arguments: { query: 'run' } }] },
  { content: 'run() returns 1', toolCalls: [] },
];

function createAssistant(
  options: {
    repoPath?: string;
    store?: ChunkStore;
    completions?: ChatCompletion[];
    provider?: KeywordEmbeddingProvider;
    toolset?: McpToolset;
  } = {}
) {
  const config = resolveConfig({
    repository: { path: options.repoPath ?? repo.root },
    storage: { path: IN_MEMORY },
  });
  const provider = options.provider ?? new KeywordEmbeddingProvider(['run', 'add']);
  const chatModel = new ScriptedChatModel(options.completions ?? SEARCH_THEN_ANSWER);
  const store = options.store ?? new ChunkStore(openDatabase(IN_MEMORY));
  const logger = { info: vi.fn(), warn: vi.fn(), debug: vi.fn() };

  const assistant = new CodebaseAssistant({
    config,
    logger,
    store,
    embeddingProvider: provider,
    chatModel,
    conversations: new ConversationStore(),
    ...(options.toolset ? { toolset: options.toolset } : {}),
  });
  return { assistant, provider, chatModel, store, logger };
}

describe('CodebaseAssistant', () => {
  describe('initialize', () => {
    it('should build the index when the store is empty', async () => {
      const { assistant, store } = createAssistant();

      await assistant.initialize();

      expect(assistant.isInitialized()).toBe(true);
      expect(store.count()).toBe(2);
      expect(assistant.status()).toEqual({
        initialized: true,
        repo_path: resolve(repo.root),
        persist_dir: IN_MEMORY,
        chunk_count: 2,
      });
    });

    it('should reuse an existing index', async () => {
      const store = new ChunkStore(openDatabase(IN_MEMORY));
      await createAssistant({ store }).assistant.initialize();

      const { assistant, provider } = createAssistant({ store });
      await assistant.initialize();

      expect(assistant.isInitialized()).toBe(true);
      expect(provider.calls).toEqual([]);
    });

    it('should rebuild on forceReload', async () => {
      const store = new ChunkStore(openDatabase(IN_MEMORY));
      await createAssistant({ store }).assistant.initialize();

      const { assistant, provider } = createAssistant({ store });
      await assistant.initialize({ forceReload: true });

      expect(provider.calls).toHaveLength(1);
      expect(store.count()).toBe(2);
    });

    it('should stay uninitialized when asked to skip embeddings', async () => {
      const { assistant, logger } = createAssistant();

      await assistant.initialize({ skipEmbeddings: true });

      expect(assistant.isInitialized()).toBe(false);
      expect(logger.info).toHaveBeenCalledWith('Skipping embedding creation as requested.');
    });

    it('should stay uninitialized when the repository has no chunks', async () => {
      const { assistant, logger } = createAssistant({ repoPath: emptyRepo.root });

      await assistant.initialize();

      expect(assistant.isInitialized()).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(`No chunks indexed from ${resolve(emptyRepo.root)}`);
    });
  });

  describe('before initialize', () => {
    it('should reject conversation operations', async () => {
      const { assistant } = createAssistant();

      await expect(assistant.query('hi')).rejects.toBeInstanceOf(NotInitializedError);
      expect(() => assistant.listConversations()).toThrow(NotInitializedError);
      expect(() => assistant.getConversationHistory('default')).toThrow(NotInitializedError);
      expect(() => assistant.clearConversation('default')).toThrow(NotInitializedError);
    });

    it('should still report status', () => {
      const { assistant } = createAssistant();
      expect(assistant.status()).toMatchObject({ initialized: false, chunk_count: 0 });
    });
  });

  describe('query', () => {
    it('should answer through the search tool', async () => {
      const { assistant, chatModel } = createAssistant();
      await assistant.initialize();

      const answer = await assistant.query('What does run return?');

      expect(answer).toBe('run() returns 1');
      expect(chatModel.requests[1]?.messages[3]).toEqual({
        role: 'tool',
        toolCallId: 'call-1',
        name: 'search_codebase',
        content:
          'File: src/app.py (score: 100.0%)\n```\ndef run():\n    return 1\n```\n\n' +
          'File: src/util.ts (score: 50.0%)\n```\nexport function add(a, b) {\n  return a + b;\n}\n```',
      });
    });
  });

  describe('MCP tools', () => {
    it('should offer MCP tools after search_codebase', async () => {
      const toolset = new McpToolset({
        connections: { utility: { transport: 'streamable_http', url: 'http://localhost:8001/mcp/' } },
        createTransport: createInProcessServers({
          utility: [
            {
              name: 'line_count',
              description: 'Count lines in a file',
              inputSchema: { type: 'object', properties: { path: { type: 'string' } } },
              handler: (args) => ({ text: `${String(args.path)}: 2 lines` }),
            },
          ],
        }),
      });
      const { assistant, chatModel } = createAssistant({
        toolset,
        completions: [
          {
            content: '',
            toolCalls: [{ id: 'call-1', name: 'line_count', arguments: { path: 'src/app.py' } }],
          },
          { content: 'src/app.py has 2 lines', toolCalls: [] },
        ],
      });
      await assistant.initialize();

      const answer = await assistant.query('How long is src/app.py?');
      await assistant.close();

      expect(answer).toBe('src/app.py has 2 lines');
      expect(chatModel.requests[0]?.tools.map((tool) => tool.name)).toEqual([
        'search_codebase',
        'line_count',
      ]);
      expect(chatModel.requests[1]?.messages[3]).toEqual({
        role: 'tool',
        toolCallId: 'call-1',
        name: 'line_count',
        content: 'src/app.py: 2 lines',
      });
    });
  });

  describe('conversations', () => {
    async function askOnce() {
      const created = createAssistant();
      await created.assistant.initialize();
      await created.assistant.query('What does run return?', 'default');
      return created.assistant;
    }

    it('should return history without the system prompt', async () => {
      const assistant = await askOnce();

      expect(assistant.getConversationHistory('default')).toEqual([
        { role: 'user', content: 'What does run return?' },
        {
          role: 'assistant',
          content: '',
          tool_calls: [{ id: 'call-1', name: 'search_codebase', arguments: { query: 'run' } }],
        },
        expect.objectContaining({ role: 'tool', tool_call_id: 'call-1' }),
        { role: 'assistant', content: 'run() returns 1' },
      ]);
      expect(assistant.getConversationHistory('other')).toEqual([]);
    });

    it('should expose the full checkpoint state', async () => {
      const assistant = await askOnce();
      const state = assistant.getConversationState('default');

      expect(state?.message_count).toBe(5);
      expect(state?.messages[0]?.role).toBe('system');
      expect(state?.metadata).toEqual({ model: 'scripted-test', last_iterations: 2 });
      expect(assistant.getConversationState('other')).toBeNull();
    });

    it('should summarize a conversation', async () => {
      const assistant = await askOnce();

      expect(assistant.getConversationSummary('default')).toEqual({
        conversation_id: 'default',
        exists: true,
        message_count: 4,
        role_counts: { user: 1, assistant: 2, tool: 1 },
        first_message: 'What does run return?',
        last_message: 'run() returns 1',
      });
    });

    it('should cut summary previews to 100 characters', async () => {
      const long = 'q'.repeat(150);
      const { assistant } = createAssistant({
        completions: [{ content: 'a'.repeat(120), toolCalls: [] }],
      });
      await assistant.initialize();
      await assistant.query(long, 'long');

      const summary = assistant.getConversationSummary('long');

      expect(summary.exists).toBe(true);
      if (summary.exists) {
        expect(summary.first_message).toBe('q'.repeat(100));
        expect(summary.last_message).toBe('a'.repeat(100));
      }
    });

    it('should list and clear conversations', async () => {
      const assistant = await askOnce();

      expect(assistant.listConversations()).toEqual(['default']);
      expect(assistant.clearConversation('default')).toBe(true);
      expect(assistant.clearConversation('default')).toBe(false);
      expect(assistant.getConversationSummary('default')).toEqual({
        conversation_id: 'default',
        exists: false,
        message_count: 0,
      });
    });
  });
});
