/**
 * Codebase Assistant
 *
 * Interface-agnostic entry point used by the CLI and the HTTP server:
 * builds (or reuses) the vector index, wires the agent, and exposes
 * conversation management.
 *
 * ```typescript
 * const assistant = new CodebaseAssistant({ config: loadConfig() });
 * await assistant.initialize();
 * const answer = await assistant.query('How are sessions validated?', 'default');
 * ```
 */

import { resolve } from 'node:path';

import type { Config } from '../config/schema.js';
import { resolveStoragePath } from '../config/loader.js';
import { openDatabase } from '../database/connection.js';
import { NotInitializedError } from '../errors/index.js';
import { createEmbeddingProvider } from '../indexer/embedder/provider.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import { runIndexPipeline } from '../indexer/pipeline.js';
import { ChunkStore } from '../search/store.js';
import { VectorIndex } from '../search/vector-index.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { CodebaseAgent } from './agent.js';
import { createChatModel } from './chat-model.js';
import { ConversationStore } from './conversation-store.js';
import { createSearchCodebaseTool, McpToolset } from './tools/index.js';
import type { ChatMessage, ChatModel, Role, Tool } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface CodebaseAssistantOptions {
  config: Config;
  logger?: Logger;

  /** Chunk store; opened from `storage.path` when omitted */
  store?: ChunkStore;

  /** Created from the [embedding] section when omitted */
  embeddingProvider?: EmbeddingProvider;

  /** Created from the [llm] section when omitted */
  chatModel?: ChatModel;

  conversations?: ConversationStore;

  /** Created from [mcp.connections] when omitted */
  toolset?: McpToolset;
}

export interface InitializeOptions {
  /** Rebuild the index even if the store already has chunks */
  forceReload?: boolean;

  /** Do not build an index when none exists; the assistant stays uninitialized */
  skipEmbeddings?: boolean;
}

/**
 * A message as exposed by history endpoints. System prompts are omitted.
 */
export interface HistoryMessage {
  role: Role;
  content: string;
  tool_calls?: Array<{ id: string; name: string; arguments: Record<string, unknown> }>;
  tool_call_id?: string;
}

export interface ConversationState {
  conversation_id: string;
  checkpoint_id: string;
  messages: HistoryMessage[];
  metadata: Record<string, unknown>;
  message_count: number;
  updated_at: string;
}

export type ConversationSummary =
  | { conversation_id: string; exists: false; message_count: 0 }
  | {
      conversation_id: string;
      exists: true;
      message_count: number;
      role_counts: Partial<Record<Role, number>>;
      first_message: string;
      last_message: string;
    };

export interface AssistantStatus {
  initialized: boolean;
  repo_path: string;
  persist_dir: string;
  chunk_count: number;
}

const PREVIEW_LENGTH = 100;

function toHistoryMessage(message: ChatMessage): HistoryMessage {
  return {
    role: message.role,
    content: message.content,
    ...(message.toolCalls?.length ? { tool_calls: message.toolCalls } : {}),
    ...(message.toolCallId ? { tool_call_id: message.toolCallId } : {}),
  };
}

// ============================================================================
// CodebaseAssistant
// ============================================================================

export class CodebaseAssistant {
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly conversations: ConversationStore;
  private readonly repoPath: string;
  private readonly persistPath: string;
  private readonly toolset: McpToolset;

  private store: ChunkStore | undefined;
  private embeddingProvider: EmbeddingProvider | undefined;
  private chatModel: ChatModel | undefined;
  private agent: CodebaseAgent | null = null;

  constructor(options: CodebaseAssistantOptions) {
    this.config = options.config;
    this.logger = options.logger ?? consoleLogger;
    this.store = options.store;
    this.embeddingProvider = options.embeddingProvider;
    this.chatModel = options.chatModel;
    this.conversations = options.conversations ?? new ConversationStore();
    this.repoPath = resolve(this.config.repository.path);
    this.persistPath = resolveStoragePath(this.config);
    this.toolset =
      options.toolset ??
      new McpToolset({ connections: this.config.mcp.connections, logger: this.logger });
  }

  /**
   * Load the existing index or build one, then create the agent.
   *
   * Returns without initializing when the repository yields no chunks, or
   * when no index exists and `skipEmbeddings` is set.
   *
   * @throws APIKeyError when a provider must be created and OPENAI_API_KEY is missing
   */
  async initialize(options: InitializeOptions = {}): Promise<this> {
    this.logger.info('Initializing codebase assistant...');
    const store = this.openStore();

    if (options.forceReload || store.count() === 0) {
      if (options.skipEmbeddings) {
        this.logger.info('Skipping embedding creation as requested.');
        return this;
      }

      this.logger.info(`Building index from ${this.repoPath}...`);
      const result = await runIndexPipeline({
        repoPath: this.repoPath,
        extensions: this.extensions(),
        splitter: {
          chunkSize: this.config.chunking.chunk_size,
          chunkOverlap: this.config.chunking.chunk_overlap,
        },
        index: new VectorIndex(store, this.getEmbeddingProvider()),
        embeddingBatchSize: this.config.embedding.batch_size,
        onWarning: (message) => this.logger.warn(message),
      });

      if (result.chunksStored === 0) {
        this.logger.warn(`No chunks indexed from ${this.repoPath}`);
        return this;
      }
      this.logger.info(`Indexed ${result.chunksStored} chunks from ${result.filesLoaded} files`);
    }

    const index = new VectorIndex(store, this.getEmbeddingProvider());
    const tools: Tool[] = [createSearchCodebaseTool(index, { topK: this.config.search.top_k })];
    tools.push(...(await this.toolset.loadTools(tools.map((tool) => tool.name))));

    this.agent = new CodebaseAgent({
      model: this.getChatModel(),
      tools,
      store: this.conversations,
      logger: this.logger,
      maxIterations: this.config.llm.max_iterations,
    });

    this.logger.info('Codebase assistant ready.');
    return this;
  }

  isInitialized(): boolean {
    return this.agent !== null;
  }

  /**
   * Disconnect from MCP servers. Stdio servers are child processes and
   * keep the CLI alive until closed.
   */
  async close(): Promise<void> {
    await this.toolset.close();
  }

  /**
   * Answer a question within a conversation.
   *
   * @throws NotInitializedError before a successful initialize()
   */
  async query(question: string, conversationId = 'default'): Promise<string> {
    return this.requireAgent().ask(question, conversationId);
  }

  getConversationHistory(conversationId: string): HistoryMessage[] {
    this.requireAgent();
    const checkpoint = this.conversations.get(conversationId);
    if (!checkpoint) return [];

    return checkpoint.messages
      .filter((message) => message.role !== 'system')
      .map(toHistoryMessage);
  }

  listConversations(): string[] {
    this.requireAgent();
    return this.conversations.list();
  }

  getConversationState(conversationId: string): ConversationState | null {
    this.requireAgent();
    const checkpoint = this.conversations.get(conversationId);
    if (!checkpoint) return null;

    const messages = checkpoint.messages.map(toHistoryMessage);
    return {
      conversation_id: conversationId,
      checkpoint_id: checkpoint.id,
      messages,
      metadata: checkpoint.metadata,
      message_count: messages.length,
      updated_at: checkpoint.updatedAt,
    };
  }

  getConversationSummary(conversationId: string): ConversationSummary {
    const history = this.getConversationHistory(conversationId);
    const first = history[0];
    const last = history[history.length - 1];

    if (!first || !last) {
      return { conversation_id: conversationId, exists: false, message_count: 0 };
    }

    const roleCounts: Partial<Record<Role, number>> = {};
    for (const message of history) {
      roleCounts[message.role] = (roleCounts[message.role] ?? 0) + 1;
    }

    return {
      conversation_id: conversationId,
      exists: true,
      message_count: history.length,
      role_counts: roleCounts,
      first_message: first.content.slice(0, PREVIEW_LENGTH),
      last_message: last.content.slice(0, PREVIEW_LENGTH),
    };
  }

  /** @returns false when the conversation was unknown */
  clearConversation(conversationId: string): boolean {
    this.requireAgent();
    const removed = this.conversations.delete(conversationId);
    if (removed) {
      this.logger.info(`Cleared conversation: ${conversationId}`);
    }
    return removed;
  }

  status(): AssistantStatus {
    return {
      initialized: this.isInitialized(),
      repo_path: this.repoPath,
      persist_dir: this.persistPath,
      chunk_count: this.store?.count() ?? 0,
    };
  }

  // --------------------------------------------------------------------------

  private requireAgent(): CodebaseAgent {
    if (!this.agent) {
      throw new NotInitializedError();
    }
    return this.agent;
  }

  private openStore(): ChunkStore {
    if (!this.store) {
      this.store = new ChunkStore(openDatabase(this.persistPath));
    }
    return this.store;
  }

  private getEmbeddingProvider(): EmbeddingProvider {
    if (!this.embeddingProvider) {
      this.embeddingProvider = createEmbeddingProvider(this.config.embedding);
    }
    return this.embeddingProvider;
  }

  private getChatModel(): ChatModel {
    if (!this.chatModel) {
      this.chatModel = createChatModel(this.config.llm);
    }
    return this.chatModel;
  }

  private extensions(): string[] | undefined {
    const list = this.config.repository.include_extensions;
    return list.length > 0 ? list : undefined;
  }
}
