/**
 * Fake Providers
 */

import type { ChatCompletion, ChatMessage, ChatModel, ToolDefinition } from '../agent/types.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';

/**
 * Embeds text as keyword counts, one dimension per keyword plus a constant
 * last dimension so no vector is all zeros.
 *
 * Texts containing `failOn` make the whole request reject.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'keyword-test';

  /** Every batch passed to embedBatch, in call order */
  readonly calls: string[][] = [];

  constructor(
    private readonly keywords: readonly string[],
    private readonly failOn?: string
  ) {}

  vectorFor(text: string): number[] {
    const lower = text.toLowerCase();
    const counts = this.keywords.map((keyword) => lower.split(keyword).length - 1);
    return [...counts, 1];
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector ?? [];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    const failOn = this.failOn;
    if (failOn !== undefined && texts.some((text) => text.includes(failOn))) {
      throw new Error(`refusing to embed "${failOn}"`);
    }
    return texts.map((text) => this.vectorFor(text));
  }
}

/**
 * Chat model that replays queued completions and records what it was sent.
 */
export class ScriptedChatModel implements ChatModel {
  readonly model = 'scripted-test';

  readonly requests: Array<{ messages: ChatMessage[]; tools: ToolDefinition[] }> = [];

  private readonly queue: ChatCompletion[];

  constructor(completions: ChatCompletion[]) {
    this.queue = [...completions];
  }

  async complete(
    messages: readonly ChatMessage[],
    tools: readonly ToolDefinition[]
  ): Promise<ChatCompletion> {
    this.requests.push({ messages: [...messages], tools: [...tools] });
    const next = this.queue.shift();
    if (!next) {
      throw new Error('ScriptedChatModel has no completions left');
    }
    return next;
  }
}
