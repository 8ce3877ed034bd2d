/**
 * Conversation Store
 *
 * In-memory checkpointer keyed by conversation id. Each `put` replaces the
 * previous checkpoint of that conversation; nothing survives the process.
 */

import { randomUUID } from 'node:crypto';

import type { ChatMessage, Checkpoint } from './types.js';

export class ConversationStore {
  private readonly checkpoints = new Map<string, Checkpoint>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  get(conversationId: string): Checkpoint | undefined {
    return this.checkpoints.get(conversationId);
  }

  /**
   * Save the full message list of a conversation.
   */
  put(
    conversationId: string,
    messages: readonly ChatMessage[],
    metadata: Record<string, unknown> = {}
  ): Checkpoint {
    const previous = this.checkpoints.get(conversationId);
    const checkpoint: Checkpoint = {
      id: randomUUID(),
      conversationId,
      messages: [...messages],
      metadata: { ...previous?.metadata, ...metadata },
      updatedAt: this.now().toISOString(),
    };
    this.checkpoints.set(conversationId, checkpoint);
    return checkpoint;
  }

  /** Conversation ids in insertion order */
  list(): string[] {
    return [...this.checkpoints.keys()];
  }

  /** @returns false when the conversation was unknown */
  delete(conversationId: string): boolean {
    return this.checkpoints.delete(conversationId);
  }
}
