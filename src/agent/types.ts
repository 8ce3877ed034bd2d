/**
 * Agent Types
 *
 * Message, tool and model contracts shared by the agent loop, the
 * conversation store and the OpenAI chat model.
 */

// ============================================================================
// Messages
// ============================================================================

export type Role = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A function call requested by the model.
 */
export interface ToolCall {
  /** Provider-assigned id, echoed back on the tool result */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ChatMessage {
  role: Role;
  content: string;
  /** Set on assistant messages that request tools */
  toolCalls?: ToolCall[];
  /** Set on tool messages: the call this result answers */
  toolCallId?: string;
  /** Tool name, on tool messages */
  name?: string;
}

// ============================================================================
// Tools
// ============================================================================

/**
 * What the model sees of a tool. `parameters` is a JSON Schema object.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

/**
 * A tool the agent can run. `execute` returns the text fed back to the
 * model; failures are reported in that text rather than thrown.
 */
export interface Tool extends ToolDefinition {
  execute(args: Record<string, unknown>): Promise<string>;
}

// ============================================================================
// Model
// ============================================================================

export interface ChatCompletion {
  /** Assistant text; empty when the model only requested tools */
  content: string;
  toolCalls: ToolCall[];
}

/**
 * Chat completion backend with function calling.
 */
export interface ChatModel {
  readonly model: string;
  complete(messages: readonly ChatMessage[], tools: readonly ToolDefinition[]): Promise<ChatCompletion>;
}

// ============================================================================
// Conversations
// ============================================================================

/**
 * Saved state of one conversation after its latest turn.
 */
export interface Checkpoint {
  /** Changes on every save */
  id: string;
  conversationId: string;
  messages: ChatMessage[];
  metadata: Record<string, unknown>;
  /** ISO-8601 */
  updatedAt: string;
}
