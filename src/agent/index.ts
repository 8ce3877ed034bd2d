/**
 * Agent Module
 *
 * Tool-calling agent over the vector index, plus the assistant facade the
 * CLI and HTTP server share.
 */

export {
  CodebaseAgent,
  SYSTEM_PROMPT,
  MAX_ITERATIONS_NOTICE,
  type CodebaseAgentConfig,
  type AgentRunResult,
} from './agent.js';
export {
  CodebaseAssistant,
  type CodebaseAssistantOptions,
  type InitializeOptions,
  type HistoryMessage,
  type ConversationState,
  type ConversationSummary,
  type AssistantStatus,
} from './assistant.js';
export {
  OpenAIChatModel,
  createChatModel,
  toOpenAIMessage,
  fromOpenAIResponse,
  type OpenAIChatModelOptions,
  type LLMConfig,
} from './chat-model.js';
export { ConversationStore } from './conversation-store.js';
export { createSearchCodebaseTool, SEARCH_CODEBASE_TOOL_NAME } from './tools/index.js';
export type {
  ChatCompletion,
  ChatMessage,
  ChatModel,
  Checkpoint,
  Role,
  Tool,
  ToolCall,
  ToolDefinition,
} from './types.js';
