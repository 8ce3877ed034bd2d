/**
 * Agent Tools
 *
 * Tools available to the agent loop. Each is a plain object with a JSON
 * Schema for the model and an `execute` that returns text. Tools from MCP
 * servers are adapted to the same shape.
 */

export {
  createSearchCodebaseTool,
  SEARCH_CODEBASE_TOOL_NAME,
  type SearchCodebaseToolOptions,
} from './search-codebase-tool.js';

export {
  McpToolset,
  createTransport,
  formatToolResult,
  type McpToolsetOptions,
  type TransportFactory,
} from './mcp-tools.js';
