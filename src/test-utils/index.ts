/**
 * Test Utilities Module
 *
 * In-process stand-ins for the embedding API, the chat model and MCP
 * servers, plus temporary repositories on disk.
 *
 * @example
 * ```typescript
 * import { KeywordEmbeddingProvider, createTempRepo } from '../../test-utils/index.js';
 *
 * const repo = createTempRepo({ 'src/app.py': 'def run():\n    pass\n' });
 * afterAll(() => repo.cleanup());
 * ```
 */

export { KeywordEmbeddingProvider, ScriptedChatModel } from './fakes.js';
export { createTempRepo, type TempRepo } from './fixtures.js';
export { createInProcessServers, type ServerTool } from './mcp.js';
