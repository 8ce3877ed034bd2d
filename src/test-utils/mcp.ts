/**
 * In-process MCP servers, linked to clients through the SDK's in-memory
 * transport.
 */

import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import type { TransportFactory } from '../agent/tools/mcp-tools.js';

export interface ServerTool {
  name: string;
  description?: string;
  inputSchema: { type: 'object'; properties?: Record<string, unknown>; required?: string[] };
  /** Throwing makes the call fail with a protocol error */
  handler: (args: Record<string, unknown>) => { text: string; isError?: boolean };
}

function createServer(name: string, tools: ServerTool[]): Server {
  const server = new Server({ name, version: '0.0.0' }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map((tool) => ({
      name: tool.name,
      inputSchema: tool.inputSchema,
      ...(tool.description !== undefined ? { description: tool.description } : {}),
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const tool = tools.find((candidate) => candidate.name === request.params.name);
    if (!tool) throw new Error(`Unknown tool: ${request.params.name}`);

    const { text, isError } = tool.handler(request.params.arguments ?? {});
    return { content: [{ type: 'text' as const, text }], ...(isError ? { isError } : {}) };
  });

  return server;
}

/**
 * A transport factory that answers every connection name in `servers` with
 * a fresh in-process server offering those tools.
 */
export function createInProcessServers(servers: Record<string, ServerTool[]>): TransportFactory {
  return async (name) => {
    const tools = servers[name];
    if (!tools) throw new Error(`No in-process server named ${name}`);

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await createServer(name, tools).connect(serverTransport);
    return clientTransport;
  };
}
