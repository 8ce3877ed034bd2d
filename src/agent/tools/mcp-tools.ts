/**
 * MCP Tools
 *
 * Offers the tools of the servers listed under [mcp.connections] to the
 * agent. One client per server; every tool a server lists becomes a `Tool`
 * whose `execute` forwards to `tools/call`.
 *
 * ```typescript
 * const toolset = new McpToolset({ connections: config.mcp.connections });
 * const tools = await toolset.loadTools(['search_codebase']);
 * // ...
 * await toolset.close();
 * ```
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { z } from 'zod';

import type { McpConnection } from '../../config/schema.js';
import { ToolServerError } from '../../errors/index.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { Tool } from '../types.js';

const CLIENT_INFO = { name: 'codebase-intel', version: '0.1.0' };

export type TransportFactory = (
  name: string,
  connection: McpConnection
) => Transport | Promise<Transport>;

export interface McpToolsetOptions {
  connections: Record<string, McpConnection>;
  logger?: Logger;
  /** Builds the transport for a connection. Default: createTransport */
  createTransport?: TransportFactory;
}

const CallToolResultSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .default([]),
  isError: z.boolean().optional(),
});

export function createTransport(_name: string, connection: McpConnection): Transport {
  switch (connection.transport) {
    case 'stdio':
      return new StdioClientTransport({
        command: connection.command,
        args: connection.args,
        ...(connection.env ? { env: connection.env } : {}),
      });
    case 'streamable_http':
      return new StreamableHTTPClientTransport(new URL(connection.url));
  }
}

/**
 * Text blocks are joined; anything else is named by its type.
 */
export function formatToolResult(result: unknown): string {
  const parsed = CallToolResultSchema.safeParse(result);
  if (!parsed.success) return 'Tool error: malformed tool result';

  const text = parsed.data.content
    .map((block) => (block.type === 'text' && block.text !== undefined ? block.text : `[${block.type}]`))
    .join('\n');

  if (parsed.data.isError) return `Tool error: ${text || 'unknown error'}`;
  return text || '(no output)';
}

export class McpToolset {
  private readonly connections: Record<string, McpConnection>;
  private readonly logger: Logger;
  private readonly transportFactory: TransportFactory;
  private clients: Client[] = [];

  constructor(options: McpToolsetOptions) {
    this.connections = options.connections;
    this.logger = options.logger ?? silentLogger;
    this.transportFactory = options.createTransport ?? createTransport;
  }

  get size(): number {
    return Object.keys(this.connections).length;
  }

  /**
   * Connect to every server and list its tools. Clients from a previous
   * call are closed first. A tool whose name is taken (by `reservedNames`
   * or an earlier server) is skipped with a warning.
   *
   * @throws ToolServerError when a server cannot be reached or listed
   */
  async loadTools(reservedNames: readonly string[] = []): Promise<Tool[]> {
    await this.close();
    if (this.size === 0) return [];

    const taken = new Set(reservedNames);
    const tools: Tool[] = [];

    for (const [server, connection] of Object.entries(this.connections)) {
      const client = await this.connect(server, connection);

      for (const tool of await this.listServerTools(server, client)) {
        if (taken.has(tool.name)) {
          this.logger.warn(`Skipping MCP tool "${tool.name}" from "${server}": name already taken`);
          continue;
        }
        taken.add(tool.name);
        tools.push(tool);
      }
    }

    this.logger.info(`Loaded ${tools.length} MCP tools.`);
    return tools;
  }

  async close(): Promise<void> {
    const clients = this.clients;
    this.clients = [];
    await Promise.all(clients.map((client) => client.close()));
  }

  private async connect(server: string, connection: McpConnection): Promise<Client> {
    const client = new Client(CLIENT_INFO);
    try {
      await client.connect(await this.transportFactory(server, connection));
    } catch (error) {
      throw new ToolServerError(server, error instanceof Error ? error.message : String(error));
    }
    this.clients.push(client);
    return client;
  }

  private async listServerTools(server: string, client: Client): Promise<Tool[]> {
    const tools: Tool[] = [];
    let cursor: string | undefined;

    try {
      do {
        const page = await client.listTools(cursor ? { cursor } : undefined);
        for (const listed of page.tools) {
          tools.push(this.toTool(server, client, listed.name, listed.description, { ...listed.inputSchema }));
        }
        cursor = page.nextCursor;
      } while (cursor);
    } catch (error) {
      throw new ToolServerError(server, error instanceof Error ? error.message : String(error));
    }

    this.logger.debug?.(`MCP server "${server}" offers ${tools.length} tools`);
    return tools;
  }

  private toTool(
    server: string,
    client: Client,
    name: string,
    description: string | undefined,
    parameters: Record<string, unknown>
  ): Tool {
    const logger = this.logger;
    return {
      name,
      description: description ?? `${name} (from ${server})`,
      parameters,
      async execute(args) {
        try {
          return formatToolResult(await client.callTool({ name, arguments: args }));
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn(`MCP tool "${name}" failed: ${message}`);
          return `Tool error: ${message}`;
        }
      },
    };
  }
}
