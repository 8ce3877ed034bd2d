/**
 * Configuration Schema
 *
 * Shape of ~/.cbi/config.toml, as zod schemas: TypeScript types and runtime
 * validation from one definition.
 */

import { z } from 'zod';

export const RepositoryConfigSchema = z.object({
  path: z.string().min(1).describe('Repository to index'),
  include_extensions: z
    .array(z.string())
    .describe('Only index these extensions (empty = every non-binary file)'),
});

export const StorageConfigSchema = z.object({
  path: z.string().describe('SQLite index file (empty = ~/.cbi/index.db)'),
});

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['openai']).describe('Embedding provider'),
  model: z.string().min(1).describe('Embedding model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .describe('Texts per embedding request (1-2048)'),
});

export const LLMConfigSchema = z.object({
  model: z.string().min(1).describe('Chat model used by the agent'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
  max_iterations: z
    .number()
    .int()
    .min(1)
    .max(50)
    .describe('Model calls per question before giving up'),
});

export const ChunkingConfigSchema = z.object({
  chunk_size: z.number().int().min(1).describe('Maximum characters per chunk'),
  chunk_overlap: z.number().int().min(0).describe('Characters shared by consecutive pieces'),
});

export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Results returned by search_codebase'),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
});

const StdioConnectionSchema = z.object({
  transport: z.literal('stdio'),
  command: z.string().min(1).describe('Executable that speaks MCP on stdin/stdout'),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional(),
});

const StreamableHttpConnectionSchema = z.object({
  transport: z.literal('streamable_http'),
  url: z.string().url().describe('MCP endpoint, e.g. http://localhost:8001/mcp/'),
});

export const McpConnectionSchema = z.discriminatedUnion('transport', [
  StdioConnectionSchema,
  StreamableHttpConnectionSchema,
]);

export type McpConnection = z.infer<typeof McpConnectionSchema>;

export const McpConfigSchema = z.object({
  connections: z
    .record(McpConnectionSchema)
    .describe('MCP servers whose tools are offered to the agent, by name'),
});

/**
 * Every section, without cross-field rules.
 */
export const BaseConfigSchema = z.object({
  repository: RepositoryConfigSchema,
  storage: StorageConfigSchema,
  embedding: EmbeddingConfigSchema,
  llm: LLMConfigSchema,
  chunking: ChunkingConfigSchema,
  search: SearchConfigSchema,
  server: ServerConfigSchema,
  mcp: McpConfigSchema,
});

/**
 * Complete config.toml shape, including cross-field rules.
 */
export const ConfigSchema = BaseConfigSchema.superRefine((config, ctx) => {
  if (config.chunking.chunk_overlap >= config.chunking.chunk_size) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['chunking', 'chunk_overlap'],
      message: 'must be smaller than chunking.chunk_size',
    });
  }
});

export type Config = z.infer<typeof BaseConfigSchema>;

/**
 * Sparse user overrides: every field optional, at any depth.
 */
export const PartialConfigSchema = BaseConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
